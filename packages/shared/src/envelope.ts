export const ERROR_CODES = ["VALIDATION_ERROR", "NOT_FOUND", "INTERNAL_ERROR"] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export const HTTP_STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
};

export type OkEnvelope<T> = {
  status: "ok";
  data: T;
};

export type ErrorEnvelope = {
  status: "error";
  error: {
    code: ErrorCode;
    message: string;
  };
};

export function ok<T>(data: T): OkEnvelope<T> {
  return { status: "ok", data };
}

export function failure(code: ErrorCode, message: string): ErrorEnvelope {
  return { status: "error", error: { code, message } };
}
