import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { ErrorObject, ValidateFunction } from "ajv";
import Ajv2020Module from "ajv/dist/2020.js";
import { PUBLISHED_AT_MESSAGE, type Item, type ItemInput, type ItemPatch } from "@campus-items/shared";

export type SchemaError = { path: string; message: string };

export type ValidateResult<T> = { ok: true; value: T } | { ok: false; errors: SchemaError[] };

const SCHEMA_FILES = {
  item: "item.schema.json",
  itemInput: "item-input.schema.json",
  itemPatch: "item-patch.schema.json",
} as const;

export type SchemaName = keyof typeof SCHEMA_FILES;

type SchemaTypes = {
  item: Item;
  itemInput: ItemInput;
  itemPatch: ItemPatch;
};

// Ajv is CommonJS; from ESM the default import is module.exports, which carries `default`.
const Ajv2020 = Ajv2020Module.default;

// Extended ISO-8601: seconds and fraction optional, zone required.
const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?(?:Z|[+-](\d{2}):(\d{2}))$/u;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1] ?? 0;
}

/** Calendar-checked date-time; years 0001-9999, no leap seconds, offsets under 24h. */
export function isIsoDateTime(value: string): boolean {
  const match = ISO_DATE_TIME.exec(value);
  if (!match) return false;
  const [year, month, day, hour, minute, second, offsetHour, offsetMinute] = match
    .slice(1)
    .map((part) => Number(part ?? "0"));
  if (year < 1 || month < 1 || month > 12) return false;
  if (day < 1 || day > daysInMonth(year, month)) return false;
  if (hour > 23 || minute > 59 || second > 59) return false;
  return offsetHour <= 23 && offsetMinute <= 59;
}

const ajv = new Ajv2020({
  allErrors: true,
  strict: false,
});
ajv.addFormat("iso-date-time", isIsoDateTime);

function findRepoRoot(startDir: string): string {
  let current = resolve(startDir);
  while (true) {
    if (existsSync(resolve(current, "docs/contracts/schemas"))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      throw new Error(`Unable to locate repo root from: ${startDir}`);
    }
    current = parent;
  }
}

function schemaDirectory(): string {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const root = findRepoRoot(moduleDir);
  return resolve(root, "docs/contracts/schemas");
}

function lazyValidator<T>(name: SchemaName): () => ValidateFunction<T> {
  let compiled: ValidateFunction<T> | undefined;
  return () => {
    if (!compiled) {
      const schemaPath = resolve(schemaDirectory(), SCHEMA_FILES[name]);
      compiled = ajv.compile<T>(JSON.parse(readFileSync(schemaPath, "utf-8")));
    }
    return compiled;
  };
}

const validators: { [N in SchemaName]: () => ValidateFunction<SchemaTypes[N]> } = {
  item: lazyValidator<Item>("item"),
  itemInput: lazyValidator<ItemInput>("itemInput"),
  itemPatch: lazyValidator<ItemPatch>("itemPatch"),
};

function pointerToPath(pointer: string): string {
  return pointer
    .split("/")
    .filter(Boolean)
    .map((segment) => segment.replace(/~1/gu, "/").replace(/~0/gu, "~"))
    .join(".");
}

function toErrors(errors: ErrorObject[] | null | undefined): SchemaError[] {
  if (!errors) {
    return [];
  }
  return errors.map((e) => {
    const missing: unknown = e.keyword === "required" ? e.params.missingProperty : undefined;
    if (typeof missing === "string") {
      return { path: pointerToPath(`${e.instancePath}/${missing}`), message: "is required" };
    }
    return {
      path: pointerToPath(e.instancePath),
      message: e.message || "Invalid value",
    };
  });
}

export function validateSchema<N extends SchemaName>(name: N, payload: unknown): ValidateResult<SchemaTypes[N]> {
  const validator = validators[name]();

  if (validator(payload)) {
    return { ok: true, value: payload };
  }

  return { ok: false, errors: toErrors(validator.errors) };
}

/**
 * Collapses schema errors into one human-readable line.
 * Every `publishedAt` failure (format or missing `Z`) reads as the same message.
 */
export function describeErrors(errors: SchemaError[]): string {
  const lines = errors.map((error) => {
    if (error.path === "publishedAt") return PUBLISHED_AT_MESSAGE;
    return `${error.path || "request body"} ${error.message}`;
  });
  return Array.from(new Set(lines)).join("; ");
}

export function ensureSchema<N extends SchemaName>(name: N, payload: unknown): SchemaTypes[N] {
  const result = validateSchema(name, payload);
  if (!result.ok) {
    throw new Error(`Schema validation failed for ${name}: ${describeErrors(result.errors)}`);
  }
  return result.value;
}
