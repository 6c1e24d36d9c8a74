import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply } from "fastify";
import cors from "@fastify/cors";
import {
  HTTP_STATUS_BY_CODE,
  LIST_LIMIT_DEFAULT,
  LIST_LIMIT_MAX,
  LIST_LIMIT_MIN,
  failure,
  newItemId,
  ok,
} from "@campus-items/shared";
import { dbPathFromEnv, logLevelFromEnv, resolveFromRoot, seedPathFromEnv, type LogLevel } from "./config.js";
import { createItemService, type ServiceResult } from "./items.js";
import { loadSeedRecords } from "./seed.js";
import { openItemStore } from "./store.js";

type CreateAppOptions = {
  dbPath?: string;
  seedPath?: string;
  logLevel?: LogLevel;
  generateId?: () => string;
};

type ListQuery = {
  limit: number;
  offset: number;
};

type ItemParams = {
  id: string;
};

const LIST_QUERY_SCHEMA = {
  type: "object",
  properties: {
    limit: { type: "integer", minimum: LIST_LIMIT_MIN, maximum: LIST_LIMIT_MAX, default: LIST_LIMIT_DEFAULT },
    offset: { type: "integer", minimum: 0, default: 0 },
  },
} as const;

function sendResult<T>(reply: FastifyReply, result: ServiceResult<T>, successStatus = 200): FastifyReply {
  if (!result.ok) {
    return reply.status(HTTP_STATUS_BY_CODE[result.code]).send(failure(result.code, result.message));
  }
  return reply.status(successStatus).send(ok(result.data));
}

export async function createApp(options: CreateAppOptions = {}): Promise<FastifyInstance> {
  // Environment values are read only for options the caller left unset.
  const dbPath = options.dbPath ? resolveFromRoot(options.dbPath) : dbPathFromEnv();
  const seedPath = options.seedPath ? resolveFromRoot(options.seedPath) : seedPathFromEnv();
  const generateId = options.generateId ?? newItemId;

  const app = Fastify({ logger: { level: options.logLevel ?? logLevelFromEnv() } });
  await app.register(cors, { origin: true });

  const store = await openItemStore(dbPath);
  try {
    const seeded = store.seedIfEmpty(loadSeedRecords(seedPath, app.log), generateId);
    if (seeded > 0) {
      app.log.info({ seeded, seedPath }, "seed_loaded");
    }
  } catch (err) {
    store.close();
    throw err;
  }
  app.addHook("onClose", async () => {
    store.close();
  });

  const items = createItemService(store, { log: app.log, generateId });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (error.validation || (statusCode >= 400 && statusCode < 500)) {
      return reply.status(error.validation ? 400 : statusCode).send(failure("VALIDATION_ERROR", error.message));
    }
    request.log.error({ err: error }, "unhandled_error");
    return reply.status(500).send(failure("INTERNAL_ERROR", "Internal server error"));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send(failure("NOT_FOUND", `Route ${request.method} ${request.url} not found`));
  });

  app.get("/health", async () => ({ status: "ok" }));

  app.get<{ Querystring: ListQuery }>("/api/v1/items", { schema: { querystring: LIST_QUERY_SCHEMA } }, async (request, reply) => {
    return sendResult(reply, items.list(request.query.limit, request.query.offset));
  });

  app.get<{ Params: ItemParams }>("/api/v1/items/:id", async (request, reply) => {
    return sendResult(reply, items.get(request.params.id));
  });

  app.post("/api/v1/items", async (request, reply) => {
    return sendResult(reply, items.create(request.body), 201);
  });

  app.patch<{ Params: ItemParams }>("/api/v1/items/:id", async (request, reply) => {
    return sendResult(reply, items.update(request.params.id, request.body));
  });

  app.delete<{ Params: ItemParams }>("/api/v1/items/:id", async (request, reply) => {
    const result = items.remove(request.params.id);
    if (!result.ok) {
      return sendResult(reply, result);
    }
    return reply.status(204).send();
  });

  return app;
}
