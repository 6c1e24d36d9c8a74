import type { FastifyBaseLogger } from "fastify";
import { describeErrors, validateSchema } from "@campus-items/contracts";
import { newItemId, type ErrorCode, type Item, type ItemPatch } from "@campus-items/shared";
import type { ItemStore } from "./store.js";

export type ServiceResult<T> = { ok: true; data: T } | { ok: false; code: ErrorCode; message: string };

type ItemServiceOptions = {
  log: Pick<FastifyBaseLogger, "warn">;
  generateId?: () => string;
};

export type ItemService = ReturnType<typeof createItemService>;

const ITEM_NOT_FOUND = "Item not found";

function success<T>(data: T): ServiceResult<T> {
  return { ok: true, data };
}

function rejected<T>(code: ErrorCode, message: string): ServiceResult<T> {
  return { ok: false, code, message };
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

// Copies only recognised fields; unknown keys in the body never reach the store.
function pickPatch(input: ItemPatch): ItemPatch {
  return {
    ...(input.title !== undefined ? { title: input.title } : {}),
    ...(input.source !== undefined ? { source: { name: input.source.name } } : {}),
    ...(input.publishedAt !== undefined ? { publishedAt: input.publishedAt } : {}),
    ...(input.url !== undefined ? { url: input.url } : {}),
    ...(input.summary !== undefined ? { summary: input.summary } : {}),
    ...(input.tags !== undefined ? { tags: [...input.tags] } : {}),
  };
}

export function createItemService(store: ItemStore, options: ItemServiceOptions) {
  const generateId = options.generateId ?? newItemId;
  const log = options.log;

  function list(limit: number, offset: number): ServiceResult<Item[]> {
    return success(store.list(limit, offset));
  }

  function get(id: string): ServiceResult<Item> {
    const item = store.getById(id);
    return item ? success(item) : rejected("NOT_FOUND", ITEM_NOT_FOUND);
  }

  function create(payload: unknown): ServiceResult<Item> {
    if (!isObjectRecord(payload)) {
      return rejected("VALIDATION_ERROR", "request body must be an object");
    }
    const result = validateSchema("itemInput", payload);
    if (!result.ok) {
      return rejected("VALIDATION_ERROR", describeErrors(result.errors));
    }
    const input = result.value;
    const item: Item = {
      id: generateId(),
      title: input.title,
      source: { name: input.source.name },
      publishedAt: input.publishedAt,
      url: input.url,
      summary: input.summary,
      tags: [...(input.tags ?? [])],
    };
    try {
      store.insert(item);
    } catch (err) {
      log.warn({ err, itemId: item.id }, "item_insert_failed");
      return rejected("VALIDATION_ERROR", "item could not be stored");
    }
    return success(item);
  }

  function update(id: string, payload: unknown): ServiceResult<Item> {
    const body = payload ?? {};
    if (!isObjectRecord(body)) {
      return rejected("VALIDATION_ERROR", "request body must be an object");
    }
    // Checked before the schema: the key is refused even when it repeats the current id.
    if (Object.hasOwn(body, "id")) {
      return rejected("VALIDATION_ERROR", "id field cannot be updated");
    }
    const result = validateSchema("itemPatch", body);
    if (!result.ok) {
      return rejected("VALIDATION_ERROR", describeErrors(result.errors));
    }
    if (!store.getById(id)) {
      return rejected("NOT_FOUND", ITEM_NOT_FOUND);
    }
    const updated = store.update(id, pickPatch(result.value));
    return updated ? success(updated) : rejected("NOT_FOUND", ITEM_NOT_FOUND);
  }

  function remove(id: string): ServiceResult<null> {
    if (!store.getById(id)) {
      return rejected("NOT_FOUND", ITEM_NOT_FOUND);
    }
    store.deleteById(id);
    return success(null);
  }

  return { list, get, create, update, remove };
}
