import test from "node:test";
import assert from "node:assert/strict";
import { PUBLISHED_AT_MESSAGE, type ItemInput } from "@campus-items/shared";
import { createItemService, type ItemService } from "../src/items.js";
import { IN_MEMORY_DB, openItemStore, type ItemStore } from "../src/store.js";

const input = {
  title: "Exam timetable published",
  source: { name: "Registrar" },
  publishedAt: "2025-04-01T12:00:00Z",
  url: "https://campus.example.org/exams",
  summary: "Check your personal timetable.",
  tags: ["exams"],
} satisfies ItemInput;

async function withService(
  run: (service: ItemService, store: ItemStore, warnings: unknown[][]) => void,
): Promise<void> {
  const store = await openItemStore(IN_MEMORY_DB);
  const warnings: unknown[][] = [];
  let next = 0;
  const service = createItemService(store, {
    log: {
      warn: (...args: unknown[]) => {
        warnings.push(args);
      },
    },
    generateId: () => {
      next += 1;
      return `itm_test_${next}`;
    },
  });
  try {
    run(service, store, warnings);
  } finally {
    store.close();
  }
}

test("create stores the item under a generated id", async () => {
  await withService((service, store) => {
    const result = service.create(input);
    assert.deepEqual(result, { ok: true, data: { ...input, id: "itm_test_1" } });
    assert.deepEqual(store.getById("itm_test_1"), { ...input, id: "itm_test_1" });
  });
});

test("create drops unknown fields before storing", async () => {
  await withService((service) => {
    const result = service.create({ ...input, source: { name: "Registrar", region: "north" }, extra: true });
    assert.deepEqual(result, { ok: true, data: { ...input, id: "itm_test_1" } });
  });
});

test("create reports the publishedAt format", async () => {
  await withService((service) => {
    assert.deepEqual(service.create({ ...input, publishedAt: "2025-04-01T12:00:00+00:00" }), {
      ok: false,
      code: "VALIDATION_ERROR",
      message: PUBLISHED_AT_MESSAGE,
    });
  });
});

test("create logs and downgrades a storage failure", async () => {
  await withService((service, store, warnings) => {
    store.insert({ ...input, id: "itm_test_1" });
    assert.deepEqual(service.create(input), {
      ok: false,
      code: "VALIDATION_ERROR",
      message: "item could not be stored",
    });
    assert.equal(warnings.length, 1);
    assert.equal(warnings[0]?.[1], "item_insert_failed");
  });
});

test("get and remove report NOT_FOUND for unknown ids", async () => {
  await withService((service) => {
    const notFound = { ok: false, code: "NOT_FOUND", message: "Item not found" };
    assert.deepEqual(service.get("itm_nope"), notFound);
    assert.deepEqual(service.remove("itm_nope"), notFound);
  });
});

test("update checks the id key, then the fields, then existence", async () => {
  await withService((service) => {
    assert.deepEqual(service.update("itm_nope", { id: "itm_nope" }), {
      ok: false,
      code: "VALIDATION_ERROR",
      message: "id field cannot be updated",
    });
    assert.deepEqual(service.update("itm_nope", { url: "" }), {
      ok: false,
      code: "VALIDATION_ERROR",
      message: "url must NOT have fewer than 1 characters",
    });
    assert.deepEqual(service.update("itm_nope", { url: "https://campus.example.org/x" }), {
      ok: false,
      code: "NOT_FOUND",
      message: "Item not found",
    });
    assert.deepEqual(service.update("itm_nope", "title"), {
      ok: false,
      code: "VALIDATION_ERROR",
      message: "request body must be an object",
    });
  });
});

test("update merges present fields and ignores unknown ones", async () => {
  await withService((service) => {
    service.create(input);
    const result = service.update("itm_test_1", { title: "Exam timetable revised", note: "ignored" });
    assert.deepEqual(result, {
      ok: true,
      data: { ...input, id: "itm_test_1", title: "Exam timetable revised" },
    });
    assert.deepEqual(service.update("itm_test_1", undefined), result);
  });
});

test("list and remove", async () => {
  await withService((service) => {
    service.create(input);
    service.create({ ...input, publishedAt: "2025-04-02T12:00:00Z" });
    const listed = service.list(10, 0);
    assert.ok(listed.ok);
    assert.deepEqual(
      listed.data.map((item) => item.id),
      ["itm_test_2", "itm_test_1"],
    );
    assert.deepEqual(service.remove("itm_test_2"), { ok: true, data: null });
    assert.deepEqual(service.get("itm_test_2"), { ok: false, code: "NOT_FOUND", message: "Item not found" });
  });
});
