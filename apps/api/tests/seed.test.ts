import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import assert from "node:assert/strict";
import { loadSeedRecords } from "../src/seed.js";
import { resolveFromRoot } from "../src/config.js";

function recordingLog() {
  const events: string[] = [];
  return {
    events,
    log: {
      warn: (_obj: unknown, msg?: string) => {
        events.push(msg ?? "");
      },
    },
  };
}

function seedFile(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), "campus-items-seed-loader-"));
  const path = join(dir, "seed.json");
  writeFileSync(path, contents, "utf-8");
  return path;
}

const validRecord = {
  title: "Open day",
  source: { name: "Admissions" },
  publishedAt: "2025-05-10T10:00:00Z",
  url: "https://campus.example.org/open-day",
  summary: "Tours every hour.",
  tags: ["admissions"],
};

test("loadSeedRecords returns valid records and skips invalid ones", () => {
  const { events, log } = recordingLog();
  const path = seedFile(JSON.stringify([validRecord, { ...validRecord, publishedAt: "2025-05-10" }, { title: "" }]));
  assert.deepEqual(loadSeedRecords(path, log), [validRecord]);
  assert.deepEqual(events, ["seed_record_invalid", "seed_record_invalid"]);
});

test("loadSeedRecords treats a missing file as no data", () => {
  const { events, log } = recordingLog();
  assert.deepEqual(loadSeedRecords(join(tmpdir(), "campus-items-no-such-dir", "seed.json"), log), []);
  assert.deepEqual(events, ["seed_file_unreadable"]);
});

test("loadSeedRecords rejects non-array documents", () => {
  const { events, log } = recordingLog();
  assert.deepEqual(loadSeedRecords(seedFile('{"title":"not a list"}'), log), []);
  assert.deepEqual(events, ["seed_file_unreadable"]);
});

test("the bundled seed file holds eight valid records", () => {
  const { events, log } = recordingLog();
  const records = loadSeedRecords(resolveFromRoot("data/seed.json"), log);
  assert.equal(records.length, 8);
  assert.deepEqual(events, []);
});
