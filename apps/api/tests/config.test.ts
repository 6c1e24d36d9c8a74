import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig, repoRoot } from "../src/config.js";

test("loadConfig returns defaults for an empty environment", () => {
  const config = loadConfig({});
  assert.deepEqual(config, {
    port: 8080,
    host: "0.0.0.0",
    dbPath: resolve(repoRoot(), "apps/api/data/items.db"),
    seedPath: resolve(repoRoot(), "data/seed.json"),
    logLevel: "info",
  });
});

test("loadConfig reads overrides and keeps :memory: and absolute paths", () => {
  const config = loadConfig({
    API_PORT: "9090",
    API_HOST: "127.0.0.1",
    DB_PATH: ":memory:",
    SEED_PATH: "/srv/seed/items.json",
    LOG_LEVEL: " WARN ",
  });
  assert.equal(config.port, 9090);
  assert.equal(config.host, "127.0.0.1");
  assert.equal(config.dbPath, ":memory:");
  assert.equal(config.seedPath, "/srv/seed/items.json");
  assert.equal(config.logLevel, "warn");
});

test("loadConfig rejects an invalid port or log level", () => {
  assert.throws(() => loadConfig({ API_PORT: "eighty" }), /API_PORT must be an integer/u);
  assert.throws(() => loadConfig({ API_PORT: "70000" }), /API_PORT must be an integer/u);
  assert.throws(() => loadConfig({ LOG_LEVEL: "verbose" }), /LOG_LEVEL must be/u);
});

test("repoRoot points at the directory holding the seed data", () => {
  assert.equal(resolve(repoRoot(), "data"), fileURLToPath(new URL("../../../data", import.meta.url)));
});
