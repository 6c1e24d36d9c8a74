import { dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { IN_MEMORY_DB } from "./store.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type ApiConfig = {
  port: number;
  host: string;
  dbPath: string;
  seedPath: string;
  logLevel: LogLevel;
};

export function repoRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "../../..");
}

export function resolveFromRoot(path: string): string {
  if (path === IN_MEMORY_DB || isAbsolute(path)) return path;
  return resolve(repoRoot(), path);
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parsePort(rawValue: string | undefined): number {
  const trimmed = (rawValue ?? "").trim();
  if (!trimmed) return 8080;
  const port = Number(trimmed);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`API_PORT must be an integer between 0 and 65535, got: ${rawValue}`);
  }
  return port;
}

function parseLogLevel(rawValue: string | undefined): LogLevel {
  const normalized = (rawValue ?? "").trim().toLowerCase();
  if (!normalized) return "info";
  if (!isLogLevel(normalized)) {
    throw new Error(`LOG_LEVEL must be ${LOG_LEVELS.join("|")}, got: ${rawValue}`);
  }
  return normalized;
}

export function dbPathFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  return resolveFromRoot(env.DB_PATH?.trim() || "apps/api/data/items.db");
}

export function seedPathFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  return resolveFromRoot(env.SEED_PATH?.trim() || "data/seed.json");
}

export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseLogLevel(env.LOG_LEVEL);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return {
    port: parsePort(env.API_PORT),
    host: env.API_HOST?.trim() || "0.0.0.0",
    dbPath: dbPathFromEnv(env),
    seedPath: seedPathFromEnv(env),
    logLevel: logLevelFromEnv(env),
  };
}
