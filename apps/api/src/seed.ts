import { readFileSync } from "node:fs";
import type { FastifyBaseLogger } from "fastify";
import { describeErrors, validateSchema } from "@campus-items/contracts";
import type { ItemInput } from "@campus-items/shared";

type SeedLogger = Pick<FastifyBaseLogger, "warn">;

/**
 * Reads the seed file as a JSON array of create payloads.
 * An unreadable or malformed file yields no records; records failing the create schema are skipped.
 */
export function loadSeedRecords(seedPath: string, log: SeedLogger): ItemInput[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(seedPath, "utf-8")) as unknown;
  } catch (err) {
    log.warn({ err, seedPath }, "seed_file_unreadable");
    return [];
  }
  if (!Array.isArray(parsed)) {
    log.warn({ seedPath }, "seed_file_unreadable");
    return [];
  }

  const records: ItemInput[] = [];
  parsed.forEach((entry: unknown, index) => {
    const result = validateSchema("itemInput", entry);
    if (result.ok) {
      records.push(result.value);
    } else {
      log.warn({ seedPath, index, reason: describeErrors(result.errors) }, "seed_record_invalid");
    }
  });
  return records;
}
