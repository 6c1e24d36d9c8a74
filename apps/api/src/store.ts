import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import initSqlJsModule, { type Database, type ParamsObject, type SqlJsStatic, type SqlValue } from "sql.js";
import { PATCHABLE_FIELDS, type Item, type ItemInput, type ItemPatch, type ItemRow, type PatchableField } from "@campus-items/shared";

export const IN_MEMORY_DB = ":memory:";

const ITEM_COLUMNS = "id, title, source_name, publishedAt, url, summary, tags";

const COLUMN_BY_FIELD: Record<PatchableField, keyof ItemRow> = {
  title: "title",
  source: "source_name",
  publishedAt: "publishedAt",
  url: "url",
  summary: "summary",
  tags: "tags",
};

// sql.js is CommonJS; from ESM the default import is module.exports, which carries `default`.
const initSqlJs = initSqlJsModule.default;

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

function safeParseJson(rawValue: string | null): unknown {
  if (!rawValue) return undefined;
  try {
    return JSON.parse(rawValue) as unknown;
  } catch {
    return undefined;
  }
}

function parseTags(rawValue: string | null): string[] {
  const parsed = safeParseJson(rawValue);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((tag): tag is string => typeof tag === "string");
}

function textColumn(record: ParamsObject, column: keyof ItemRow): string {
  const value = record[column];
  return typeof value === "string" ? value : "";
}

function toItemRow(record: ParamsObject): ItemRow {
  return {
    id: textColumn(record, "id"),
    title: textColumn(record, "title"),
    source_name: textColumn(record, "source_name"),
    publishedAt: textColumn(record, "publishedAt"),
    url: textColumn(record, "url"),
    summary: textColumn(record, "summary"),
    tags: textColumn(record, "tags"),
  };
}

export function rowToItem(row: ItemRow): Item {
  return {
    id: row.id,
    title: row.title,
    source: { name: row.source_name },
    publishedAt: row.publishedAt,
    url: row.url,
    summary: row.summary,
    tags: parseTags(row.tags),
  };
}

export function itemToRow(item: Item): ItemRow {
  return {
    id: item.id,
    title: item.title,
    source_name: item.source.name,
    publishedAt: item.publishedAt,
    url: item.url,
    summary: item.summary,
    tags: JSON.stringify(item.tags),
  };
}

function patchValue(field: PatchableField, patch: ItemPatch): string | undefined {
  switch (field) {
    case "source":
      return patch.source?.name;
    case "tags":
      return patch.tags ? JSON.stringify(patch.tags) : undefined;
    default:
      return patch[field];
  }
}

/**
 * Item table over an in-process SQLite engine. File-backed stores write the
 * whole database image back to `filePath` after every change.
 */
export class ItemStore {
  constructor(
    private readonly db: Database,
    private readonly filePath: string | null = null,
  ) {}

  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS items (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        source_name TEXT NOT NULL,
        publishedAt TEXT NOT NULL,
        url TEXT NOT NULL,
        summary TEXT NOT NULL,
        tags TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_items_published_at ON items(publishedAt);
    `);
    this.persist();
  }

  count(): number {
    const value = this.select("SELECT COUNT(1) AS count FROM items")[0]?.count;
    return typeof value === "number" ? value : 0;
  }

  /** Inserts every record under a fresh id when the table is empty. Returns how many rows were written. */
  seedIfEmpty(records: ItemInput[], generateId: () => string): number {
    if (this.count() > 0) {
      return 0;
    }
    this.db.exec("BEGIN");
    try {
      for (const input of records) {
        this.writeRow({
          id: generateId(),
          title: input.title,
          source: { name: input.source.name },
          publishedAt: input.publishedAt,
          url: input.url,
          summary: input.summary,
          tags: input.tags ?? [],
        });
      }
      this.db.exec("COMMIT");
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    }
    this.persist();
    return records.length;
  }

  // publishedAt is compared as text; same-format UTC strings sort chronologically.
  list(limit: number, offset: number): Item[] {
    const rows = this.select(
      `
        SELECT ${ITEM_COLUMNS}
        FROM items
        ORDER BY publishedAt DESC
        LIMIT ?
        OFFSET ?
      `,
      [limit, offset],
    );
    return rows.map((record) => rowToItem(toItemRow(record)));
  }

  getById(id: string): Item | null {
    const record = this.select(`SELECT ${ITEM_COLUMNS} FROM items WHERE id = ?`, [id])[0];
    return record ? rowToItem(toItemRow(record)) : null;
  }

  insert(item: Item): void {
    this.writeRow(item);
    this.persist();
  }

  update(id: string, patch: ItemPatch): Item | null {
    const setParts: string[] = [];
    const params: string[] = [];
    for (const field of PATCHABLE_FIELDS) {
      const value = patchValue(field, patch);
      if (value === undefined) continue;
      setParts.push(`${COLUMN_BY_FIELD[field]} = ?`);
      params.push(value);
    }
    if (setParts.length) {
      this.db.run(`UPDATE items SET ${setParts.join(", ")} WHERE id = ?`, [...params, id]);
      if (this.db.getRowsModified() > 0) {
        this.persist();
      }
    }
    return this.getById(id);
  }

  deleteById(id: string): boolean {
    this.db.run("DELETE FROM items WHERE id = ?", [id]);
    const removed = this.db.getRowsModified() > 0;
    if (removed) {
      this.persist();
    }
    return removed;
  }

  close(): void {
    this.db.close();
  }

  private writeRow(item: Item): void {
    const row = itemToRow(item);
    this.db.run(`INSERT INTO items (${ITEM_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`, [
      row.id,
      row.title,
      row.source_name,
      row.publishedAt,
      row.url,
      row.summary,
      row.tags,
    ]);
  }

  private select(sql: string, params: SqlValue[] = []): ParamsObject[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const records: ParamsObject[] = [];
      while (statement.step()) {
        records.push(statement.getAsObject());
      }
      return records;
    } finally {
      statement.free();
    }
  }

  private persist(): void {
    if (this.filePath) {
      writeFileSync(this.filePath, this.db.export());
    }
  }
}

export async function openItemStore(dbPath: string): Promise<ItemStore> {
  const SQL = await loadSqlJs();
  if (dbPath === IN_MEMORY_DB) {
    const store = new ItemStore(new SQL.Database());
    store.initialize();
    return store;
  }

  mkdirSync(dirname(dbPath), { recursive: true });
  const db = existsSync(dbPath) ? new SQL.Database(readFileSync(dbPath)) : new SQL.Database();
  const store = new ItemStore(db, dbPath);
  store.initialize();
  return store;
}
