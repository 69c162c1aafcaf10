import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { getConfig } from "./config";

export type CacheKind = "count" | "coverage";

const CacheRowSchema = z.object({ resultJson: z.string() });

/** Canonical cache key: the sorted hand plus the query parameters in key order. */
export function cacheKey(numbers: readonly number[], params: Record<string, number | boolean | null>): string {
  const sorted = [...numbers].sort((a, b) => a - b).join(",");
  const rest = Object.keys(params)
    .sort()
    .map((k) => `${k}=${String(params[k])}`)
    .join("&");
  return rest ? `${sorted}|${rest}` : sorted;
}

/** Accepts Neon's sql tagged-template function (typed loosely to avoid Neon generic mismatch). */
async function initNeonSchema(
  sql: (strings: TemplateStringsArray, ...values: unknown[]) => Promise<unknown>
) {
  await sql`
    CREATE TABLE IF NOT EXISTS query_cache (
      kind TEXT NOT NULL,
      key TEXT NOT NULL,
      "resultJson" TEXT NOT NULL,
      "createdAt" BIGINT NOT NULL,
      PRIMARY KEY (kind, key)
    )
  `;
}

// ---- Neon (async) path ----
async function neonDb(connectionString: string) {
  const { neon } = await import("@neondatabase/serverless");
  const sql = neon(connectionString);
  await initNeonSchema(sql);
  return sql;
}

let neonSql: Awaited<ReturnType<typeof neonDb>> | null = null;

async function getNeon(connectionString: string) {
  if (neonSql) return neonSql;
  neonSql = await neonDb(connectionString);
  return neonSql;
}

/**
 * Look up a cached query result. Rows that no longer match `schema` (e.g.
 * written by an older release) are treated as misses.
 */
export async function getCachedResult<T>(
  kind: CacheKind,
  key: string,
  schema: z.ZodType<T>
): Promise<T | null> {
  const config = getConfig();
  if (config.cacheDisabled) return null;

  let row: unknown;
  if (config.databaseUrl) {
    const sql = await getNeon(config.databaseUrl);
    const rows = await sql`
      SELECT "resultJson" FROM query_cache WHERE kind = ${kind} AND key = ${key}
    `;
    row = rows[0];
  } else {
    row = sqliteGetCachedRow(kind, key);
  }

  const parsedRow = CacheRowSchema.safeParse(row);
  if (!parsedRow.success) return null;
  const value = schema.safeParse(JSON.parse(parsedRow.data.resultJson));
  return value.success ? value.data : null;
}

export async function putCachedResult(kind: CacheKind, key: string, value: unknown): Promise<void> {
  const config = getConfig();
  if (config.cacheDisabled) return;

  const resultJson = JSON.stringify(value);
  const now = Date.now();
  if (config.databaseUrl) {
    const sql = await getNeon(config.databaseUrl);
    await sql`
      INSERT INTO query_cache (kind, key, "resultJson", "createdAt")
      VALUES (${kind}, ${key}, ${resultJson}, ${now})
      ON CONFLICT (kind, key) DO UPDATE SET "resultJson" = EXCLUDED."resultJson", "createdAt" = EXCLUDED."createdAt"
    `;
    return;
  }
  sqlitePutCachedRow(kind, key, resultJson, now);
}

// ---- SQLite (sync) path for local dev when no Postgres URL ----
let sqliteDb: Database.Database | null = null;

function getSqliteDb(): Database.Database {
  if (sqliteDb) return sqliteDb;
  const { cachePath } = getConfig();
  if (cachePath !== ":memory:") {
    const dbPath = path.resolve(process.cwd(), cachePath);
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    sqliteDb = new Database(dbPath);
    sqliteDb.pragma("journal_mode = WAL");
  } else {
    sqliteDb = new Database(":memory:");
  }
  sqliteDb.exec(`
    CREATE TABLE IF NOT EXISTS query_cache (
      kind TEXT NOT NULL,
      key TEXT NOT NULL,
      resultJson TEXT NOT NULL,
      createdAt INTEGER NOT NULL,
      PRIMARY KEY (kind, key)
    );
  `);
  return sqliteDb;
}

function sqliteGetCachedRow(kind: CacheKind, key: string): unknown {
  return getSqliteDb()
    .prepare(`SELECT resultJson FROM query_cache WHERE kind = ? AND key = ?`)
    .get(kind, key);
}

function sqlitePutCachedRow(kind: CacheKind, key: string, resultJson: string, createdAt: number): void {
  getSqliteDb()
    .prepare(
      `INSERT INTO query_cache (kind, key, resultJson, createdAt) VALUES (?, ?, ?, ?)
       ON CONFLICT (kind, key) DO UPDATE SET resultJson = excluded.resultJson, createdAt = excluded.createdAt`
    )
    .run(kind, key, resultJson, createdAt);
}

/** Close the local SQLite handle; the next cache call reopens it. */
export function closeCache(): void {
  sqliteDb?.close();
  sqliteDb = null;
}
