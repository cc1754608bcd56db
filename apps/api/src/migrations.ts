/**
 * Schema migrations: migrations/NNN_*.sql applied in filename order, one
 * transaction per file, with a sha256 of each applied file kept in
 * schema_migrations so later edits show up as drift.
 */
import crypto from "crypto";
import fs from "fs";
import path from "path";
import { getClient, query } from "./db";
import { errorMessage } from "./errors";
import { logInfo, logWarn } from "./logger";

export const MIGRATIONS_DIR = path.resolve(__dirname, "..", "migrations");

const MIGRATION_FILENAME_RE = /^[0-9]{3}_[A-Za-z0-9_-]+\.sql$/;

// Every table the data access modules query.
export const REQUIRED_TABLES = [
  "spring_types",
  "defect_types",
  "inspection_activities",
  "inspectors",
  "spring_failures",
] as const;

export type Migration = {
  filename: string;
  sql: string;
  checksum: string;
};

export type MigrationRun = {
  applied: string[];
  drifted: string[];
};

export function migrationChecksum(sql: string): string {
  return crypto.createHash("sha256").update(sql).digest("hex");
}

export function loadMigrations(dir: string = MIGRATIONS_DIR): Migration[] {
  return fs
    .readdirSync(dir)
    .filter((entry) => MIGRATION_FILENAME_RE.test(entry))
    .sort((a, b) => a.localeCompare(b, "en"))
    .map((filename) => {
      const sql = fs.readFileSync(path.join(dir, filename), "utf-8");
      return { filename, sql, checksum: migrationChecksum(sql) };
    });
}

export async function runMigrations(migrations: readonly Migration[] = loadMigrations()): Promise<MigrationRun> {
  const client = await getClient();
  const result: MigrationRun = { applied: [], drifted: [] };
  try {
    await client.query(`CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      content_hash TEXT NOT NULL
    )`);
    const { rows } = await client.query<{ filename: string; content_hash: string }>(
      "SELECT filename, content_hash FROM schema_migrations"
    );
    const appliedHashes = new Map(rows.map((row) => [row.filename, row.content_hash]));

    for (const migration of migrations) {
      const storedHash = appliedHashes.get(migration.filename);
      if (storedHash !== undefined) {
        if (storedHash !== migration.checksum) {
          logWarn("MIGRATION_DRIFT", {
            filename: migration.filename,
            expected: storedHash.slice(0, 12),
            actual: migration.checksum.slice(0, 12),
          });
          result.drifted.push(migration.filename);
        }
        continue;
      }

      await client.query("BEGIN");
      try {
        await client.query(migration.sql);
        await client.query("INSERT INTO schema_migrations (filename, content_hash) VALUES ($1, $2)", [
          migration.filename,
          migration.checksum,
        ]);
        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw new Error(`MIGRATION_FAILED: ${migration.filename}: ${errorMessage(error)}`);
      }
      logInfo("MIGRATION_APPLIED", { filename: migration.filename, checksum: migration.checksum.slice(0, 12) });
      result.applied.push(migration.filename);
    }
  } finally {
    client.release();
  }
  return result;
}

/** Throws when a table the service queries is missing after migrating. */
export async function verifySchema(): Promise<void> {
  const { rows } = await query<{ table_name: string }>(
    `SELECT table_name FROM information_schema.tables
     WHERE table_schema = current_schema() AND table_name = ANY($1::text[])`,
    [[...REQUIRED_TABLES]]
  );
  const present = new Set(rows.map((row) => row.table_name));
  const missing = REQUIRED_TABLES.filter((table) => !present.has(table));
  if (missing.length > 0) {
    throw new Error(`MIGRATION_SCHEMA_INCOMPLETE: missing ${missing.join(", ")}`);
  }
}
