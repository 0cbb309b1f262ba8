import fs from "node:fs/promises";
import path from "node:path";
import type { Pool } from "pg";
import { getPgPool, queryTimeoutMs, withQueryTimeout } from "./postgres";

export const DEFAULT_MIGRATIONS_DIR = path.join(__dirname, "..", "..", "migrations");

export async function listMigrationFiles(migrationsDir: string): Promise<string[]> {
  return (await fs.readdir(migrationsDir)).filter((f) => f.endsWith(".sql")).sort((a, b) => a.localeCompare(b));
}

export async function runMigrations(
  migrationsDir = DEFAULT_MIGRATIONS_DIR,
  pool: Pool = getPgPool()
): Promise<{ applied: string[] }> {
  const timeoutMs = queryTimeoutMs();
  const applied: string[] = [];
  await withQueryTimeout(timeoutMs, "bootstrap", () =>
    pool.query(`
    CREATE TABLE IF NOT EXISTS library_migrations (
      id text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `)
  );

  for (const file of await listMigrationFiles(migrationsDir)) {
    const exists = await withQueryTimeout(timeoutMs, "check", () =>
      pool.query("SELECT 1 FROM library_migrations WHERE id = $1", [file])
    );
    if (exists.rowCount && exists.rowCount > 0) continue;

    const sql = await fs.readFile(path.join(migrationsDir, file), "utf8");
    const client = await pool.connect();
    try {
      await withQueryTimeout(timeoutMs, "begin", () => client.query("BEGIN"));
      try {
        await withQueryTimeout(timeoutMs, "migration", () => client.query(sql));
        await withQueryTimeout(timeoutMs, "record", () =>
          client.query("INSERT INTO library_migrations (id) VALUES ($1)", [file])
        );
        await withQueryTimeout(timeoutMs, "commit", () => client.query("COMMIT"));
        applied.push(file);
      } catch (error) {
        await withQueryTimeout(timeoutMs, "rollback", () => client.query("ROLLBACK"));
        throw error;
      }
    } finally {
      client.release();
    }
  }
  return { applied };
}
