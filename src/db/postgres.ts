import { Pool } from "pg";
import { readEnv, type LibraryEnv } from "../config/env";
import { withRetry } from "../connectivity/retry";
import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";

let pool: Pool | null = null;

export function queryTimeoutMs(env: LibraryEnv = readEnv()): number {
  return Math.max(500, env.LIBRARY_PG_QUERY_TIMEOUT_MS);
}

export function withQueryTimeout<T>(timeoutMs: number, label: string, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | null = null;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`postgres ${label} query timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([task(), deadline]).finally(() => {
    if (timer) {
      clearTimeout(timer);
    }
  });
}

export function createPgPool(env: LibraryEnv = readEnv()): Pool {
  return new Pool({
    host: env.PGHOST,
    port: env.PGPORT,
    database: env.PGDATABASE,
    user: env.PGUSER,
    password: env.PGPASSWORD,
    ssl: env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : false,
    max: env.LIBRARY_PG_POOL_MAX,
    idleTimeoutMillis: env.LIBRARY_PG_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: env.LIBRARY_PG_CONNECTION_TIMEOUT_MS,
  });
}

export function getPgPool(): Pool {
  if (pool) return pool;
  pool = createPgPool();
  return pool;
}

export type PgCheckResult = {
  ok: boolean;
  latencyMs: number;
  error?: string;
  details?: Record<string, unknown>;
};

export async function checkPgConnection(target: Pool = getPgPool(), logger: Logger = silentLogger): Promise<PgCheckResult> {
  const startedAt = Date.now();
  try {
    const timeoutMs = queryTimeoutMs();
    const version = await withRetry(
      "postgres_healthcheck",
      async () => {
        const result = await withQueryTimeout(timeoutMs, "health", () =>
          target.query("SELECT 1 as ok, current_setting('server_version') as version")
        );
        const row: unknown = result.rows[0];
        if (typeof row !== "object" || row === null || !("version" in row) || !row.version) {
          throw new Error("invalid postgres result");
        }
        return String(row.version);
      },
      logger,
      { attempts: 3, baseDelayMs: 100 }
    );
    return {
      ok: true,
      details: { status: "connected", version },
      latencyMs: Date.now() - startedAt,
    };
  } catch (error) {
    return {
      ok: false,
      latencyMs: Date.now() - startedAt,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

export async function closePgPool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
}
