import type { LibraryEnv } from "../config/env";
import type { Logger } from "../config/logger";
import { runMigrations } from "../db/migrate";
import { closePgPool, getPgPool } from "../db/postgres";
import type { LibraryStore } from "./interfaces";
import { MemoryLibraryStore } from "./memoryStores";
import { PostgresLibraryStore } from "./postgresLibraryStore";

export type OpenedStore = {
  store: LibraryStore;
  close: () => Promise<void>;
};

/** Opens the configured store; the postgres store is migrated before it is returned. */
export async function openLibraryStore(env: LibraryEnv, logger: Logger): Promise<OpenedStore> {
  if (env.LIBRARY_STORE === "memory") {
    logger.warn("library_store_memory", { message: "Using the in-memory store; data is lost on exit." });
    return { store: new MemoryLibraryStore({ lockTimeoutMs: env.LIBRARY_LOCK_TIMEOUT_MS }), close: async () => {} };
  }

  logger.info("library_migrations_start", {});
  const migrationResult = await runMigrations();
  logger.info("library_migrations_complete", {
    appliedCount: migrationResult.applied.length,
    applied: migrationResult.applied,
  });
  return {
    store: new PostgresLibraryStore(getPgPool(), { lockTimeoutMs: env.LIBRARY_LOCK_TIMEOUT_MS }),
    close: closePgPool,
  };
}
