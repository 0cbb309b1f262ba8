import { allowedOrigins, loanPolicyFromEnv, readEnv, redactEnvForLogs } from "./config/env";
import { createLogger } from "./config/logger";
import { openLibraryStore } from "./stores/factory";
import { createLibraryServices } from "./library/services";
import { JobRunner } from "./jobs/runner";
import { OVERDUE_SWEEP_JOB, createOverdueSweepJob } from "./jobs/overdueSweepJob";
import { createFirebaseAuthVerifier, startHttpServer } from "./http/server";

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.LIBRARY_LOG_LEVEL);
  const runtimeStartedAt = new Date().toISOString();
  const schedulerState: {
    intervalMs: number;
    nextRunAt: string | null;
    lastRunStartedAt: string | null;
    lastRunCompletedAt: string | null;
    totalRuns: number;
    totalFailures: number;
    consecutiveFailures: number;
    lastFailureMessage: string | null;
  } = {
    intervalMs: env.LIBRARY_OVERDUE_SWEEP_INTERVAL_MS,
    nextRunAt: null,
    lastRunStartedAt: null,
    lastRunCompletedAt: null,
    totalRuns: 0,
    totalFailures: 0,
    consecutiveFailures: 0,
    lastFailureMessage: null,
  };

  logger.info("library_boot", { env: redactEnvForLogs(env) });

  const { store, close } = await openLibraryStore(env, logger);
  const services = createLibraryServices(store, {
    logger,
    policy: loanPolicyFromEnv(env),
    conflictAttempts: env.LIBRARY_BORROW_CONFLICT_ATTEMPTS,
  });

  const runner = new JobRunner(
    { jobRuns: store.jobRuns, events: store.events, logger },
    { [OVERDUE_SWEEP_JOB]: createOverdueSweepJob(services.lifecycle) }
  );

  const runSweep = async (trigger: "startup" | "scheduled"): Promise<void> => {
    schedulerState.lastRunStartedAt = new Date().toISOString();
    schedulerState.totalRuns += 1;
    try {
      await runner.run(OVERDUE_SWEEP_JOB);
      schedulerState.consecutiveFailures = 0;
      schedulerState.lastFailureMessage = null;
      logger.info("overdue_sweep_completed", { trigger });
    } catch (error) {
      schedulerState.totalFailures += 1;
      schedulerState.consecutiveFailures += 1;
      schedulerState.lastFailureMessage = error instanceof Error ? error.message : String(error);
      logger.error("overdue_sweep_failed", {
        trigger,
        message: schedulerState.lastFailureMessage,
      });
    } finally {
      schedulerState.lastRunCompletedAt = new Date().toISOString();
    }
  };

  if (env.LIBRARY_ENABLE_STARTUP_SWEEP) {
    await runSweep("startup");
  }

  const server = startHttpServer({
    host: env.LIBRARY_HOST,
    port: env.LIBRARY_PORT,
    logger,
    services,
    allowedOrigins: allowedOrigins(env),
    verifyAuth: createFirebaseAuthVerifier(env.FIREBASE_PROJECT_ID),
    getRuntimeStatus: () => ({
      startedAt: runtimeStartedAt,
      scheduler: { ...schedulerState },
      jobs: runner.getStats(),
    }),
  });

  let timer: NodeJS.Timeout | null = null;
  let shuttingDown = false;

  const scheduleNext = (delayMs: number): void => {
    if (shuttingDown) return;
    schedulerState.nextRunAt = new Date(Date.now() + delayMs).toISOString();
    timer = setTimeout(async () => {
      schedulerState.nextRunAt = null;
      await runSweep("scheduled");
      scheduleNext(env.LIBRARY_OVERDUE_SWEEP_INTERVAL_MS);
    }, delayMs);
    if (typeof timer.unref === "function") {
      timer.unref();
    }
  };

  scheduleNext(env.LIBRARY_OVERDUE_SWEEP_INTERVAL_MS);

  const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("library_shutdown_start", { signal });

    if (timer) {
      clearTimeout(timer);
      timer = null;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    await close();
    logger.info("library_shutdown_complete", {});
    process.exitCode = exitCode;
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("library_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    void shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("library_unhandled_rejection", {
      message: reason instanceof Error ? reason.message : String(reason),
    });
    void shutdown("unhandledRejection", 1);
  });
}

void main().catch((error) => {
  process.stderr.write(`library fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
