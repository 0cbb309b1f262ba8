import { loanPolicyFromEnv, readEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { openLibraryStore } from "../stores/factory";
import { LoanLifecycle } from "../loans/lifecycle";
import { JobRunner } from "../jobs/runner";
import { OVERDUE_SWEEP_JOB, createOverdueSweepJob } from "../jobs/overdueSweepJob";

function arg(name: string, fallback: string | undefined = undefined): string | undefined {
  const prefix = `--${name}=`;
  const exact = process.argv.find((entry) => entry === `--${name}`);
  if (exact === `--${name}`) return "";
  const prefixed = process.argv.find((entry) => entry.startsWith(prefix));
  if (!prefixed) return fallback;
  return prefixed.slice(prefix.length);
}

async function run(): Promise<void> {
  const outputMode = arg("output", "text") === "json" ? "json" : "text";
  const env = readEnv();
  const logger = createLogger(env.LIBRARY_LOG_LEVEL);
  const { store, close } = await openLibraryStore(env, logger);
  try {
    const lifecycle = new LoanLifecycle(store, { policy: loanPolicyFromEnv(env), logger });
    const runner = new JobRunner(
      { jobRuns: store.jobRuns, events: store.events, logger },
      { [OVERDUE_SWEEP_JOB]: createOverdueSweepJob(lifecycle) }
    );
    await runner.run(OVERDUE_SWEEP_JOB);
    const [latest] = await store.jobRuns.listRecentJobRuns(1);
    const summary = latest?.summary ?? "";
    if (outputMode === "json") {
      process.stdout.write(`${JSON.stringify({ ok: true, runId: latest?.id ?? null, summary }, null, 2)}\n`);
    } else {
      process.stdout.write(`overdue sweep: ${summary}\n`);
    }
  } finally {
    await close();
  }
}

void run().catch((error) => {
  process.stderr.write(`overdue sweep failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
