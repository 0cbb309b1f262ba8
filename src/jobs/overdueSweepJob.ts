import type { JobHandler } from "./runner";
import type { LoanLifecycle } from "../loans/lifecycle";

export const OVERDUE_SWEEP_JOB = "overdueSweep";

export function createOverdueSweepJob(lifecycle: Pick<LoanLifecycle, "promoteOverdueLoans">): JobHandler {
  return async () => {
    const result = await lifecycle.promoteOverdueLoans();
    return {
      summary: `scanned=${result.scanned} promoted=${result.promoted} finesUpdated=${result.finesUpdated} skipped=${result.skipped}`,
    };
  };
}
