import test from "node:test";
import assert from "node:assert/strict";
import { normalizeRetryOptions, retryDelayMs, withRetry } from "./retry";
import { silentLogger } from "../config/logger";

const fast = { baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 };

test("withRetry returns the first successful result", async () => {
  let calls = 0;
  const result = await withRetry(
    "flaky",
    async () => {
      calls += 1;
      if (calls < 3) throw new Error("not yet");
      return "done";
    },
    silentLogger,
    { attempts: 5, ...fast }
  );
  assert.equal(result, "done");
  assert.equal(calls, 3);
});

test("withRetry rethrows the last error once attempts run out", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      "always_failing",
      async () => {
        calls += 1;
        throw new Error(`failure ${calls}`);
      },
      silentLogger,
      { attempts: 2, ...fast }
    ),
    /failure 2/
  );
  assert.equal(calls, 2);
});

test("withRetry stops immediately when shouldRetry declines", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      "not_retryable",
      async () => {
        calls += 1;
        throw new Error("permanent");
      },
      silentLogger,
      { attempts: 4, ...fast, shouldRetry: () => false }
    ),
    /permanent/
  );
  assert.equal(calls, 1);
});

test("retryDelayMs grows exponentially up to the cap", () => {
  const policy = normalizeRetryOptions({ baseDelayMs: 100, maxDelayMs: 300, jitterMs: 0 });
  assert.equal(retryDelayMs(policy, 1), 100);
  assert.equal(retryDelayMs(policy, 2), 200);
  assert.equal(retryDelayMs(policy, 3), 300);
  assert.equal(retryDelayMs(policy, 4), 300);
});
