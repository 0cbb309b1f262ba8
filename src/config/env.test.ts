import test from "node:test";
import assert from "node:assert/strict";
import { allowedOrigins, loanPolicyFromEnv, readEnv, redactEnvForLogs } from "./env";

test("readEnv applies circulation defaults", () => {
  const env = readEnv({});
  assert.equal(env.LIBRARY_STORE, "postgres");
  assert.deepEqual(loanPolicyFromEnv(env), {
    loanPeriodDays: 14,
    maxRenewals: 2,
    renewalDays: 14,
    maxActiveLoans: 5,
    dailyFineRate: 1,
  });
  assert.deepEqual(allowedOrigins(env), ["http://127.0.0.1:5173", "http://localhost:5173"]);
});

test("readEnv coerces numeric and boolean strings", () => {
  const env = readEnv({
    LIBRARY_DAILY_FINE_RATE: "0.25",
    LIBRARY_MAX_ACTIVE_LOANS: "3",
    LIBRARY_ENABLE_STARTUP_SWEEP: "0",
    LIBRARY_STORE: "memory",
  });
  assert.equal(env.LIBRARY_DAILY_FINE_RATE, 0.25);
  assert.equal(env.LIBRARY_MAX_ACTIVE_LOANS, 3);
  assert.equal(env.LIBRARY_ENABLE_STARTUP_SWEEP, false);
  assert.equal(env.LIBRARY_STORE, "memory");
});

test("readEnv validates strict log level enum", () => {
  assert.throws(() => readEnv({ LIBRARY_LOG_LEVEL: "trace" }), /LIBRARY_LOG_LEVEL/);
});

test("readEnv rejects renewal periods beyond thirty days", () => {
  assert.throws(() => readEnv({ LIBRARY_RENEWAL_DAYS: "45" }), /LIBRARY_RENEWAL_DAYS/);
});

test("readEnv rejects malformed allowed origins", () => {
  assert.throws(() => readEnv({ LIBRARY_ALLOWED_ORIGINS: "not a url" }), /LIBRARY_ALLOWED_ORIGINS/);
});

test("readEnv rejects placeholder database passwords", () => {
  assert.throws(() => readEnv({ PGPASSWORD: "change-me" }), /PGPASSWORD is configured with a placeholder/);
});

test("redactEnvForLogs masks sensitive fields", () => {
  const env = readEnv({
    PGPASSWORD: "test-secret",
    GOOGLE_APPLICATION_CREDENTIALS: "/tmp/service-account.json",
  });
  const safe = redactEnvForLogs(env);
  assert.equal(safe.PGPASSWORD, "[redacted]");
  assert.equal(safe.GOOGLE_APPLICATION_CREDENTIALS, "[set]");
  assert.equal(safe.FIREBASE_PROJECT_ID, null);
});
