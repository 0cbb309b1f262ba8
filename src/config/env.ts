import dotenv from "dotenv";
import { z } from "zod";
import type { LoanPolicy } from "../library/model";

dotenv.config();

const PLACEHOLDER_MATCHERS = [
  /change-?me/i,
  /placeholder/i,
  /replace[_-]?with/i,
  /^\s*<.*>\s*$/,
  /\$\{[^}]+\}/,
];

const RUNTIME_ENFORCED_SENSITIVE_VARS = new Set(["PGPASSWORD"]);

const BoolFromString = z
  .union([z.enum(["true", "false", "1", "0"]), z.boolean()])
  .transform((value) => value === true || value === "true" || value === "1");

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const EnvSchema = z.object({
  LIBRARY_PORT: z.coerce.number().int().min(0).max(65535).default(8788),
  LIBRARY_HOST: requiredString("LIBRARY_HOST").default("127.0.0.1"),
  LIBRARY_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LIBRARY_ALLOWED_ORIGINS: z.string().default("http://127.0.0.1:5173,http://localhost:5173"),
  LIBRARY_STORE: z.enum(["postgres", "memory"]).default("postgres"),

  LIBRARY_LOAN_PERIOD_DAYS: z.coerce.number().int().min(1).max(365).default(14),
  LIBRARY_MAX_RENEWALS: z.coerce.number().int().min(0).max(20).default(2),
  LIBRARY_RENEWAL_DAYS: z.coerce.number().int().min(1).max(30).default(14),
  LIBRARY_MAX_ACTIVE_LOANS: z.coerce.number().int().min(1).max(100).default(5),
  LIBRARY_DAILY_FINE_RATE: z.coerce.number().min(0).max(1_000).default(1),

  LIBRARY_LOCK_TIMEOUT_MS: z.coerce.number().int().min(50).max(60_000).default(2_000),
  LIBRARY_BORROW_CONFLICT_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  LIBRARY_OVERDUE_SWEEP_INTERVAL_MS: z.coerce.number().int().min(10_000).max(86_400_000).default(60 * 60 * 1000),
  LIBRARY_ENABLE_STARTUP_SWEEP: BoolFromString.default(true),

  PGHOST: requiredString("PGHOST").default("127.0.0.1"),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PGDATABASE: requiredString("PGDATABASE").default("library"),
  PGUSER: requiredString("PGUSER").default("postgres"),
  PGPASSWORD: requiredString("PGPASSWORD").default("postgres"),
  PGSSLMODE: z.enum(["disable", "prefer", "require"]).default("disable"),
  LIBRARY_PG_POOL_MAX: z.coerce.number().int().min(1).max(50).default(10),
  LIBRARY_PG_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(300_000).default(30_000),
  LIBRARY_PG_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(10_000),
  LIBRARY_PG_QUERY_TIMEOUT_MS: z.coerce.number().int().min(500).max(120_000).default(5_000),

  FIREBASE_PROJECT_ID: z.string().optional(),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
});

export type LibraryEnv = z.infer<typeof EnvSchema>;

function hasPlaceholderValue(value: string): boolean {
  return PLACEHOLDER_MATCHERS.some((pattern) => pattern.test(value));
}

export function allowedOrigins(env: LibraryEnv): string[] {
  return env.LIBRARY_ALLOWED_ORIGINS.split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function validateOrigins(env: LibraryEnv): string[] {
  const errors: string[] = [];
  for (const origin of allowedOrigins(env)) {
    try {
      new URL(origin);
    } catch {
      errors.push(`LIBRARY_ALLOWED_ORIGINS entry ${origin} must be a valid URL`);
    }
  }
  return errors;
}

function validateRuntimeSecretValues(env: LibraryEnv): string[] {
  const issues: string[] = [];
  for (const [name, rawValue] of Object.entries(env)) {
    if (!RUNTIME_ENFORCED_SENSITIVE_VARS.has(name)) continue;
    if (typeof rawValue !== "string") continue;
    if (!hasPlaceholderValue(rawValue)) continue;
    issues.push(`${name} is configured with a placeholder value; set a concrete secret before runtime startup.`);
  }
  return issues;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): LibraryEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid library env: ${message}`);
  }
  const env = parsed.data;
  const originIssues = validateOrigins(env);
  if (originIssues.length > 0) {
    throw new Error(`Invalid library env origins: ${originIssues.join("; ")}`);
  }
  const runtimeSecretIssues = validateRuntimeSecretValues(env);
  if (runtimeSecretIssues.length > 0) {
    throw new Error(`Invalid library env values: ${runtimeSecretIssues.join("; ")}`);
  }
  return env;
}

export function loanPolicyFromEnv(env: LibraryEnv): LoanPolicy {
  return {
    loanPeriodDays: env.LIBRARY_LOAN_PERIOD_DAYS,
    maxRenewals: env.LIBRARY_MAX_RENEWALS,
    renewalDays: env.LIBRARY_RENEWAL_DAYS,
    maxActiveLoans: env.LIBRARY_MAX_ACTIVE_LOANS,
    dailyFineRate: env.LIBRARY_DAILY_FINE_RATE,
  };
}

export function redactEnvForLogs(env: LibraryEnv): Record<string, string | number | boolean | null> {
  return {
    LIBRARY_HOST: env.LIBRARY_HOST,
    LIBRARY_PORT: env.LIBRARY_PORT,
    LIBRARY_LOG_LEVEL: env.LIBRARY_LOG_LEVEL,
    LIBRARY_ALLOWED_ORIGINS: env.LIBRARY_ALLOWED_ORIGINS,
    LIBRARY_STORE: env.LIBRARY_STORE,
    LIBRARY_LOAN_PERIOD_DAYS: env.LIBRARY_LOAN_PERIOD_DAYS,
    LIBRARY_MAX_RENEWALS: env.LIBRARY_MAX_RENEWALS,
    LIBRARY_RENEWAL_DAYS: env.LIBRARY_RENEWAL_DAYS,
    LIBRARY_MAX_ACTIVE_LOANS: env.LIBRARY_MAX_ACTIVE_LOANS,
    LIBRARY_DAILY_FINE_RATE: env.LIBRARY_DAILY_FINE_RATE,
    LIBRARY_LOCK_TIMEOUT_MS: env.LIBRARY_LOCK_TIMEOUT_MS,
    LIBRARY_BORROW_CONFLICT_ATTEMPTS: env.LIBRARY_BORROW_CONFLICT_ATTEMPTS,
    LIBRARY_OVERDUE_SWEEP_INTERVAL_MS: env.LIBRARY_OVERDUE_SWEEP_INTERVAL_MS,
    LIBRARY_ENABLE_STARTUP_SWEEP: env.LIBRARY_ENABLE_STARTUP_SWEEP,
    PGHOST: env.PGHOST,
    PGPORT: env.PGPORT,
    PGDATABASE: env.PGDATABASE,
    PGUSER: env.PGUSER,
    PGSSLMODE: env.PGSSLMODE,
    PGPASSWORD: "[redacted]",
    LIBRARY_PG_POOL_MAX: env.LIBRARY_PG_POOL_MAX,
    LIBRARY_PG_IDLE_TIMEOUT_MS: env.LIBRARY_PG_IDLE_TIMEOUT_MS,
    LIBRARY_PG_CONNECTION_TIMEOUT_MS: env.LIBRARY_PG_CONNECTION_TIMEOUT_MS,
    LIBRARY_PG_QUERY_TIMEOUT_MS: env.LIBRARY_PG_QUERY_TIMEOUT_MS,
    FIREBASE_PROJECT_ID: env.FIREBASE_PROJECT_ID ?? null,
    GOOGLE_APPLICATION_CREDENTIALS: env.GOOGLE_APPLICATION_CREDENTIALS ? "[set]" : null,
  };
}
