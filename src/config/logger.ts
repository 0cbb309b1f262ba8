export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => void;
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
};

const REDACT_KEYS = ["password", "secret", "token", "authorization", "credential"];

function levelWeight(level: LogLevel): number {
  switch (level) {
    case "debug":
      return 10;
    case "info":
      return 20;
    case "warn":
      return 30;
    case "error":
      return 40;
  }
}

function shouldRedactKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return REDACT_KEYS.some((candidate) => normalized.includes(candidate));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function sanitizeLogMeta(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map((entry) => sanitizeLogMeta(entry));
  if (!isPlainRecord(value)) return value;

  const output: Record<string, unknown> = {};
  for (const [key, innerValue] of Object.entries(value)) {
    output[key] = shouldRedactKey(key) ? "[redacted]" : sanitizeLogMeta(innerValue);
  }
  return output;
}

export type LogSink = (line: string) => void;

export function createLogger(level: LogLevel = "info", sink: LogSink = (line) => process.stdout.write(line)): Logger {
  const threshold = levelWeight(level);

  const write = (lvl: LogLevel, msg: string, meta?: Record<string, unknown>) => {
    if (levelWeight(lvl) < threshold) return;
    const payload = {
      at: new Date().toISOString(),
      level: lvl,
      msg,
      ...(meta ? { meta: sanitizeLogMeta(meta) } : {}),
    };
    sink(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
