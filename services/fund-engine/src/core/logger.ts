import { getConfig, type LogLevel } from "../config.js";

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SENSITIVE_KEY = /authorization|token|key|secret|password|credential/i;

// Redact sensitive values from log meta
function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEY.test(key)) {
      result[key] = "[REDACTED]";
    } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      result[key] = redactSensitive(value as Record<string, unknown>);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function format(level: string, scope: string, msg: string): string {
  return `[${level}] [${scope}] ${msg}`;
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  const threshold = (): number => LEVEL_RANK[level ?? getConfig().logLevel];
  const emit = (
    rank: number,
    label: string,
    sink: (...args: unknown[]) => void,
    msg: string,
    meta?: Record<string, unknown>,
  ): void => {
    if (rank < threshold()) {
      return;
    }
    const safeMeta = meta ? redactSensitive(meta) : undefined;
    sink(format(label, scope, msg), safeMeta ? JSON.stringify(safeMeta) : "");
  };

  return {
    debug: (msg, meta) => emit(LEVEL_RANK.debug, "DEBUG", console.debug, msg, meta),
    info: (msg, meta) => emit(LEVEL_RANK.info, "INFO", console.log, msg, meta),
    warn: (msg, meta) => emit(LEVEL_RANK.warn, "WARN", console.warn, msg, meta),
    error: (msg, meta) => emit(LEVEL_RANK.error, "ERROR", console.error, msg, meta),
  };
}
