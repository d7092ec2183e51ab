export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

export type LogContext = Record<string, unknown>;

interface LogPayload {
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function normalizeLogLevel(value: string | undefined): LogThreshold {
  if (!value) {
    return "info";
  }

  const normalized = value.toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }

  return "info";
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }
  // JSON.stringify cannot encode bigint (wei amounts, balances)
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

function serializeContext(context: LogContext | undefined): LogContext | undefined {
  if (!context) {
    return undefined;
  }

  const serialized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    serialized[key] = serializeValue(value);
  }

  return serialized;
}

function writeLog(level: LogLevel, scope: string, payload: LogPayload): void {
  const threshold = normalizeLogLevel(process.env.LOG_LEVEL);
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[threshold]) {
    return;
  }

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    scope,
    message: payload.message,
    ...(payload.context ? { context: serializeContext(payload.context) } : {})
  });

  if (level === "error") {
    process.stderr.write(`${line}\n`);
    return;
  }

  process.stdout.write(`${line}\n`);
}

function merge(bindings: LogContext, context: LogContext | undefined): LogContext | undefined {
  if (Object.keys(bindings).length === 0) {
    return context;
  }
  return { ...bindings, ...context };
}

export function createLogger(scope: string, bindings: LogContext = {}): Logger {
  return {
    debug(message, context) {
      writeLog("debug", scope, { message, context: merge(bindings, context) });
    },
    info(message, context) {
      writeLog("info", scope, { message, context: merge(bindings, context) });
    },
    warn(message, context) {
      writeLog("warn", scope, { message, context: merge(bindings, context) });
    },
    error(message, context) {
      writeLog("error", scope, { message, context: merge(bindings, context) });
    },
    child(extra) {
      return createLogger(scope, { ...bindings, ...extra });
    }
  };
}
