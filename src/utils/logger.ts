/**
 * Structured logging with secret-aware sanitization.
 * Keypairs and secret keys must never reach a log line.
 */

import pino from "pino";

const isDevelopment = process.env.NODE_ENV === "development";

const pinoLogger = pino({
  level: process.env.LOG_LEVEL || (isDevelopment ? "debug" : "info"),
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  redact: {
    paths: [
      "*.secretKey",
      "*.privateKey",
      "*.keypair",
      "*.fundingSecretKey",
      "*.authorization",
    ],
    remove: true,
  },
  serializers: {
    error: pino.stdSerializers.err,
  },
});

type LogFn = (message: string, context?: object) => void;

export interface Logger {
  info: LogFn;
  error: LogFn;
  warn: LogFn;
  debug: LogFn;
  fatal: LogFn;
  trace: LogFn;
}

const SENSITIVE_KEYS = [
  "secretkey",
  "privatekey",
  "keypair",
  "secret",
  "seed",
  "mnemonic",
  "authorization",
];

/**
 * Sanitize an object before logging. Errors are flattened to name and message
 * since their own fields are not enumerable.
 */
export function sanitizeForLogging(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (obj instanceof Error) {
    return { name: obj.name, message: obj.message };
  }

  if (typeof obj === "bigint") return obj.toString();

  if (typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map(sanitizeForLogging);
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sk) => lowerKey.includes(sk))) {
      sanitized[key] = "[REDACTED]";
    } else {
      sanitized[key] = sanitizeForLogging(value);
    }
  }

  return sanitized;
}

function toContext(context: object): Record<string, unknown> {
  const sanitized = sanitizeForLogging(context);
  if (sanitized !== null && typeof sanitized === "object" && !Array.isArray(sanitized)) {
    return { ...sanitized };
  }
  return { context: sanitized };
}

function wrap(target: pino.Logger): Logger {
  const emit =
    (level: pino.Level): LogFn =>
    (message, context) => {
      if (context) {
        target[level](toContext(context), message);
      } else {
        target[level](message);
      }
    };

  return {
    info: emit("info"),
    error: emit("error"),
    warn: emit("warn"),
    debug: emit("debug"),
    fatal: emit("fatal"),
    trace: emit("trace"),
  };
}

/**
 * Logger wrapper with convenient API
 * Accepts (message, context) instead of pino's (context, message)
 */
export const logger: Logger & {
  child: (bindings: Record<string, unknown>) => Logger;
} = {
  ...wrap(pinoLogger),
  child: (bindings) => wrap(pinoLogger.child(toContext(bindings))),
};

/**
 * Create a child logger bound to a component.
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export default logger;
