import pino, { type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type Logger = PinoLogger;

export type LoggerBindings = Record<string, unknown>;

export type NormalizedError = {
  message: string;
  name?: string;
  code?: string | number;
  stack?: string;
  cause?: NormalizedError | string;
};

export interface CreateLoggerOptions {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
  options?: LoggerOptions;
}

function resolveLevel(): string {
  const envLevel = process.env.LOG_LEVEL?.trim();
  return envLevel && envLevel.length > 0 ? envLevel : "info";
}

function buildLoggerOptions(serviceName: string, overrides?: LoggerOptions): LoggerOptions {
  const base: LoggerOptions = {
    level: resolveLevel(),
    base: { service: serviceName },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return overrides ? { ...base, ...overrides } : base;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions = buildLoggerOptions(options.serviceName ?? "seqchat", options.options);
  if (options.level) {
    loggerOptions.level = options.level;
  }
  const logger = pino(loggerOptions);
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

function extractCode(error: object): string | number | undefined {
  if ("code" in error) {
    const candidate = error.code;
    if (typeof candidate === "string" || typeof candidate === "number") {
      return candidate;
    }
  }
  return undefined;
}

/** Flattens an unknown thrown value into something pino serializes well. */
export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = { message: error.message, name: error.name };
    const code = extractCode(error);
    if (code !== undefined) normalized.code = code;
    if (error.stack) normalized.stack = error.stack;
    if (error.cause !== undefined) {
      normalized.cause = error.cause instanceof Error ? normalizeError(error.cause) : String(error.cause);
    }
    return normalized;
  }
  if (typeof error === "string") {
    return { message: error };
  }
  return { message: String(error) };
}
