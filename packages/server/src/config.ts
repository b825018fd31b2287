/**
 * Configuration schemas (zod) for the delivery core and the standalone server.
 *
 * Every tunable the core relies on lives here with its default, so the
 * behaviour of a running server is fully described by one parsed object.
 */

import { z } from "zod";

// ============================================================================
// Core
// ============================================================================

export const PersistRetryConfigSchema = z.object({
  /** Total attempts per message, including the first one. */
  attempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().min(0).max(60_000).default(50),
  maxDelayMs: z.number().int().min(0).max(300_000).default(1_000),
});
export type PersistRetryConfig = z.infer<typeof PersistRetryConfigSchema>;

export const ChatCoreConfigSchema = z
  .object({
    /** Upgrade path prefix; connections go to `${path}/${chatId}`. */
    path: z.string().startsWith("/").default("/ws"),
    maxMessageBytes: z.number().int().min(1).max(1_048_576).default(4_096),
    backlogPageSize: z.number().int().min(1).max(1_000).default(100),
    outboundQueueSize: z.number().int().min(1).max(10_000).default(256),
    slowConsumerGraceMs: z.number().int().min(0).max(600_000).default(5_000),
    persistRetry: PersistRetryConfigSchema.default({}),
  })
  .refine((config) => config.backlogPageSize <= config.outboundQueueSize, {
    message: "backlogPageSize must not exceed outboundQueueSize",
    path: ["backlogPageSize"],
  });
export type ChatCoreConfig = z.infer<typeof ChatCoreConfigSchema>;
export type ChatCoreConfigInput = z.input<typeof ChatCoreConfigSchema>;

// ============================================================================
// Standalone server (environment)
// ============================================================================

export const ServerEnvConfigSchema = z.object({
  port: z.number().int().min(0).max(65_535).default(3_000),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  jwtSecret: z.string().min(1).optional(),
  core: ChatCoreConfigSchema,
});
export type ServerEnvConfig = z.infer<typeof ServerEnvConfigSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export function resolveCoreConfig(input: ChatCoreConfigInput = {}): ChatCoreConfig {
  const result = ChatCoreConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") return undefined;
  // NaN is rejected by the schema with the field's path
  return Number(raw);
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw === undefined || raw === "" ? undefined : raw;
}

/**
 * Reads PORT, LOG_LEVEL and the SEQCHAT_* variables.
 * Throws ConfigError listing every invalid value.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerEnvConfig {
  const candidate = {
    port: readNumber(env, "PORT"),
    logLevel: readString(env, "LOG_LEVEL"),
    jwtSecret: readString(env, "SEQCHAT_JWT_SECRET"),
    core: {
      path: readString(env, "SEQCHAT_PATH"),
      maxMessageBytes: readNumber(env, "SEQCHAT_MAX_MESSAGE_BYTES"),
      backlogPageSize: readNumber(env, "SEQCHAT_BACKLOG_PAGE_SIZE"),
      outboundQueueSize: readNumber(env, "SEQCHAT_OUTBOUND_QUEUE_SIZE"),
      slowConsumerGraceMs: readNumber(env, "SEQCHAT_SLOW_CONSUMER_GRACE_MS"),
      persistRetry: {
        attempts: readNumber(env, "SEQCHAT_PERSIST_ATTEMPTS"),
      },
    },
  };
  const result = ServerEnvConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}
