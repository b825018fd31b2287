/**
 * @seqchat/server - ordered, exactly-once chat delivery over WebSockets.
 * Export all public API and protocol types for use in a Node.js backend.
 */

// Server API
export {
  createServer,
  createWebSocketServer,
  createWebSocketHandler,
  rawDataToString,
  type ServerOptions,
  type WebSocketServerOptions,
  type ChatWebSocketServer,
  type UpgradeHandler,
} from "./server.js";
export { ChatCore, type ChatCoreOptions, type CreateConnectionOptions } from "./core.js";

// Delivery components
export { Connection, type ConnectionOptions, type Transport } from "./connection.js";
export { ConnectionRegistry, type RegisteredConnection } from "./connection-registry.js";
export { SequenceAllocator, type SequenceAllocatorOptions } from "./sequence-allocator.js";
export { MessageIngress, type MessageIngressOptions, type SubmitMessageInput } from "./message-ingress.js";
export { Fanout, type FanoutOptions, type ReadStatus } from "./fanout.js";
export { ReadTracker, type AcknowledgeInput, type AcknowledgeResult } from "./read-tracker.js";
export {
  HistoryReconciler,
  type HistoryReconcilerOptions,
  type ReconcileResult,
  type ReconcilingConnection,
} from "./history-reconciler.js";
export { OutboundQueue, type OutboundQueueOptions } from "./outbound-queue.js";
export { KeyedLock } from "./keyed-lock.js";

// Auth
export * from "./auth/index.js";

// Protocol (for client compatibility and typing)
export type {
  ClientFrame,
  SendMessageFrame,
  ReadReceiptFrame,
  ServerFrame,
  MessageFrame,
  ReadStatusFrame,
  SyncedFrame,
  ErrorFrame,
  ParseResult,
} from "./protocol.js";
export {
  FRAME_MESSAGE,
  FRAME_READ,
  FRAME_SYNCED,
  FRAME_ERROR,
  ClientFrameSchema,
  parseClientFrame,
  toMessageFrame,
} from "./protocol.js";

// Errors, configuration, logging
export * from "./errors.js";
export {
  ChatCoreConfigSchema,
  PersistRetryConfigSchema,
  ServerEnvConfigSchema,
  ConfigError,
  resolveCoreConfig,
  loadConfigFromEnv,
  type ChatCoreConfig,
  type ChatCoreConfigInput,
  type PersistRetryConfig,
  type ServerEnvConfig,
} from "./config.js";
export { createLogger, normalizeError, type Logger, type CreateLoggerOptions } from "./logger.js";

// Chat store interface and in-memory (no extra deps)
export type {
  ChatStore,
  ChatRecord,
  ChatKind,
  NewChat,
  ParticipantRecord,
  ParticipantRole,
  StoredMessage,
} from "./storage/chat-store.js";
export { createInMemoryChatStore, type InMemoryChatStoreOptions } from "./storage/in-memory.js";

// Optional DB adapters (require pg / mysql2 / better-sqlite3 to be installed)
export { createPostgresChatStore } from "./storage/postgres.js";
export type { PostgresChatStoreOptions, PostgresConnectionConfig } from "./storage/postgres.js";
export { createMySQLChatStore } from "./storage/mysql.js";
export type { MySQLChatStoreOptions, MySQLConnectionConfig } from "./storage/mysql.js";
export { createSQLiteChatStore } from "./storage/sqlite.js";
export type { SQLiteChatStoreOptions, SQLiteConnectionConfig } from "./storage/sqlite.js";
