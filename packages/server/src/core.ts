/**
 * ChatCore wires the delivery components together around one store and one
 * validated configuration. Transports plug in through `admit`,
 * `createConnection` and `reconcile`; the WebSocket glue in server.ts is one
 * such transport.
 */

import { randomUUID } from "node:crypto";
import { AuthGate } from "./auth/auth-gate.js";
import type { CredentialValidator, Identity } from "./auth/credential.js";
import { resolveCoreConfig, type ChatCoreConfig, type ChatCoreConfigInput } from "./config.js";
import { Connection, type Transport } from "./connection.js";
import { ConnectionRegistry } from "./connection-registry.js";
import { CLOSE_GOING_AWAY } from "./errors.js";
import { Fanout } from "./fanout.js";
import { HistoryReconciler, type ReconcileResult } from "./history-reconciler.js";
import { KeyedLock } from "./keyed-lock.js";
import { createLogger, type Logger } from "./logger.js";
import { MessageIngress } from "./message-ingress.js";
import { ReadTracker } from "./read-tracker.js";
import { SequenceAllocator } from "./sequence-allocator.js";
import type { ChatStore } from "./storage/chat-store.js";
import { createInMemoryChatStore } from "./storage/in-memory.js";

export interface ChatCoreOptions {
  /** Resolves the identity behind an access token. */
  validateCredential: CredentialValidator;
  /** Defaults to an empty in-memory store. */
  store?: ChatStore;
  config?: ChatCoreConfigInput;
  logger?: Logger;
}

export interface CreateConnectionOptions {
  chatId: string;
  userId: string;
  lastSeenSeq: number;
  connectionId?: string;
}

export class ChatCore {
  readonly config: ChatCoreConfig;
  readonly store: ChatStore;
  readonly logger: Logger;
  readonly registry: ConnectionRegistry<Connection>;
  readonly allocator: SequenceAllocator;
  readonly fanout: Fanout;
  readonly ingress: MessageIngress;
  readonly readTracker: ReadTracker;
  readonly reconciler: HistoryReconciler;
  readonly authGate: AuthGate;

  /** Connections that are still reconciling and not yet registered. */
  private readonly syncing = new Set<Connection>();
  private closing: Promise<void> | null = null;

  constructor(options: ChatCoreOptions) {
    this.config = resolveCoreConfig(options.config);
    this.store = options.store ?? createInMemoryChatStore();
    this.logger = options.logger ?? createLogger();

    this.registry = new ConnectionRegistry<Connection>({ logger: this.logger });
    this.allocator = new SequenceAllocator({ store: this.store, logger: this.logger, lock: new KeyedLock() });
    this.fanout = new Fanout({ registry: this.registry, logger: this.logger });
    this.ingress = new MessageIngress({
      store: this.store,
      allocator: this.allocator,
      fanout: this.fanout,
      logger: this.logger,
      maxMessageBytes: this.config.maxMessageBytes,
      persistRetry: this.config.persistRetry,
    });
    this.readTracker = new ReadTracker({ store: this.store, fanout: this.fanout, logger: this.logger });
    this.reconciler = new HistoryReconciler({
      store: this.store,
      allocator: this.allocator,
      registry: this.registry,
      logger: this.logger,
      pageSize: this.config.backlogPageSize,
    });
    this.authGate = new AuthGate({
      validateCredential: options.validateCredential,
      store: this.store,
      logger: this.logger,
    });
  }

  get isClosing(): boolean {
    return this.closing !== null;
  }

  admit(token: string | null | undefined, chatId: string): Promise<Identity> {
    return this.authGate.admit(token, chatId);
  }

  createConnection(transport: Transport, options: CreateConnectionOptions): Connection {
    return new Connection(transport, {
      connectionId: options.connectionId ?? randomUUID(),
      chatId: options.chatId,
      userId: options.userId,
      lastSeenSeq: options.lastSeenSeq,
      queueCapacity: this.config.outboundQueueSize,
      slowConsumerGraceMs: this.config.slowConsumerGraceMs,
      ingress: this.ingress,
      readTracker: this.readTracker,
      registry: this.registry,
      logger: this.logger,
    });
  }

  /** Replay the backlog to `connection` and register it. */
  async reconcile(connection: Connection): Promise<ReconcileResult> {
    this.syncing.add(connection);
    try {
      return await this.reconciler.reconcile(connection);
    } finally {
      this.syncing.delete(connection);
    }
  }

  /** Close every connection with 1001 and release the store. Idempotent. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const connections = [...this.syncing];
    for (const chatId of this.registry.chatIds()) {
      connections.push(...this.registry.list(chatId));
    }
    this.logger.info({ connections: connections.length }, "shutting down");
    for (const connection of connections) {
      connection.close(CLOSE_GOING_AWAY, "Server shutting down");
    }
    await this.store.close?.();
  }
}
