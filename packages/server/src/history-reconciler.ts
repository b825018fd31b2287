/**
 * Brings a new connection up to date before it goes live.
 *
 * The bulk of the backlog is replayed without holding the chat lock, waiting
 * for queue capacity page by page. The remainder (whatever was committed while
 * that ran) is read under the allocator's chat lock, and the connection is
 * registered before the lock is released. Publishes run under the same lock,
 * so each message reaches the connection exactly once: from the catch-up read
 * or from fanout.
 */

import type { ConnectionRegistry, RegisteredConnection } from "./connection-registry.js";
import { InvalidReconnectStateError } from "./errors.js";
import type { Logger } from "./logger.js";
import { FRAME_SYNCED, toMessageFrame } from "./protocol.js";
import type { SequenceAllocator } from "./sequence-allocator.js";
import type { ChatStore, StoredMessage } from "./storage/chat-store.js";

export interface ReconcilingConnection extends RegisteredConnection {
  /** Highest seq the client says it has; 0 for a fresh client. */
  readonly lastSeenSeq: number;
  /** Aborted when the connection goes away: ConnectionClosedError, or SlowConsumerError after a 4429. */
  readonly signal: AbortSignal;
  /** Enqueue a backlog page, waiting for room in the outbound queue first. */
  deliverBacklog(messages: StoredMessage[]): Promise<void>;
}

export interface ReconcileResult {
  replayed: number;
  head: number;
}

export interface HistoryReconcilerOptions {
  store: Pick<ChatStore, "readRange">;
  allocator: Pick<SequenceAllocator, "head" | "exclusive">;
  registry: Pick<ConnectionRegistry, "register">;
  logger: Logger;
  pageSize: number;
}

export class HistoryReconciler {
  private readonly store: HistoryReconcilerOptions["store"];
  private readonly allocator: HistoryReconcilerOptions["allocator"];
  private readonly registry: HistoryReconcilerOptions["registry"];
  private readonly logger: Logger;
  private readonly pageSize: number;

  constructor(options: HistoryReconcilerOptions) {
    this.store = options.store;
    this.allocator = options.allocator;
    this.registry = options.registry;
    this.logger = options.logger.child({ component: "history-reconciler" });
    this.pageSize = options.pageSize;
  }

  /**
   * Replay everything after the connection's last-seen seq, send `synced` and
   * register the connection. Throws InvalidReconnectStateError when the client
   * claims more than the chat holds, and the connection's abort reason when it
   * closes part-way; in both cases nothing is registered.
   */
  async reconcile(connection: ReconcilingConnection): Promise<ReconcileResult> {
    const { chatId, lastSeenSeq, signal } = connection;
    const head = await this.allocator.head(chatId);
    signal.throwIfAborted();
    if (lastSeenSeq > head) {
      throw new InvalidReconnectStateError(lastSeenSeq, head);
    }

    let cursor = lastSeenSeq;
    let replayed = 0;
    while (cursor < head) {
      const page = await this.store.readRange(chatId, cursor, this.pageSize);
      signal.throwIfAborted();
      if (page.length === 0) break;
      await connection.deliverBacklog(page);
      signal.throwIfAborted();
      replayed += page.length;
      cursor = page[page.length - 1].seq;
    }

    return this.allocator.exclusive(chatId, async () => {
      for (;;) {
        const page = await this.store.readRange(chatId, cursor, this.pageSize);
        signal.throwIfAborted();
        for (const message of page) {
          connection.deliver(toMessageFrame(message));
        }
        if (page.length > 0) {
          replayed += page.length;
          cursor = page[page.length - 1].seq;
        }
        if (page.length < this.pageSize) break;
      }
      connection.deliver({ type: FRAME_SYNCED, chat: chatId, seq: cursor });
      signal.throwIfAborted();
      this.registry.register(connection);
      this.logger.debug({ chatId, connectionId: connection.id, lastSeenSeq, replayed, head: cursor }, "connection synced");
      return { replayed, head: cursor };
    });
  }
}
