/**
 * Single authority for per-chat sequence numbers.
 *
 * The head of each chat is cached in memory and loaded from the store's
 * highest persisted seq on first use, which is also the restart rule: nothing
 * besides the messages themselves is persisted, so a restarted process resumes
 * at max(seq) + 1. The head only moves after the commit for seq = head + 1
 * succeeded, so a failed commit never leaves a gap.
 */

import { SequenceConflictError } from "./errors.js";
import { KeyedLock } from "./keyed-lock.js";
import type { Logger } from "./logger.js";
import type { ChatStore } from "./storage/chat-store.js";

export interface SequenceAllocatorOptions {
  store: Pick<ChatStore, "getHeadSeq">;
  logger: Logger;
  /** Shared chat lock; pass one in to serialize other per-chat work with allocation. */
  lock?: KeyedLock;
}

export class SequenceAllocator {
  private readonly store: Pick<ChatStore, "getHeadSeq">;
  private readonly logger: Logger;
  private readonly lock: KeyedLock;
  private readonly heads = new Map<string, number>();

  constructor(options: SequenceAllocatorOptions) {
    this.store = options.store;
    this.logger = options.logger.child({ component: "sequence-allocator" });
    this.lock = options.lock ?? new KeyedLock();
  }

  /**
   * Current head (last committed seq), 0 for an empty chat. Reads outside the
   * lock do not populate the cache.
   */
  async head(chatId: string): Promise<number> {
    return this.heads.get(chatId) ?? this.store.getHeadSeq(chatId);
  }

  /**
   * Mint head + 1 for the chat and hand it to `commit`. The head advances only
   * when `commit` resolves; `onCommitted` then runs before the chat lock is
   * released, so its side effects happen in sequence order.
   */
  async next<T>(
    chatId: string,
    commit: (seq: number) => Promise<T>,
    onCommitted?: (value: T, seq: number) => void
  ): Promise<T> {
    return this.lock.run(chatId, async () => {
      let seq = (this.heads.get(chatId) ?? (await this.loadHead(chatId))) + 1;
      let value: T;
      try {
        value = await commit(seq);
      } catch (err) {
        if (!(err instanceof SequenceConflictError)) throw err;
        // another writer owns this number: resync from the store and retry once
        this.heads.delete(chatId);
        const reloaded = await this.loadHead(chatId);
        this.logger.warn({ chatId, seq, reloaded }, "sequence conflict, reloaded head");
        seq = reloaded + 1;
        value = await commit(seq);
      }
      this.heads.set(chatId, seq);
      if (onCommitted) {
        try {
          onCommitted(value, seq);
        } catch (err) {
          this.logger.error({ chatId, seq, err }, "post-commit hook failed");
        }
      }
      return value;
    });
  }

  /** Run `task` while holding the chat's allocation lock. */
  exclusive<T>(chatId: string, task: () => Promise<T>): Promise<T> {
    return this.lock.run(chatId, task);
  }

  /** Drop the cached head; the next use reloads it from the store. */
  forget(chatId: string): void {
    this.heads.delete(chatId);
  }

  private async loadHead(chatId: string): Promise<number> {
    const head = await this.store.getHeadSeq(chatId);
    this.heads.set(chatId, head);
    return head;
  }
}
