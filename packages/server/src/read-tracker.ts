/**
 * Per-(chat, user) read watermarks. A watermark only ever moves forward, and a
 * read-status broadcast goes out only when it moved.
 */

import { PersistenceError, UnknownMessageError, isChatCoreError } from "./errors.js";
import type { Fanout } from "./fanout.js";
import { KeyedLock } from "./keyed-lock.js";
import type { Logger } from "./logger.js";
import type { ChatStore } from "./storage/chat-store.js";

export interface AcknowledgeInput {
  chatId: string;
  userId: string;
  messageId: string;
}

export interface AcknowledgeResult {
  /** True when the watermark moved. */
  advanced: boolean;
  /** Watermark after the receipt. */
  seq: number;
}

export interface ReadTrackerOptions {
  store: Pick<ChatStore, "getMessage" | "getWatermark" | "setWatermark">;
  fanout: Pick<Fanout, "broadcastReadStatus">;
  logger: Logger;
}

export class ReadTracker {
  private readonly store: ReadTrackerOptions["store"];
  private readonly fanout: ReadTrackerOptions["fanout"];
  private readonly logger: Logger;
  private readonly lock = new KeyedLock();

  constructor(options: ReadTrackerOptions) {
    this.store = options.store;
    this.fanout = options.fanout;
    this.logger = options.logger.child({ component: "read-tracker" });
  }

  async acknowledge(input: AcknowledgeInput): Promise<AcknowledgeResult> {
    const { chatId, userId, messageId } = input;
    const message = await this.store.getMessage(messageId);
    if (!message || message.chatId !== chatId) {
      throw new UnknownMessageError(messageId);
    }

    return this.lock.run(JSON.stringify([chatId, userId]), async () => {
      const current = await this.store.getWatermark(chatId, userId);
      if (message.seq <= current) {
        return { advanced: false, seq: current };
      }
      try {
        await this.store.setWatermark(chatId, userId, message.seq);
      } catch (err) {
        if (isChatCoreError(err)) throw err;
        throw new PersistenceError("Failed to store read watermark", 1, err);
      }
      this.logger.debug({ chatId, userId, seq: message.seq }, "watermark advanced");
      this.fanout.broadcastReadStatus({ chatId, userId, seq: message.seq });
      return { advanced: true, seq: message.seq };
    });
  }

  watermark(chatId: string, userId: string): Promise<number> {
    return this.store.getWatermark(chatId, userId);
  }
}
