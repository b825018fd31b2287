/**
 * Accepts a message from a participant: validate, sequence, persist, publish.
 */

import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import type { PersistRetryConfig } from "./config.js";
import { MalformedFrameError, PersistenceError, SequenceConflictError } from "./errors.js";
import type { Fanout } from "./fanout.js";
import type { Logger } from "./logger.js";
import type { SequenceAllocator } from "./sequence-allocator.js";
import type { ChatStore, StoredMessage } from "./storage/chat-store.js";

export interface SubmitMessageInput {
  chatId: string;
  senderId: string;
  text: unknown;
}

export interface MessageIngressOptions {
  store: Pick<ChatStore, "appendMessage" | "getMessage">;
  allocator: Pick<SequenceAllocator, "next">;
  fanout: Pick<Fanout, "publish">;
  logger: Logger;
  maxMessageBytes: number;
  persistRetry: PersistRetryConfig;
  /** Test seam for the backoff wait. */
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
  generateId?: () => string;
}

export class MessageIngress {
  private readonly options: MessageIngressOptions;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MessageIngressOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: "message-ingress" });
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Persist and publish one message. Resolves with the stored record once it is
   * durable and has been handed to fanout; nothing is published for a message
   * that could not be persisted.
   */
  async submit(input: SubmitMessageInput): Promise<StoredMessage> {
    const text = this.validate(input.text);
    const id = this.generateId();
    const createdAt = this.now().toISOString();

    const message = await this.options.allocator.next(
      input.chatId,
      (seq) => this.persist({ id, chatId: input.chatId, senderId: input.senderId, seq, text, createdAt }),
      (stored) => {
        this.options.fanout.publish(stored);
      }
    );
    this.logger.debug({ chatId: message.chatId, seq: message.seq, messageId: message.id }, "message accepted");
    return message;
  }

  private validate(text: unknown): string {
    if (typeof text !== "string") {
      throw new MalformedFrameError("Message text must be a string");
    }
    if (text.trim().length === 0) {
      throw new MalformedFrameError("Message text must not be empty");
    }
    const bytes = Buffer.byteLength(text, "utf8");
    if (bytes > this.options.maxMessageBytes) {
      throw new MalformedFrameError(
        `Message text is ${bytes} bytes, limit is ${this.options.maxMessageBytes}`
      );
    }
    return text;
  }

  /**
   * Writes the message at its seq, retrying with capped exponential backoff. A
   * failed attempt may still have reached the store, so after one the message
   * is looked up by id before it counts as missing.
   */
  private async persist(message: StoredMessage): Promise<StoredMessage> {
    const { attempts, baseDelayMs, maxDelayMs } = this.options.persistRetry;
    let lastError: unknown;
    let uncertain = false;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        await this.options.store.appendMessage(message);
        return message;
      } catch (err) {
        if (uncertain && (await this.landed(message))) return message;
        // the allocator owns conflicts
        if (err instanceof SequenceConflictError) throw err;
        uncertain = true;
        lastError = err;
        this.logger.warn(
          { chatId: message.chatId, seq: message.seq, attempt, attempts, err },
          "persist attempt failed"
        );
        if (attempt < attempts) {
          await this.sleep(Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs));
        }
      }
    }
    if (await this.landed(message)) return message;
    throw new PersistenceError(
      `Failed to persist message after ${attempts} attempt${attempts === 1 ? "" : "s"}`,
      attempts,
      lastError
    );
  }

  /** True when the store already holds this message at this seq. */
  private async landed(message: StoredMessage): Promise<boolean> {
    let existing: StoredMessage | null;
    try {
      existing = await this.options.store.getMessage(message.id);
    } catch (err) {
      this.logger.warn({ chatId: message.chatId, seq: message.seq, err }, "could not check for an earlier write");
      return false;
    }
    if (existing === null || existing.chatId !== message.chatId || existing.seq !== message.seq) return false;
    this.logger.info({ chatId: message.chatId, seq: message.seq, messageId: message.id }, "earlier persist attempt had landed");
    return true;
  }
}
