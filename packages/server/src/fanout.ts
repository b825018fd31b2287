/**
 * Pushes persisted messages and read-status changes to live connections.
 * Every call returns without waiting on any transport.
 */

import type { ConnectionRegistry, RegisteredConnection } from "./connection-registry.js";
import type { Logger } from "./logger.js";
import { FRAME_READ, toMessageFrame, type ReadStatusFrame } from "./protocol.js";
import type { StoredMessage } from "./storage/chat-store.js";

export interface ReadStatus {
  chatId: string;
  userId: string;
  seq: number;
}

export interface FanoutOptions {
  registry: Pick<ConnectionRegistry, "list">;
  logger: Logger;
}

export class Fanout {
  private readonly registry: Pick<ConnectionRegistry, "list">;
  private readonly logger: Logger;

  constructor(options: FanoutOptions) {
    this.registry = options.registry;
    this.logger = options.logger.child({ component: "fanout" });
  }

  /**
   * Enqueue a message on every connection of its chat. Callers publish in
   * sequence order (the allocator's post-commit hook), which makes delivery
   * order equal to sequence order. Returns how many connections accepted it.
   */
  publish(message: StoredMessage): number {
    const frame = toMessageFrame(message);
    return this.deliverAll(this.registry.list(message.chatId), (connection) => connection.deliver(frame), {
      chatId: message.chatId,
      seq: message.seq,
    });
  }

  /**
   * Tell the chat that `status.userId` has read up to `status.seq`. The reader's
   * own connection is skipped unless another user id is excluded instead.
   */
  broadcastReadStatus(status: ReadStatus, exceptUserId: string = status.userId): number {
    const frame: ReadStatusFrame = { type: FRAME_READ, chat: status.chatId, user: status.userId, seq: status.seq };
    const targets = this.registry.list(status.chatId).filter((c) => c.userId !== exceptUserId);
    return this.deliverAll(targets, (connection) => connection.deliver(frame), {
      chatId: status.chatId,
      reader: status.userId,
      seq: status.seq,
    });
  }

  private deliverAll(
    targets: RegisteredConnection[],
    deliver: (connection: RegisteredConnection) => boolean,
    context: Record<string, unknown>
  ): number {
    let accepted = 0;
    for (const connection of targets) {
      if (deliver(connection)) {
        accepted++;
      } else {
        this.logger.debug({ ...context, connectionId: connection.id }, "connection did not accept frame");
      }
    }
    return accepted;
  }
}
