/**
 * Live connections, sharded by chat.
 *
 * A shard is created on the first registration for a chat and dropped when its
 * last connection leaves. Each (chat, user) pair holds at most one connection.
 */

import { CLOSE_REPLACED } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ServerFrame } from "./protocol.js";

/** What the registry and fanout need from a connection. */
export interface RegisteredConnection {
  readonly id: string;
  readonly chatId: string;
  readonly userId: string;
  /** Non-blocking enqueue; false when the frame was not accepted. */
  deliver(frame: ServerFrame): boolean;
  close(code: number, reason: string): void;
}

export interface ConnectionRegistryOptions {
  logger: Logger;
}

export class ConnectionRegistry<C extends RegisteredConnection = RegisteredConnection> {
  private readonly shards = new Map<string, Map<string, C>>();
  private readonly logger: Logger;

  constructor(options: ConnectionRegistryOptions) {
    this.logger = options.logger.child({ component: "connection-registry" });
  }

  /**
   * Add a connection. An older connection of the same user in the same chat is
   * closed before the new one takes its place.
   */
  register(connection: C): void {
    const existing = this.shards.get(connection.chatId)?.get(connection.userId);
    if (existing === connection) return;
    if (existing) {
      this.logger.info(
        { chatId: connection.chatId, userId: connection.userId, evicted: existing.id, replacement: connection.id },
        "evicting older connection"
      );
      existing.close(CLOSE_REPLACED, "Replaced by a newer connection");
      // close() normally deregisters; make sure the slot is free either way
      this.removeIfCurrent(existing);
    }
    let shard = this.shards.get(connection.chatId);
    if (!shard) {
      shard = new Map();
      this.shards.set(connection.chatId, shard);
    }
    shard.set(connection.userId, connection);
  }

  /** Remove exactly this connection. Returns false if it was not registered. */
  deregister(connection: C): boolean {
    return this.removeIfCurrent(connection);
  }

  list(chatId: string): C[] {
    const shard = this.shards.get(chatId);
    return shard ? [...shard.values()] : [];
  }

  get(chatId: string, userId: string): C | undefined {
    return this.shards.get(chatId)?.get(userId);
  }

  /** Connections in one chat, or across all chats. */
  size(chatId?: string): number {
    if (chatId !== undefined) {
      return this.shards.get(chatId)?.size ?? 0;
    }
    let total = 0;
    for (const shard of this.shards.values()) {
      total += shard.size;
    }
    return total;
  }

  chatIds(): string[] {
    return [...this.shards.keys()];
  }

  private removeIfCurrent(connection: C): boolean {
    const shard = this.shards.get(connection.chatId);
    if (!shard || shard.get(connection.userId) !== connection) return false;
    shard.delete(connection.userId);
    if (shard.size === 0) {
      this.shards.delete(connection.chatId);
    }
    return true;
  }
}
