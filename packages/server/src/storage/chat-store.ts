/**
 * Chat store interface for pluggable persistence.
 * Implementations: in-memory, Postgres, MySQL, SQLite.
 *
 * The store is the source of truth for chats, participants, messages and read
 * watermarks. The core never caches anything it cannot rebuild from here.
 */

export type ChatKind = "direct" | "group";

export type ParticipantRole = "owner" | "member";

export interface ChatRecord {
  id: string;
  kind: ChatKind;
  name?: string;
  createdAt: string;
}

export interface NewChat {
  /** Generated when omitted. */
  id?: string;
  kind: ChatKind;
  name?: string;
  participants?: Array<{ userId: string; role?: ParticipantRole }>;
}

export interface ParticipantRecord {
  chatId: string;
  userId: string;
  role: ParticipantRole;
  joinedAt: string;
}

/** A persisted message. `seq` is dense and strictly increasing per chat. */
export interface StoredMessage {
  id: string;
  chatId: string;
  senderId: string;
  seq: number;
  text: string;
  /** ISO-8601 timestamp. */
  createdAt: string;
}

export interface ChatStore {
  createChat(chat: NewChat): Promise<ChatRecord>;

  /** Adds a participant; re-adding an existing one keeps the original record. */
  addParticipant(chatId: string, userId: string, role?: ParticipantRole): Promise<ParticipantRecord>;

  getChat(chatId: string): Promise<ChatRecord | null>;

  /** False for unknown chats as well as for non-members. */
  isParticipant(chatId: string, userId: string): Promise<boolean>;

  /**
   * Persist a message whose seq was minted by the caller.
   * Must reject with SequenceConflictError when (chatId, seq) already exists.
   */
  appendMessage(message: StoredMessage): Promise<StoredMessage>;

  /** Highest persisted seq for the chat, 0 when it has no messages. */
  getHeadSeq(chatId: string): Promise<number>;

  /** Messages with seq > afterSeq, oldest first, at most `limit`. */
  readRange(chatId: string, afterSeq: number, limit: number): Promise<StoredMessage[]>;

  getMessage(messageId: string): Promise<StoredMessage | null>;

  /** Last acknowledged seq for the user in the chat, 0 when none. */
  getWatermark(chatId: string, userId: string): Promise<number>;

  /** Raise the watermark; a lower value than the stored one is ignored. */
  setWatermark(chatId: string, userId: string, seq: number): Promise<void>;

  /** Optional: release connections / cleanup. */
  close?(): Promise<void>;
}

const TABLE_PREFIX_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface StoreTables {
  chats: string;
  participants: string;
  messages: string;
  watermarks: string;
}

/** Table names for the SQL stores; the prefix is interpolated into DDL, so it is validated. */
export function storeTables(prefix: string): StoreTables {
  if (!TABLE_PREFIX_PATTERN.test(prefix)) {
    throw new Error(`Invalid table prefix "${prefix}"`);
  }
  return {
    chats: `${prefix}_chats`,
    participants: `${prefix}_participants`,
    messages: `${prefix}_messages`,
    watermarks: `${prefix}_watermarks`,
  };
}

export const DEFAULT_TABLE_PREFIX = "seqchat";
