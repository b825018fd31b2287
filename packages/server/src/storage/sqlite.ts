/**
 * SQLite chat store (better-sqlite3). Synchronous driver wrapped in promises;
 * loaded on first use.
 */

import { randomUUID } from "node:crypto";
import type BetterSqlite3 from "better-sqlite3";
import { SequenceConflictError } from "../errors.js";
import {
  DEFAULT_TABLE_PREFIX,
  storeTables,
  type ChatKind,
  type ChatRecord,
  type ChatStore,
  type NewChat,
  type ParticipantRecord,
  type ParticipantRole,
  type StoredMessage,
} from "./chat-store.js";

export interface SQLiteChatStoreOptions {
  /** Prefix for the four tables (default "seqchat"). */
  tablePrefix?: string;
}

export type SQLiteConnectionConfig = string | { filename: string; options?: BetterSqlite3.Options };

type ChatRow = { id: string; kind: ChatKind; name: string | null; created_at: number };
type ParticipantRow = { chat_id: string; user_id: string; role: ParticipantRole; joined_at: number };
type MessageRow = {
  id: string;
  chat_id: string;
  sender_id: string;
  seq: number;
  text: string;
  created_at: number;
};
type SeqRow = { seq: number | null };

function toChat(row: ChatRow): ChatRecord {
  return {
    id: row.id,
    kind: row.kind,
    name: row.name ?? undefined,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

function toParticipant(row: ParticipantRow): ParticipantRecord {
  return {
    chatId: row.chat_id,
    userId: row.user_id,
    role: row.role,
    joinedAt: new Date(row.joined_at).toISOString(),
  };
}

function toMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    chatId: row.chat_id,
    senderId: row.sender_id,
    seq: row.seq,
    text: row.text,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

/** Only the (chat_id, seq) constraint is a sequence conflict; a reused id is not. */
function isSeqViolation(error: unknown, messagesTable: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "SQLITE_CONSTRAINT_UNIQUE" &&
    error.message.includes(`${messagesTable}.seq`)
  );
}

async function loadDatabase(): Promise<typeof BetterSqlite3> {
  try {
    const { default: Database } = await import("better-sqlite3");
    return Database;
  } catch {
    throw new Error(
      'SQLite storage requires the "better-sqlite3" package. Install it with: npm install better-sqlite3'
    );
  }
}

export async function createSQLiteChatStore(
  connectionConfig: SQLiteConnectionConfig,
  options: SQLiteChatStoreOptions = {}
): Promise<ChatStore> {
  const Database = await loadDatabase();
  const config = typeof connectionConfig === "string" ? { filename: connectionConfig } : connectionConfig;
  const db = new Database(config.filename, "options" in config ? config.options : undefined);
  const t = storeTables(options.tablePrefix ?? DEFAULT_TABLE_PREFIX);

  db.exec(`
    CREATE TABLE IF NOT EXISTS ${t.chats} (
      id TEXT PRIMARY KEY,
      kind TEXT NOT NULL,
      name TEXT,
      created_at INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS ${t.participants} (
      chat_id TEXT NOT NULL REFERENCES ${t.chats}(id) ON DELETE CASCADE,
      user_id TEXT NOT NULL,
      role TEXT NOT NULL,
      joined_at INTEGER NOT NULL,
      PRIMARY KEY (chat_id, user_id)
    );
    CREATE TABLE IF NOT EXISTS ${t.messages} (
      id TEXT PRIMARY KEY,
      chat_id TEXT NOT NULL,
      sender_id TEXT NOT NULL,
      seq INTEGER NOT NULL,
      text TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      UNIQUE (chat_id, seq)
    );
    CREATE TABLE IF NOT EXISTS ${t.watermarks} (
      chat_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      seq INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (chat_id, user_id)
    );
  `);

  const insertChat = db.prepare(`INSERT INTO ${t.chats} (id, kind, name, created_at) VALUES (?, ?, ?, ?)`);
  const insertParticipant = db.prepare(
    `INSERT OR IGNORE INTO ${t.participants} (chat_id, user_id, role, joined_at) VALUES (?, ?, ?, ?)`
  );
  const selectChat = db.prepare<[string], ChatRow>(`SELECT id, kind, name, created_at FROM ${t.chats} WHERE id = ?`);
  const selectParticipant = db.prepare<[string, string], ParticipantRow>(
    `SELECT chat_id, user_id, role, joined_at FROM ${t.participants} WHERE chat_id = ? AND user_id = ?`
  );
  const insertMessage = db.prepare(
    `INSERT INTO ${t.messages} (id, chat_id, sender_id, seq, text, created_at) VALUES (?, ?, ?, ?, ?, ?)`
  );
  const selectHead = db.prepare<[string], SeqRow>(`SELECT MAX(seq) AS seq FROM ${t.messages} WHERE chat_id = ?`);
  const selectRange = db.prepare<[string, number, number], MessageRow>(
    `SELECT id, chat_id, sender_id, seq, text, created_at
     FROM ${t.messages}
     WHERE chat_id = ? AND seq > ?
     ORDER BY seq ASC
     LIMIT ?`
  );
  const selectMessage = db.prepare<[string], MessageRow>(
    `SELECT id, chat_id, sender_id, seq, text, created_at FROM ${t.messages} WHERE id = ?`
  );
  const selectWatermark = db.prepare<[string, string], SeqRow>(`SELECT seq FROM ${t.watermarks} WHERE chat_id = ? AND user_id = ?`);
  const upsertWatermark = db.prepare(
    `INSERT INTO ${t.watermarks} (chat_id, user_id, seq, updated_at) VALUES (?, ?, ?, ?)
     ON CONFLICT (chat_id, user_id) DO UPDATE SET seq = MAX(seq, excluded.seq), updated_at = excluded.updated_at`
  );

  const createChatTx = db.transaction((chat: NewChat, id: string, now: number) => {
    insertChat.run(id, chat.kind, chat.name ?? null, now);
    for (const participant of chat.participants ?? []) {
      insertParticipant.run(id, participant.userId, participant.role ?? "member", now);
    }
  });

  function findChat(chatId: string): ChatRecord | null {
    const row = selectChat.get(chatId);
    return row ? toChat(row) : null;
  }

  function findParticipant(chatId: string, userId: string): ParticipantRecord | null {
    const row = selectParticipant.get(chatId, userId);
    return row ? toParticipant(row) : null;
  }

  return {
    async createChat(chat: NewChat): Promise<ChatRecord> {
      const id = chat.id ?? randomUUID();
      const now = Date.now();
      createChatTx(chat, id, now);
      return { id, kind: chat.kind, name: chat.name, createdAt: new Date(now).toISOString() };
    },

    async addParticipant(chatId: string, userId: string, role: ParticipantRole = "member"): Promise<ParticipantRecord> {
      if (!findChat(chatId)) {
        throw new Error(`Chat ${chatId} does not exist`);
      }
      insertParticipant.run(chatId, userId, role, Date.now());
      const record = findParticipant(chatId, userId);
      if (!record) {
        throw new Error(`Participant ${userId} missing from chat ${chatId} after insert`);
      }
      return record;
    },

    async getChat(chatId: string): Promise<ChatRecord | null> {
      return findChat(chatId);
    },

    async isParticipant(chatId: string, userId: string): Promise<boolean> {
      return findParticipant(chatId, userId) !== null;
    },

    async appendMessage(message: StoredMessage): Promise<StoredMessage> {
      try {
        insertMessage.run(
          message.id,
          message.chatId,
          message.senderId,
          message.seq,
          message.text,
          Date.parse(message.createdAt)
        );
      } catch (err) {
        if (isSeqViolation(err, t.messages)) {
          throw new SequenceConflictError(message.chatId, message.seq, err);
        }
        throw err;
      }
      return { ...message };
    },

    async getHeadSeq(chatId: string): Promise<number> {
      return selectHead.get(chatId)?.seq ?? 0;
    },

    async readRange(chatId: string, afterSeq: number, limit: number): Promise<StoredMessage[]> {
      return selectRange.all(chatId, afterSeq, limit).map(toMessage);
    },

    async getMessage(messageId: string): Promise<StoredMessage | null> {
      const row = selectMessage.get(messageId);
      return row ? toMessage(row) : null;
    },

    async getWatermark(chatId: string, userId: string): Promise<number> {
      return selectWatermark.get(chatId, userId)?.seq ?? 0;
    },

    async setWatermark(chatId: string, userId: string, seq: number): Promise<void> {
      upsertWatermark.run(chatId, userId, seq, Date.now());
    },

    async close(): Promise<void> {
      db.close();
    },
  };
}
