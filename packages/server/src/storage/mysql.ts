/**
 * MySQL chat store (mysql2). The driver is loaded on first use.
 */

import { randomUUID } from "node:crypto";
import type { Pool, PoolOptions, RowDataPacket } from "mysql2/promise";
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

export interface MySQLChatStoreOptions {
  /** Prefix for the four tables (default "seqchat"). */
  tablePrefix?: string;
}

export type MySQLConnectionConfig = string | PoolOptions;

type ChatRow = RowDataPacket & { id: string; kind: ChatKind; name: string | null; created_at: number | string };
type ParticipantRow = RowDataPacket & {
  chat_id: string;
  user_id: string;
  role: ParticipantRole;
  joined_at: number | string;
};
type MessageRow = RowDataPacket & {
  id: string;
  chat_id: string;
  sender_id: string;
  seq: number | string;
  text: string;
  created_at: number | string;
};
type SeqRow = RowDataPacket & { seq: number | string | null };

function toChat(row: ChatRow): ChatRecord {
  return {
    id: row.id,
    kind: row.kind,
    name: row.name ?? undefined,
    createdAt: new Date(Number(row.created_at)).toISOString(),
  };
}

function toParticipant(row: ParticipantRow): ParticipantRecord {
  return {
    chatId: row.chat_id,
    userId: row.user_id,
    role: row.role,
    joinedAt: new Date(Number(row.joined_at)).toISOString(),
  };
}

function toMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    chatId: row.chat_id,
    senderId: row.sender_id,
    seq: Number(row.seq),
    text: row.text,
    createdAt: new Date(Number(row.created_at)).toISOString(),
  };
}

/** Only the (chat_id, seq) key is a sequence conflict; a reused id is not. */
function isSeqDuplicate(error: unknown, messagesTable: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ER_DUP_ENTRY" &&
    error.message.includes(`uq_${messagesTable}_chat_seq'`)
  );
}

async function loadCreatePool(): Promise<(config: string | PoolOptions) => Pool> {
  try {
    const { default: mysql } = await import("mysql2/promise");
    return (config) => (typeof config === "string" ? mysql.createPool(config) : mysql.createPool(config));
  } catch {
    throw new Error('MySQL storage requires the "mysql2" package. Install it with: npm install mysql2');
  }
}

export async function createMySQLChatStore(
  connectionConfig: MySQLConnectionConfig,
  options: MySQLChatStoreOptions = {}
): Promise<ChatStore> {
  const createPool = await loadCreatePool();
  const pool = createPool(connectionConfig);
  const t = storeTables(options.tablePrefix ?? DEFAULT_TABLE_PREFIX);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${t.chats} (
      id VARCHAR(191) PRIMARY KEY,
      kind VARCHAR(16) NOT NULL,
      name TEXT,
      created_at BIGINT NOT NULL
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${t.participants} (
      chat_id VARCHAR(191) NOT NULL,
      user_id VARCHAR(191) NOT NULL,
      role VARCHAR(16) NOT NULL,
      joined_at BIGINT NOT NULL,
      PRIMARY KEY (chat_id, user_id)
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${t.messages} (
      id VARCHAR(64) PRIMARY KEY,
      chat_id VARCHAR(191) NOT NULL,
      sender_id VARCHAR(191) NOT NULL,
      seq BIGINT NOT NULL,
      text TEXT NOT NULL,
      created_at BIGINT NOT NULL,
      UNIQUE KEY uq_${t.messages}_chat_seq (chat_id, seq)
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${t.watermarks} (
      chat_id VARCHAR(191) NOT NULL,
      user_id VARCHAR(191) NOT NULL,
      seq BIGINT NOT NULL,
      updated_at BIGINT NOT NULL,
      PRIMARY KEY (chat_id, user_id)
    )
  `);

  async function selectParticipant(chatId: string, userId: string): Promise<ParticipantRecord | null> {
    const [rows] = await pool.query<ParticipantRow[]>(
      `SELECT chat_id, user_id, role, joined_at FROM ${t.participants} WHERE chat_id = ? AND user_id = ?`,
      [chatId, userId]
    );
    const row = rows[0];
    return row ? toParticipant(row) : null;
  }

  async function selectChat(chatId: string): Promise<ChatRecord | null> {
    const [rows] = await pool.query<ChatRow[]>(
      `SELECT id, kind, name, created_at FROM ${t.chats} WHERE id = ?`,
      [chatId]
    );
    const row = rows[0];
    return row ? toChat(row) : null;
  }

  return {
    async createChat(chat: NewChat): Promise<ChatRecord> {
      const id = chat.id ?? randomUUID();
      const now = Date.now();
      const conn = await pool.getConnection();
      try {
        await conn.beginTransaction();
        await conn.query(
          `INSERT INTO ${t.chats} (id, kind, name, created_at) VALUES (?, ?, ?, ?)`,
          [id, chat.kind, chat.name ?? null, now]
        );
        for (const participant of chat.participants ?? []) {
          await conn.query(
            `INSERT IGNORE INTO ${t.participants} (chat_id, user_id, role, joined_at) VALUES (?, ?, ?, ?)`,
            [id, participant.userId, participant.role ?? "member", now]
          );
        }
        await conn.commit();
      } catch (err) {
        await conn.rollback();
        throw err;
      } finally {
        conn.release();
      }
      return { id, kind: chat.kind, name: chat.name, createdAt: new Date(now).toISOString() };
    },

    async addParticipant(chatId: string, userId: string, role: ParticipantRole = "member"): Promise<ParticipantRecord> {
      if (!(await selectChat(chatId))) {
        throw new Error(`Chat ${chatId} does not exist`);
      }
      await pool.query(
        `INSERT IGNORE INTO ${t.participants} (chat_id, user_id, role, joined_at) VALUES (?, ?, ?, ?)`,
        [chatId, userId, role, Date.now()]
      );
      const record = await selectParticipant(chatId, userId);
      if (!record) {
        throw new Error(`Participant ${userId} missing from chat ${chatId} after insert`);
      }
      return record;
    },

    getChat: selectChat,

    async isParticipant(chatId: string, userId: string): Promise<boolean> {
      return (await selectParticipant(chatId, userId)) !== null;
    },

    async appendMessage(message: StoredMessage): Promise<StoredMessage> {
      try {
        await pool.query(
          `INSERT INTO ${t.messages} (id, chat_id, sender_id, seq, text, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
          [
            message.id,
            message.chatId,
            message.senderId,
            message.seq,
            message.text,
            Date.parse(message.createdAt),
          ]
        );
      } catch (err) {
        if (isSeqDuplicate(err, t.messages)) {
          throw new SequenceConflictError(message.chatId, message.seq, err);
        }
        throw err;
      }
      return { ...message };
    },

    async getHeadSeq(chatId: string): Promise<number> {
      const [rows] = await pool.query<SeqRow[]>(
        `SELECT MAX(seq) AS seq FROM ${t.messages} WHERE chat_id = ?`,
        [chatId]
      );
      const seq = rows[0]?.seq;
      return seq === null || seq === undefined ? 0 : Number(seq);
    },

    async readRange(chatId: string, afterSeq: number, limit: number): Promise<StoredMessage[]> {
      const [rows] = await pool.query<MessageRow[]>(
        `SELECT id, chat_id, sender_id, seq, text, created_at
         FROM ${t.messages}
         WHERE chat_id = ? AND seq > ?
         ORDER BY seq ASC
         LIMIT ?`,
        [chatId, afterSeq, limit]
      );
      return rows.map(toMessage);
    },

    async getMessage(messageId: string): Promise<StoredMessage | null> {
      const [rows] = await pool.query<MessageRow[]>(
        `SELECT id, chat_id, sender_id, seq, text, created_at FROM ${t.messages} WHERE id = ?`,
        [messageId]
      );
      const row = rows[0];
      return row ? toMessage(row) : null;
    },

    async getWatermark(chatId: string, userId: string): Promise<number> {
      const [rows] = await pool.query<SeqRow[]>(
        `SELECT seq FROM ${t.watermarks} WHERE chat_id = ? AND user_id = ?`,
        [chatId, userId]
      );
      const seq = rows[0]?.seq;
      return seq === null || seq === undefined ? 0 : Number(seq);
    },

    async setWatermark(chatId: string, userId: string, seq: number): Promise<void> {
      await pool.query(
        `INSERT INTO ${t.watermarks} (chat_id, user_id, seq, updated_at) VALUES (?, ?, ?, ?)
         ON DUPLICATE KEY UPDATE seq = GREATEST(seq, VALUES(seq)), updated_at = VALUES(updated_at)`,
        [chatId, userId, seq, Date.now()]
      );
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}
