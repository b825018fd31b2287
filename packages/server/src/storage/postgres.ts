/**
 * Postgres chat store (pg). The driver is loaded on first use so that
 * in-memory deployments never touch it.
 */

import { randomUUID } from "node:crypto";
import type { Pool, PoolConfig } from "pg";
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

export interface PostgresChatStoreOptions {
  /** Prefix for the four tables (default "seqchat"). */
  tablePrefix?: string;
}

export type PostgresConnectionConfig = string | PoolConfig;

const UNIQUE_VIOLATION = "23505";

type ChatRow = { id: string; kind: ChatKind; name: string | null; created_at: string };
type ParticipantRow = { chat_id: string; user_id: string; role: ParticipantRole; joined_at: string };
type MessageRow = {
  id: string;
  chat_id: string;
  sender_id: string;
  seq: string;
  text: string;
  created_at: string;
};
type SeqRow = { seq: string | null };

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

/** Only the (chat_id, seq) constraint is a sequence conflict; a reused id is not. */
function isSeqViolation(error: unknown, messagesTable: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === UNIQUE_VIOLATION &&
    "constraint" in error &&
    error.constraint === `${messagesTable}_chat_id_seq_key`
  );
}

async function loadPool(): Promise<typeof Pool> {
  try {
    const { default: pg } = await import("pg");
    return pg.Pool;
  } catch {
    throw new Error('Postgres storage requires the "pg" package. Install it with: npm install pg');
  }
}

export async function createPostgresChatStore(
  connectionConfig: PostgresConnectionConfig,
  options: PostgresChatStoreOptions = {}
): Promise<ChatStore> {
  const PoolClass = await loadPool();
  const pool = new PoolClass(
    typeof connectionConfig === "string" ? { connectionString: connectionConfig } : connectionConfig
  );
  const t = storeTables(options.tablePrefix ?? DEFAULT_TABLE_PREFIX);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${t.chats} (
      id TEXT PRIMARY KEY,
      kind TEXT NOT NULL,
      name TEXT,
      created_at BIGINT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS ${t.participants} (
      chat_id TEXT NOT NULL REFERENCES ${t.chats}(id) ON DELETE CASCADE,
      user_id TEXT NOT NULL,
      role TEXT NOT NULL,
      joined_at BIGINT NOT NULL,
      PRIMARY KEY (chat_id, user_id)
    );
    CREATE TABLE IF NOT EXISTS ${t.messages} (
      id TEXT PRIMARY KEY,
      chat_id TEXT NOT NULL,
      sender_id TEXT NOT NULL,
      seq BIGINT NOT NULL,
      text TEXT NOT NULL,
      created_at BIGINT NOT NULL,
      CONSTRAINT ${t.messages}_chat_id_seq_key UNIQUE (chat_id, seq)
    );
    CREATE TABLE IF NOT EXISTS ${t.watermarks} (
      chat_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      seq BIGINT NOT NULL,
      updated_at BIGINT NOT NULL,
      PRIMARY KEY (chat_id, user_id)
    );
  `);

  async function selectParticipant(chatId: string, userId: string): Promise<ParticipantRecord | null> {
    const result = await pool.query<ParticipantRow>(
      `SELECT chat_id, user_id, role, joined_at FROM ${t.participants} WHERE chat_id = $1 AND user_id = $2`,
      [chatId, userId]
    );
    const row = result.rows[0];
    return row ? toParticipant(row) : null;
  }

  return {
    async createChat(chat: NewChat): Promise<ChatRecord> {
      const id = chat.id ?? randomUUID();
      const now = Date.now();
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const inserted = await client.query<ChatRow>(
          `INSERT INTO ${t.chats} (id, kind, name, created_at) VALUES ($1, $2, $3, $4)
           RETURNING id, kind, name, created_at`,
          [id, chat.kind, chat.name ?? null, now]
        );
        for (const participant of chat.participants ?? []) {
          await client.query(
            `INSERT INTO ${t.participants} (chat_id, user_id, role, joined_at) VALUES ($1, $2, $3, $4)
             ON CONFLICT (chat_id, user_id) DO NOTHING`,
            [id, participant.userId, participant.role ?? "member", now]
          );
        }
        await client.query("COMMIT");
        return toChat(inserted.rows[0]);
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      } finally {
        client.release();
      }
    },

    async addParticipant(chatId: string, userId: string, role: ParticipantRole = "member"): Promise<ParticipantRecord> {
      const chat = await pool.query<ChatRow>(`SELECT id FROM ${t.chats} WHERE id = $1`, [chatId]);
      if (chat.rows.length === 0) {
        throw new Error(`Chat ${chatId} does not exist`);
      }
      await pool.query(
        `INSERT INTO ${t.participants} (chat_id, user_id, role, joined_at) VALUES ($1, $2, $3, $4)
         ON CONFLICT (chat_id, user_id) DO NOTHING`,
        [chatId, userId, role, Date.now()]
      );
      const record = await selectParticipant(chatId, userId);
      if (!record) {
        throw new Error(`Participant ${userId} missing from chat ${chatId} after insert`);
      }
      return record;
    },

    async getChat(chatId: string): Promise<ChatRecord | null> {
      const result = await pool.query<ChatRow>(
        `SELECT id, kind, name, created_at FROM ${t.chats} WHERE id = $1`,
        [chatId]
      );
      const row = result.rows[0];
      return row ? toChat(row) : null;
    },

    async isParticipant(chatId: string, userId: string): Promise<boolean> {
      return (await selectParticipant(chatId, userId)) !== null;
    },

    async appendMessage(message: StoredMessage): Promise<StoredMessage> {
      try {
        await pool.query(
          `INSERT INTO ${t.messages} (id, chat_id, sender_id, seq, text, created_at) VALUES ($1, $2, $3, $4, $5, $6)`,
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
        if (isSeqViolation(err, t.messages)) {
          throw new SequenceConflictError(message.chatId, message.seq, err);
        }
        throw err;
      }
      return { ...message };
    },

    async getHeadSeq(chatId: string): Promise<number> {
      const result = await pool.query<SeqRow>(
        `SELECT MAX(seq) AS seq FROM ${t.messages} WHERE chat_id = $1`,
        [chatId]
      );
      const seq = result.rows[0]?.seq;
      return seq === null || seq === undefined ? 0 : Number(seq);
    },

    async readRange(chatId: string, afterSeq: number, limit: number): Promise<StoredMessage[]> {
      const result = await pool.query<MessageRow>(
        `SELECT id, chat_id, sender_id, seq, text, created_at
         FROM ${t.messages}
         WHERE chat_id = $1 AND seq > $2
         ORDER BY seq ASC
         LIMIT $3`,
        [chatId, afterSeq, limit]
      );
      return result.rows.map(toMessage);
    },

    async getMessage(messageId: string): Promise<StoredMessage | null> {
      const result = await pool.query<MessageRow>(
        `SELECT id, chat_id, sender_id, seq, text, created_at FROM ${t.messages} WHERE id = $1`,
        [messageId]
      );
      const row = result.rows[0];
      return row ? toMessage(row) : null;
    },

    async getWatermark(chatId: string, userId: string): Promise<number> {
      const result = await pool.query<SeqRow>(
        `SELECT seq FROM ${t.watermarks} WHERE chat_id = $1 AND user_id = $2`,
        [chatId, userId]
      );
      const seq = result.rows[0]?.seq;
      return seq === null || seq === undefined ? 0 : Number(seq);
    },

    async setWatermark(chatId: string, userId: string, seq: number): Promise<void> {
      await pool.query(
        `INSERT INTO ${t.watermarks} AS w (chat_id, user_id, seq, updated_at) VALUES ($1, $2, $3, $4)
         ON CONFLICT (chat_id, user_id)
         DO UPDATE SET seq = GREATEST(w.seq, EXCLUDED.seq), updated_at = EXCLUDED.updated_at`,
        [chatId, userId, seq, Date.now()]
      );
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}
