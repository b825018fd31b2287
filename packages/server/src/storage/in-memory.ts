/**
 * In-memory chat store. No DB required; default when no store is configured.
 * State lives for the lifetime of the process only.
 */

import { randomUUID } from "node:crypto";
import { SequenceConflictError } from "../errors.js";
import type {
  ChatRecord,
  ChatStore,
  NewChat,
  ParticipantRecord,
  ParticipantRole,
  StoredMessage,
} from "./chat-store.js";

export interface InMemoryChatStoreOptions {
  /** Chats (with participants) to create up front. */
  chats?: NewChat[];
}

function watermarkKey(chatId: string, userId: string): string {
  return JSON.stringify([chatId, userId]);
}

export function createInMemoryChatStore(options: InMemoryChatStoreOptions = {}): ChatStore {
  const chats = new Map<string, ChatRecord>();
  const participants = new Map<string, Map<string, ParticipantRecord>>();
  // index i holds seq i + 1, so the array length is the head
  const messages = new Map<string, StoredMessage[]>();
  const messagesById = new Map<string, StoredMessage>();
  const watermarks = new Map<string, number>();

  function addParticipantSync(chatId: string, userId: string, role: ParticipantRole): ParticipantRecord {
    const members = participants.get(chatId) ?? new Map<string, ParticipantRecord>();
    participants.set(chatId, members);
    const existing = members.get(userId);
    if (existing) return { ...existing };
    const record: ParticipantRecord = { chatId, userId, role, joinedAt: new Date().toISOString() };
    members.set(userId, record);
    return { ...record };
  }

  function createChatSync(chat: NewChat): ChatRecord {
    const record: ChatRecord = {
      id: chat.id ?? randomUUID(),
      kind: chat.kind,
      name: chat.name,
      createdAt: new Date().toISOString(),
    };
    if (chats.has(record.id)) {
      throw new Error(`Chat ${record.id} already exists`);
    }
    chats.set(record.id, record);
    participants.set(record.id, new Map());
    for (const participant of chat.participants ?? []) {
      addParticipantSync(record.id, participant.userId, participant.role ?? "member");
    }
    return { ...record };
  }

  for (const chat of options.chats ?? []) {
    createChatSync(chat);
  }

  return {
    async createChat(chat: NewChat): Promise<ChatRecord> {
      return createChatSync(chat);
    },

    async addParticipant(chatId: string, userId: string, role: ParticipantRole = "member"): Promise<ParticipantRecord> {
      if (!chats.has(chatId)) {
        throw new Error(`Chat ${chatId} does not exist`);
      }
      return addParticipantSync(chatId, userId, role);
    },

    async getChat(chatId: string): Promise<ChatRecord | null> {
      const chat = chats.get(chatId);
      return chat ? { ...chat } : null;
    },

    async isParticipant(chatId: string, userId: string): Promise<boolean> {
      return participants.get(chatId)?.has(userId) ?? false;
    },

    async appendMessage(message: StoredMessage): Promise<StoredMessage> {
      if (messagesById.has(message.id)) {
        throw new Error(`Message ${message.id} already exists`);
      }
      const list = messages.get(message.chatId) ?? [];
      if (message.seq !== list.length + 1) {
        // taken seqs and gaps are both rejected; only head + 1 fits
        throw new SequenceConflictError(message.chatId, message.seq);
      }
      const stored = { ...message };
      list.push(stored);
      messages.set(message.chatId, list);
      messagesById.set(stored.id, stored);
      return { ...stored };
    },

    async getHeadSeq(chatId: string): Promise<number> {
      return messages.get(chatId)?.length ?? 0;
    },

    async readRange(chatId: string, afterSeq: number, limit: number): Promise<StoredMessage[]> {
      const list = messages.get(chatId) ?? [];
      const start = Math.max(0, afterSeq);
      return list.slice(start, start + Math.max(0, limit)).map((m) => ({ ...m }));
    },

    async getMessage(messageId: string): Promise<StoredMessage | null> {
      const message = messagesById.get(messageId);
      return message ? { ...message } : null;
    },

    async getWatermark(chatId: string, userId: string): Promise<number> {
      return watermarks.get(watermarkKey(chatId, userId)) ?? 0;
    },

    async setWatermark(chatId: string, userId: string, seq: number): Promise<void> {
      const key = watermarkKey(chatId, userId);
      const current = watermarks.get(key) ?? 0;
      if (seq > current) watermarks.set(key, seq);
    },
  };
}
