/**
 * Wire protocol for @seqchat/server.
 * Must stay in sync with @seqchat/client (same frame types and field names).
 */

import { z } from "zod";
import type { StoredMessage } from "./storage/chat-store.js";

// ----- Client → Server frame types -----

export const FRAME_MESSAGE = "message";
export const FRAME_READ = "read";

export const SendMessageFrameSchema = z.object({
  type: z.literal(FRAME_MESSAGE),
  text: z.string(),
});

export const ReadReceiptFrameSchema = z.object({
  type: z.literal(FRAME_READ),
  message_id: z.string().min(1),
});

export const ClientFrameSchema = z.discriminatedUnion("type", [SendMessageFrameSchema, ReadReceiptFrameSchema]);

export type SendMessageFrame = z.infer<typeof SendMessageFrameSchema>;
export type ReadReceiptFrame = z.infer<typeof ReadReceiptFrameSchema>;
export type ClientFrame = z.infer<typeof ClientFrameSchema>;

// ----- Server → Client frame types -----

export const FRAME_SYNCED = "synced";
export const FRAME_ERROR = "error";

export interface MessageFrame {
  type: typeof FRAME_MESSAGE;
  id: string;
  chat: string;
  sender: string;
  seq: number;
  text: string;
  created_at: string;
}

export interface ReadStatusFrame {
  type: typeof FRAME_READ;
  chat: string;
  user: string;
  seq: number;
}

/** Backlog drained; every later message frame is live. */
export interface SyncedFrame {
  type: typeof FRAME_SYNCED;
  chat: string;
  seq: number;
}

export interface ErrorFrame {
  type: typeof FRAME_ERROR;
  code: string;
  reason: string;
}

export type ServerFrame = MessageFrame | ReadStatusFrame | SyncedFrame | ErrorFrame;

export function toMessageFrame(message: StoredMessage): MessageFrame {
  return {
    type: FRAME_MESSAGE,
    id: message.id,
    chat: message.chatId,
    sender: message.senderId,
    seq: message.seq,
    text: message.text,
    created_at: message.createdAt,
  };
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/** Parses one raw inbound frame; never throws. */
export function parseClientFrame(raw: string): ParseResult<ClientFrame> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: "Invalid JSON" };
  }
  const result = ClientFrameSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, reason: `Invalid frame: ${where}${issue?.message ?? "schema mismatch"}` };
  }
  return { ok: true, value: result.data };
}
