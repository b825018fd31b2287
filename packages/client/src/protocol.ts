/**
 * Wire protocol types for @seqchat/client.
 * Must stay in sync with @seqchat/server protocol (same frame types and field names).
 */

// ----- Client → Server frame types -----

export const FRAME_MESSAGE = "message";
export const FRAME_READ = "read";

export interface SendMessageFrame {
  type: typeof FRAME_MESSAGE;
  text: string;
}

export interface ReadReceiptFrame {
  type: typeof FRAME_READ;
  message_id: string;
}

export type ClientFrame = SendMessageFrame | ReadReceiptFrame;

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

// ----- Close codes -----

export const CLOSE_REPLACED = 4000;
export const CLOSE_AUTHENTICATION_FAILED = 4401;
export const CLOSE_NOT_A_PARTICIPANT = 4403;
export const CLOSE_INVALID_RECONNECT_STATE = 4409;
export const CLOSE_SLOW_CONSUMER = 4429;
export const CLOSE_INTERNAL_ERROR = 4500;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function isSeq(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function isServerFrame(value: unknown): value is ServerFrame {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case FRAME_MESSAGE:
      return (
        typeof value.id === "string" &&
        typeof value.chat === "string" &&
        typeof value.sender === "string" &&
        isSeq(value.seq) &&
        typeof value.text === "string" &&
        typeof value.created_at === "string"
      );
    case FRAME_READ:
      return typeof value.chat === "string" && typeof value.user === "string" && isSeq(value.seq);
    case FRAME_SYNCED:
      return typeof value.chat === "string" && isSeq(value.seq);
    case FRAME_ERROR:
      return typeof value.code === "string" && typeof value.reason === "string";
    default:
      return false;
  }
}
