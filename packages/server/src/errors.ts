/**
 * Error taxonomy shared by the delivery core and the WebSocket glue.
 * Each error carries a stable code for error frames and, where the failure
 * ends the connection, the WebSocket close code to use.
 */

export const CLOSE_REPLACED = 4000;
export const CLOSE_AUTHENTICATION_FAILED = 4401;
export const CLOSE_NOT_A_PARTICIPANT = 4403;
export const CLOSE_INVALID_RECONNECT_STATE = 4409;
export const CLOSE_SLOW_CONSUMER = 4429;
export const CLOSE_INTERNAL_ERROR = 4500;
export const CLOSE_GOING_AWAY = 1001;

export type ChatErrorCode =
  | "AUTHENTICATION_FAILED"
  | "NOT_A_PARTICIPANT"
  | "MALFORMED_FRAME"
  | "UNKNOWN_MESSAGE"
  | "PERSISTENCE_FAILED"
  | "SLOW_CONSUMER"
  | "INVALID_RECONNECT_STATE"
  | "SEQUENCE_CONFLICT"
  | "CONNECTION_CLOSED";

export class ChatCoreError extends Error {
  readonly code: ChatErrorCode;
  readonly closeCode?: number;

  constructor(code: ChatErrorCode, message: string, options: { closeCode?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ChatCoreError";
    this.code = code;
    this.closeCode = options.closeCode;
  }
}

/** Bad, missing or expired credential. */
export class AuthenticationError extends ChatCoreError {
  constructor(message = "Invalid or missing credential") {
    super("AUTHENTICATION_FAILED", message, { closeCode: CLOSE_AUTHENTICATION_FAILED });
    this.name = "AuthenticationError";
  }
}

/** Valid credential, but the user is not a participant of the chat. */
export class AuthorizationError extends ChatCoreError {
  readonly chatId: string;
  readonly userId: string;

  constructor(chatId: string, userId: string) {
    super("NOT_A_PARTICIPANT", `User ${userId} is not a participant of chat ${chatId}`, {
      closeCode: CLOSE_NOT_A_PARTICIPANT,
    });
    this.name = "AuthorizationError";
    this.chatId = chatId;
    this.userId = userId;
  }
}

export class MalformedFrameError extends ChatCoreError {
  constructor(message: string) {
    super("MALFORMED_FRAME", message);
    this.name = "MalformedFrameError";
  }
}

export class UnknownMessageError extends ChatCoreError {
  readonly messageId: string;

  constructor(messageId: string) {
    super("UNKNOWN_MESSAGE", `Unknown message ${messageId}`);
    this.name = "UnknownMessageError";
    this.messageId = messageId;
  }
}

export class PersistenceError extends ChatCoreError {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super("PERSISTENCE_FAILED", message, { cause });
    this.name = "PersistenceError";
    this.attempts = attempts;
  }
}

export class SlowConsumerError extends ChatCoreError {
  constructor(message = "Outbound queue saturated") {
    super("SLOW_CONSUMER", message, { closeCode: CLOSE_SLOW_CONSUMER });
    this.name = "SlowConsumerError";
  }
}

/** The client claims to have seen more than the chat contains. */
export class InvalidReconnectStateError extends ChatCoreError {
  readonly lastSeenSeq: number;
  readonly head: number;

  constructor(lastSeenSeq: number, head: number, message?: string) {
    super(
      "INVALID_RECONNECT_STATE",
      message ?? `Last seen sequence ${lastSeenSeq} is ahead of chat head ${head}`,
      { closeCode: CLOSE_INVALID_RECONNECT_STATE }
    );
    this.name = "InvalidReconnectStateError";
    this.lastSeenSeq = lastSeenSeq;
    this.head = head;
  }
}

/** Thrown by a store when (chat, seq) is already taken. */
export class SequenceConflictError extends ChatCoreError {
  readonly chatId: string;
  readonly seq: number;

  constructor(chatId: string, seq: number, cause?: unknown) {
    super("SEQUENCE_CONFLICT", `Sequence ${seq} already assigned in chat ${chatId}`, { cause });
    this.name = "SequenceConflictError";
    this.chatId = chatId;
    this.seq = seq;
  }
}

export class ConnectionClosedError extends ChatCoreError {
  constructor(message = "Connection closed") {
    super("CONNECTION_CLOSED", message);
    this.name = "ConnectionClosedError";
  }
}

export function isChatCoreError(error: unknown): error is ChatCoreError {
  return error instanceof ChatCoreError;
}
