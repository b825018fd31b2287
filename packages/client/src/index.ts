/**
 * @seqchat/client - WebSocket client for one chat with gap-free resume.
 */

export { createChatClient } from "./client.js";
export type {
  ChatClient,
  ChatClientConfig,
  ChatClientState,
  ChatMessage,
  ConnectionStatus,
} from "./client.js";

export type {
  ClientFrame,
  SendMessageFrame,
  ReadReceiptFrame,
  ServerFrame,
  MessageFrame,
  ReadStatusFrame,
  SyncedFrame,
  ErrorFrame,
} from "./protocol.js";
export {
  FRAME_MESSAGE,
  FRAME_READ,
  FRAME_SYNCED,
  FRAME_ERROR,
  CLOSE_REPLACED,
  CLOSE_AUTHENTICATION_FAILED,
  CLOSE_NOT_A_PARTICIPANT,
  CLOSE_INVALID_RECONNECT_STATE,
  CLOSE_SLOW_CONSUMER,
  CLOSE_INTERNAL_ERROR,
  isServerFrame,
} from "./protocol.js";
