/**
 * Core WebSocket client for @seqchat/client.
 * Connects to one chat on @seqchat/server, keeps the ordered timeline and read
 * marks, and resumes from the last seq it saw after a disconnect.
 */

import type { ClientFrame, MessageFrame, ServerFrame } from "./protocol.js";
import {
  CLOSE_AUTHENTICATION_FAILED,
  CLOSE_INVALID_RECONNECT_STATE,
  CLOSE_NOT_A_PARTICIPANT,
  CLOSE_REPLACED,
  FRAME_ERROR,
  FRAME_MESSAGE,
  FRAME_READ,
  FRAME_SYNCED,
  isServerFrame,
} from "./protocol.js";

export type ConnectionStatus = "connecting" | "open" | "closing" | "closed";

export interface ChatMessage {
  id: string;
  chatId: string;
  senderId: string;
  seq: number;
  text: string;
  createdAt: string;
}

export interface ChatClientState {
  connectionStatus: ConnectionStatus;
  chatId: string;
  /** Highest seq in `messages`; sent as last_seq on every (re)connect. */
  lastSeq: number;
  /** True once the server has drained the backlog for the current socket. */
  synced: boolean;
  messages: ChatMessage[];
  /** Highest seq each user has read. */
  readMarks: Record<string, number>;
  lastError: { code: string; message: string } | null;
}

export interface ChatClientConfig {
  /** WebSocket base URL without the chat id (e.g. wss://host/ws). */
  url: string;
  chatId: string;
  /** Optional: return token for auth; appended as ?access_token=. */
  getAuthToken?: () => string | Promise<string>;
  /** Resume after this seq instead of replaying the whole chat (default 0). */
  lastSeq?: number;
  /** Auto-reconnect on close (default true). */
  reconnect?: boolean;
  /** Initial reconnect delay in ms (default 1000). */
  reconnectIntervalMs?: number;
  /** Max reconnect delay in ms (default 30000). */
  maxReconnectIntervalMs?: number;
}

export interface ChatClient {
  connect(): void;
  disconnect(): void;
  /** Returns false when the socket is not open. */
  sendMessage(text: string): boolean;
  markRead(messageId: string): boolean;
  getConnectionStatus(): ConnectionStatus;
  getState(): ChatClientState;
  subscribe(listener: (state: ChatClientState) => void): () => void;
}

const DEFAULT_RECONNECT_INTERVAL_MS = 1000;
const DEFAULT_MAX_RECONNECT_INTERVAL_MS = 30000;

const READY_STATE_CONNECTING = 0;
const READY_STATE_OPEN = 1;

/** Close codes after which reconnecting would fail the same way or fight another tab. */
const TERMINAL_CLOSE_CODES = new Set([CLOSE_REPLACED, CLOSE_AUTHENTICATION_FAILED, CLOSE_NOT_A_PARTICIPANT]);

function toChatMessage(frame: MessageFrame): ChatMessage {
  return {
    id: frame.id,
    chatId: frame.chat,
    senderId: frame.sender,
    seq: frame.seq,
    text: frame.text,
    createdAt: frame.created_at,
  };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createChatClient(config: ChatClientConfig): ChatClient {
  const {
    url: baseUrl,
    chatId,
    getAuthToken,
    reconnect: reconnectEnabled = true,
    reconnectIntervalMs = DEFAULT_RECONNECT_INTERVAL_MS,
    maxReconnectIntervalMs = DEFAULT_MAX_RECONNECT_INTERVAL_MS,
  } = config;

  let ws: WebSocket | null = null;
  let reconnectTimeoutId: ReturnType<typeof setTimeout> | null = null;
  let nextReconnectMs = reconnectIntervalMs;
  let intentionalClose = false;

  const state: ChatClientState = {
    connectionStatus: "closed",
    chatId,
    lastSeq: config.lastSeq ?? 0,
    synced: false,
    messages: [],
    readMarks: {},
    lastError: null,
  };

  const listeners = new Set<(s: ChatClientState) => void>();

  function snapshot(): ChatClientState {
    return {
      connectionStatus: state.connectionStatus,
      chatId: state.chatId,
      lastSeq: state.lastSeq,
      synced: state.synced,
      messages: [...state.messages],
      readMarks: { ...state.readMarks },
      lastError: state.lastError ? { ...state.lastError } : null,
    };
  }

  function emit() {
    const s = snapshot();
    listeners.forEach((cb) => cb(s));
  }

  function setStatus(status: ConnectionStatus) {
    state.connectionStatus = status;
    emit();
  }

  function send(frame: ClientFrame): boolean {
    if (!ws || ws.readyState !== READY_STATE_OPEN) return false;
    ws.send(JSON.stringify(frame));
    return true;
  }

  function clearReconnect() {
    if (reconnectTimeoutId !== null) {
      clearTimeout(reconnectTimeoutId);
      reconnectTimeoutId = null;
    }
    nextReconnectMs = reconnectIntervalMs;
  }

  function scheduleReconnect() {
    if (!reconnectEnabled || intentionalClose) return;
    if (reconnectTimeoutId !== null) clearTimeout(reconnectTimeoutId);
    const delay = nextReconnectMs;
    nextReconnectMs = Math.min(nextReconnectMs * 2, maxReconnectIntervalMs);
    reconnectTimeoutId = setTimeout(() => {
      reconnectTimeoutId = null;
      connect();
    }, delay);
  }

  function resetTimeline() {
    state.lastSeq = 0;
    state.messages = [];
    state.readMarks = {};
  }

  /** Drop the socket and reconnect from the current lastSeq. */
  function resync(code: string, message: string) {
    const socket = ws;
    ws = null;
    socket?.close(1000, "Resync");
    state.lastError = { code, message };
    state.synced = false;
    setStatus("closed");
    scheduleReconnect();
  }

  function handleFrame(frame: ServerFrame) {
    switch (frame.type) {
      case FRAME_MESSAGE: {
        if (frame.chat !== chatId || frame.seq <= state.lastSeq) return;
        if (frame.seq > state.lastSeq + 1) {
          resync("SEQUENCE_GAP", `Expected seq ${state.lastSeq + 1}, got ${frame.seq}`);
          return;
        }
        state.messages = [...state.messages, toChatMessage(frame)];
        state.lastSeq = frame.seq;
        emit();
        break;
      }
      case FRAME_READ: {
        if (frame.chat !== chatId) return;
        if (frame.seq > (state.readMarks[frame.user] ?? 0)) {
          state.readMarks = { ...state.readMarks, [frame.user]: frame.seq };
          emit();
        }
        break;
      }
      case FRAME_SYNCED: {
        if (frame.seq > state.lastSeq) {
          resync("SEQUENCE_GAP", `Synced at seq ${frame.seq} but timeline ends at ${state.lastSeq}`);
          return;
        }
        state.synced = true;
        emit();
        break;
      }
      case FRAME_ERROR: {
        state.lastError = { code: frame.code, message: frame.reason };
        emit();
        break;
      }
    }
  }

  function handleMessage(data: string) {
    let frame: unknown;
    try {
      frame = JSON.parse(data);
    } catch {
      state.lastError = { code: "INVALID_JSON", message: "Invalid JSON from server" };
      emit();
      return;
    }
    if (!isServerFrame(frame)) {
      state.lastError = { code: "UNKNOWN_FRAME", message: "Unknown frame from server" };
      emit();
      return;
    }
    handleFrame(frame);
  }

  function handleClose(code: number, reason: string) {
    ws = null;
    state.synced = false;
    state.connectionStatus = "closed";
    if (intentionalClose) {
      clearReconnect();
      emit();
      return;
    }
    if (code === CLOSE_INVALID_RECONNECT_STATE) {
      // The server does not know our lastSeq; start over from an empty timeline.
      resetTimeline();
      state.lastError = { code: "INVALID_RECONNECT_STATE", message: reason };
    } else if (TERMINAL_CLOSE_CODES.has(code)) {
      state.lastError = { code: `CLOSED_${code}`, message: reason };
      emit();
      return;
    }
    emit();
    scheduleReconnect();
  }

  function buildUrl(token: string | null): string {
    const params = new URLSearchParams({ last_seq: String(state.lastSeq) });
    if (token) params.set("access_token", token);
    return `${baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(chatId)}?${params.toString()}`;
  }

  function openSocket(token: string | null) {
    const socket = new WebSocket(buildUrl(token));
    ws = socket;

    socket.onopen = () => {
      nextReconnectMs = reconnectIntervalMs;
      setStatus("open");
    };

    socket.onmessage = (event) => {
      if (ws !== socket) return;
      handleMessage(typeof event.data === "string" ? event.data : String(event.data));
    };

    socket.onclose = (event) => {
      if (ws !== socket) return;
      handleClose(event.code, event.reason);
    };

    socket.onerror = () => {
      state.lastError = { code: "WEBSOCKET_ERROR", message: "WebSocket error" };
      emit();
    };
  }

  function fail(code: string, e: unknown) {
    state.lastError = { code, message: errorMessage(e) };
    setStatus("closed");
  }

  function connect() {
    if (
      state.connectionStatus === "connecting" ||
      ws?.readyState === READY_STATE_OPEN ||
      ws?.readyState === READY_STATE_CONNECTING
    ) {
      return;
    }
    intentionalClose = false;
    setStatus("connecting");

    if (!getAuthToken) {
      openSocket(null);
      return;
    }
    Promise.resolve()
      .then(getAuthToken)
      .then(
        (token) => {
          if (!intentionalClose) openSocket(token);
        },
        (e: unknown) => fail("AUTH_ERROR", e)
      )
      .catch((e: unknown) => fail("CONNECT_ERROR", e));
  }

  function disconnect() {
    intentionalClose = true;
    clearReconnect();
    state.synced = false;
    if (ws) {
      const socket = ws;
      ws = null;
      setStatus("closing");
      socket.close(1000, "Client disconnect");
    }
    setStatus("closed");
  }

  function subscribe(listener: (state: ChatClientState) => void): () => void {
    listeners.add(listener);
    return () => listeners.delete(listener);
  }

  return {
    connect,
    disconnect,
    sendMessage: (text) => send({ type: FRAME_MESSAGE, text }),
    markRead: (messageId) => send({ type: FRAME_READ, message_id: messageId }),
    getConnectionStatus: () => state.connectionStatus,
    getState: snapshot,
    subscribe,
  };
}
