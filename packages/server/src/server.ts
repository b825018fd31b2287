/**
 * createServer, createWebSocketServer, createWebSocketHandler.
 */

import * as http from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { chatIdFromPath, parseLastSeenSeq, tokenFromRequest } from "./auth/token-auth.js";
import type { Connection } from "./connection.js";
import { ChatCore, type ChatCoreOptions } from "./core.js";
import {
  CLOSE_GOING_AWAY,
  CLOSE_INTERNAL_ERROR,
  CLOSE_INVALID_RECONNECT_STATE,
  ConnectionClosedError,
  isChatCoreError,
} from "./errors.js";
import { normalizeError } from "./logger.js";

/** Either a ready ChatCore or the options to build one. */
export type WebSocketServerOptions = ChatCoreOptions | { core: ChatCore };

export interface ServerOptions {
  /** Port for the standalone server (default: 3000). */
  port?: number;
  host?: string;
}

export type UpgradeHandler = (request: http.IncomingMessage, socket: Duplex, head: Buffer) => boolean;

export interface ChatWebSocketServer {
  wss: WebSocketServer;
  core: ChatCore;
}

/** WebSocket close reasons are capped at 123 bytes. */
const MAX_CLOSE_REASON_BYTES = 123;

function resolveCore(options: WebSocketServerOptions): ChatCore {
  return "core" in options ? options.core : new ChatCore(options);
}

function closeReason(reason: string): string {
  let out = reason;
  while (Buffer.byteLength(out, "utf8") > MAX_CLOSE_REASON_BYTES) {
    out = out.slice(0, -1);
  }
  return out;
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/**
 * Admission, reconciliation and go-live for one socket. Frames that arrive
 * before the connection exists are buffered and replayed in order.
 */
async function runSession(core: ChatCore, ws: WebSocket, request: http.IncomingMessage, chatId: string): Promise<void> {
  const log = core.logger.child({ component: "server", chatId });
  const early: string[] = [];
  let connection: Connection | null = null;
  let socketClosed = false;

  ws.on("message", (data: RawData) => {
    const raw = rawDataToString(data);
    if (connection) connection.receive(raw);
    else early.push(raw);
  });
  ws.on("close", () => {
    socketClosed = true;
    connection?.handleClose();
  });
  ws.on("error", (err) => {
    log.warn({ err }, "socket error");
  });

  const fail = (code: number, reason: string): void => {
    if (connection) connection.close(code, closeReason(reason));
    else if (!socketClosed) ws.close(code, closeReason(reason));
  };

  try {
    if (core.isClosing) {
      fail(CLOSE_GOING_AWAY, "Server shutting down");
      return;
    }
    const lastSeen = parseLastSeenSeq(request);
    if (!lastSeen.ok) {
      fail(CLOSE_INVALID_RECONNECT_STATE, lastSeen.reason);
      return;
    }
    const identity = await core.admit(tokenFromRequest(request), chatId);
    if (socketClosed) return;

    const live = core.createConnection(ws, { chatId, userId: identity.userId, lastSeenSeq: lastSeen.value });
    connection = live;
    for (const raw of early.splice(0)) {
      live.receive(raw);
    }
    const { replayed, head } = await core.reconcile(live);
    log.info({ connectionId: live.id, userId: live.userId, lastSeenSeq: lastSeen.value, replayed, head }, "connection live");
  } catch (err) {
    // already closed, with its own code
    if (err instanceof ConnectionClosedError || connection?.isClosed) return;
    if (isChatCoreError(err) && err.closeCode !== undefined) {
      log.info({ code: err.code, reason: err.message }, "connection rejected");
      fail(err.closeCode, err.message);
      return;
    }
    log.error({ error: normalizeError(err) }, "connection setup failed");
    fail(CLOSE_INTERNAL_ERROR, "Internal error");
  }
}

function handleUpgrade(
  wss: WebSocketServer,
  core: ChatCore,
  request: http.IncomingMessage,
  socket: Duplex,
  head: Buffer
): boolean {
  const chatId = chatIdFromPath(request.url, core.config.path);
  if (chatId === null) return false;

  wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
    wss.emit("connection", ws, request);
    runSession(core, ws, request, chatId).catch((err: unknown) => {
      core.logger.error({ error: normalizeError(err), chatId }, "session failed");
    });
  });
  return true;
}

/**
 * Returns the raw upgrade handler together with its core. Attach it with
 * server.on('upgrade', handler); it returns false, leaving the socket alone,
 * for paths outside `${path}/${chatId}`.
 */
export function createWebSocketHandler(options: WebSocketServerOptions): { handler: UpgradeHandler; core: ChatCore } {
  const core = resolveCore(options);
  const wss = new WebSocketServer({ noServer: true });
  return {
    core,
    handler: (request, socket, head) => handleUpgrade(wss, core, request, socket, head),
  };
}

/**
 * Attaches WebSocket upgrade handling to an existing Node HTTP server.
 * Upgrades to any other path are refused with 404.
 */
export function createWebSocketServer(server: http.Server, options: WebSocketServerOptions): ChatWebSocketServer {
  const core = resolveCore(options);
  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (request: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    if (!handleUpgrade(wss, core, request, socket, head)) {
      socket.end("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
    }
  });

  return { wss, core };
}

/**
 * Creates an HTTP server with a health endpoint and WebSocket support, and
 * starts listening. The WebSocketServer and core are exposed as `server.ws`
 * and `server.core`.
 */
export function createServer(
  options: WebSocketServerOptions & ServerOptions
): http.Server & { ws: WebSocketServer; core: ChatCore } {
  const port = options.port ?? 3000;
  const server = http.createServer((req, res) => {
    const pathname = (req.url ?? "/").split("?")[0];
    if (req.method === "GET" && pathname === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok" }));
      return;
    }
    res.writeHead(404, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ error: "Not found" }));
  });
  const { wss, core } = createWebSocketServer(server, options);
  server.on("close", () => {
    wss.close();
  });
  if (options.host) server.listen(port, options.host);
  else server.listen(port);
  return Object.assign(server, { ws: wss, core });
}
