/**
 * One admitted client in one chat: parses inbound frames, runs them one at a
 * time, and owns the outbound queue that feeds the transport.
 */

import type { ConnectionRegistry } from "./connection-registry.js";
import {
  CLOSE_INTERNAL_ERROR,
  CLOSE_SLOW_CONSUMER,
  ConnectionClosedError,
  SlowConsumerError,
  isChatCoreError,
} from "./errors.js";
import type { ReconcilingConnection } from "./history-reconciler.js";
import type { Logger } from "./logger.js";
import type { MessageIngress } from "./message-ingress.js";
import { OutboundQueue } from "./outbound-queue.js";
import {
  FRAME_ERROR,
  FRAME_MESSAGE,
  FRAME_READ,
  parseClientFrame,
  toMessageFrame,
  type ClientFrame,
  type ServerFrame,
} from "./protocol.js";
import type { ReadTracker } from "./read-tracker.js";
import type { StoredMessage } from "./storage/chat-store.js";

/** The part of a WebSocket the connection uses. `ws` sockets satisfy it. */
export interface Transport {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

const READY_STATE_OPEN = 1;

export interface ConnectionOptions {
  connectionId: string;
  chatId: string;
  userId: string;
  lastSeenSeq: number;
  queueCapacity: number;
  slowConsumerGraceMs: number;
  ingress: Pick<MessageIngress, "submit">;
  readTracker: Pick<ReadTracker, "acknowledge">;
  registry: Pick<ConnectionRegistry, "deregister">;
  logger: Logger;
}

export class Connection implements ReconcilingConnection {
  readonly id: string;
  readonly chatId: string;
  readonly userId: string;
  readonly lastSeenSeq: number;

  private readonly transport: Transport;
  private readonly ingress: ConnectionOptions["ingress"];
  private readonly readTracker: ConnectionOptions["readTracker"];
  private readonly registry: ConnectionOptions["registry"];
  private readonly logger: Logger;
  private readonly queue: OutboundQueue<ServerFrame>;
  private readonly abortController = new AbortController();
  private inbound: Promise<void> = Promise.resolve();
  private lastQueuedSeq: number;
  private lastSentSeq: number;
  private closed = false;

  constructor(transport: Transport, options: ConnectionOptions) {
    this.transport = transport;
    this.id = options.connectionId;
    this.chatId = options.chatId;
    this.userId = options.userId;
    this.lastSeenSeq = options.lastSeenSeq;
    this.lastQueuedSeq = options.lastSeenSeq;
    this.lastSentSeq = options.lastSeenSeq;
    this.ingress = options.ingress;
    this.readTracker = options.readTracker;
    this.registry = options.registry;
    this.logger = options.logger.child({
      component: "connection",
      connectionId: options.connectionId,
      chatId: options.chatId,
      userId: options.userId,
    });
    this.queue = new OutboundQueue<ServerFrame>({
      capacity: options.queueCapacity,
      graceMs: options.slowConsumerGraceMs,
      write: (frame) => this.write(frame),
      onWritten: (frame) => {
        if (frame.type === FRAME_MESSAGE) this.lastSentSeq = frame.seq;
      },
      onSaturated: () => {
        this.logger.warn({ cursor: this.lastSentSeq }, "outbound queue saturated, closing slow consumer");
        this.close(CLOSE_SLOW_CONSUMER, "Slow consumer", new SlowConsumerError());
      },
      onWriteError: (err) => {
        if (this.closed) return;
        if (err instanceof ConnectionClosedError) {
          this.handleClose();
          return;
        }
        this.logger.warn({ err }, "transport write failed");
        this.close(CLOSE_INTERNAL_ERROR, "Write failed");
      },
    });
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Highest message seq handed to the transport. */
  get cursor(): number {
    return this.lastSentSeq;
  }

  /**
   * Non-blocking enqueue. A message frame at or below the highest seq already
   * queued is skipped (and counts as accepted).
   */
  deliver(frame: ServerFrame): boolean {
    if (this.closed) return false;
    if (frame.type === FRAME_MESSAGE) {
      if (frame.seq <= this.lastQueuedSeq) return true;
      const accepted = this.queue.push(frame);
      if (accepted) this.lastQueuedSeq = frame.seq;
      return accepted;
    }
    return this.queue.push(frame);
  }

  async deliverBacklog(messages: StoredMessage[]): Promise<void> {
    this.signal.throwIfAborted();
    await this.queue.waitForCapacity(messages.length);
    for (const message of messages) {
      this.deliver(toMessageFrame(message));
    }
  }

  /** Queue one raw inbound frame for processing. */
  receive(raw: string): void {
    if (this.closed) return;
    const parsed = parseClientFrame(raw);
    if (!parsed.ok) {
      this.sendError("MALFORMED_FRAME", parsed.reason);
      return;
    }
    const frame = parsed.value;
    this.inbound = this.inbound.then(() => this.dispatch(frame)).catch((err: unknown) => this.reportFailure(err));
  }

  /** Resolves once every frame received so far has been processed. */
  idle(): Promise<void> {
    return this.inbound;
  }

  /**
   * Server-side close. Idempotent. In-flight work is aborted with `abortReason`
   * (ConnectionClosedError unless given).
   */
  close(code: number, reason: string, abortReason: Error = new ConnectionClosedError()): void {
    if (this.closed) return;
    this.teardown(abortReason);
    this.logger.info({ code, reason }, "closing connection");
    this.transport.close(code, reason);
  }

  /** The transport closed on its own. */
  handleClose(): void {
    if (this.closed) return;
    this.teardown(new ConnectionClosedError());
    this.logger.debug("connection closed by peer");
  }

  private teardown(reason: Error): void {
    this.closed = true;
    this.abortController.abort(reason);
    this.queue.stop(reason);
    this.registry.deregister(this);
  }

  private async dispatch(frame: ClientFrame): Promise<void> {
    if (this.closed) return;
    switch (frame.type) {
      case FRAME_MESSAGE:
        await this.ingress.submit({ chatId: this.chatId, senderId: this.userId, text: frame.text });
        break;
      case FRAME_READ:
        await this.readTracker.acknowledge({ chatId: this.chatId, userId: this.userId, messageId: frame.message_id });
        break;
    }
  }

  private reportFailure(err: unknown): void {
    if (err instanceof ConnectionClosedError) return;
    if (isChatCoreError(err)) {
      this.logger.debug({ code: err.code, reason: err.message }, "frame rejected");
      this.sendError(err.code, err.message);
      return;
    }
    this.logger.error({ err }, "frame processing failed");
    this.sendError("SERVER_ERROR", "Internal error");
  }

  private sendError(code: string, reason: string): void {
    this.deliver({ type: FRAME_ERROR, code, reason });
  }

  private write(frame: ServerFrame): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.transport.readyState !== READY_STATE_OPEN) {
        reject(new ConnectionClosedError("Transport is not open"));
        return;
      }
      this.transport.send(JSON.stringify(frame), (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
