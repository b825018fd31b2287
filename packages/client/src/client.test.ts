import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createChatClient, type ChatClientState } from "./client.js";

class FakeWebSocket {
  static instances: FakeWebSocket[] = [];

  readyState = 0;
  sent: unknown[] = [];
  closedWith: { code?: number; reason?: string } | null = null;
  onopen: (() => void) | null = null;
  onmessage: ((event: { data: unknown }) => void) | null = null;
  onclose: ((event: { code: number; reason: string }) => void) | null = null;
  onerror: (() => void) | null = null;

  constructor(readonly url: string) {
    FakeWebSocket.instances.push(this);
  }

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
    this.readyState = 3;
    this.onclose?.({ code: code ?? 1005, reason: reason ?? "" });
  }

  open(): void {
    this.readyState = 1;
    this.onopen?.();
  }

  receive(frame: unknown): void {
    this.onmessage?.({ data: typeof frame === "string" ? frame : JSON.stringify(frame) });
  }

  serverClose(code: number, reason = ""): void {
    this.readyState = 3;
    this.onclose?.({ code, reason });
  }
}

function socket(index = FakeWebSocket.instances.length - 1): FakeWebSocket {
  const ws = FakeWebSocket.instances[index];
  if (!ws) throw new Error(`no socket #${index}`);
  return ws;
}

function message(seq: number, text = `text ${seq}`) {
  return {
    type: "message",
    id: `m${seq}`,
    chat: "c1",
    sender: "alice",
    seq,
    text,
    created_at: "2026-01-01T00:00:00.000Z",
  };
}

function seqsOf(state: ChatClientState): number[] {
  return state.messages.map((m) => m.seq);
}

describe("createChatClient", () => {
  beforeEach(() => {
    FakeWebSocket.instances = [];
    vi.stubGlobal("WebSocket", FakeWebSocket);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it("connects to the chat path with the last seen seq", () => {
    const client = createChatClient({ url: "ws://host/ws/", chatId: "c 1", lastSeq: 3 });
    client.connect();

    expect(socket().url).toBe("ws://host/ws/c%201?last_seq=3");
    expect(client.getConnectionStatus()).toBe("connecting");
    socket().open();
    expect(client.getConnectionStatus()).toBe("open");
  });

  it("appends the access token from getAuthToken", async () => {
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1", getAuthToken: async () => "test-token" });
    client.connect();

    await vi.waitFor(() => expect(FakeWebSocket.instances).toHaveLength(1));
    expect(socket().url).toBe("ws://host/ws/c1?last_seq=0&access_token=test-token");
  });

  it("records AUTH_ERROR when getAuthToken fails", async () => {
    const client = createChatClient({
      url: "ws://host/ws",
      chatId: "c1",
      getAuthToken: () => Promise.reject(new Error("no session")),
    });
    client.connect();

    await vi.waitFor(() => expect(client.getState().lastError).toEqual({ code: "AUTH_ERROR", message: "no session" }));
    expect(client.getConnectionStatus()).toBe("closed");
    expect(FakeWebSocket.instances).toHaveLength(0);
  });

  it("builds the timeline in seq order and skips duplicates", () => {
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1" });
    client.connect();
    socket().open();

    socket().receive(message(1, "hi"));
    socket().receive(message(2));
    socket().receive(message(2));
    socket().receive(message(1));
    expect(client.getState().synced).toBe(false);
    socket().receive({ type: "synced", chat: "c1", seq: 2 });

    const state = client.getState();
    expect(seqsOf(state)).toEqual([1, 2]);
    expect(state.lastSeq).toBe(2);
    expect(state.synced).toBe(true);
    expect(state.messages[0]).toEqual({
      id: "m1",
      chatId: "c1",
      senderId: "alice",
      seq: 1,
      text: "hi",
      createdAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("treats a seq gap as a reason to reconnect from the last contiguous seq", () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1" });
    client.connect();
    const first = socket();
    first.open();

    first.receive(message(1));
    first.receive(message(3));

    expect(first.closedWith).toEqual({ code: 1000, reason: "Resync" });
    expect(client.getState().lastError).toEqual({ code: "SEQUENCE_GAP", message: "Expected seq 2, got 3" });
    expect(seqsOf(client.getState())).toEqual([1]);

    vi.advanceTimersByTime(1000);
    expect(FakeWebSocket.instances).toHaveLength(2);
    expect(socket(1).url).toBe("ws://host/ws/c1?last_seq=1");
  });

  it("keeps the highest read seq per user", () => {
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1" });
    client.connect();
    socket().open();

    socket().receive({ type: "read", chat: "c1", user: "bob", seq: 2 });
    socket().receive({ type: "read", chat: "c1", user: "bob", seq: 1 });
    socket().receive({ type: "read", chat: "c1", user: "carol", seq: 1 });
    socket().receive({ type: "read", chat: "other", user: "dave", seq: 5 });

    expect(client.getState().readMarks).toEqual({ bob: 2, carol: 1 });
  });

  it("sends message and read frames only while open", () => {
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1" });
    expect(client.sendMessage("too early")).toBe(false);
    client.connect();
    expect(client.sendMessage("still early")).toBe(false);
    socket().open();

    expect(client.sendMessage("hi")).toBe(true);
    expect(client.markRead("m1")).toBe(true);
    expect(socket().sent).toEqual([
      { type: "message", text: "hi" },
      { type: "read", message_id: "m1" },
    ]);
  });

  it("surfaces server error frames and unknown frames", () => {
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1" });
    client.connect();
    socket().open();

    socket().receive({ type: "error", code: "UNKNOWN_MESSAGE", reason: "Unknown message m9" });
    expect(client.getState().lastError).toEqual({ code: "UNKNOWN_MESSAGE", message: "Unknown message m9" });

    socket().receive({ type: "presence" });
    expect(client.getState().lastError).toEqual({ code: "UNKNOWN_FRAME", message: "Unknown frame from server" });

    socket().receive("{oops");
    expect(client.getState().lastError).toEqual({ code: "INVALID_JSON", message: "Invalid JSON from server" });
  });

  it("resets the timeline and resyncs from zero after 4409", () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1", lastSeq: 7 });
    client.connect();
    socket().serverClose(4409, "Last-seen seq 7 is ahead of head 2");

    const state = client.getState();
    expect(state.lastSeq).toBe(0);
    expect(state.messages).toEqual([]);
    expect(state.lastError).toEqual({ code: "INVALID_RECONNECT_STATE", message: "Last-seen seq 7 is ahead of head 2" });

    vi.advanceTimersByTime(1000);
    expect(socket(1).url).toBe("ws://host/ws/c1?last_seq=0");
  });

  it("stops reconnecting when replaced or refused", () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    for (const code of [4000, 4401, 4403]) {
      FakeWebSocket.instances = [];
      const client = createChatClient({ url: "ws://host/ws", chatId: "c1" });
      client.connect();
      socket().open();
      socket().serverClose(code, "bye");

      vi.advanceTimersByTime(60_000);
      expect(FakeWebSocket.instances).toHaveLength(1);
      expect(client.getState().lastError).toEqual({ code: `CLOSED_${code}`, message: "bye" });
      expect(client.getConnectionStatus()).toBe("closed");
    }
  });

  it("backs off exponentially until a socket opens", () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1", maxReconnectIntervalMs: 3000 });
    client.connect();

    socket().serverClose(1006);
    vi.advanceTimersByTime(999);
    expect(FakeWebSocket.instances).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(FakeWebSocket.instances).toHaveLength(2);

    socket().serverClose(1006);
    vi.advanceTimersByTime(1999);
    expect(FakeWebSocket.instances).toHaveLength(2);
    vi.advanceTimersByTime(1);
    expect(FakeWebSocket.instances).toHaveLength(3);

    socket().serverClose(1006);
    vi.advanceTimersByTime(3000);
    expect(FakeWebSocket.instances).toHaveLength(4);

    socket().open();
    socket().serverClose(1006);
    vi.advanceTimersByTime(1000);
    expect(FakeWebSocket.instances).toHaveLength(5);
  });

  it("does not reconnect after disconnect", () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1" });
    client.connect();
    const ws = socket();
    ws.open();

    client.disconnect();

    expect(ws.closedWith).toEqual({ code: 1000, reason: "Client disconnect" });
    expect(client.getConnectionStatus()).toBe("closed");
    vi.advanceTimersByTime(60_000);
    expect(FakeWebSocket.instances).toHaveLength(1);
  });

  it("notifies subscribers with snapshots until unsubscribed", () => {
    const client = createChatClient({ url: "ws://host/ws", chatId: "c1" });
    const seen: number[][] = [];
    const unsubscribe = client.subscribe((state) => seen.push(seqsOf(state)));
    client.connect();
    socket().open();

    socket().receive(message(1));
    unsubscribe();
    socket().receive(message(2));

    expect(seen).toEqual([[], [], [1]]);
  });
});
