import { describe, it, expect } from "vitest";
import { ConnectionRegistry, type RegisteredConnection } from "./connection-registry.js";
import { CLOSE_REPLACED } from "./errors.js";
import { createLogger } from "./logger.js";
import type { ServerFrame } from "./protocol.js";

const logger = createLogger({ level: "silent" });

interface FakeConnection extends RegisteredConnection {
  frames: ServerFrame[];
  closedWith: { code: number; reason: string } | null;
}

function fakeConnection(id: string, chatId: string, userId: string): FakeConnection {
  const conn: FakeConnection = {
    id,
    chatId,
    userId,
    frames: [],
    closedWith: null,
    deliver(frame) {
      conn.frames.push(frame);
      return true;
    },
    close(code, reason) {
      conn.closedWith = { code, reason };
    },
  };
  return conn;
}

describe("ConnectionRegistry", () => {
  it("lists connections per chat", () => {
    const registry = new ConnectionRegistry<FakeConnection>({ logger });
    const a = fakeConnection("1", "c1", "alice");
    const b = fakeConnection("2", "c1", "bob");
    const c = fakeConnection("3", "c2", "alice");
    registry.register(a);
    registry.register(b);
    registry.register(c);

    expect(registry.list("c1").map((x) => x.id)).toEqual(["1", "2"]);
    expect(registry.list("c2").map((x) => x.id)).toEqual(["3"]);
    expect(registry.list("missing")).toEqual([]);
    expect(registry.size("c1")).toBe(2);
    expect(registry.size()).toBe(3);
    expect(registry.get("c2", "alice")).toBe(c);
  });

  it("closes the older connection of the same user with 4000", () => {
    const registry = new ConnectionRegistry<FakeConnection>({ logger });
    const first = fakeConnection("1", "c1", "alice");
    const second = fakeConnection("2", "c1", "alice");
    registry.register(first);
    registry.register(second);

    expect(first.closedWith).toEqual({ code: CLOSE_REPLACED, reason: "Replaced by a newer connection" });
    expect(second.closedWith).toBeNull();
    expect(registry.list("c1")).toEqual([second]);
  });

  it("the same user in another chat is not evicted", () => {
    const registry = new ConnectionRegistry<FakeConnection>({ logger });
    const inC1 = fakeConnection("1", "c1", "alice");
    registry.register(inC1);
    registry.register(fakeConnection("2", "c2", "alice"));

    expect(inC1.closedWith).toBeNull();
    expect(registry.size()).toBe(2);
  });

  it("deregister removes only the exact connection and drops empty shards", () => {
    const registry = new ConnectionRegistry<FakeConnection>({ logger });
    const first = fakeConnection("1", "c1", "alice");
    const second = fakeConnection("2", "c1", "alice");
    registry.register(first);
    registry.register(second);

    // the evicted connection's late teardown must not remove its replacement
    expect(registry.deregister(first)).toBe(false);
    expect(registry.get("c1", "alice")).toBe(second);

    expect(registry.deregister(second)).toBe(true);
    expect(registry.size("c1")).toBe(0);
    expect(registry.chatIds()).toEqual([]);
  });
});
