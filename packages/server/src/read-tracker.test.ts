import { describe, it, expect } from "vitest";
import { ReadTracker } from "./read-tracker.js";
import { createInMemoryChatStore } from "./storage/in-memory.js";
import type { ChatStore, StoredMessage } from "./storage/chat-store.js";
import type { ReadStatus } from "./fanout.js";
import { PersistenceError, UnknownMessageError } from "./errors.js";
import { createLogger } from "./logger.js";

const logger = createLogger({ level: "silent" });

function message(chatId: string, seq: number): StoredMessage {
  return {
    id: `${chatId}-m${seq}`,
    chatId,
    senderId: "alice",
    seq,
    text: `text ${seq}`,
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

async function seeded(): Promise<ChatStore> {
  const store = createInMemoryChatStore();
  for (const m of [message("c1", 1), message("c1", 2), message("c2", 1)]) {
    await store.appendMessage(m);
  }
  return store;
}

function tracker(store: Pick<ChatStore, "getMessage" | "getWatermark" | "setWatermark">) {
  const broadcasts: ReadStatus[] = [];
  const readTracker = new ReadTracker({
    store,
    fanout: {
      broadcastReadStatus: (status) => {
        broadcasts.push(status);
        return 1;
      },
    },
    logger,
  });
  return { readTracker, broadcasts };
}

describe("ReadTracker", () => {
  it("advances the watermark and broadcasts the new position", async () => {
    const store = await seeded();
    const { readTracker, broadcasts } = tracker(store);

    const result = await readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c1-m1" });

    expect(result).toEqual({ advanced: true, seq: 1 });
    expect(await readTracker.watermark("c1", "bob")).toBe(1);
    expect(broadcasts).toEqual([{ chatId: "c1", userId: "bob", seq: 1 }]);
  });

  it("ignores receipts at or below the current watermark", async () => {
    const store = await seeded();
    const { readTracker, broadcasts } = tracker(store);
    await readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c1-m2" });

    expect(await readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c1-m2" })).toEqual({
      advanced: false,
      seq: 2,
    });
    expect(await readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c1-m1" })).toEqual({
      advanced: false,
      seq: 2,
    });
    expect(broadcasts).toHaveLength(1);
    expect(await readTracker.watermark("c1", "bob")).toBe(2);
  });

  it("keeps the highest receipt when receipts race", async () => {
    const store = await seeded();
    const { readTracker, broadcasts } = tracker(store);

    await Promise.all([
      readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c1-m2" }),
      readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c1-m1" }),
    ]);

    expect(await readTracker.watermark("c1", "bob")).toBe(2);
    expect(broadcasts.map((b) => b.seq)).toEqual([2]);
  });

  it("tracks users independently", async () => {
    const store = await seeded();
    const { readTracker } = tracker(store);
    await readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c1-m2" });

    expect(await readTracker.watermark("c1", "alice")).toBe(0);
    expect(await readTracker.acknowledge({ chatId: "c1", userId: "alice", messageId: "c1-m1" })).toEqual({
      advanced: true,
      seq: 1,
    });
  });

  it("rejects unknown messages and messages of another chat", async () => {
    const store = await seeded();
    const { readTracker, broadcasts } = tracker(store);

    await expect(
      readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "nope" })
    ).rejects.toBeInstanceOf(UnknownMessageError);
    await expect(
      readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c2-m1" })
    ).rejects.toThrow("Unknown message c2-m1");
    expect(broadcasts).toEqual([]);
  });

  it("wraps watermark write failures", async () => {
    const store = await seeded();
    const { readTracker, broadcasts } = tracker({
      getMessage: (id) => store.getMessage(id),
      getWatermark: (chatId, userId) => store.getWatermark(chatId, userId),
      setWatermark: async () => {
        throw new Error("read-only replica");
      },
    });

    await expect(
      readTracker.acknowledge({ chatId: "c1", userId: "bob", messageId: "c1-m1" })
    ).rejects.toBeInstanceOf(PersistenceError);
    expect(broadcasts).toEqual([]);
  });
});
