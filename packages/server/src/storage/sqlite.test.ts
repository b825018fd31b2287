import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createSQLiteChatStore } from "./sqlite.js";
import { SequenceConflictError } from "../errors.js";
import type { ChatStore, StoredMessage } from "./chat-store.js";

function message(chatId: string, seq: number): StoredMessage {
  return {
    id: `${chatId}-m${seq}`,
    chatId,
    senderId: "alice",
    seq,
    text: `text ${seq}`,
    createdAt: "2026-03-01T10:00:00.000Z",
  };
}

describe("createSQLiteChatStore", () => {
  let store: ChatStore;

  beforeEach(async () => {
    store = await createSQLiteChatStore(":memory:");
  });

  afterEach(async () => {
    await store.close?.();
  });

  it("creates chats with participants in one transaction", async () => {
    const chat = await store.createChat({
      id: "c1",
      kind: "group",
      name: "team",
      participants: [{ userId: "alice", role: "owner" }, { userId: "bob" }],
    });
    expect(chat).toMatchObject({ id: "c1", kind: "group", name: "team" });
    expect(await store.getChat("c1")).toMatchObject({ id: "c1", kind: "group", name: "team" });
    expect(await store.isParticipant("c1", "alice")).toBe(true);
    expect(await store.isParticipant("c1", "bob")).toBe(true);
    expect(await store.isParticipant("c1", "carol")).toBe(false);
    await expect(store.createChat({ id: "c1", kind: "direct" })).rejects.toThrow();
  });

  it("addParticipant rejects unknown chats and keeps existing roles", async () => {
    await store.createChat({ id: "c1", kind: "direct", participants: [{ userId: "alice", role: "owner" }] });
    expect((await store.addParticipant("c1", "alice", "member")).role).toBe("owner");
    expect((await store.addParticipant("c1", "bob")).role).toBe("member");
    await expect(store.addParticipant("nope", "bob")).rejects.toThrow("Chat nope does not exist");
  });

  it("persists messages and maps a duplicate seq to SequenceConflictError", async () => {
    await store.appendMessage(message("c1", 1));
    await store.appendMessage(message("c1", 2));
    expect(await store.getHeadSeq("c1")).toBe(2);
    expect(await store.getHeadSeq("other")).toBe(0);
    await expect(store.appendMessage({ ...message("c1", 2), id: "fresh-id" })).rejects.toBeInstanceOf(
      SequenceConflictError
    );
  });

  it("reports a reused message id as a plain error, not a seq conflict", async () => {
    await store.appendMessage(message("c1", 1));

    const again = store.appendMessage({ ...message("c1", 1), seq: 2 });
    await expect(again).rejects.toThrow();
    await expect(again).rejects.not.toBeInstanceOf(SequenceConflictError);
    expect(await store.getHeadSeq("c1")).toBe(1);
  });

  it("reports driver failures as rejected promises", async () => {
    await store.close?.();

    const head = store.getHeadSeq("c1");
    const range = store.readRange("c1", 0, 10);
    const watermark = store.setWatermark("c1", "alice", 1);
    const participant = store.addParticipant("c1", "bob");

    await expect(head).rejects.toThrow("The database connection is not open");
    await expect(range).rejects.toThrow("The database connection is not open");
    await expect(watermark).rejects.toThrow("The database connection is not open");
    await expect(participant).rejects.toThrow("The database connection is not open");
  });

  it("readRange pages ascending from an exclusive lower bound", async () => {
    for (let seq = 1; seq <= 4; seq++) {
      await store.appendMessage(message("c1", seq));
    }
    const page = await store.readRange("c1", 1, 2);
    expect(page.map((m) => m.seq)).toEqual([2, 3]);
    expect(page[0]).toEqual(message("c1", 2));
  });

  it("getMessage returns the stored record or null", async () => {
    await store.appendMessage(message("c1", 1));
    expect(await store.getMessage("c1-m1")).toEqual(message("c1", 1));
    expect(await store.getMessage("missing")).toBeNull();
  });

  it("setWatermark keeps the maximum", async () => {
    await store.setWatermark("c1", "bob", 5);
    await store.setWatermark("c1", "bob", 3);
    expect(await store.getWatermark("c1", "bob")).toBe(5);
    expect(await store.getWatermark("c1", "alice")).toBe(0);
  });
});
