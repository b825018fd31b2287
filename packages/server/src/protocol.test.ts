import { describe, it, expect } from "vitest";
import { FRAME_ERROR, FRAME_MESSAGE, FRAME_READ, FRAME_SYNCED, parseClientFrame, toMessageFrame } from "./protocol.js";

describe("protocol constants", () => {
  it("frame types are string constants", () => {
    expect(FRAME_MESSAGE).toBe("message");
    expect(FRAME_READ).toBe("read");
    expect(FRAME_SYNCED).toBe("synced");
    expect(FRAME_ERROR).toBe("error");
  });
});

describe("parseClientFrame", () => {
  it("accepts message and read frames", () => {
    expect(parseClientFrame('{"type":"message","text":"hi"}')).toEqual({
      ok: true,
      value: { type: "message", text: "hi" },
    });
    expect(parseClientFrame('{"type":"read","message_id":"m1"}')).toEqual({
      ok: true,
      value: { type: "read", message_id: "m1" },
    });
  });

  it("drops unknown fields", () => {
    expect(parseClientFrame('{"type":"message","text":"hi","seq":99}')).toEqual({
      ok: true,
      value: { type: "message", text: "hi" },
    });
  });

  it("rejects invalid JSON", () => {
    expect(parseClientFrame("{")).toEqual({ ok: false, reason: "Invalid JSON" });
  });

  it("reports the first schema problem with its path", () => {
    expect(parseClientFrame('{"type":"read","message_id":""}')).toEqual({
      ok: false,
      reason: "Invalid frame: message_id: String must contain at least 1 character(s)",
    });
    expect(parseClientFrame('{"type":"message","text":5}')).toEqual({
      ok: false,
      reason: "Invalid frame: text: Expected string, received number",
    });
  });

  it("rejects non-object payloads", () => {
    const result = parseClientFrame("42");
    expect(result.ok).toBe(false);
  });
});

describe("toMessageFrame", () => {
  it("maps a stored message to its wire shape", () => {
    expect(
      toMessageFrame({
        id: "m1",
        chatId: "c1",
        senderId: "alice",
        seq: 3,
        text: "hi",
        createdAt: "2026-01-01T00:00:00.000Z",
      })
    ).toEqual({
      type: "message",
      id: "m1",
      chat: "c1",
      sender: "alice",
      seq: 3,
      text: "hi",
      created_at: "2026-01-01T00:00:00.000Z",
    });
  });
});
