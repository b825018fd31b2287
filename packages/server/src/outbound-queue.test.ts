import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OutboundQueue, type OutboundQueueOptions } from "./outbound-queue.js";
import { ConnectionClosedError, SlowConsumerError } from "./errors.js";

/** Lets pending promise callbacks run; setImmediate stays real below. */
const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function controlledWriter(): {
  written: number[];
  write: (item: number) => Promise<void>;
  release: () => void;
} {
  const written: number[] = [];
  const pending: Array<() => void> = [];
  return {
    written,
    write: (item) =>
      new Promise<void>((resolve) => {
        pending.push(() => {
          written.push(item);
          resolve();
        });
      }),
    release: () => pending.shift()?.(),
  };
}

function queue(overrides: Partial<OutboundQueueOptions<number>> & Pick<OutboundQueueOptions<number>, "write">) {
  const onSaturated = vi.fn();
  const onWriteError = vi.fn();
  const q = new OutboundQueue<number>({
    capacity: 2,
    graceMs: 1000,
    onSaturated,
    onWriteError,
    ...overrides,
  });
  return { q, onSaturated, onWriteError };
}

describe("OutboundQueue", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("writes items in push order and reports each one", async () => {
    const written: number[] = [];
    const onWritten = vi.fn();
    const { q } = queue({
      write: async (item) => {
        written.push(item);
      },
      onWritten,
    });

    expect(q.push(1)).toBe(true);
    expect(q.push(2)).toBe(true);
    await flush();
    expect(q.push(3)).toBe(true);
    await flush();

    expect(written).toEqual([1, 2, 3]);
    expect(onWritten.mock.calls.map(([item]) => item)).toEqual([1, 2, 3]);
    expect(q.size).toBe(0);
  });

  it("parks items in the overflow and saturates when it fills up", () => {
    const writer = controlledWriter();
    const { q, onSaturated } = queue({ write: writer.write });

    expect(q.push(1)).toBe(true);
    expect(q.push(2)).toBe(true);
    expect(q.size).toBe(2);
    expect(q.push(3)).toBe(true);
    expect(q.push(4)).toBe(true);
    expect(q.size).toBe(4);
    expect(onSaturated).not.toHaveBeenCalled();

    expect(q.push(5)).toBe(false);
    expect(onSaturated).toHaveBeenCalledTimes(1);
    expect(q.isStopped).toBe(true);
    expect(q.size).toBe(0);
    expect(q.push(6)).toBe(false);
    expect(onSaturated).toHaveBeenCalledTimes(1);
  });

  it("saturates when the overflow outlives the grace period", () => {
    const writer = controlledWriter();
    const { q, onSaturated } = queue({ capacity: 1, write: writer.write });

    q.push(1);
    q.push(2);
    vi.advanceTimersByTime(999);
    expect(onSaturated).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onSaturated).toHaveBeenCalledTimes(1);
    expect(q.push(3)).toBe(false);
  });

  it("cancels the grace timer once the overflow drains", async () => {
    const writer = controlledWriter();
    const { q, onSaturated } = queue({ capacity: 1, write: writer.write });

    q.push(1);
    q.push(2);
    expect(q.size).toBe(2);

    writer.release();
    await flush();
    expect(writer.written).toEqual([1]);
    expect(q.size).toBe(1);

    vi.advanceTimersByTime(5000);
    expect(onSaturated).not.toHaveBeenCalled();

    writer.release();
    await flush();
    expect(writer.written).toEqual([1, 2]);
  });

  it("waitForCapacity resolves once enough items have been written", async () => {
    const writer = controlledWriter();
    const { q } = queue({ write: writer.write });
    q.push(1);
    q.push(2);

    let ready = false;
    const waiting = q.waitForCapacity(1).then(() => {
      ready = true;
    });
    await flush();
    expect(ready).toBe(false);

    writer.release();
    await waiting;
    expect(ready).toBe(true);
  });

  it("saturates when a capacity waiter outlives the grace period", async () => {
    const writer = controlledWriter();
    const { q, onSaturated } = queue({ write: writer.write });
    q.push(1);
    q.push(2);
    const outcome = q.waitForCapacity(1).then(
      () => "resolved",
      (err: unknown) => err
    );

    vi.advanceTimersByTime(999);
    expect(onSaturated).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onSaturated).toHaveBeenCalledTimes(1);
    expect(await outcome).toBeInstanceOf(SlowConsumerError);
    expect(q.isStopped).toBe(true);
    expect(q.push(3)).toBe(false);
  });

  it("a capacity waiter that gets room in time does not saturate", async () => {
    const writer = controlledWriter();
    const { q, onSaturated } = queue({ write: writer.write });
    q.push(1);
    q.push(2);
    const waiting = q.waitForCapacity(1);

    writer.release();
    await waiting;
    vi.advanceTimersByTime(5000);
    expect(onSaturated).not.toHaveBeenCalled();
  });

  it("stop() rejects capacity waiters and refuses new items", async () => {
    const writer = controlledWriter();
    const { q, onSaturated } = queue({ write: writer.write });
    q.push(1);
    q.push(2);
    const waiting = q.waitForCapacity(2);

    q.stop();
    q.stop();

    await expect(waiting).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(q.waitForCapacity(1)).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(q.push(3)).toBe(false);
    expect(onSaturated).not.toHaveBeenCalled();
  });

  it("reports a failed write", async () => {
    const failure = new Error("socket gone");
    const { q, onWriteError } = queue({
      write: async () => {
        throw failure;
      },
    });

    q.push(1);
    await flush();
    expect(onWriteError).toHaveBeenCalledWith(failure);
  });
});
