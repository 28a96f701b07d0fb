import { describe, expect, it } from "vitest";
import {
  BoundedChannel,
  CancelledError,
  ChannelClosedError,
  ChannelFactory,
  UnboundedChannel
} from "../../../src/streaming/index.js";

const tick = (ms = 0) => new Promise<void>((r) => setTimeout(r, ms));

describe("streaming/channel", () => {
  it("delivers items in FIFO order and reports empty", async () => {
    const ch = new BoundedChannel<number>(5);
    await ch.put(1);
    await ch.put(2);
    await ch.put(3);

    expect(ch.tryTake()).toEqual({ ok: true, value: 1 });
    expect(ch.tryTake()).toEqual({ ok: true, value: 2 });
    expect(ch.tryTake()).toEqual({ ok: true, value: 3 });
    expect(ch.tryTake()).toEqual({ ok: false });
  });

  it("waitReadable returns false on a completed, drained channel", async () => {
    const ch = new BoundedChannel<number>();
    ch.complete();
    await expect(ch.waitReadable()).resolves.toBe(false);
    await expect(ch.waitReadable()).resolves.toBe(false);
  });

  it("complete is idempotent and keeps the first terminal error", async () => {
    const ch = new BoundedChannel<number>();
    expect(ch.complete(new Error("first"))).toBe(true);
    expect(ch.complete(new Error("second"))).toBe(false);
    expect(ch.complete()).toBe(false);

    expect(ch.terminalError?.message).toBe("first");
    await expect(ch.waitReadable()).rejects.toThrow("first");
    const terminal = await ch.completion;
    expect(terminal?.message).toBe("first");
  });

  it("keeps buffered items readable after completion", async () => {
    const ch = new BoundedChannel<string>();
    await ch.put("a");
    ch.complete(new Error("late"));

    await expect(ch.waitReadable()).resolves.toBe(true);
    expect(ch.tryTake()).toEqual({ ok: true, value: "a" });
    await expect(ch.waitReadable()).rejects.toThrow("late");
  });

  it("rejects writes after completion", async () => {
    const ch = new UnboundedChannel<number>();
    ch.complete();
    await expect(ch.put(1)).rejects.toBeInstanceOf(ChannelClosedError);
    expect(ch.tryPut(1)).toBe(false);
  });

  it("suspends put while full until the reader drains", async () => {
    const ch = new BoundedChannel<number>(2);
    await ch.put(0);
    await ch.put(1);

    let resolved = false;
    const pending = ch.put(2).then(() => {
      resolved = true;
    });
    await tick(10);
    expect(resolved).toBe(false);
    expect(ch.tryPut(9)).toBe(false);

    expect(ch.tryTake()).toEqual({ ok: true, value: 0 });
    await pending;
    expect(resolved).toBe(true);
    expect(ch.size).toBe(2);
    expect(ch.tryTake()).toEqual({ ok: true, value: 1 });
    expect(ch.tryTake()).toEqual({ ok: true, value: 2 });
  });

  it("cancels a blocked put without enqueuing the item", async () => {
    const ch = new BoundedChannel<number>(1);
    await ch.put(0);

    const ac = new AbortController();
    const pending = ch.put(1, ac.signal);
    ac.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(ch.tryTake()).toEqual({ ok: true, value: 0 });
    expect(ch.tryTake()).toEqual({ ok: false });
  });

  it("rejects put immediately when the signal is already aborted", async () => {
    const ch = new BoundedChannel<number>();
    const ac = new AbortController();
    ac.abort();
    await expect(ch.put(1, ac.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(ch.size).toBe(0);
  });

  it("cancels a pending waitReadable", async () => {
    const ch = new BoundedChannel<number>();
    const ac = new AbortController();
    const pending = ch.waitReadable(ac.signal);
    ac.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it("wakes a waiting reader on put and on completion", async () => {
    const ch = new BoundedChannel<number>();
    const first = ch.waitReadable();
    await ch.put(7);
    await expect(first).resolves.toBe(true);
    ch.tryTake();

    const second = ch.waitReadable();
    ch.complete();
    await expect(second).resolves.toBe(false);
  });

  it("rejects a waiting reader with the terminal error", async () => {
    const ch = new BoundedChannel<number>();
    const pending = ch.waitReadable();
    ch.complete(new Error("boom"));
    await expect(pending).rejects.toThrow("boom");
  });

  it("settles completion only after the buffer is drained", async () => {
    const ch = new BoundedChannel<number>();
    await ch.put(1);
    ch.complete();

    let settled = false;
    void ch.completion.then(() => {
      settled = true;
    });
    await tick();
    expect(settled).toBe(false);
    await expect(ch.closed).resolves.toBeUndefined();

    ch.tryTake();
    await expect(ch.completion).resolves.toBeUndefined();
    expect(settled).toBe(true);
  });

  it("unbounded put never suspends", async () => {
    const ch = new UnboundedChannel<number>();
    for (let i = 0; i < 1000; i += 1) await ch.put(i);
    expect(ch.size).toBe(1000);
    expect(ch.capacity).toBe(Infinity);
  });

  it("iterates with for await until completion", async () => {
    const ch = new BoundedChannel<number>();
    await ch.put(1);
    await ch.put(2);
    setTimeout(() => {
      void ch.put(3).then(() => ch.complete());
    }, 5);

    const seen: number[] = [];
    for await (const v of ch) seen.push(v);
    expect(seen).toEqual([1, 2, 3]);
  });

  it("rejects non-positive or fractional capacities", () => {
    expect(() => new BoundedChannel<number>(0)).toThrow(RangeError);
    expect(() => new BoundedChannel<number>(1.5)).toThrow(RangeError);
  });

  it("factory builds bounded channels with its default capacity", () => {
    const factory = new ChannelFactory({ capacity: 3 });
    expect(factory.bounded<number>().capacity).toBe(3);
    expect(factory.create<number>("bounded").capacity).toBe(3);
    expect(factory.create<number>("unbounded").capacity).toBe(Infinity);
  });
});
