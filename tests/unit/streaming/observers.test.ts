import { describe, expect, it, vi } from "vitest";
import { ObserverDeliveryFailedError, ObserverRegistry } from "../../../src/streaming/index.js";

describe("streaming/observers", () => {
  it("broadcast to zero observers is a no-op", async () => {
    const registry = new ObserverRegistry<number>();
    await expect(registry.broadcast(1)).resolves.toEqual({ observers: 0, delivered: 0, failures: [] });
  });

  it("observers added during a broadcast only see later items", async () => {
    const registry = new ObserverRegistry<number>();
    const a: number[] = [];
    const b: number[] = [];
    let added = false;

    registry.subscribe((item) => {
      a.push(item);
      if (!added) {
        added = true;
        registry.subscribe((x) => {
          b.push(x);
        });
      }
    });

    await registry.broadcast(1);
    await registry.broadcast(2);

    expect(a).toEqual([1, 2]);
    expect(b).toEqual([2]);
  });

  it("observers removed during a broadcast still receive that item", async () => {
    const registry = new ObserverRegistry<string>();
    const seen: string[] = [];
    let unsubscribeB = () => {};

    registry.subscribe(() => unsubscribeB(), { id: "a" });
    unsubscribeB = registry.subscribe((item) => {
      seen.push(item);
    }, { id: "b" });

    await registry.broadcast("first");
    await registry.broadcast("second");

    expect(seen).toEqual(["first"]);
    expect(registry.size).toBe(1);
  });

  it("isolates a failing observer", async () => {
    const onDeliveryFailed = vi.fn();
    const registry = new ObserverRegistry<number>({ onDeliveryFailed });
    const seen: number[] = [];

    registry.subscribe(() => {
      throw new Error("disconnected");
    }, { id: "broken" });
    registry.subscribe((item) => {
      seen.push(item);
    }, { id: "ok" });

    const report = await registry.broadcast(5);

    expect(seen).toEqual([5]);
    expect(report.observers).toBe(2);
    expect(report.delivered).toBe(1);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toBeInstanceOf(ObserverDeliveryFailedError);
    expect(report.failures[0]?.observerId).toBe("broken");
    expect(report.failures[0]?.message).toBe("Delivery to observer broken failed: disconnected");
    expect(onDeliveryFailed).toHaveBeenCalledTimes(1);
  });

  it("bounds a hanging observer by the delivery timeout", async () => {
    const registry = new ObserverRegistry<number>({ deliveryTimeoutMs: 20 });
    const seen: number[] = [];

    registry.subscribe(() => new Promise<void>(() => {}), { id: "slow" });
    registry.subscribe((item) => {
      seen.push(item);
    }, { id: "fast" });

    const report = await registry.broadcast(1);

    expect(seen).toEqual([1]);
    expect(report.delivered).toBe(1);
    expect(report.failures[0]?.message).toBe("Delivery to observer slow failed: Delivery timed out after 20ms");
  });

  it("unsubscribes via AbortSignal", async () => {
    const registry = new ObserverRegistry<number>();
    const ac = new AbortController();
    const seen: number[] = [];
    registry.subscribe((item) => {
      seen.push(item);
    }, { signal: ac.signal });

    await registry.broadcast(1);
    ac.abort();
    await registry.broadcast(2);

    expect(seen).toEqual([1]);
    expect(registry.size).toBe(0);
  });

  it("drops its abort listener on manual unsubscribe and clear", () => {
    const registry = new ObserverRegistry<number>();
    const ac = new AbortController();
    const removeSpy = vi.spyOn(ac.signal, "removeEventListener");

    const unsubscribe = registry.subscribe(() => {}, { id: "a", signal: ac.signal });
    registry.subscribe(() => {}, { id: "b", signal: ac.signal });
    unsubscribe();
    expect(removeSpy).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(1);

    registry.clear();
    expect(removeSpy).toHaveBeenCalledTimes(2);
    expect(registry.size).toBe(0);
  });

  it("enforces the observer cap", () => {
    const registry = new ObserverRegistry<number>({ maxObservers: 1 });
    registry.subscribe(() => {});
    expect(() => registry.subscribe(() => {})).toThrow("Observer cap exceeded (2/1)");
  });
});
