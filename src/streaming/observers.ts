import { setTimeout as sleep } from "node:timers/promises";
import { ObserverDeliveryFailedError } from "./errors.js";
import type { Streaming } from "../types/streaming.js";

export type Observer<T> = Streaming.Upload.Observer<T>;
export type ObserverId = string;
export type Unsubscribe = () => void;

export interface ObserverRegistryOptions {
  /** Upper bound for a single delivery attempt. No bound when omitted. */
  deliveryTimeoutMs?: number;
  maxObservers?: number;
  onDeliveryFailed?: (error: ObserverDeliveryFailedError) => void;
}

export interface SubscribeOptions {
  id?: ObserverId;
  signal?: AbortSignal;
}

export interface BroadcastReport {
  observers: number;
  delivered: number;
  failures: ObserverDeliveryFailedError[];
}

function createId(): ObserverId {
  return `obs_${Math.random().toString(16).slice(2)}_${Date.now().toString(16)}`;
}

async function attempt(deliver: () => void | Promise<void>, timeoutMs?: number): Promise<void> {
  const delivery = Promise.resolve().then(deliver);
  if (timeoutMs === undefined) {
    await delivery;
    return;
  }

  const timer = new AbortController();
  try {
    await Promise.race([
      delivery,
      sleep(timeoutMs, undefined, { signal: timer.signal }).then(() => {
        throw new Error(`Delivery timed out after ${timeoutMs}ms`);
      })
    ]);
  } finally {
    timer.abort();
  }
}

/**
 * Set of observers that can change while a broadcast is running.
 * Every broadcast works over a snapshot taken when it starts; observers
 * added later only see later items.
 */
export class ObserverRegistry<T> {
  private readonly subs = new Map<ObserverId, { observer: Observer<T>; unsubscribe: Unsubscribe }>();
  private readonly options: ObserverRegistryOptions;

  public constructor(options?: ObserverRegistryOptions) {
    this.options = { ...options };
  }

  public get size(): number {
    return this.subs.size;
  }

  public subscribe(observer: Observer<T>, options?: SubscribeOptions): Unsubscribe {
    const max = this.options.maxObservers;
    if (max !== undefined && this.subs.size >= max) {
      throw new Error(`Observer cap exceeded (${this.subs.size + 1}/${max})`);
    }

    const id = options?.id ?? createId();
    if (options?.signal?.aborted) return () => {};

    const signal = options?.signal;
    const unsubscribe: Unsubscribe = () => {
      signal?.removeEventListener("abort", unsubscribe);
      if (this.subs.get(id)?.unsubscribe === unsubscribe) this.subs.delete(id);
    };
    this.subs.set(id, { observer, unsubscribe });
    signal?.addEventListener("abort", unsubscribe, { once: true });
    return unsubscribe;
  }

  public clear(): void {
    for (const { unsubscribe } of Array.from(this.subs.values())) unsubscribe();
  }

  public async broadcast(item: T): Promise<BroadcastReport> {
    const snapshot = Array.from(this.subs);
    const failures: ObserverDeliveryFailedError[] = [];

    await Promise.all(
      snapshot.map(async ([id, { observer }]) => {
        try {
          await attempt(() => observer(item), this.options.deliveryTimeoutMs);
        } catch (err) {
          const failure = new ObserverDeliveryFailedError(id, err);
          failures.push(failure);
          this.options.onDeliveryFailed?.(failure);
        }
      })
    );

    return { observers: snapshot.length, delivered: snapshot.length - failures.length, failures };
  }
}
