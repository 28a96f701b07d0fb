import { onAbort, throwIfAborted } from "./abort.js";
import { CancelledError, ChannelClosedError } from "./errors.js";
import type { Streaming } from "../types/streaming.js";

export type ChannelId = Streaming.Channel.Id;
export type TakeResult<T> = Streaming.Channel.TakeResult<T>;
export type ChannelReader<T> = Streaming.Channel.Reader<T>;
export type ChannelWriter<T> = Streaming.Channel.Writer<T>;

export const DEFAULT_BOUNDED_CAPACITY = 10;

function createId(): ChannelId {
  return `ch_${Math.random().toString(16).slice(2)}_${Date.now().toString(16)}`;
}

type PendingPut<T> = {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
  dispose: () => void;
};

type ReadWaiter = {
  resolve: (readable: boolean) => void;
  reject: (err: Error) => void;
  dispose: () => void;
};

/**
 * FIFO hand-off queue between exactly one writer and one reader.
 *
 * - `put` suspends while the buffer is at capacity
 * - `complete` is idempotent; the first call fixes the terminal error
 * - `closed` settles when the writer completes the channel
 * - `completion` settles once the channel is completed AND drained
 */
export class QueueChannel<T> implements ChannelReader<T>, ChannelWriter<T> {
  public readonly id: ChannelId;
  public readonly capacity: number;
  public readonly closed: Promise<Error | undefined>;
  public readonly completion: Promise<Error | undefined>;

  private readonly buffer: T[] = [];
  private readonly pendingPuts: Array<PendingPut<T>> = [];
  private readonly readWaiters: ReadWaiter[] = [];

  private completed = false;
  private error: Error | undefined;
  private drained = false;
  private resolveClosed: (error: Error | undefined) => void = () => {};
  private resolveCompletion: (error: Error | undefined) => void = () => {};

  public constructor(options: { capacity: number; id?: ChannelId }) {
    if (options.capacity !== Infinity && !(Number.isInteger(options.capacity) && options.capacity > 0)) {
      throw new RangeError(`Channel capacity must be a positive integer (got ${options.capacity})`);
    }
    this.id = options.id ?? createId();
    this.capacity = options.capacity;
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
    this.completion = new Promise((resolve) => {
      this.resolveCompletion = resolve;
    });
  }

  public get reader(): ChannelReader<T> {
    return this;
  }

  public get writer(): ChannelWriter<T> {
    return this;
  }

  public get size(): number {
    return this.buffer.length;
  }

  public get isCompleted(): boolean {
    return this.completed;
  }

  public get terminalError(): Error | undefined {
    return this.error;
  }

  public async put(item: T, signal?: AbortSignal): Promise<void> {
    if (this.completed) throw new ChannelClosedError();
    throwIfAborted(signal);

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      this.wakeReader();
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const pending: PendingPut<T> = { item, resolve, reject, dispose: () => {} };
      this.pendingPuts.push(pending);
      pending.dispose = onAbort(signal, () => {
        const idx = this.pendingPuts.indexOf(pending);
        if (idx >= 0) this.pendingPuts.splice(idx, 1);
        reject(new CancelledError("Write was cancelled", { cause: signal?.reason }));
      });
    });
  }

  public tryPut(item: T): boolean {
    if (this.completed || this.buffer.length >= this.capacity) return false;
    this.buffer.push(item);
    this.wakeReader();
    return true;
  }

  public tryTake(): TakeResult<T> {
    if (this.buffer.length === 0) return { ok: false };
    const value = this.buffer[0];
    this.buffer.shift();

    // Space freed: admit the oldest blocked writer.
    const next = this.pendingPuts.shift();
    if (next) {
      next.dispose();
      this.buffer.push(next.item);
      next.resolve();
    }

    this.settleIfDrained();
    return { ok: true, value };
  }

  public async waitReadable(signal?: AbortSignal): Promise<boolean> {
    if (this.buffer.length > 0) return true;
    if (this.completed) {
      if (this.error) throw this.error;
      return false;
    }
    throwIfAborted(signal);

    return await new Promise<boolean>((resolve, reject) => {
      const waiter: ReadWaiter = { resolve, reject, dispose: () => {} };
      this.readWaiters.push(waiter);
      waiter.dispose = onAbort(signal, () => {
        const idx = this.readWaiters.indexOf(waiter);
        if (idx >= 0) this.readWaiters.splice(idx, 1);
        reject(new CancelledError("Read was cancelled", { cause: signal?.reason }));
      });
    });
  }

  public complete(error?: Error): boolean {
    if (this.completed) return false;
    this.completed = true;
    this.error = error;

    for (const pending of this.pendingPuts.splice(0)) {
      pending.dispose();
      pending.reject(new ChannelClosedError());
    }

    for (const waiter of this.readWaiters.splice(0)) {
      waiter.dispose();
      if (this.buffer.length > 0) waiter.resolve(true);
      else if (error) waiter.reject(error);
      else waiter.resolve(false);
    }

    this.resolveClosed(error);
    this.settleIfDrained();
    return true;
  }

  public async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (await this.waitReadable()) {
      for (;;) {
        const next = this.tryTake();
        if (!next.ok) break;
        yield next.value;
      }
    }
  }

  private wakeReader(): void {
    const waiter = this.readWaiters.shift();
    if (!waiter) return;
    waiter.dispose();
    waiter.resolve(true);
  }

  private settleIfDrained(): void {
    if (this.drained || !this.completed || this.buffer.length > 0) return;
    this.drained = true;
    this.resolveCompletion(this.error);
  }
}

/** Fixed-capacity channel; writers suspend while it is full. */
export class BoundedChannel<T> extends QueueChannel<T> {
  public constructor(capacity = DEFAULT_BOUNDED_CAPACITY, options?: { id?: ChannelId }) {
    super({ capacity, id: options?.id });
  }
}

/** Channel whose `put` never suspends. Use only where the reader keeps up or memory is not a concern. */
export class UnboundedChannel<T> extends QueueChannel<T> {
  public constructor(options?: { id?: ChannelId }) {
    super({ capacity: Infinity, id: options?.id });
  }
}

export type ChannelKind = "bounded" | "unbounded";

export class ChannelFactory {
  private readonly capacity: number;

  public constructor(options?: { capacity?: number }) {
    this.capacity = options?.capacity ?? DEFAULT_BOUNDED_CAPACITY;
  }

  public bounded<T>(capacity = this.capacity): BoundedChannel<T> {
    return new BoundedChannel<T>(capacity);
  }

  public unbounded<T>(): UnboundedChannel<T> {
    return new UnboundedChannel<T>();
  }

  public create<T>(kind: ChannelKind): QueueChannel<T> {
    return kind === "bounded" ? this.bounded<T>() : this.unbounded<T>();
  }
}

export function isChannelReader<T>(value: ChannelReader<T> | AsyncIterable<T> | Iterable<T>): value is ChannelReader<T> {
  return "waitReadable" in value && typeof value.waitReadable === "function" && "tryTake" in value;
}
