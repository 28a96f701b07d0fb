import { linkAbort, onAbort } from "./abort.js";
import { isChannelReader, type ChannelReader } from "./channel.js";
import { CancelledError, ChannelFaultedError } from "./errors.js";
import type { Streaming } from "../types/streaming.js";

export type ConsumeStatus = Streaming.Consumer.Status;
export type ConsumeResult = Streaming.Consumer.Result;
export type OnItem<T> = Streaming.Consumer.OnItem<T>;

export interface ConsumeOptions {
  /** Consumer-side cancellation. Share it with the producer so both ends stop. */
  signal?: AbortSignal;
}

function settle(err: unknown, received: number): ConsumeResult {
  if (err instanceof CancelledError) return { status: "cancelled", received, error: err };
  const error = err instanceof Error ? err : new ChannelFaultedError(err);
  return { status: "faulted", received, error };
}

function cancelled(signal: AbortSignal | undefined, received: number): ConsumeResult {
  return {
    status: "cancelled",
    received,
    error: new CancelledError("Consumer cancelled", { cause: signal?.reason })
  };
}

type NextStep<T> = { aborted: true } | { aborted: false; result: IteratorResult<T> };

function isAsyncIterable<T>(sequence: AsyncIterable<T> | Iterable<T>): sequence is AsyncIterable<T> {
  return Symbol.asyncIterator in sequence;
}

async function* fromIterable<T>(sequence: Iterable<T>): AsyncGenerator<T, void, undefined> {
  yield* sequence;
}

function iteratorOf<T>(sequence: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> {
  return isAsyncIterable(sequence) ? sequence[Symbol.asyncIterator]() : fromIterable(sequence)[Symbol.asyncIterator]();
}

/** Pulls the next item, settling early with `aborted` when `signal` fires first. */
function nextOrAbort<T>(iterator: AsyncIterator<T>, signal?: AbortSignal): Promise<NextStep<T>> {
  return new Promise((resolve, reject) => {
    const dispose = onAbort(signal, () => resolve({ aborted: true }));
    void iterator.next().then(
      (result) => {
        dispose();
        resolve({ aborted: false, result });
      },
      (err: unknown) => {
        dispose();
        reject(err);
      }
    );
  });
}

/**
 * Asks the source to stop without waiting for it. A generator still
 * suspended inside `next()` only runs its cleanup once that call settles.
 */
function release<T>(iterator: AsyncIterator<T>): void {
  const closing = iterator.return?.();
  if (!closing) return;
  void closing.then(undefined, (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Upload source failed to close", err);
  });
}

/**
 * Drains a channel: wait until readable, then take until empty, repeat
 * until the channel reports completion.
 *
 * Never throws. Terminal errors (including the producer's cancellation)
 * come back in the result.
 */
export async function consumeChannel<T>(
  reader: ChannelReader<T>,
  onItem: OnItem<T>,
  options?: ConsumeOptions
): Promise<ConsumeResult> {
  const signal = options?.signal;
  let received = 0;
  try {
    while (await reader.waitReadable(signal)) {
      for (;;) {
        if (signal?.aborted) return cancelled(signal, received);
        const next = reader.tryTake();
        if (!next.ok) break;
        await onItem(next.value, received);
        received += 1;
      }
    }
    return { status: "completed", received };
  } catch (err) {
    return settle(err, received);
  }
}

/**
 * Same contract as consumeChannel, over any (async) iterable. The iterator is
 * driven by hand so that an abort also ends a source idling inside `next()`.
 */
export async function consumeSequence<T>(
  sequence: AsyncIterable<T> | Iterable<T>,
  onItem: OnItem<T>,
  options?: ConsumeOptions
): Promise<ConsumeResult> {
  const signal = options?.signal;
  const iterator = iteratorOf(sequence);
  let received = 0;
  try {
    for (;;) {
      if (signal?.aborted) {
        await iterator.return?.();
        return cancelled(signal, received);
      }
      const step = await nextOrAbort(iterator, signal);
      if (step.aborted) {
        release(iterator);
        return cancelled(signal, received);
      }
      if (step.result.done) break;
      await onItem(step.result.value, received);
      received += 1;
    }
    if (signal?.aborted) return cancelled(signal, received);
    return { status: "completed", received };
  } catch (err) {
    release(iterator);
    return settle(err, received);
  }
}

/**
 * Client-side consumer with its own cancellation controller.
 *
 * `cancel()` stops reading at the next take and aborts `signal`, which a
 * producer started with the same signal observes at its next check.
 */
export class StreamConsumer<T> {
  private readonly controller = new AbortController();
  private readonly unlink: () => void;

  public constructor(
    private readonly onItem: OnItem<T>,
    options?: ConsumeOptions
  ) {
    this.unlink = linkAbort(options?.signal, this.controller);
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  public cancel(reason?: unknown): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort(reason ?? new CancelledError("Consumer cancelled"));
  }

  public async consume(source: Streaming.Upload.Source<T>): Promise<ConsumeResult> {
    const options = { signal: this.controller.signal };
    try {
      return isChannelReader(source)
        ? await consumeChannel(source, this.onItem, options)
        : await consumeSequence(source, this.onItem, options);
    } finally {
      this.unlink();
    }
  }
}
