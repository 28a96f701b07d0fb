import { delay, throwIfAborted } from "./abort.js";
import type { ChannelWriter } from "./channel.js";
import { toTerminalError } from "./errors.js";
import { parseStreamRequest, type StreamRequest } from "./request.js";

export interface PacedProducerOptions<T = number> extends StreamRequest {
  /** Maps the running index to the produced item. Defaults to the index itself. */
  map?: (index: number) => T;
}

async function writeItems<T>(
  writer: ChannelWriter<T>,
  count: number,
  delayMs: number,
  map: (index: number) => T,
  signal?: AbortSignal
): Promise<void> {
  let failure: Error | undefined;
  try {
    for (let i = 0; i < count; i += 1) {
      throwIfAborted(signal);
      await writer.put(map(i), signal);
      await delay(delayMs, signal);
    }
  } catch (err) {
    failure = toTerminalError(err);
  } finally {
    writer.complete(failure);
  }
}

/**
 * Writes `0..count-1` into `writer`, pausing `delayMs` after every write.
 *
 * Returns immediately. The only completion signal is the channel itself:
 * the writer is completed exactly once on every exit path, carrying a
 * CancelledError or ChannelFaultedError when the loop ended early.
 */
export function startPacedProducer(writer: ChannelWriter<number>, options: StreamRequest): void;
export function startPacedProducer<T>(
  writer: ChannelWriter<T>,
  options: StreamRequest & { map: (index: number) => T }
): void;
export function startPacedProducer<T>(
  writer: ChannelWriter<T | number>,
  options: PacedProducerOptions<T>
): void {
  const { count, delayMs, signal } = parseStreamRequest(options);
  const map = options.map ?? ((i: number) => i);
  void writeItems(writer, count, delayMs, map, signal);
}

/**
 * Lazy paced sequence: yields `0..count-1` on demand with `delayMs` between items.
 * Throws CancelledError when `signal` is observed before a yield or during a delay.
 */
export async function* pacedSequence(options: StreamRequest): AsyncGenerator<number, void, undefined> {
  const { count, delayMs, signal } = parseStreamRequest(options);
  for (let i = 0; i < count; i += 1) {
    throwIfAborted(signal);
    yield i;
    await delay(delayMs, signal);
  }
}

/** Unpaced lazy sequence of `count` items built by `factory`. */
export async function* generateSequence<T>(
  count: number,
  factory: (index: number) => T | Promise<T>,
  signal?: AbortSignal
): AsyncGenerator<T, void, undefined> {
  for (let i = 0; i < count; i += 1) {
    throwIfAborted(signal);
    yield await factory(i);
  }
}

async function pumpSequence<T>(
  writer: ChannelWriter<T>,
  sequence: AsyncIterable<T> | Iterable<T>,
  signal?: AbortSignal
): Promise<void> {
  let failure: Error | undefined;
  try {
    for await (const item of sequence) {
      throwIfAborted(signal);
      await writer.put(item, signal);
    }
    throwIfAborted(signal);
  } catch (err) {
    failure = toTerminalError(err);
  } finally {
    writer.complete(failure);
  }
}

/**
 * Drives a caller-supplied lazy sequence into `writer`, with the same
 * fire-and-forget contract as startPacedProducer.
 */
export function startSequenceProducer<T>(
  writer: ChannelWriter<T>,
  sequence: AsyncIterable<T> | Iterable<T>,
  signal?: AbortSignal
): void {
  void pumpSequence(writer, sequence, signal);
}
