/**
 * Streaming: contract types
 *
 * Channel = single-producer/single-consumer FIFO hand-off with optional capacity.
 * Session = one request bound to one channel and one cancellation controller.
 * Upload  = a remote-driven sequence drained into a set of observers.
 *
 * Implementations live under `src/streaming/*`.
 */

export declare namespace Streaming {
  export namespace Channel {
    /** Channel identifier. */
    export type Id = string;

    /** Result of a non-blocking take. `ok: false` means the buffer was empty. */
    export type TakeResult<T> = { ok: true; value: T } | { ok: false };

    /** Consuming half. Owned by exactly one reader. */
    export interface Reader<T> extends AsyncIterable<T> {
      readonly id: Id;

      /** Number of buffered items. */
      readonly size: number;

      /** True once the writer has completed the channel (items may remain). */
      readonly isCompleted: boolean;

      /** Settles when the writer completes the channel. Resolves with the terminal error, if any. */
      readonly closed: Promise<Error | undefined>;

      /**
       * Settles once the channel is completed AND drained.
       * Resolves with the terminal error, if any; never rejects.
       */
      readonly completion: Promise<Error | undefined>;

      tryTake(): TakeResult<T>;

      /**
       * Resolves `true` when an item is available, `false` when completed and drained.
       * Rejects with the terminal error once drained, or with a cancellation when `signal` fires.
       */
      waitReadable(signal?: AbortSignal): Promise<boolean>;
    }

    /** Producing half. Owned by exactly one writer. */
    export interface Writer<T> {
      readonly id: Id;

      /** Positive integer, or `Infinity` for unbounded channels. */
      readonly capacity: number;

      /** Suspends while the channel is full. */
      put(item: T, signal?: AbortSignal): Promise<void>;

      tryPut(item: T): boolean;

      /** Idempotent. Returns true only for the call that completed the channel. */
      complete(error?: Error): boolean;
    }
  }

  export namespace Session {
    export type State = "idle" | "started" | "completed" | "cancelled" | "faulted";

    export type TerminalState = Exclude<State, "idle" | "started">;

    export interface Request {
      /** Number of items to produce (non-negative integer). */
      count: number;

      /** Pause between consecutive items, in milliseconds. */
      delayMs: number;

      /** Remote-side cancellation (e.g. peer disconnect). */
      signal?: AbortSignal;
    }

    export interface Session<T> {
      readonly id: string;
      readonly state: State;

      /** Resolves with the terminal state as soon as the channel is completed, even if items remain unread. */
      readonly done: Promise<TerminalState>;

      start(request: Request): Channel.Reader<T>;
      cancel(reason?: unknown): void;
    }
  }

  export namespace Consumer {
    export type Status = "completed" | "cancelled" | "faulted";

    export interface Result {
      status: Status;
      received: number;
      error?: Error;
    }

    /** Per-item callback; a returned promise is awaited before the next take. */
    export type OnItem<T> = (item: T, index: number) => void | Promise<void>;
  }

  export namespace Upload {
    export type Observer<T> = (item: T) => void | Promise<void>;

    /** Anything UploadSink can drain. */
    export type Source<T> = Channel.Reader<T> | AsyncIterable<T> | Iterable<T>;
  }
}
