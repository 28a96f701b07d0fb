import { setTimeout as sleep } from "node:timers/promises";
import { CancelledError } from "./errors.js";

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError("Operation was cancelled", { cause: signal.reason });
  }
}

/**
 * Suspends for `ms`, rejecting with CancelledError as soon as `signal` fires.
 * A zero delay still yields to the event loop.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) {
      throw new CancelledError("Delay was cancelled", { cause: signal.reason });
    }
    throw err;
  }
}

/**
 * Registers `handler` for the lifetime of one suspension.
 * Returns the disposer; call it once the suspension ends either way.
 */
export function onAbort(signal: AbortSignal | undefined, handler: () => void): () => void {
  if (!signal) return () => {};
  if (signal.aborted) {
    handler();
    return () => {};
  }
  signal.addEventListener("abort", handler, { once: true });
  return () => signal.removeEventListener("abort", handler);
}

/** Forwards aborts from `source` into `target`. Returns the disposer. */
export function linkAbort(source: AbortSignal | undefined, target: AbortController): () => void {
  return onAbort(source, () => target.abort(source?.reason));
}

/**
 * Signal that aborts when any of `signals` does.
 * Call `dispose` once the guarded operation ends to drop the listeners.
 */
export function anySignal(signals: Array<AbortSignal | undefined>): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const disposers = signals.map((s) => linkAbort(s, controller));
  return {
    signal: controller.signal,
    dispose: () => {
      for (const d of disposers) d();
    }
  };
}
