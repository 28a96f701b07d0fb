export type StreamErrorCode =
  | "ERR_CANCELLED"
  | "ERR_CHANNEL_FAULTED"
  | "ERR_CHANNEL_CLOSED"
  | "ERR_INVALID_STATE"
  | "ERR_INVALID_REQUEST"
  | "ERR_OBSERVER_DELIVERY";

/**
 * Base class for every error the streaming core raises.
 * `code` is stable and safe to surface to transport adapters.
 */
export class StreamError extends Error {
  public readonly code: StreamErrorCode;

  public constructor(code: StreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StreamError";
    this.code = code;
  }

  public toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/** Operation stopped by an explicit signal. Expected, not a fault. */
export class CancelledError extends StreamError {
  public constructor(message = "Operation was cancelled", options?: { cause?: unknown }) {
    super("ERR_CANCELLED", message, options);
    this.name = "CancelledError";
  }
}

/** Unexpected error inside a producer loop, delivered as the channel's terminal error. */
export class ChannelFaultedError extends StreamError {
  public constructor(cause: unknown) {
    super("ERR_CHANNEL_FAULTED", `Producer faulted: ${describeError(cause)}`, { cause });
    this.name = "ChannelFaultedError";
  }
}

export class ChannelClosedError extends StreamError {
  public constructor(message = "Channel is completed; no further items may be written") {
    super("ERR_CHANNEL_CLOSED", message);
    this.name = "ChannelClosedError";
  }
}

export class InvalidStateError extends StreamError {
  public readonly state: string;

  public constructor(operation: string, state: string) {
    super("ERR_INVALID_STATE", `Cannot ${operation} a session in state '${state}'`);
    this.name = "InvalidStateError";
    this.state = state;
  }
}

export class InvalidRequestError extends StreamError {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super("ERR_INVALID_REQUEST", `Invalid stream request: ${issues.join("; ")}`);
    this.name = "InvalidRequestError";
    this.issues = issues;
  }
}

/** Broadcast to a single observer failed. Logged, never propagated. */
export class ObserverDeliveryFailedError extends StreamError {
  public readonly observerId: string;

  public constructor(observerId: string, cause: unknown) {
    super("ERR_OBSERVER_DELIVERY", `Delivery to observer ${observerId} failed: ${describeError(cause)}`, {
      cause
    });
    this.name = "ObserverDeliveryFailedError";
    this.observerId = observerId;
  }
}

export function isCancelled(err: unknown): err is CancelledError {
  return err instanceof CancelledError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps whatever a producer loop threw onto the channel's terminal error.
 * Aborts become CancelledError, anything else is wrapped as a fault.
 */
export function toTerminalError(err: unknown): StreamError {
  if (err instanceof CancelledError || err instanceof ChannelFaultedError) return err;
  if (err instanceof Error && err.name === "AbortError") {
    return new CancelledError("Operation was cancelled", { cause: err });
  }
  return new ChannelFaultedError(err);
}
