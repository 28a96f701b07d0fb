import { describe, expect, it } from "vitest";
import {
  CancelledError,
  ChannelFaultedError,
  InvalidStateError,
  StreamError,
  isCancelled,
  toTerminalError
} from "../../../src/streaming/index.js";

describe("streaming/errors", () => {
  it("passes cancellation and faults through unchanged", () => {
    const cancelled = new CancelledError();
    const faulted = new ChannelFaultedError("x");
    expect(toTerminalError(cancelled)).toBe(cancelled);
    expect(toTerminalError(faulted)).toBe(faulted);
  });

  it("maps AbortError onto CancelledError", () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";
    const mapped = toTerminalError(abort);
    expect(mapped).toBeInstanceOf(CancelledError);
    expect(mapped.cause).toBe(abort);
  });

  it("wraps anything else as a producer fault", () => {
    const mapped = toTerminalError(new TypeError("nope"));
    expect(mapped).toBeInstanceOf(ChannelFaultedError);
    expect(mapped.code).toBe("ERR_CHANNEL_FAULTED");
    expect(mapped.message).toBe("Producer faulted: nope");
  });

  it("serializes code and message", () => {
    const err = new InvalidStateError("start", "completed");
    expect(err).toBeInstanceOf(StreamError);
    expect(err.toJSON()).toEqual({
      name: "InvalidStateError",
      code: "ERR_INVALID_STATE",
      message: "Cannot start a session in state 'completed'"
    });
  });

  it("isCancelled only matches CancelledError", () => {
    expect(isCancelled(new CancelledError())).toBe(true);
    expect(isCancelled(new Error("Operation was cancelled"))).toBe(false);
  });
});
