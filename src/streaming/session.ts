import { linkAbort } from "./abort.js";
import { ChannelFactory, type ChannelKind, type ChannelReader, type QueueChannel } from "./channel.js";
import { silentDiagnostics, errorInfo, type DiagnosticsContext } from "./diagnostics.js";
import { CancelledError, InvalidStateError } from "./errors.js";
import { startPacedProducer, startSequenceProducer } from "./producer.js";
import { parseStreamRequest, type StreamRequest } from "./request.js";
import type { Streaming } from "../types/streaming.js";

export type SessionState = Streaming.Session.State;
export type SessionTerminalState = Streaming.Session.TerminalState;

export interface StreamingSessionOptions {
  id?: string;
  channels?: ChannelFactory;
  /** Server-to-client flows default to a bounded channel. */
  channelKind?: ChannelKind;
  diagnostics?: DiagnosticsContext;
}

function createId(): string {
  return `ss_${Math.random().toString(16).slice(2)}_${Date.now().toString(16)}`;
}

function terminalStateOf(error: Error | undefined): SessionTerminalState {
  if (!error) return "completed";
  return error instanceof CancelledError ? "cancelled" : "faulted";
}

/**
 * One streaming request: a producer, a channel and a cancellation controller.
 *
 * idle -> started -> completed | cancelled | faulted
 *
 * The terminal state follows the channel: the producer completes it on
 * every exit path and the session reads the outcome from there. A session
 * starts at most once.
 */
export class StreamingSession<T> implements Streaming.Session.Session<T> {
  public readonly id: string;
  public readonly done: Promise<SessionTerminalState>;

  private _state: SessionState = "idle";
  private _error: Error | undefined;
  private readonly controller = new AbortController();
  private readonly channels: ChannelFactory;
  private readonly channelKind: ChannelKind;
  private readonly diagnostics: DiagnosticsContext;
  private unlink: () => void = () => {};
  private resolveDone: (state: SessionTerminalState) => void = () => {};

  /** Session that streams the running index itself. */
  public static counting(options?: StreamingSessionOptions): StreamingSession<number> {
    return new StreamingSession<number>((index) => index, options);
  }

  public constructor(
    private readonly map: (index: number) => T,
    options?: StreamingSessionOptions
  ) {
    this.id = options?.id ?? createId();
    this.channels = options?.channels ?? new ChannelFactory();
    this.channelKind = options?.channelKind ?? "bounded";
    this.diagnostics = (options?.diagnostics ?? silentDiagnostics).with({
      source: "streaming.session",
      correlationId: this.id
    });
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  public get state(): SessionState {
    return this._state;
  }

  /** Terminal error recorded on the channel, once the session has ended. */
  public get error(): Error | undefined {
    return this._error;
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public start(request: StreamRequest): ChannelReader<T> {
    this.assertIdle();
    const { count, delayMs, signal } = parseStreamRequest(request);

    const channel = this.begin(signal);
    startPacedProducer(channel.writer, {
      count,
      delayMs,
      signal: this.controller.signal,
      map: this.map
    });
    void this.diagnostics.info("Session started", { details: { count, delayMs, channel: channel.id } });
    return channel.reader;
  }

  /** Starts from a caller-supplied lazy sequence instead of the paced counter. */
  public startFrom(sequence: AsyncIterable<T> | Iterable<T>, options?: { signal?: AbortSignal }): ChannelReader<T> {
    this.assertIdle();

    const channel = this.begin(options?.signal);
    startSequenceProducer(channel.writer, sequence, this.controller.signal);
    void this.diagnostics.info("Session started from sequence", { details: { channel: channel.id } });
    return channel.reader;
  }

  /**
   * Signals the shared cancellation token. The channel is left to the
   * producer, which completes it at its next check.
   */
  public cancel(reason?: unknown): void {
    if (this._state !== "started") {
      throw new InvalidStateError("cancel", this._state);
    }
    if (this.controller.signal.aborted) return;
    this.controller.abort(reason ?? new CancelledError("Session cancelled"));
  }

  private assertIdle(): void {
    if (this._state !== "idle") {
      throw new InvalidStateError("start", this._state);
    }
  }

  private begin(signal: AbortSignal | undefined): QueueChannel<T> {
    const channel = this.channels.create<T>(this.channelKind);
    this.unlink = linkAbort(signal, this.controller);
    this._state = "started";
    void channel.closed.then((error) => this.finish(error));
    return channel;
  }

  private finish(error: Error | undefined): void {
    this.unlink();
    const state = terminalStateOf(error);
    this._state = state;
    this._error = error;

    if (state === "faulted") {
      void this.diagnostics.error("Session faulted", { error: errorInfo(error) });
    } else {
      void this.diagnostics.info(`Session ${state}`);
    }
    this.resolveDone(state);
  }
}
