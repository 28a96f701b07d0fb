import { z } from "zod";
import { anySignal } from "./abort.js";
import { ChannelFactory, type ChannelReader, type ChannelWriter } from "./channel.js";
import { defaultStreamingConfig, type StreamingConfig } from "./config.js";
import { errorInfo, silentDiagnostics, type DiagnosticsContext } from "./diagnostics.js";
import { CancelledError, InvalidRequestError, StreamError, describeError } from "./errors.js";
import { ObserverRegistry, type Observer, type SubscribeOptions, type Unsubscribe } from "./observers.js";
import { pacedSequence } from "./producer.js";
import { parseStreamParams } from "./request.js";
import { StreamingSession } from "./session.js";
import { UploadSink, type UploadResult, type UploadSource } from "./upload-sink.js";

export const HubEvents = {
  channelStreamData: "ReceiveChannelStreamData",
  asyncStreamData: "ReceiveAsyncStreamData"
} as const;

export type HubEvent = (typeof HubEvents)[keyof typeof HubEvents];

export const hubMethodSchema = z.enum([
  "GetChannelStream",
  "GetAsyncStream",
  "UploadStreamToChannel",
  "UploadAsyncStream"
]);

export type HubMethod = z.infer<typeof hubMethodSchema>;

export type HubInvokeResult<T = unknown> =
  | { status: "ok"; value: T }
  | { status: "error"; error: { message: string; code?: string } }
  | { status: "canceled"; error?: { message: string } };

export interface StreamHubOptions {
  config?: StreamingConfig;
  channels?: ChannelFactory;
  diagnostics?: DiagnosticsContext;
}

function isUploadSource(value: unknown): boolean {
  if (typeof value !== "object" || value === null) return false;
  return Symbol.asyncIterator in value || Symbol.iterator in value;
}

const streamArgsSchema = z.tuple([z.unknown(), z.unknown()]);

function uploadArgsSchema<U>() {
  return z.tuple([
    z.custom<UploadSource<U>>(isUploadSource, { message: "Expected a channel reader or (async) iterable" })
  ]);
}

/**
 * In-process duplex hub: server-to-client streams (channel-backed or lazy)
 * and client-to-server uploads broadcast to every observer of the matching
 * event, the uploading client included.
 */
export class StreamHub<U = string> {
  private readonly config: StreamingConfig;
  private readonly channels: ChannelFactory;
  private readonly diagnostics: DiagnosticsContext;
  private readonly registries = new Map<HubEvent, ObserverRegistry<U>>();
  private readonly sessions = new Set<StreamingSession<number>>();
  private readonly shutdown = new AbortController();

  public constructor(options?: StreamHubOptions) {
    this.config = options?.config ?? defaultStreamingConfig();
    this.channels = options?.channels ?? new ChannelFactory({ capacity: this.config.channel.capacity });
    this.diagnostics = (options?.diagnostics ?? silentDiagnostics).with({ source: "streaming.hub" });
  }

  public get activeSessions(): number {
    return this.sessions.size;
  }

  public get disposed(): boolean {
    return this.shutdown.signal.aborted;
  }

  public on(event: HubEvent, observer: Observer<U>, options?: SubscribeOptions): Unsubscribe {
    return this.registry(event).subscribe(observer, options);
  }

  /** Paced counter over a bounded channel; the producer runs detached. */
  public getChannelStream(count: number, delayMs: number, signal?: AbortSignal): ChannelReader<number> {
    this.assertOpen();
    const session = StreamingSession.counting({
      channels: this.channels,
      channelKind: "bounded",
      diagnostics: this.diagnostics
    });
    const reader = session.start({ count, delayMs, signal });
    this.sessions.add(session);
    void session.done.then(() => this.sessions.delete(session));
    return reader;
  }

  /** Lazy paced counter; production happens as the caller pulls. */
  public getAsyncStream(count: number, delayMs: number, signal?: AbortSignal): AsyncGenerator<number, void, undefined> {
    this.assertOpen();
    return this.pullCounter(count, delayMs, signal);
  }

  public async uploadStreamToChannel(stream: ChannelReader<U>, signal?: AbortSignal): Promise<UploadResult> {
    return this.upload(HubEvents.channelStreamData, stream, signal);
  }

  public async uploadAsyncStream(stream: AsyncIterable<U>, signal?: AbortSignal): Promise<UploadResult> {
    return this.upload(HubEvents.asyncStreamData, stream, signal);
  }

  /**
   * Client side of a channel upload: a local channel (kind from config)
   * whose reader the hub drains. Write with `writer`, then complete it.
   */
  public openUpload(signal?: AbortSignal): { writer: ChannelWriter<U>; done: Promise<UploadResult> } {
    this.assertOpen();
    const channel = this.channels.create<U>(this.config.upload.channel);
    return { writer: channel.writer, done: this.uploadStreamToChannel(channel.reader, signal) };
  }

  /** Untyped entry point for transport adapters; arguments are validated. */
  public async invoke(method: string, args: readonly unknown[], signal?: AbortSignal): Promise<HubInvokeResult> {
    void this.diagnostics.debug(`invoke ${method}`);
    try {
      this.assertOpen();
      const m = hubMethodSchema.safeParse(method);
      if (!m.success) throw new InvalidRequestError([`method: unknown hub method '${method}'`]);

      switch (m.data) {
        case "GetChannelStream":
        case "GetAsyncStream": {
          const [count, delayMs] = this.parseArgs(streamArgsSchema, args);
          const params = parseStreamParams({ count, delayMs });
          const value =
            m.data === "GetChannelStream"
              ? this.getChannelStream(params.count, params.delayMs, signal)
              : this.getAsyncStream(params.count, params.delayMs, signal);
          return { status: "ok", value };
        }
        case "UploadStreamToChannel":
        case "UploadAsyncStream": {
          const [source] = this.parseArgs(uploadArgsSchema<U>(), args);
          const event = m.data === "UploadStreamToChannel" ? HubEvents.channelStreamData : HubEvents.asyncStreamData;
          const result = await this.upload(event, source, signal);
          if (result.status === "cancelled") {
            return { status: "canceled", error: result.error ? { message: result.error.message } : undefined };
          }
          if (result.status === "faulted") {
            return { status: "error", error: { message: describeError(result.error) } };
          }
          return { status: "ok", value: result };
        }
      }
    } catch (err) {
      if (err instanceof CancelledError) return { status: "canceled", error: { message: err.message } };
      void this.diagnostics.warn(`invoke ${method} failed`, { error: errorInfo(err) });
      return {
        status: "error",
        error: { message: describeError(err), code: err instanceof StreamError ? err.code : undefined }
      };
    }
  }

  /** Cancels every running session and drops all observers. Idempotent. */
  public dispose(): void {
    if (this.shutdown.signal.aborted) return;
    this.shutdown.abort(new CancelledError("Hub disposed"));
    for (const session of this.sessions) {
      if (session.state === "started") session.cancel(new CancelledError("Hub disposed"));
    }
    for (const registry of this.registries.values()) registry.clear();
    void this.diagnostics.info("Hub disposed");
  }

  private async *pullCounter(count: number, delayMs: number, signal?: AbortSignal): AsyncGenerator<number, void, undefined> {
    const linked = anySignal([signal, this.shutdown.signal]);
    try {
      yield* pacedSequence({ count, delayMs, signal: linked.signal });
    } finally {
      linked.dispose();
    }
  }

  private async upload(event: HubEvent, source: UploadSource<U>, signal?: AbortSignal): Promise<UploadResult> {
    this.assertOpen();
    const sink = new UploadSink<U>({
      name: event,
      observers: this.registry(event),
      diagnostics: this.diagnostics
    });
    const linked = anySignal([signal, this.shutdown.signal]);
    try {
      return await sink.accept(source, { signal: linked.signal });
    } finally {
      linked.dispose();
    }
  }

  private registry(event: HubEvent): ObserverRegistry<U> {
    let registry = this.registries.get(event);
    if (!registry) {
      registry = new ObserverRegistry<U>({
        deliveryTimeoutMs: this.config.upload.deliveryTimeoutMs,
        onDeliveryFailed: (failure) => {
          void this.diagnostics.warn(failure.message, {
            code: failure.code,
            details: { event, observerId: failure.observerId }
          });
        }
      });
      this.registries.set(event, registry);
    }
    return registry;
  }

  private parseArgs<S extends z.ZodTypeAny>(schema: S, args: readonly unknown[]): z.infer<S> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      throw new InvalidRequestError(parsed.error.issues.map((i) => `args.${i.path.join(".")}: ${i.message}`));
    }
    return parsed.data;
  }

  private assertOpen(): void {
    if (this.shutdown.signal.aborted) throw new CancelledError("Hub disposed");
  }
}
