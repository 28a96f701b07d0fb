import { isChannelReader } from "./channel.js";
import { consumeChannel, consumeSequence, type ConsumeResult } from "./consumer.js";
import { silentDiagnostics, errorInfo, type DiagnosticsContext } from "./diagnostics.js";
import { ObserverRegistry, type Observer, type SubscribeOptions, type Unsubscribe } from "./observers.js";
import type { Streaming } from "../types/streaming.js";

export type UploadSource<T> = Streaming.Upload.Source<T>;

export interface UploadSinkOptions<T> {
  name?: string;
  /**
   * Share a registry between sinks (e.g. one per hub event). Its own
   * timeout and failure handling apply; do not combine with `deliveryTimeoutMs`.
   */
  observers?: ObserverRegistry<T>;
  deliveryTimeoutMs?: number;
  diagnostics?: DiagnosticsContext;
}

export interface UploadResult extends ConsumeResult {
  /** Delivery attempts that failed, summed over every item. */
  deliveryFailures: number;
}

/**
 * Drains client-driven sequences and fans every item out to the observers
 * registered at the moment it arrives. No replay for late observers; a
 * failing observer is logged and skipped.
 */
export class UploadSink<T> {
  public readonly name: string;
  private readonly observers: ObserverRegistry<T>;
  private readonly diagnostics: DiagnosticsContext;

  public constructor(options?: UploadSinkOptions<T>) {
    if (options?.observers && options.deliveryTimeoutMs !== undefined) {
      throw new Error("UploadSink: set deliveryTimeoutMs on the shared observer registry, not on the sink");
    }
    this.name = options?.name ?? "upload";
    this.diagnostics = (options?.diagnostics ?? silentDiagnostics).with({ source: `streaming.upload.${this.name}` });
    this.observers =
      options?.observers ??
      new ObserverRegistry<T>({
        deliveryTimeoutMs: options?.deliveryTimeoutMs,
        onDeliveryFailed: (failure) => {
          void this.diagnostics.warn(failure.message, {
            code: failure.code,
            details: { observerId: failure.observerId },
            error: errorInfo(failure.cause)
          });
        }
      });
  }

  public get observerCount(): number {
    return this.observers.size;
  }

  public subscribe(observer: Observer<T>, options?: SubscribeOptions): Unsubscribe {
    return this.observers.subscribe(observer, options);
  }

  /**
   * Consumes `source` to exhaustion. The sequence may be unbounded; it ends
   * when the remote producer stops or `signal` fires.
   */
  public async accept(source: UploadSource<T>, options?: { signal?: AbortSignal }): Promise<UploadResult> {
    let deliveryFailures = 0;
    const onItem = async (item: T): Promise<void> => {
      const report = await this.observers.broadcast(item);
      deliveryFailures += report.failures.length;
    };

    const result = isChannelReader(source)
      ? await consumeChannel(source, onItem, options)
      : await consumeSequence(source, onItem, options);

    if (result.status === "faulted") {
      void this.diagnostics.error("Upload faulted", { error: errorInfo(result.error) });
    } else {
      void this.diagnostics.debug(`Upload ${result.status}`, { details: { received: result.received } });
    }
    return { ...result, deliveryFailures };
  }
}
