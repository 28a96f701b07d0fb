import { ObserverRegistry, type Observer, type SubscribeOptions, type Unsubscribe } from "./observers.js";

export type DiagnosticsLevel = "error" | "warn" | "info" | "log" | "debug";
export type DiagnosticsCode = string;
export type DiagnosticsSource = string;

const LEVEL_RANK: Record<DiagnosticsLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  log: 3,
  debug: 4
};

export interface DiagnosticsErrorInfo {
  name?: string;
  message?: string;
  stack?: string;
  code?: string | number;
}

export interface DiagnosticsEvent {
  level: DiagnosticsLevel;
  message: string;
  code?: DiagnosticsCode;
  source?: DiagnosticsSource;
  tsMs: number;
  correlationId?: string;
  details?: Record<string, unknown>;
  error?: DiagnosticsErrorInfo;
  tags?: string[];
}

export type DiagnosticsDefaults = {
  source?: DiagnosticsSource;
  correlationId?: string;
  tags?: string[];
};

export type DiagnosticsInit = Partial<Omit<DiagnosticsEvent, "level" | "message">>;

export interface DiagnosticsSink {
  readonly history?: ReadonlyArray<DiagnosticsEvent>;
  emit(event: DiagnosticsEvent): Promise<void>;
  subscribe(observer: Observer<DiagnosticsEvent>, options?: SubscribeOptions): Unsubscribe;
}

export interface DiagnosticsCreateSinkOptions {
  mode?: "dev" | "prod";
  history?: {
    enabled?: boolean;
    maxEvents?: number;
  };
  console?: {
    enabled?: boolean;
    /** Most verbose level mirrored to the console. */
    level?: DiagnosticsLevel;
  };
  defaults?: DiagnosticsDefaults;
}

export interface DiagnosticsContext {
  emit(event: Omit<DiagnosticsEvent, "tsMs"> & Partial<Pick<DiagnosticsEvent, "tsMs">>): Promise<void>;
  error(message: string, init?: DiagnosticsInit): Promise<void>;
  warn(message: string, init?: DiagnosticsInit): Promise<void>;
  info(message: string, init?: DiagnosticsInit): Promise<void>;
  log(message: string, init?: DiagnosticsInit): Promise<void>;
  debug(message: string, init?: DiagnosticsInit): Promise<void>;
  with(defaults: DiagnosticsDefaults): DiagnosticsContext;
}

export function errorInfo(err: unknown): DiagnosticsErrorInfo {
  if (err instanceof Error) {
    const code = "code" in err && (typeof err.code === "string" || typeof err.code === "number") ? err.code : undefined;
    return { name: err.name, message: err.message, stack: err.stack, code };
  }
  return { message: String(err) };
}

function writeConsole(event: DiagnosticsEvent): void {
  const prefix = event.source ? `[${event.source}] ` : "";
  const line = `${prefix}${event.message}`;
  const extra = event.details ?? event.error;
  const args = extra === undefined ? [line] : [line, extra];
  /* eslint-disable no-console */
  switch (event.level) {
    case "error":
      console.error(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    case "info":
      console.info(...args);
      break;
    case "debug":
      console.debug(...args);
      break;
    default:
      console.log(...args);
  }
  /* eslint-enable no-console */
}

export class InMemoryDiagnosticsSink implements DiagnosticsSink {
  private readonly observers: ObserverRegistry<DiagnosticsEvent>;
  private readonly events?: DiagnosticsEvent[];
  private readonly maxEvents: number;
  private readonly consoleLevel?: DiagnosticsLevel;
  private readonly defaults?: DiagnosticsDefaults;

  public constructor(options?: DiagnosticsCreateSinkOptions) {
    this.observers = new ObserverRegistry<DiagnosticsEvent>({
      onDeliveryFailed: (failure) => {
        // Never route these back through the sink.
        // eslint-disable-next-line no-console
        console.error("Diagnostics subscriber threw", failure.cause);
      }
    });
    this.events = options?.history?.enabled ? [] : undefined;
    this.maxEvents = options?.history?.maxEvents ?? (options?.mode === "prod" ? 100_000 : 10_000);
    this.consoleLevel = options?.console?.enabled === false ? undefined : options?.console?.level ?? "warn";
    this.defaults = options?.defaults;
  }

  public get history(): ReadonlyArray<DiagnosticsEvent> | undefined {
    return this.events;
  }

  public subscribe(observer: Observer<DiagnosticsEvent>, options?: SubscribeOptions): Unsubscribe {
    return this.observers.subscribe(observer, options);
  }

  public async emit(event: DiagnosticsEvent): Promise<void> {
    const merged: DiagnosticsEvent = { ...this.defaults, ...event };

    if (this.events) {
      this.events.push(merged);
      if (this.events.length > this.maxEvents) this.events.splice(0, this.events.length - this.maxEvents);
    }
    if (this.consoleLevel && LEVEL_RANK[merged.level] <= LEVEL_RANK[this.consoleLevel]) {
      writeConsole(merged);
    }
    await this.observers.broadcast(merged);
  }
}

export class DefaultDiagnosticsContext implements DiagnosticsContext {
  public constructor(
    private readonly sink: DiagnosticsSink,
    private readonly defaults?: DiagnosticsDefaults
  ) {}

  public async emit(
    event: Omit<DiagnosticsEvent, "tsMs"> & Partial<Pick<DiagnosticsEvent, "tsMs">>
  ): Promise<void> {
    await this.sink.emit({
      ...this.defaults,
      ...event,
      tsMs: event.tsMs ?? Date.now()
    });
  }

  public async error(message: string, init?: DiagnosticsInit): Promise<void> {
    return this.emit({ ...init, level: "error", message });
  }
  public async warn(message: string, init?: DiagnosticsInit): Promise<void> {
    return this.emit({ ...init, level: "warn", message });
  }
  public async info(message: string, init?: DiagnosticsInit): Promise<void> {
    return this.emit({ ...init, level: "info", message });
  }
  public async log(message: string, init?: DiagnosticsInit): Promise<void> {
    return this.emit({ ...init, level: "log", message });
  }
  public async debug(message: string, init?: DiagnosticsInit): Promise<void> {
    return this.emit({ ...init, level: "debug", message });
  }

  public with(defaults: DiagnosticsDefaults): DiagnosticsContext {
    return new DefaultDiagnosticsContext(this.sink, { ...this.defaults, ...defaults });
  }
}

/** Context that drops everything. Default for components built without diagnostics. */
export const silentDiagnostics: DiagnosticsContext = new DefaultDiagnosticsContext({
  emit: async () => {},
  subscribe: () => () => {}
});

export function createDiagnostics(options?: DiagnosticsCreateSinkOptions): {
  sink: InMemoryDiagnosticsSink;
  context: DiagnosticsContext;
} {
  const sink = new InMemoryDiagnosticsSink(options);
  return { sink, context: new DefaultDiagnosticsContext(sink, options?.defaults) };
}
