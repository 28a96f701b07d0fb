#!/usr/bin/env node
import process from "node:process";
import { pathToFileURL } from "node:url";
import { loadStreamingConfig } from "./streaming/config.js";
import { StreamConsumer, type ConsumeResult } from "./streaming/consumer.js";
import { createDiagnostics } from "./streaming/diagnostics.js";
import { describeError, InvalidRequestError } from "./streaming/errors.js";
import { HubEvents, StreamHub } from "./streaming/hub.js";
import { pacedSequence, startPacedProducer } from "./streaming/producer.js";
import { parseStreamParams, type StreamParams } from "./streaming/request.js";

type Mode = "channel" | "async";

type ParsedArgs = {
  command: "stream" | "upload" | "help" | "unknown";
  count?: string;
  delay?: string;
  cancelAfter?: string;
  config?: string;
  mode: string;
  json: boolean;
  help: boolean;
};

function printHelp(): void {
  const text = `
channel-streams stream --count <n> --delay <ms> [--cancel-after <k>] [--mode channel|async] [--json]
channel-streams upload --count <n> --delay <ms> [--mode channel|async] [--json]

Streams a paced counter from an in-process hub and prints every item as it
arrives (stream), or uploads a paced sequence to the hub and prints what
its observers receive (upload).

Global flags:
  --config <path>   YAML config file (defaults to $STREAM_CONFIG)
  --json            NDJSON output

Examples:
  channel-streams stream --count 10 --delay 500
  channel-streams stream --count 10 --delay 500 --cancel-after 4
  channel-streams upload --count 5 --delay 100 --mode async
`.trim();
  // eslint-disable-next-line no-console
  console.log(text);
}

function readFlag(argv: string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx < 0) return undefined;
  return argv[idx + 1];
}

function parseArgs(argv: string[]): ParsedArgs {
  const help = argv.includes("-h") || argv.includes("--help");
  const json = argv.includes("--json");
  const valueFlags = new Set(["--count", "--delay", "--cancel-after", "--mode", "--config"]);

  const positional = argv.filter((a, i) => !a.startsWith("-") && !valueFlags.has(argv[i - 1] ?? ""));
  const base = {
    count: readFlag(argv, "--count"),
    delay: readFlag(argv, "--delay"),
    cancelAfter: readFlag(argv, "--cancel-after"),
    config: readFlag(argv, "--config"),
    mode: readFlag(argv, "--mode") ?? "channel",
    json,
    help
  };

  const command = positional[0];
  if (command === undefined || command === "help") {
    return { ...base, command: "help", help: true };
  }
  if (command === "stream" || command === "upload") {
    return { ...base, command };
  }
  return { ...base, command: "unknown" };
}

function toNumber(raw: string | undefined, fallback: number): number {
  return raw === undefined ? fallback : Number(raw);
}

function print(json: boolean, text: string, record: Record<string, unknown>): void {
  // eslint-disable-next-line no-console
  console.log(json ? JSON.stringify(record) : text);
}

function printResult(json: boolean, result: ConsumeResult): void {
  const suffix = result.status === "faulted" ? `: ${describeError(result.error)}` : "";
  print(json, `${result.status} (${result.received} items)${suffix}`, {
    status: result.status,
    received: result.received,
    ...(result.status === "faulted" ? { error: describeError(result.error) } : {})
  });
}

async function runStream(
  hub: StreamHub,
  params: StreamParams,
  opts: { mode: Mode; json: boolean; cancelAfter?: number }
): Promise<ConsumeResult> {
  const consumer: StreamConsumer<number> = new StreamConsumer<number>((item, index) => {
    print(opts.json, `item ${item}`, { item });
    if (opts.cancelAfter !== undefined && index + 1 >= opts.cancelAfter) consumer.cancel();
  });
  if (opts.cancelAfter === 0) consumer.cancel();

  const source =
    opts.mode === "channel"
      ? hub.getChannelStream(params.count, params.delayMs, consumer.signal)
      : hub.getAsyncStream(params.count, params.delayMs, consumer.signal);
  return await consumer.consume(source);
}

async function* labelled(params: StreamParams): AsyncGenerator<string, void, undefined> {
  for await (const i of pacedSequence(params)) yield `item-${i}`;
}

async function runUpload(
  hub: StreamHub,
  params: StreamParams,
  opts: { mode: Mode; json: boolean }
): Promise<ConsumeResult> {
  const event = opts.mode === "channel" ? HubEvents.channelStreamData : HubEvents.asyncStreamData;
  hub.on(event, (item) => print(opts.json, `received ${item}`, { event, item }));

  if (opts.mode === "async") {
    return await hub.uploadAsyncStream(labelled(params));
  }
  const { writer, done } = hub.openUpload();
  startPacedProducer(writer, { ...params, map: (i) => `item-${i}` });
  return await done;
}

export async function main(argv = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const args = parseArgs(argv);

  if (args.command === "help" || args.help) {
    printHelp();
    return 0;
  }

  if (args.command === "unknown") {
    // eslint-disable-next-line no-console
    console.error(`Unknown command. See: channel-streams --help`);
    return 2;
  }

  if (args.mode !== "channel" && args.mode !== "async") {
    // eslint-disable-next-line no-console
    console.error(`Unknown --mode '${args.mode}' (expected channel or async)`);
    return 2;
  }
  const mode: Mode = args.mode;

  let params: StreamParams;
  let cancelAfter: number | undefined;
  try {
    params = parseStreamParams({ count: toNumber(args.count, 10), delayMs: toNumber(args.delay, 0) });
    if (args.cancelAfter !== undefined) {
      cancelAfter = parseStreamParams({ count: Number(args.cancelAfter), delayMs: 0 }).count;
    }
  } catch (err) {
    if (!(err instanceof InvalidRequestError)) throw err;
    // eslint-disable-next-line no-console
    console.error(err.message);
    return 2;
  }

  const config = await loadStreamingConfig({ file: args.config, env });
  const { context } = createDiagnostics({
    mode: config.mode,
    console: { enabled: config.diagnostics.console, level: config.diagnostics.level },
    history: { enabled: config.diagnostics.history },
    defaults: { source: "cli" }
  });
  const hub = new StreamHub({ config, diagnostics: context });

  try {
    const result =
      args.command === "stream"
        ? await runStream(hub, params, { mode, json: args.json, cancelAfter })
        : await runUpload(hub, params, { mode, json: args.json });
    printResult(args.json, result);
    return result.status === "faulted" ? 1 : 0;
  } finally {
    hub.dispose();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error(err instanceof Error ? err.stack ?? err.message : String(err));
      process.exit(1);
    });
}
