import fs from "node:fs/promises";
import process from "node:process";
import YAML from "yaml";
import { z } from "zod";
import { DEFAULT_BOUNDED_CAPACITY } from "./channel.js";
import { getConfigPathFromEnv, readEnv, readEnvBoolean } from "./env.js";

const levelSchema = z.enum(["error", "warn", "info", "log", "debug"]);

export const streamingConfigSchema = z.object({
  mode: z.enum(["dev", "prod"]),
  channel: z.object({
    capacity: z.number().int().positive()
  }),
  upload: z.object({
    channel: z.enum(["bounded", "unbounded"]),
    deliveryTimeoutMs: z.number().int().positive().optional()
  }),
  diagnostics: z.object({
    level: levelSchema,
    console: z.boolean(),
    history: z.boolean()
  })
});

export type StreamingConfig = z.infer<typeof streamingConfigSchema>;

/** Deep-partial overlay, as read from a file or the environment. */
export type StreamingConfigOverlay = {
  mode?: StreamingConfig["mode"];
  channel?: Partial<StreamingConfig["channel"]>;
  upload?: Partial<StreamingConfig["upload"]>;
  diagnostics?: Partial<StreamingConfig["diagnostics"]>;
};

export function defaultStreamingConfig(mode: StreamingConfig["mode"] = "dev"): StreamingConfig {
  return {
    mode,
    channel: { capacity: DEFAULT_BOUNDED_CAPACITY },
    upload: { channel: "unbounded" },
    diagnostics: {
      level: mode === "dev" ? "warn" : "error",
      console: true,
      history: false
    }
  };
}

function deepFreeze<T>(obj: T): Readonly<T> {
  if (!obj || typeof obj !== "object") return obj;
  Object.freeze(obj);
  for (const v of Object.values(obj)) {
    if (v && typeof v === "object" && !Object.isFrozen(v)) deepFreeze(v);
  }
  return obj;
}

export function mergeStreamingConfig(base: StreamingConfig, ...overlays: StreamingConfigOverlay[]): StreamingConfig {
  let merged = base;
  for (const o of overlays) {
    merged = {
      mode: o.mode ?? merged.mode,
      channel: { ...merged.channel, ...o.channel },
      upload: { ...merged.upload, ...o.upload },
      diagnostics: { ...merged.diagnostics, ...o.diagnostics }
    };
  }
  return merged;
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): StreamingConfigOverlay {
  const mode = readEnv("STREAM_MODE", env);
  const uploadChannel = readEnv("STREAM_UPLOAD_CHANNEL", env);
  const level = levelSchema.safeParse(readEnv("STREAM_LOG_LEVEL", env));

  const overlay: StreamingConfigOverlay = {
    channel: {},
    upload: {},
    diagnostics: {}
  };
  if (mode === "dev" || mode === "prod") overlay.mode = mode;
  const capacity = parseNumber(readEnv("STREAM_CHANNEL_CAPACITY", env));
  if (capacity !== undefined) overlay.channel = { capacity };
  if (uploadChannel === "bounded" || uploadChannel === "unbounded") overlay.upload = { channel: uploadChannel };
  const timeout = parseNumber(readEnv("STREAM_DELIVERY_TIMEOUT_MS", env));
  if (timeout !== undefined) overlay.upload = { ...overlay.upload, deliveryTimeoutMs: timeout };
  if (level.success) overlay.diagnostics = { level: level.data };
  const consoleEnabled = readEnvBoolean("STREAM_LOG_CONSOLE", env);
  if (consoleEnabled !== undefined) overlay.diagnostics = { ...overlay.diagnostics, console: consoleEnabled };
  return overlay;
}

const overlaySchema = z
  .object({
    mode: streamingConfigSchema.shape.mode.optional(),
    channel: streamingConfigSchema.shape.channel.partial().optional(),
    upload: streamingConfigSchema.shape.upload.partial().optional(),
    diagnostics: streamingConfigSchema.shape.diagnostics.partial().optional()
  })
  .strict();

export function parseConfigYaml(text: string, origin = "config"): StreamingConfigOverlay {
  const raw: unknown = YAML.parse(text) ?? {};
  const parsed = overlaySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid streaming config in ${origin}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function validateStreamingConfig(config: StreamingConfig): Readonly<StreamingConfig> {
  const parsed = streamingConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid streaming config: ${issues.join("; ")}`);
  }
  return deepFreeze(parsed.data);
}

/**
 * Resolves the process-level config: defaults, then the YAML file named by
 * `file` or STREAM_CONFIG (if any), then STREAM_* environment variables.
 */
export async function loadStreamingConfig(options?: {
  file?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<Readonly<StreamingConfig>> {
  const env = options?.env ?? process.env;
  const envOverlay = configFromEnv(env);

  const file = options?.file ?? getConfigPathFromEnv(env);
  const fileOverlay = file ? parseConfigYaml(await fs.readFile(file, "utf8"), file) : {};
  const base = defaultStreamingConfig(envOverlay.mode ?? fileOverlay.mode ?? "dev");

  return validateStreamingConfig(mergeStreamingConfig(base, fileOverlay, envOverlay));
}
