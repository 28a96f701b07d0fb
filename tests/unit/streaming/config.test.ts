import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadStreamingConfig, parseConfigYaml } from "../../../src/streaming/index.js";

async function writeTempConfig(text: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "channel-streams-config-"));
  const file = path.join(dir, "streaming.yaml");
  await fs.writeFile(file, text, "utf8");
  return file;
}

describe("streaming/config", () => {
  it("falls back to frozen defaults", async () => {
    const config = await loadStreamingConfig({ env: {} });
    expect(config).toEqual({
      mode: "dev",
      channel: { capacity: 10 },
      upload: { channel: "unbounded" },
      diagnostics: { level: "warn", console: true, history: false }
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.channel)).toBe(true);
  });

  it("applies STREAM_* environment overrides", async () => {
    const config = await loadStreamingConfig({
      env: {
        STREAM_MODE: "prod",
        STREAM_CHANNEL_CAPACITY: "4",
        STREAM_UPLOAD_CHANNEL: "bounded",
        STREAM_DELIVERY_TIMEOUT_MS: "250",
        STREAM_LOG_LEVEL: "debug",
        STREAM_LOG_CONSOLE: "false"
      }
    });
    expect(config).toEqual({
      mode: "prod",
      channel: { capacity: 4 },
      upload: { channel: "bounded", deliveryTimeoutMs: 250 },
      diagnostics: { level: "debug", console: false, history: false }
    });
  });

  it("layers the environment over the YAML file", async () => {
    const file = await writeTempConfig("channel:\n  capacity: 3\ndiagnostics:\n  history: true\n");
    const config = await loadStreamingConfig({ file, env: { STREAM_CHANNEL_CAPACITY: "5" } });
    expect(config.channel.capacity).toBe(5);
    expect(config.diagnostics.history).toBe(true);
  });

  it("reads the file named by STREAM_CONFIG and takes its mode defaults", async () => {
    const file = await writeTempConfig("mode: prod\n");
    const config = await loadStreamingConfig({ env: { STREAM_CONFIG: file } });
    expect(config.mode).toBe("prod");
    expect(config.diagnostics.level).toBe("error");
  });

  it("rejects invalid values", async () => {
    await expect(loadStreamingConfig({ env: { STREAM_CHANNEL_CAPACITY: "0" } })).rejects.toThrow(/channel\.capacity/);
  });

  it("rejects unknown keys in the file", () => {
    expect(() => parseConfigYaml("bogus: 1\n", "test.yaml")).toThrow(/Invalid streaming config in test\.yaml: .*Unrecognized key/);
  });

  it("treats an empty file as no overrides", () => {
    expect(parseConfigYaml("")).toEqual({});
  });
});
