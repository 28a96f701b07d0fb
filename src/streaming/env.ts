import process from "node:process";

export function readEnv(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

export function readEnvAny(names: string[], env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const name of names) {
    const v = readEnv(name, env);
    if (v) return v;
  }
  return undefined;
}

export function readEnvBoolean(name: string, env: NodeJS.ProcessEnv = process.env): boolean | undefined {
  const v = readEnv(name, env)?.toLowerCase();
  if (v === undefined) return undefined;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return undefined;
}

export function getConfigPathFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return readEnvAny(["STREAM_CONFIG", "STREAMING_CONFIG"], env);
}
