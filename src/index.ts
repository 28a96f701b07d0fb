export type { Streaming } from "./types/streaming.js";
export * from "./streaming/index.js";
