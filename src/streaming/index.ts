export * from "./abort.js";
export * from "./channel.js";
export * from "./config.js";
export * from "./consumer.js";
export * from "./diagnostics.js";
export * from "./errors.js";
export * from "./hub.js";
export * from "./observers.js";
export * from "./producer.js";
export * from "./request.js";
export * from "./session.js";
export * from "./upload-sink.js";
