export * from "./config.js";
export * from "./conversation-log.js";
export * from "./history.js";
export * from "./item-schema.js";
export * from "./log.js";
export * from "./openai-backend.js";
export * from "./openai-runtime.js";
export * from "./reconciler.js";
export * from "./resource-hints.js";
export * from "./runtime.js";
export * from "./session.js";
export * from "./telemetry.js";
export * from "./turn-accumulator.js";
export * from "./uploads.js";
