export * from "./context.js";
export * from "./relevanceGate.js";
export * from "./formatter.js";
export * from "./retry.js";
export * from "./assistant.js";
