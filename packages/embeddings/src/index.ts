export * from "./embedder.js";
export { ollamaEmbedMany, ollamaEmbedOne } from "./ollama.js";
export type { OllamaRequestOptions } from "./ollama.js";
