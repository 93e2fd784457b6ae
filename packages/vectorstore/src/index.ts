export * from "./store.js";
export * from "./sqliteStore.js";
export * from "./similarity.js";
