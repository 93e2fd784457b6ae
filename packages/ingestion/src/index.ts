export * from "./sentenceSplitter.js";
export * from "./normalizer.js";
export * from "./textChunker.js";
export * from "./pageLoader.js";
export * from "./stats.js";
export * from "./buildIndex.js";
