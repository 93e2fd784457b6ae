export const DEFAULT_IGNORE_DIRS = new Set([
  ".git",
  "node_modules",
  "dist",
  "build",
  "coverage",
  ".data",
]);

export const TEXT_EXTENSIONS = new Set([".txt"]);

// pdftotext and most extractors separate pages with a form feed
export const PAGE_SEPARATOR = "\f";
