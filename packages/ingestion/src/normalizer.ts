const INVISIBLE = /[\u00AD\u200B-\u200D\u2060\uFEFF]/g;
const CONTROL = /[\u0000-\u0009\u000B-\u001F\u007F-\u009F]/g;
const LINE_BREAK_HYPHEN = /(\p{L})-\n[ \t]*(\p{Ll})/gu;
const PAGE_NUMBER_LINE = /^[-–—\s]*(?:page\s+)?\d{1,4}[-–—\s]*$/i;

const BOILERPLATE_MIN_PAGES = 3;
const BOILERPLATE_MIN_RATIO = 0.3;
// non-blank lines checked at the top and bottom of each page
const EDGE_LINES = 2;

function cleanPage(page: string): string[] {
  // NFKC after stripping, so marks split off by a zero-width char compose on the first pass
  const text = page
    .replace(/\r\n?/g, "\n")
    .replace(INVISIBLE, "")
    .replace(CONTROL, " ")
    .normalize("NFKC")
    .replace(LINE_BREAK_HYPHEN, "$1$2");

  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !PAGE_NUMBER_LINE.test(line));
}

function boilerplateKey(line: string): string {
  return line.toLowerCase().replace(/\d+/g, "#").replace(/\s+/g, " ");
}

function edgeIndexes(lineCount: number): number[] {
  const idx = new Set<number>();
  for (let i = 0; i < Math.min(EDGE_LINES, lineCount); i++) {
    idx.add(i);
    idx.add(lineCount - 1 - i);
  }
  return [...idx];
}

/**
 * Keys of header/footer lines repeated across enough pages to be running heads.
 */
function findBoilerplate(pages: string[][]): Set<string> {
  const found = new Set<string>();
  if (pages.length < BOILERPLATE_MIN_PAGES) return found;

  const pageCounts = new Map<string, number>();
  for (const lines of pages) {
    const keys = new Set(edgeIndexes(lines.length).map((i) => boilerplateKey(lines[i] ?? "")));
    for (const key of keys) pageCounts.set(key, (pageCounts.get(key) ?? 0) + 1);
  }

  const minPages = Math.max(BOILERPLATE_MIN_PAGES, Math.ceil(pages.length * BOILERPLATE_MIN_RATIO));
  for (const [key, count] of pageCounts) {
    if (count >= minPages) found.add(key);
  }
  return found;
}

/**
 * Turns extracted page texts into one clean string: control characters stripped,
 * hyphenated line breaks re-joined, page numbers and running heads removed,
 * whitespace collapsed. Idempotent.
 */
export function normalizeText(pages: readonly string[]): string {
  const cleaned = pages.map(cleanPage);
  const boilerplate = findBoilerplate(cleaned);

  const kept: string[] = [];
  for (const lines of cleaned) {
    const edges = new Set(edgeIndexes(lines.length));
    lines.forEach((line, i) => {
      if (edges.has(i) && boilerplate.has(boilerplateKey(line))) return;
      kept.push(line);
    });
  }

  return kept.join(" ").normalize("NFKC").replace(/\s+/g, " ").trim();
}
