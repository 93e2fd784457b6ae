export interface SentenceSplitter {
  split(text: string): string[];
}

// Lower-cased, without the trailing period
export const DEFAULT_ABBREVIATIONS: ReadonlySet<string> = new Set([
  "dr",
  "mr",
  "mrs",
  "ms",
  "prof",
  "st",
  "jr",
  "sr",
  "e.g",
  "i.e",
  "cf",
  "vs",
  "al",
  "ca",
  "approx",
  "fig",
  "figs",
  "tab",
  "eq",
  "ch",
  "vol",
  "pp",
  "resp",
]);

const CLOSERS = /["'”’»)\]]+$/;
const OPENERS = /^["'“‘«(\[]+/;
const SENTENCE_START = /[\p{Lu}\p{N}"'“‘«(\[]/u;

/**
 * Punctuation based splitter. Breaks after `.`, `!` or `?` (plus closing quotes or
 * brackets) when the next token starts like a sentence, skipping known
 * abbreviations and single-letter initials.
 *
 * Sentences are returned trimmed; joining them with one space gives back the input
 * when the input has single spaces between words.
 */
export class PunctuationSentenceSplitter implements SentenceSplitter {
  constructor(private readonly abbreviations: ReadonlySet<string> = DEFAULT_ABBREVIATIONS) {}

  split(text: string): string[] {
    const trimmed = text.trim();
    if (!trimmed) return [];

    const out: string[] = [];
    const ws = /\s+/g;
    let sentenceStart = 0;
    let tokenStart = 0;

    let m: RegExpExecArray | null;
    while ((m = ws.exec(trimmed)) !== null) {
      const token = trimmed.slice(tokenStart, m.index);
      const after = m.index + m[0].length;
      const next = trimmed.charAt(after);

      if (this.endsSentence(token) && SENTENCE_START.test(next)) {
        out.push(trimmed.slice(sentenceStart, m.index));
        sentenceStart = after;
      }
      tokenStart = after;
    }

    out.push(trimmed.slice(sentenceStart));
    return out;
  }

  private endsSentence(token: string): boolean {
    const core = token.replace(CLOSERS, "");
    if (core.endsWith("!") || core.endsWith("?")) return true;
    if (!core.endsWith(".")) return false;

    const word = core.replace(OPENERS, "").replace(/\.+$/, "");
    if (!word) return false;
    if (this.abbreviations.has(word.toLowerCase())) return false;

    // initials like "J. Smith"
    if (/^\p{Lu}$/u.test(word)) return false;

    return true;
  }
}

export const defaultSentenceSplitter: SentenceSplitter = new PunctuationSentenceSplitter();
