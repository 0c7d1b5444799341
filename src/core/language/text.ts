/**
 * Text Utilities
 *
 * Tokenization and pattern compilation shared by the analyzers.
 * JavaScript's \b and \w only understand ASCII, so pattern sources are
 * rewritten to Unicode-aware equivalents before compiling (Hungarian
 * words such as "állítsd" must still sit on a word boundary).
 */

const WORD_CHAR = '[\\p{L}\\p{N}_]';
const WORD_BOUNDARY = `(?:(?<!${WORD_CHAR})(?=${WORD_CHAR})|(?<=${WORD_CHAR})(?!${WORD_CHAR}))`;

/**
 * Compile a pattern source written with \b and \w into a Unicode-aware,
 * case-insensitive RegExp.
 */
export function compilePattern(source: string): RegExp {
  const translated = source.replace(/\\b/g, WORD_BOUNDARY).replace(/\\w/g, WORD_CHAR);
  return new RegExp(translated, 'iu');
}

/**
 * Lowercased letter/digit runs. Punctuation, underscores and dots split tokens,
 * so "sensor.nappali_homerseklet" yields ["sensor", "nappali", "homerseklet"].
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Number of whitespace-separated words.
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Jaccard similarity of two token sets (0 when both are empty).
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

/**
 * Whether any of the keywords occurs as a substring of the lowercased text.
 */
export function containsAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}
