/**
 * Heuristic 0-100 score of how trustworthy a page's extracted text is.
 * Pages scoring under the threshold are candidates for an image query.
 */

// Replacement characters and glyph boxes left behind by broken extraction
const BAD_CHARS = new Set(['\uFFFD', '\u0000', '□', '■', '▯', '▢', '●', '○', '¤']);

const WORD_PATTERN = /\p{L}{2,}/gu;
const VOWEL_PATTERN = /[aeiouyàâäéèêëîïôöùûüÿœæ]/i;

function countMatching(text: string, predicate: (char: string) => boolean): number {
  let count = 0;
  for (const char of text) {
    if (predicate(char)) {
      count++;
    }
  }
  return count;
}

function isAlphanumeric(char: string): boolean {
  return /[\p{L}\p{N}]/u.test(char);
}

/**
 * Share of letters and digits once runs of whitespace are collapsed
 */
export function alphanumericRatio(text: string): number {
  if (!text) {
    return 0;
  }
  const clean = text.replace(/\s+/g, ' ');
  return countMatching(clean, isAlphanumeric) / Math.max(1, clean.length);
}

export function scoreTextQuality(text: string): number {
  if (!text || !text.trim()) {
    return 0;
  }

  const n = text.length;
  const printableRatio = countMatching(text, char => !/[\p{Cc}\p{Cs}]/u.test(char) || /\s/.test(char)) / n;
  const alphaRatio = countMatching(text, char => /\p{L}/u.test(char)) / n;
  const badRatio = countMatching(text, char => BAD_CHARS.has(char)) / n;

  const tokens = text.match(WORD_PATTERN) ?? [];
  const vowelRatio = tokens.length > 0
    ? tokens.filter(token => VOWEL_PATTERN.test(token)).length / tokens.length
    : 0;
  const avgTokenLength = tokens.length > 0
    ? tokens.reduce((sum, token) => sum + token.length, 0) / tokens.length
    : 0;
  const tokenScore = Math.min(1, avgTokenLength / 5) * 0.5 + vowelRatio * 0.5;

  const lengthScore = Math.min(1, n / 300);

  const raw =
    0.25 * lengthScore +
    0.20 * alphanumericRatio(text) +
    0.20 * alphaRatio +
    0.15 * tokenScore +
    0.20 * printableRatio -
    0.30 * badRatio;

  return Math.max(0, Math.min(1, raw)) * 100;
}

/**
 * Whether a page's text is too poor to classify from, with the score that decided it
 */
export function needsVisionFallback(text: string, threshold = 35): { needed: boolean; score: number } {
  // Long pages made mostly of symbols are extraction failures whatever else they score
  if ((text || '').trim().length >= 100 && alphanumericRatio(text) < 0.5) {
    return { needed: true, score: 0 };
  }
  const score = scoreTextQuality(text);
  return { needed: score < threshold, score };
}
