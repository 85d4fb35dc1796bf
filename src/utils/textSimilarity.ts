/**
 * Line-level fuzzy similarity used to decide whether a small section reads
 * like one of its neighbours
 */

/**
 * True for lines carrying at least one letter or digit
 */
export function isSalientLine(line: string): boolean {
  return /[\p{L}\p{N}]/u.test(line);
}

/**
 * Lowercase and collapse whitespace so OCR spacing noise does not count as an edit
 */
export function normalizeLine(line: string): string {
  return line.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Edit distance between two strings (insert, delete, substitute)
 */
export function levenshteinDistance(str1: string, str2: string): number {
  const matrix: number[][] = [];

  for (let i = 0; i <= str2.length; i++) {
    matrix[i] = [i];
  }

  for (let j = 0; j <= str1.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= str2.length; i++) {
    for (let j = 1; j <= str1.length; j++) {
      if (str2.charAt(i - 1) === str1.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1,     // insertion
          matrix[i - 1][j] + 1      // deletion
        );
      }
    }
  }

  return matrix[str2.length][str1.length];
}

/**
 * Normalized Levenshtein ratio in [0, 1]; 1 means identical after normalization
 */
export function lineSimilarity(a: string, b: string): number {
  const left = normalizeLine(a);
  const right = normalizeLine(b);
  const longest = Math.max(left.length, right.length);

  if (longest === 0) {
    return 1;
  }

  return 1 - levenshteinDistance(left, right) / longest;
}

function bestMatchMean(from: readonly string[], to: readonly string[]): number {
  let total = 0;
  for (const line of from) {
    let best = 0;
    for (const candidate of to) {
      best = Math.max(best, lineSimilarity(line, candidate));
      if (best === 1) {
        break;
      }
    }
    total += best;
  }
  return total / from.length;
}

/**
 * Symmetric similarity of two sets of representative lines.
 * Each line is scored against its best match on the other side and both
 * directions are averaged. Empty input on either side scores 0.
 */
export function sectionSimilarity(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  return (bestMatchMean(a, b) + bestMatchMean(b, a)) / 2;
}
