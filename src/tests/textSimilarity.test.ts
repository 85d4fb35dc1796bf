/**
 * Tests for line similarity
 */
import {
  isSalientLine,
  levenshteinDistance,
  lineSimilarity,
  normalizeLine,
  sectionSimilarity,
} from '../utils/textSimilarity';

describe('textSimilarity', () => {
  test('levenshteinDistance counts single-character edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('same', 'same')).toBe(0);
  });

  test('normalizeLine ignores case and spacing', () => {
    expect(normalizeLine('  Minutes   OF the\tMeeting ')).toBe('minutes of the meeting');
  });

  test('lineSimilarity is a normalized edit ratio', () => {
    expect(lineSimilarity('GENERAL BY-LAW', 'general  by-law')).toBe(1);
    expect(lineSimilarity('abcd', 'abce')).toBe(0.75);
    expect(lineSimilarity('abc', '')).toBe(0);
    expect(lineSimilarity('', '')).toBe(1);
  });

  test('sectionSimilarity averages best matches in both directions', () => {
    expect(sectionSimilarity(['abcd', 'xyz'], ['abce'])).toBeCloseTo(0.5625);
    expect(sectionSimilarity(['abce'], ['abcd', 'xyz'])).toBeCloseTo(0.5625);
  });

  test('sectionSimilarity of an empty side is 0', () => {
    expect(sectionSimilarity([], ['abc'])).toBe(0);
    expect(sectionSimilarity(['abc'], [])).toBe(0);
  });

  test('isSalientLine needs a letter or a digit', () => {
    expect(isSalientLine('---')).toBe(false);
    expect(isSalientLine('   ')).toBe(false);
    expect(isSalientLine('Page 2')).toBe(true);
    expect(isSalientLine('é')).toBe(true);
  });
});
