/**
 * Tests for reading oracle replies
 */
import { planBatches } from '../core/BatchPlanner';
import { parseBatchReply, parseVisionReply, readLinePredictions } from '../core/replyParser';
import { SectionCategory, UNKNOWN_CATEGORY } from '../models/categories';
import { LabelSource } from '../models/PageClassification';

// primary pages 3-5, context pages 2 and 6
const batch = planBatches({ start: 3, end: 5 }, 10, { batchSize: 3, overlap: 1 })[0];

function jsonReply(entries: object[]): string {
  return JSON.stringify({ pagePredictions: entries });
}

describe('parseBatchReply', () => {
  test('reads a JSON reply for every primary page', () => {
    const raw = jsonReply([
      { pageIndex: 3, label: 'By Laws', confidencePercent: 92 },
      { pageIndex: 4, label: 'By Laws', confidencePercent: 88 },
      { pageIndex: 5, label: 'Minutes & Resolutions', confidencePercent: 75 },
    ]);

    expect(parseBatchReply(raw, batch)).toEqual([
      { pageIndex: 3, category: SectionCategory.BY_LAWS, confidence: 92, source: LabelSource.ASK },
      { pageIndex: 4, category: SectionCategory.BY_LAWS, confidence: 88, source: LabelSource.ASK },
      { pageIndex: 5, category: SectionCategory.MINUTES_RESOLUTIONS, confidence: 75, source: LabelSource.ASK },
    ]);
  });

  test('a page missing from the reply becomes UNKNOWN with confidence 0', () => {
    const raw = jsonReply([
      { pageIndex: 3, label: 'By Laws', confidencePercent: 92 },
      { pageIndex: 5, label: 'By Laws', confidencePercent: 90 },
    ]);

    const labels = parseBatchReply(raw, batch);

    expect(labels).toHaveLength(3);
    expect(labels[1]).toEqual({ pageIndex: 4, category: UNKNOWN_CATEGORY, confidence: 0, source: LabelSource.ASK });
  });

  test('context pages in the reply are discarded', () => {
    const raw = jsonReply([
      { pageIndex: 2, label: 'Share Certificates', confidencePercent: 99 },
      { pageIndex: 3, label: 'By Laws', confidencePercent: 92 },
      { pageIndex: 4, label: 'By Laws', confidencePercent: 92 },
      { pageIndex: 5, label: 'By Laws', confidencePercent: 92 },
      { pageIndex: 6, label: 'Share Certificates', confidencePercent: 99 },
    ]);

    expect(parseBatchReply(raw, batch).map(l => l.pageIndex)).toEqual([3, 4, 5]);
  });

  test('a duplicated page keeps its last entry', () => {
    const raw = jsonReply([
      { pageIndex: 3, label: 'By Laws', confidencePercent: 92 },
      { pageIndex: 3, label: 'Directors Register', confidencePercent: 61 },
    ]);

    expect(parseBatchReply(raw, batch)[0]).toMatchObject({
      category: SectionCategory.DIRECTORS_REGISTER,
      confidence: 61,
    });
  });

  test('confidences are clamped to [0, 100]', () => {
    const raw = jsonReply([
      { pageIndex: 3, label: 'By Laws', confidencePercent: 140 },
      { pageIndex: 4, label: 'By Laws', confidencePercent: -5 },
    ]);

    const labels = parseBatchReply(raw, batch);
    expect(labels[0].confidence).toBe(100);
    expect(labels[1].confidence).toBe(0);
  });

  test('reads comma separated lines when there is no JSON', () => {
    const raw = [
      'Here are my answers:',
      '3, 2, 88',
      '4, Minutes & Resolutions, 70',
      'noise',
      '5, by-laws, 91%',
    ].join('\n');

    expect(parseBatchReply(raw, batch).map(l => [l.category, l.confidence])).toEqual([
      [SectionCategory.BY_LAWS, 88],
      [SectionCategory.MINUTES_RESOLUTIONS, 70],
      [SectionCategory.BY_LAWS, 91],
    ]);
  });

  test('an unreadable reply degrades to UNKNOWN without throwing', () => {
    const labels = parseBatchReply('I am not sure what these pages are {', batch);
    expect(labels.map(l => l.category)).toEqual([UNKNOWN_CATEGORY, UNKNOWN_CATEGORY, UNKNOWN_CATEGORY]);
  });

  test('entries that fail validation or carry an unknown label are dropped', () => {
    const raw = jsonReply([
      { pageIndex: 'three', label: 'By Laws', confidencePercent: 92 },
      { pageIndex: 4, label: 'Annual Report', confidencePercent: 92 },
      { pageIndex: 5, label: '', confidencePercent: 92 },
    ]);

    expect(parseBatchReply(raw, batch).map(l => l.category))
      .toEqual([UNKNOWN_CATEGORY, UNKNOWN_CATEGORY, UNKNOWN_CATEGORY]);
  });

  test('reads JSON wrapped in a code fence', () => {
    const raw = '```json\n' + jsonReply([
      { pageIndex: 3, label: 'Officers Register', confidencePercent: 80 },
    ]) + '\n```';

    expect(parseBatchReply(raw, batch)[0].category).toBe(SectionCategory.OFFICERS_REGISTER);
  });

  test('keeps the incoherent-text flag', () => {
    const raw = jsonReply([
      { pageIndex: 3, label: 'By Laws', confidencePercent: 30, isTextIncoherent: true },
      { pageIndex: 4, label: 'By Laws', confidencePercent: 90 },
    ]);

    const labels = parseBatchReply(raw, batch);
    expect(labels[0].textIncoherent).toBe(true);
    expect(labels[1].textIncoherent).toBeUndefined();
  });
});

describe('readLinePredictions', () => {
  test('accepts other separators and a page prefix', () => {
    expect(readLinePredictions('- page 12 | Directors Register | 70\n(13; 5; 64.5)')).toEqual([
      { pageIndex: 12, category: SectionCategory.DIRECTORS_REGISTER, confidence: 70 },
      { pageIndex: 13, category: SectionCategory.DIRECTORS_REGISTER, confidence: 64.5 },
    ]);
  });
});

describe('parseVisionReply', () => {
  test('reads a JSON reply', () => {
    expect(parseVisionReply('{"label": "Share Certificates", "confidencePercent": 77}', 8)).toEqual({
      pageIndex: 8,
      category: SectionCategory.SHARE_CERTIFICATES,
      confidence: 77,
      source: LabelSource.VISION,
    });
  });

  test('reads a category, confidence line', () => {
    const label = parseVisionReply('Share Certificates, 64', 2);
    expect(label.category).toBe(SectionCategory.SHARE_CERTIFICATES);
    expect(label.confidence).toBe(64);
  });

  test('an unreadable reply gives UNKNOWN', () => {
    expect(parseVisionReply('no idea', 2)).toEqual({
      pageIndex: 2,
      category: UNKNOWN_CATEGORY,
      confidence: 0,
      source: LabelSource.VISION,
    });
  });
});
