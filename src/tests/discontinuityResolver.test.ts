/**
 * Tests for suspect detection and the resolver loop
 */
import { DiscontinuityResolver, detectSuspects, ResolverOptions, ResolverState } from '../core/DiscontinuityResolver';
import { LabelStore } from '../core/LabelStore';
import { PageCorpus, PageImageSource } from '../core/PageCorpus';
import { aggregateSections } from '../core/SectionAggregator';
import { CategoryId, SectionCategory, UNKNOWN_CATEGORY } from '../models/categories';
import { OracleAuthError } from '../utils/errors';
import { labelsFrom, repeat } from './helpers/fixtures';
import { ScriptedOracle } from './helpers/scriptedOracle';

const A = SectionCategory.MINUTES_RESOLUTIONS;
const B = SectionCategory.DIRECTORS_REGISTER;
const C = SectionCategory.SHARE_CERTIFICATES;

const options: ResolverOptions = {
  smallSectionPages: 3,
  lowConfidence: 60,
  maxIterations: 3,
  finalThreshold: 85,
  contextPages: 3,
  batchSize: 55,
  maxParallelRequests: 4,
  smoothing: { windowSize: 3, minRunLength: 2, highConfidence: 90 },
  vision: { enabled: true, ocrQualityThreshold: 35, lowConfidence: 0, maxPages: 40 },
};

function corpusOfTexts(pageCount: number): string[] {
  return Array.from({ length: pageCount }, (_, n) => `Resolution ${n} of the board of directors was adopted unanimously`);
}

function corpusOf(pageCount: number): PageCorpus {
  return PageCorpus.fromTexts(corpusOfTexts(pageCount));
}

function storeWith(entries: ReadonlyArray<[CategoryId, number]>): LabelStore {
  const store = new LabelStore(entries.length);
  store.merge(labelsFrom(entries));
  return store;
}

describe('detectSuspects', () => {
  test('flags a short section between two larger sections of the same category', () => {
    const sections = aggregateSections(labelsFrom([...repeat(A, 95, 4), ...repeat(B, 40, 2), ...repeat(A, 95, 4)]));

    expect(detectSuspects(sections, options)).toEqual([
      { section: sections[1], index: 1, reasons: ['island', 'low-confidence'] },
    ]);
  });

  test('flags UNKNOWN sections', () => {
    const sections = aggregateSections(labelsFrom([...repeat(A, 95, 4), [UNKNOWN_CATEGORY, 0], ...repeat(C, 95, 4)]));

    expect(detectSuspects(sections, options).map(s => s.reasons)).toEqual([['unknown', 'low-confidence']]);
  });

  test('a short section at the document edge is not an island', () => {
    const sections = aggregateSections(labelsFrom([[B, 95], ...repeat(A, 95, 4)]));
    expect(detectSuspects(sections, options)).toEqual([]);
  });
});

describe('DiscontinuityResolver', () => {
  // pages 0-9 and 12-21 confidently A, pages 10-11 a doubtful B
  const islandLayout: Array<[CategoryId, number]> = [...repeat(A, 95, 10), ...repeat(B, 40, 2), ...repeat(A, 95, 10)];

  test('re-asks an island with its neighbours as context and settles', async () => {
    const store = storeWith(islandLayout);
    const oracle = new ScriptedOracle(() => ({ category: A, confidence: 92 }));

    const outcome = await new DiscontinuityResolver(oracle, corpusOf(22), options).resolve(store);

    expect(oracle.batches).toHaveLength(1);
    expect(oracle.batches[0].pageRange).toEqual({ start: 10, end: 11 });
    expect(oracle.batches[0].contextRange).toEqual({ start: 7, end: 14 });
    expect(oracle.batches[0].reasons).toEqual(['island', 'low-confidence']);

    const context = oracle.contexts[0];
    expect([...(context?.finalLabels?.keys() ?? [])]).toEqual([7, 8, 9, 12, 13, 14]);
    expect(context?.sectionBefore).toBe(A);
    expect(context?.sectionAfter).toBe(A);

    expect(outcome.state).toBe(ResolverState.STABLE);
    expect(outcome.iterations).toBe(1);
    expect(outcome.passes[0].pagesChanged).toEqual([10, 11]);
    expect(outcome.sections.map(s => [s.name, s.startPage, s.endPage])).toEqual([[A, 0, 21]]);
  });

  test('stops after maxIterations when the oracle keeps its answer', async () => {
    const store = storeWith(islandLayout);
    const oracle = new ScriptedOracle(() => ({ category: B, confidence: 40 }));
    const resolver = new DiscontinuityResolver(oracle, corpusOf(22), options);

    const outcome = await resolver.resolve(store);

    expect(outcome.state).toBe(ResolverState.EXHAUSTED);
    expect(resolver.currentState).toBe(ResolverState.EXHAUSTED);
    expect(outcome.iterations).toBe(3);
    expect(oracle.batches).toHaveLength(3);
    expect(outcome.passes.map(p => p.pagesChanged)).toEqual([[], [], []]);
  });

  test('does not re-ask a suspect whose pages are all final', async () => {
    const store = storeWith([...repeat(A, 95, 5), [B, 95], ...repeat(A, 95, 5)]);
    const oracle = new ScriptedOracle(() => ({ category: A, confidence: 99 }));

    const outcome = await new DiscontinuityResolver(oracle, corpusOf(11), options).resolve(store);

    expect(outcome.state).toBe(ResolverState.STABLE);
    expect(outcome.iterations).toBe(0);
    expect(outcome.settled.map(s => s.section.startPage)).toEqual([5]);
    expect(oracle.batches).toEqual([]);
  });

  test('a page left out of a reply is asked about again on the next pass', async () => {
    const store = storeWith([...repeat(A, 95, 3), ...repeat(B, 50, 3), ...repeat(C, 95, 3)]);
    const oracle = new ScriptedOracle((pageIndex, timesAsked) =>
      pageIndex === 4 && timesAsked === 0 ? undefined : { category: B, confidence: 90 }
    );

    const outcome = await new DiscontinuityResolver(oracle, corpusOf(9), options).resolve(store);

    expect(oracle.batches.map(b => b.pageRange)).toEqual([{ start: 3, end: 5 }, { start: 4, end: 4 }]);
    expect(outcome.state).toBe(ResolverState.STABLE);
    expect(outcome.iterations).toBe(2);
    expect(store.get(4)).toMatchObject({ category: B, confidence: 90 });
  });

  test('final pages inside a suspect are never primary pages again', async () => {
    const store = storeWith([...repeat(A, 95, 10), [B, 40], [B, 95], [B, 40], ...repeat(A, 95, 10)]);
    const oracle = new ScriptedOracle(() => ({ category: B, confidence: 90 }));

    const outcome = await new DiscontinuityResolver(oracle, corpusOf(23), options).resolve(store);

    expect(oracle.batches.map(b => b.pageRange)).toEqual([{ start: 10, end: 10 }, { start: 12, end: 12 }]);
    expect(oracle.contexts[0]?.finalLabels?.get(11)).toBe(B);
    expect(store.get(11).confidence).toBe(95);
    expect(outcome.state).toBe(ResolverState.STABLE);
    expect(outcome.iterations).toBe(1);
  });

  test('unreadable pages with an image are sent to the vision endpoint', async () => {
    const texts = corpusOfTexts(22);
    texts[10] = '□□□ ■■■';
    const images: PageImageSource = {
      hasImage: () => true,
      renderPage: async () => 'aW1n',
    };
    const store = storeWith(islandLayout);
    const oracle = new ScriptedOracle(() => ({ category: A, confidence: 92 }));

    const outcome = await new DiscontinuityResolver(oracle, PageCorpus.fromTexts(texts), options, { images })
      .resolve(store);

    expect(oracle.imageCalls).toEqual([10]);
    expect(oracle.batches.map(b => b.pageRange)).toEqual([{ start: 11, end: 11 }]);
    expect(outcome.state).toBe(ResolverState.STABLE);
  });

  test('a page the oracle flagged as incoherent text goes to the vision endpoint', async () => {
    const store = storeWith(islandLayout);
    store.merge([{ ...store.get(11), textIncoherent: true }]);
    const images: PageImageSource = { hasImage: page => page === 11, renderPage: async () => 'aW1n' };
    const oracle = new ScriptedOracle(() => ({ category: A, confidence: 92 }));

    await new DiscontinuityResolver(oracle, corpusOf(22), options, { images }).resolve(store);

    expect(oracle.imageCalls).toEqual([11]);
    expect(oracle.batches.map(b => b.pageRange)).toEqual([{ start: 10, end: 10 }]);
  });

  test('a page below the vision confidence threshold is read from its image', async () => {
    const images: PageImageSource = { hasImage: page => page === 10, renderPage: async () => 'aW1n' };
    const lowConfidenceVision = { ...options, vision: { ...options.vision, lowConfidence: 50 } };
    const oracle = new ScriptedOracle(() => ({ category: A, confidence: 92 }));

    await new DiscontinuityResolver(oracle, corpusOf(22), lowConfidenceVision, { images }).resolve(storeWith(islandLayout));

    expect(oracle.imageCalls).toEqual([10]);
    expect(oracle.batches.map(b => b.pageRange)).toEqual([{ start: 11, end: 11 }]);

    const confidentEnough = { ...options, vision: { ...options.vision, lowConfidence: 40 } };
    const textOnly = new ScriptedOracle(() => ({ category: A, confidence: 92 }));
    await new DiscontinuityResolver(textOnly, corpusOf(22), confidentEnough, { images }).resolve(storeWith(islandLayout));

    expect(textOnly.imageCalls).toEqual([]);
    expect(textOnly.batches.map(b => b.pageRange)).toEqual([{ start: 10, end: 11 }]);
  });

  test('vision is not used when disabled', async () => {
    const texts = corpusOfTexts(22);
    texts[10] = '□□□ ■■■';
    const images: PageImageSource = { hasImage: () => true, renderPage: async () => 'aW1n' };
    const oracle = new ScriptedOracle(() => ({ category: A, confidence: 92 }));
    const noVision = { ...options, vision: { ...options.vision, enabled: false } };

    await new DiscontinuityResolver(oracle, PageCorpus.fromTexts(texts), noVision, { images })
      .resolve(storeWith(islandLayout));

    expect(oracle.imageCalls).toEqual([]);
    expect(oracle.batches.map(b => b.pageRange)).toEqual([{ start: 10, end: 11 }]);
  });

  test('an auth failure aborts the resolver', async () => {
    const oracle = new ScriptedOracle(() => ({ category: A, confidence: 92 }), {
      fail: () => new OracleAuthError('/ask', 401),
    });

    await expect(new DiscontinuityResolver(oracle, corpusOf(22), options).resolve(storeWith(islandLayout)))
      .rejects.toBeInstanceOf(OracleAuthError);
  });
});
