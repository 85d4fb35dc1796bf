/**
 * Splits page ranges into oracle batches: disjoint primary chunks, each
 * padded with a few context-only pages on either side.
 */
import { Batch, LabelSource, PageRange, Section } from '../models/PageClassification';
import { ValidationError } from '../utils/errors';

export interface BatchPlanOptions {
  batchSize: number;
  overlap: number;
  skip?: ReadonlySet<number>;   // pages that must not be primary (already final)
  source?: LabelSource;
  firstId?: number;
  reasons?: readonly string[];
}

export interface TargetedBatchOptions {
  batchSize: number;
  margin: number;
  skip?: ReadonlySet<number>;
  firstId?: number;
  reasons?: readonly string[];
}

function checkRange(range: PageRange, pageCount: number): void {
  if (!Number.isInteger(range.start) || !Number.isInteger(range.end)) {
    throw new ValidationError(`Range bounds must be integers, got [${range.start}, ${range.end}]`);
  }
  if (range.start > range.end) {
    throw new ValidationError(`Range start ${range.start} is after its end ${range.end}`);
  }
  if (range.start < 0 || range.end >= pageCount) {
    throw new ValidationError(`Range [${range.start}, ${range.end}] is outside the document (0-${pageCount - 1})`);
  }
}

function makeBatch(
  id: number,
  primary: PageRange,
  pageCount: number,
  overlap: number,
  source: LabelSource,
  reasons: readonly string[]
): Batch {
  const contextRange = {
    start: Math.max(0, primary.start - overlap),
    end: Math.min(pageCount - 1, primary.end + overlap),
  };
  const overlapPages = new Set<number>();
  for (let i = contextRange.start; i <= contextRange.end; i++) {
    if (i < primary.start || i > primary.end) {
      overlapPages.add(i);
    }
  }
  return { id, pageRange: primary, contextRange, overlapPages, source, reasons };
}

/**
 * Contiguous runs of the range that are not skipped
 */
function openSubRanges(range: PageRange, skip: ReadonlySet<number>): PageRange[] {
  const subRanges: PageRange[] = [];
  let start: number | undefined;

  for (let i = range.start; i <= range.end; i++) {
    if (skip.has(i)) {
      if (start !== undefined) {
        subRanges.push({ start, end: i - 1 });
        start = undefined;
      }
    } else if (start === undefined) {
      start = i;
    }
  }
  if (start !== undefined) {
    subRanges.push({ start, end: range.end });
  }

  return subRanges;
}

/**
 * Plan batches covering every non-skipped page of `range` exactly once as a primary page.
 * Overlap shrinks at the document edges.
 */
export function planBatches(range: PageRange, pageCount: number, options: BatchPlanOptions): Batch[] {
  const {
    batchSize,
    overlap,
    skip = new Set<number>(),
    source = LabelSource.ASK,
    firstId = 0,
    reasons = [],
  } = options;

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ValidationError(`Batch size must be a positive integer, got ${batchSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError(`Overlap must be a non-negative integer, got ${overlap}`);
  }
  checkRange(range, pageCount);

  const batches: Batch[] = [];
  for (const subRange of openSubRanges(range, skip)) {
    for (let start = subRange.start; start <= subRange.end; start += batchSize) {
      const primary = { start, end: Math.min(subRange.end, start + batchSize - 1) };
      batches.push(makeBatch(firstId + batches.length, primary, pageCount, overlap, source, reasons));
    }
  }

  return batches;
}

/**
 * Batches re-asking the oracle about one suspect section, with `margin`
 * pages of the flanking sections as context
 */
export function planTargetedBatches(section: Section, pageCount: number, options: TargetedBatchOptions): Batch[] {
  return planBatches(
    { start: section.startPage, end: section.endPage },
    pageCount,
    {
      batchSize: options.batchSize,
      overlap: options.margin,
      skip: options.skip,
      firstId: options.firstId,
      reasons: options.reasons,
    }
  );
}

export function planSinglePageBatch(
  pageIndex: number,
  pageCount: number,
  margin: number,
  source: LabelSource,
  id = 0,
  reasons: readonly string[] = []
): Batch {
  checkRange({ start: pageIndex, end: pageIndex }, pageCount);
  if (!Number.isInteger(margin) || margin < 0) {
    throw new ValidationError(`Margin must be a non-negative integer, got ${margin}`);
  }
  return makeBatch(id, { start: pageIndex, end: pageIndex }, pageCount, margin, source, reasons);
}
