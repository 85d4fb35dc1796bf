/**
 * LabelStore.ts
 * Holds the one current label of every page. Each write replaces the whole
 * snapshot, so readers holding an older snapshot never see a partial merge.
 */
import { PageLabel, unknownLabel } from '../models/PageClassification';
import { isKnownCategory } from '../models/categories';
import { ValidationError } from '../utils/errors';

export class LabelStore {
  private snapshot: ReadonlyMap<number, PageLabel>;
  private currentVersion = 0;
  readonly pageCount: number;

  constructor(pageCount: number) {
    if (!Number.isInteger(pageCount) || pageCount < 0) {
      throw new ValidationError(`Page count must be a non-negative integer, got ${pageCount}`);
    }
    this.pageCount = pageCount;
    const initial = new Map<number, PageLabel>();
    for (let i = 0; i < pageCount; i++) {
      initial.set(i, Object.freeze(unknownLabel(i)));
    }
    this.snapshot = initial;
  }

  get version(): number {
    return this.currentVersion;
  }

  private checkLabel(label: PageLabel): void {
    if (!Number.isInteger(label.pageIndex) || label.pageIndex < 0 || label.pageIndex >= this.pageCount) {
      throw new ValidationError(`Label for page ${label.pageIndex} is outside the document`, label);
    }
    if (label.confidence < 0 || label.confidence > 100) {
      throw new ValidationError(`Confidence ${label.confidence} for page ${label.pageIndex} is outside [0, 100]`, label);
    }
  }

  /**
   * Apply labels in order; a later label for the same page supersedes an earlier one.
   * Returns the indices whose category changed.
   */
  merge(labels: readonly PageLabel[]): number[] {
    labels.forEach(label => this.checkLabel(label));

    const next = new Map(this.snapshot);
    const changed = new Set<number>();
    for (const label of labels) {
      const previous = next.get(label.pageIndex);
      if (previous?.category !== label.category) {
        changed.add(label.pageIndex);
      }
      next.set(label.pageIndex, Object.freeze({ ...label }));
    }

    this.snapshot = next;
    this.currentVersion++;
    return [...changed].sort((a, b) => a - b);
  }

  /**
   * Replace every page's label at once, e.g. with a smoothed sequence
   */
  replaceAll(labels: readonly PageLabel[]): number[] {
    if (labels.length !== this.pageCount) {
      throw new ValidationError(`Expected ${this.pageCount} labels, got ${labels.length}`);
    }
    const seen = new Set(labels.map(label => label.pageIndex));
    if (seen.size !== this.pageCount) {
      throw new ValidationError('Replacement labels must cover every page exactly once');
    }
    return this.merge(labels);
  }

  get(pageIndex: number): PageLabel {
    const label = this.snapshot.get(pageIndex);
    if (!label) {
      throw new ValidationError(`Page ${pageIndex} is outside the document`);
    }
    return label;
  }

  /**
   * Labels in page order
   */
  current(): PageLabel[] {
    const labels: PageLabel[] = [];
    for (let i = 0; i < this.pageCount; i++) {
      labels.push(this.get(i));
    }
    return labels;
  }

  isFinal(pageIndex: number, threshold: number): boolean {
    const label = this.get(pageIndex);
    return isKnownCategory(label.category) && label.confidence >= threshold;
  }

  finalPages(threshold: number): Set<number> {
    const pages = new Set<number>();
    for (let i = 0; i < this.pageCount; i++) {
      if (this.isFinal(i, threshold)) {
        pages.add(i);
      }
    }
    return pages;
  }
}

export default LabelStore;
