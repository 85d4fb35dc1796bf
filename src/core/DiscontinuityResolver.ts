/**
 * DiscontinuityResolver.ts
 * Re-asks the oracle about sections that look wrong (islands, low confidence,
 * unknown pages) until none is left, the pass limit is hit or the query budget runs out.
 */
import { isKnownCategory, SectionCategory } from '../models/categories';
import { Batch, BatchContext, LabelSource, PageLabel, Section } from '../models/PageClassification';
import { collectBatchLabels } from './batchExecution';
import { planSinglePageBatch, planTargetedBatches } from './BatchPlanner';
import { LabelStore } from './LabelStore';
import { ClassificationOracle } from './OracleClient';
import { PageCorpus, PageImageSource } from './PageCorpus';
import { aggregateSections } from './SectionAggregator';
import { smoothLabels, SmoothingOptions } from './SmoothingFilter';
import emojiLogger from '../utils/emojiLogger';
import { logger } from '../utils/logger';
import { needsVisionFallback } from '../utils/ocrQuality';
import { QueryBudget } from '../utils/QueryBudget';

export enum ResolverState {
  STABLE = 'STABLE',
  SUSPECT = 'SUSPECT',
  RESOLVING = 'RESOLVING',
  EXHAUSTED = 'EXHAUSTED',
}

export type SuspectReason = 'island' | 'low-confidence' | 'unknown';

export interface SuspectSection {
  section: Section;
  index: number;                   // position in the section list it was found in
  reasons: SuspectReason[];
}

export interface DetectionOptions {
  smallSectionPages: number;
  lowConfidence: number;
}

export interface ResolverOptions extends DetectionOptions {
  maxIterations: number;
  finalThreshold: number;
  contextPages: number;
  batchSize: number;
  maxParallelRequests: number;
  smoothing: SmoothingOptions;
  vision: {
    enabled: boolean;
    ocrQualityThreshold: number;
    lowConfidence: number;
    maxPages: number;
  };
}

export interface ResolverPass {
  iteration: number;
  suspects: SuspectSection[];
  batches: Batch[];
  pagesChanged: number[];
}

export interface ResolverOutcome {
  state: ResolverState;
  iterations: number;
  sections: Section[];
  passes: ResolverPass[];
  settled: SuspectSection[];       // suspects skipped because every page was already final
}

/**
 * Sections worth another look, in page order
 */
export function detectSuspects(sections: readonly Section[], options: DetectionOptions): SuspectSection[] {
  const suspects: SuspectSection[] = [];

  sections.forEach((section, index) => {
    const reasons: SuspectReason[] = [];

    if (!isKnownCategory(section.name)) {
      reasons.push('unknown');
    }

    const previous = sections[index - 1];
    const next = sections[index + 1];
    if (
      section.numPages < options.smallSectionPages &&
      previous !== undefined &&
      next !== undefined &&
      previous.name === next.name &&
      previous.name !== section.name &&
      previous.numPages > section.numPages &&
      next.numPages > section.numPages
    ) {
      reasons.push('island');
    }

    if (section.averageConfidence < options.lowConfidence) {
      reasons.push('low-confidence');
    }

    if (reasons.length > 0) {
      suspects.push({ section, index, reasons });
    }
  });

  return suspects;
}

function sectionKey(section: Section): string {
  return `${section.name}:${section.startPage}-${section.endPage}`;
}

export interface ResolverDependencies {
  images?: PageImageSource;
  budget?: QueryBudget;
}

export class DiscontinuityResolver {
  private oracle: ClassificationOracle;
  private corpus: PageCorpus;
  private options: ResolverOptions;
  private images?: PageImageSource;
  private budget?: QueryBudget;
  private state: ResolverState = ResolverState.STABLE;
  private visionPagesUsed = 0;

  constructor(
    oracle: ClassificationOracle,
    corpus: PageCorpus,
    options: ResolverOptions,
    dependencies: ResolverDependencies = {}
  ) {
    this.oracle = oracle;
    this.corpus = corpus;
    this.options = options;
    this.images = dependencies.images;
    this.budget = dependencies.budget;
  }

  get currentState(): ResolverState {
    return this.state;
  }

  private transition(next: ResolverState, detail: string): void {
    if (next !== this.state) {
      emojiLogger.resolver(`${this.state} -> ${next}: ${detail}`);
    }
    this.state = next;
  }

  private wantsVision(pageIndex: number, label: PageLabel): boolean {
    const { vision } = this.options;
    if (!vision.enabled || !this.images || this.visionPagesUsed >= vision.maxPages) {
      return false;
    }
    if (!this.images.hasImage(pageIndex)) {
      return false;
    }
    return label.textIncoherent === true ||
      label.confidence < vision.lowConfidence ||
      needsVisionFallback(this.corpus.text(pageIndex), vision.ocrQualityThreshold).needed;
  }

  /**
   * Batches for one pass: VISION for unreadable pages, ASK for the rest of each suspect
   */
  private planPass(
    suspects: readonly SuspectSection[],
    sections: readonly Section[],
    store: LabelStore,
    finals: ReadonlySet<number>
  ): { batches: Batch[]; contexts: Map<number, BatchContext> } {
    const batches: Batch[] = [];
    const contexts = new Map<number, BatchContext>();
    const pageCount = this.corpus.size;

    for (const suspect of suspects) {
      const { section, index, reasons } = suspect;
      const skip = new Set(finals);

      for (let i = section.startPage; i <= section.endPage; i++) {
        if (!finals.has(i) && this.wantsVision(i, store.get(i))) {
          skip.add(i);
          this.visionPagesUsed++;
          batches.push(planSinglePageBatch(i, pageCount, this.options.contextPages, LabelSource.VISION, batches.length, reasons));
        }
      }

      const askBatches = planTargetedBatches(section, pageCount, {
        batchSize: this.options.batchSize,
        margin: this.options.contextPages,
        skip,
        firstId: batches.length,
        reasons,
      });
      batches.push(...askBatches);

      for (const batch of askBatches) {
        const finalLabels = new Map<number, SectionCategory>();
        for (let i = batch.contextRange.start; i <= batch.contextRange.end; i++) {
          const label = store.get(i);
          if (finals.has(i) && isKnownCategory(label.category)) {
            finalLabels.set(i, label.category);
          }
        }
        contexts.set(batch.id, {
          finalLabels,
          sectionBefore: sections[index - 1]?.name,
          sectionAfter: sections[index + 1]?.name,
        });
      }
    }

    return { batches, contexts };
  }

  private async classify(batch: Batch, context: BatchContext | undefined): Promise<PageLabel[]> {
    if (batch.source === LabelSource.VISION && this.images) {
      const pageIndex = batch.pageRange.start;
      const image = await this.images.renderPage(pageIndex);
      return [await this.oracle.classifyPageImage(pageIndex, image)];
    }
    return this.oracle.classifyBatch(batch, this.corpus, context);
  }

  /**
   * Iterate until no actionable suspect remains or the limits are reached.
   * The store holds the latest labels throughout; the returned sections are
   * the last ones computed, whatever the final state.
   */
  async resolve(store: LabelStore): Promise<ResolverOutcome> {
    const passes: ResolverPass[] = [];
    const settled = new Map<string, SuspectSection>();
    let iterations = 0;

    for (;;) {
      const sections = aggregateSections(store.current());
      const finals = store.finalPages(this.options.finalThreshold);

      const actionable: SuspectSection[] = [];
      for (const suspect of detectSuspects(sections, this.options)) {
        const { startPage, endPage } = suspect.section;
        let allFinal = true;
        for (let i = startPage; i <= endPage && allFinal; i++) {
          allFinal = finals.has(i);
        }
        if (allFinal) {
          settled.set(sectionKey(suspect.section), suspect);
        } else {
          actionable.push(suspect);
        }
      }

      if (actionable.length === 0) {
        this.transition(ResolverState.STABLE, `no open suspects after ${iterations} passes`);
        return { state: this.state, iterations, sections, passes, settled: [...settled.values()] };
      }

      if (iterations >= this.options.maxIterations || this.budget?.exhausted()) {
        const why = iterations >= this.options.maxIterations ? 'pass limit reached' : 'query budget spent';
        this.transition(ResolverState.EXHAUSTED, `${why} with ${actionable.length} open suspects`);
        return { state: this.state, iterations, sections, passes, settled: [...settled.values()] };
      }

      this.transition(ResolverState.SUSPECT, `${actionable.length} suspect sections`);
      const { batches, contexts } = this.planPass(actionable, sections, store, finals);

      for (const batch of batches) {
        logger.debug(
          `Pass ${iterations + 1} batch ${batch.id}: context [${batch.contextRange.start}-${batch.contextRange.end}] ` +
          `target [${batch.pageRange.start}-${batch.pageRange.end}] engine ${batch.source}`,
          batch.reasons
        );
      }

      this.transition(ResolverState.RESOLVING, `${batches.length} batches`);
      const labels = await collectBatchLabels(
        batches,
        this.options.maxParallelRequests,
        batch => this.classify(batch, contexts.get(batch.id))
      );

      const changed = new Set(store.merge(labels));
      for (const page of store.replaceAll(smoothLabels(store.current(), this.options.smoothing))) {
        changed.add(page);
      }

      iterations++;
      const pagesChanged = [...changed].sort((a, b) => a - b);
      passes.push({ iteration: iterations, suspects: actionable, batches, pagesChanged });
      emojiLogger.progress(iterations, this.options.maxIterations, `Resolver pass changed ${pagesChanged.length} pages`);
    }
  }
}

export default DiscontinuityResolver;
