/**
 * SegmentationPipeline.ts
 *
 * Orchestrates the segmentation of one minute book: initial classification,
 * smoothing, targeted re-classification, reconciliation and final checks.
 */
import { config as defaultConfig, Config, validateConfig } from '../config';
import { OutputSection, Section } from '../models/PageClassification';
import { collectBatchLabels } from '../core/batchExecution';
import { planBatches } from '../core/BatchPlanner';
import { DiscontinuityResolver, ResolverOptions, ResolverState } from '../core/DiscontinuityResolver';
import { absorbUnknownPages, matchSectionTitles, reconcileIsolatedSections } from '../core/IsolatedSectionReconciler';
import { LabelStore } from '../core/LabelStore';
import { ClassificationOracle, OracleClient } from '../core/OracleClient';
import { PageCorpus, PageImageSource } from '../core/PageCorpus';
import { aggregateSections, assertValidSegmentation, toOutputSections } from '../core/SectionAggregator';
import { smoothLabels, SmoothingOptions } from '../core/SmoothingFilter';
import emojiLogger from '../utils/emojiLogger';
import { logger } from '../utils/logger';
import { QueryBudget } from '../utils/QueryBudget';

/**
 * Pipeline processing result
 */
export interface PipelineResult {
  sections: OutputSection[];          // 1-based, ready to write
  detailedSections: Section[];        // 0-based, with confidences
  resolverState: ResolverState;
  iterations: number;
  reconciledSections: number;
  titleMatches: number;               // pages given a missing category from their heading
  stats: {
    oracleCalls: number;
    askCalls: number;
    visionCalls: number;
    failedCalls: number;
    elapsedMs: number;
  };
}

export interface PipelineOptions {
  config?: Config;
  budget?: QueryBudget;          // shared with the oracle client for call accounting
  images?: PageImageSource;
}

export class SegmentationPipeline {
  private oracle: ClassificationOracle;
  private config: Config;
  private budget: QueryBudget;
  private images?: PageImageSource;

  constructor(oracle: ClassificationOracle, options: PipelineOptions = {}) {
    this.oracle = oracle;
    this.config = validateConfig(options.config ?? defaultConfig);
    this.budget = options.budget ??
      (oracle instanceof OracleClient ? oracle.budget : new QueryBudget(this.config.processing.maxQueries));
    this.images = options.images;

    logger.debug('SegmentationPipeline initialized', {
      batchSize: this.config.processing.batchSize,
      maxIterations: this.config.resolver.maxIterations,
      vision: Boolean(this.images) && this.config.vision.enabled,
    });
  }

  private get smoothingOptions(): SmoothingOptions {
    return {
      windowSize: this.config.smoothing.windowSize,
      minRunLength: this.config.smoothing.minRunLength,
      highConfidence: this.config.smoothing.highConfidence,
    };
  }

  private get resolverOptions(): ResolverOptions {
    const { processing, resolver, vision } = this.config;
    return {
      smallSectionPages: resolver.smallSectionPages,
      lowConfidence: resolver.lowConfidence,
      maxIterations: resolver.maxIterations,
      finalThreshold: resolver.finalThreshold,
      contextPages: resolver.contextPages,
      batchSize: processing.batchSize,
      maxParallelRequests: processing.maxParallelRequests,
      smoothing: this.smoothingOptions,
      vision: {
        enabled: vision.enabled,
        ocrQualityThreshold: vision.ocrQualityThreshold,
        lowConfidence: vision.lowConfidence,
        maxPages: vision.maxPages,
      },
    };
  }

  /**
   * First pass over the whole document, then smoothing
   */
  private async classifyAll(corpus: PageCorpus, store: LabelStore): Promise<void> {
    const { batchSize, contextPages, maxParallelRequests } = this.config.processing;
    const batches = planBatches({ start: 0, end: corpus.size - 1 }, corpus.size, {
      batchSize,
      overlap: contextPages,
    });
    emojiLogger.classify(`${corpus.size} pages in ${batches.length} batches`);

    const labels = await collectBatchLabels(
      batches,
      maxParallelRequests,
      batch => this.oracle.classifyBatch(batch, corpus),
      (completed, total) => emojiLogger.progress(completed, total, 'batches classified')
    );

    store.merge(labels);
    store.replaceAll(smoothLabels(store.current(), this.smoothingOptions));
  }

  private buildResult(
    detailedSections: Section[],
    resolverState: ResolverState,
    iterations: number,
    reconciledSections: number,
    titleMatches: number
  ): PipelineResult {
    const stats = this.budget.getStats();
    return {
      sections: toOutputSections(detailedSections),
      detailedSections,
      resolverState,
      iterations,
      reconciledSections,
      titleMatches,
      stats: {
        oracleCalls: stats.totalCalls,
        askCalls: stats.askCalls,
        visionCalls: stats.visionCalls,
        failedCalls: stats.failedCalls,
        elapsedMs: stats.elapsedMs,
      },
    };
  }

  /**
   * Segment a document. Throws OracleAuthError (nothing is produced) or
   * InvariantViolationError; every other oracle failure only lowers quality.
   */
  async run(corpus: PageCorpus): Promise<PipelineResult> {
    const stopTimer = emojiLogger.timerStart('Segmentation');

    if (corpus.size === 0) {
      emojiLogger.warn('Document has no pages');
      stopTimer();
      return this.buildResult([], ResolverState.STABLE, 0, 0, 0);
    }

    const store = new LabelStore(corpus.size);

    emojiLogger.startPhase('Initial classification');
    await this.classifyAll(corpus, store);
    emojiLogger.endPhase('Initial classification');

    emojiLogger.startPhase('Discontinuity resolution');
    const resolver = new DiscontinuityResolver(this.oracle, corpus, this.resolverOptions, {
      images: this.images,
      budget: this.budget,
    });
    const outcome = await resolver.resolve(store);
    emojiLogger.endPhase('Discontinuity resolution');
    if (outcome.state === ResolverState.EXHAUSTED) {
      emojiLogger.warn(`Resolver stopped after ${outcome.iterations} passes with suspects left; emitting best effort`);
    }

    const { reconciler } = this.config;
    const reconciled = reconcileIsolatedSections(store.current(), corpus, {
      maxPages: reconciler.maxPages,
      threshold: reconciler.similarityThreshold,
      samplePages: reconciler.samplePages,
    });
    store.replaceAll(reconciled.labels);

    let titleMatches = 0;
    if (reconciler.titleMatch) {
      const titled = matchSectionTitles(store.current(), corpus, {
        minScore: reconciler.titleMinScore,
        relabelScore: reconciler.titleRelabelScore,
      });
      store.replaceAll(titled.labels);
      titleMatches = titled.matches.length;
    }
    store.replaceAll(absorbUnknownPages(store.current()));

    const sections = aggregateSections(store.current());
    assertValidSegmentation(sections, corpus.size);

    const result = this.buildResult(sections, outcome.state, outcome.iterations, reconciled.merges.length, titleMatches);
    this.budget.logSummary();
    stopTimer();
    emojiLogger.success(`Segmented ${corpus.size} pages into ${sections.length} sections`);
    return result;
  }
}

export default SegmentationPipeline;
