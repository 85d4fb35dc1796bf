#!/usr/bin/env node
/**
 * index.ts
 *
 * Main entry point for the minute book splitter.
 * Usage: minute-book-splitter <corpus.json> [output.json]
 */

import path from 'path';
import { config, Config, validateConfig } from './config';
import { logger, setLogLevel } from './utils/logger';
import emojiLogger from './utils/emojiLogger';
import { ClassificationOracle, OracleClient } from './core/OracleClient';
import SegmentationPipeline, { PipelineResult } from './pipeline/SegmentationPipeline';
import { readCorpusFile, writeSegmentationResult } from './utils/fileUtils';
import { QueryBudget } from './utils/QueryBudget';

export interface ProcessOptions {
  config?: Config;
  oracle?: ClassificationOracle;   // defaults to the HTTP client built from config
  budget?: QueryBudget;
}

/**
 * Segment one corpus file and write `{ "sections": [...] }` to `outputPath`.
 * Nothing is written when the run fails.
 */
async function processCorpus(
  corpusPath: string,
  outputPath?: string,
  options: ProcessOptions = {}
): Promise<{ outputPath: string; result: PipelineResult }> {
  const appConfig = validateConfig(options.config ?? config);

  const target = outputPath ??
    path.join(appConfig.paths.outputDir, `${path.parse(corpusPath).name}_sections.json`);

  const { corpus, images } = await readCorpusFile(corpusPath);
  const budget = options.budget ?? new QueryBudget(appConfig.processing.maxQueries);
  const oracle = options.oracle ?? OracleClient.fromConfig(appConfig, budget);
  const pipeline = new SegmentationPipeline(oracle, { config: appConfig, budget, images });

  const result = await pipeline.run(corpus);
  await writeSegmentationResult(target, result.sections);

  logger.info(
    `Done: ${result.stats.oracleCalls} oracle calls in ${result.stats.elapsedMs}ms, resolver ${result.resolverState}`
  );
  return { outputPath: target, result };
}

// Export the public API
export { processCorpus, SegmentationPipeline, OracleClient, QueryBudget };
export { PageCorpus } from './core/PageCorpus';
export type { PageImageSource } from './core/PageCorpus';
export type { ClassificationOracle } from './core/OracleClient';
export { LabelStore } from './core/LabelStore';
export { planBatches, planTargetedBatches, planSinglePageBatch } from './core/BatchPlanner';
export { smoothLabels } from './core/SmoothingFilter';
export { aggregateSections, assertValidSegmentation, toOutputSections } from './core/SectionAggregator';
export { DiscontinuityResolver, ResolverState, detectSuspects } from './core/DiscontinuityResolver';
export { reconcileIsolatedSections, matchSectionTitles, absorbUnknownPages } from './core/IsolatedSectionReconciler';
export { parseBatchReply, parseVisionReply } from './core/replyParser';
export { SectionCategory, UNKNOWN_CATEGORY, canonicalizeCategory } from './models/categories';
export * from './models/PageClassification';
export { loadConfig, validateConfig } from './config';
export type { Config } from './config';
export type { PipelineResult } from './pipeline/SegmentationPipeline';

/**
 * Main function to run the splitter from the command line
 */
async function main(): Promise<void> {
  const [corpusPath, outputPath] = process.argv.slice(2);

  if (!corpusPath) {
    logger.error('Usage: minute-book-splitter <corpus.json> [output.json]');
    process.exit(1);
  }

  setLogLevel(config.logging.level);
  emojiLogger.pipeline(`Segmenting ${corpusPath}`);

  try {
    const { outputPath: written } = await processCorpus(corpusPath, outputPath);
    emojiLogger.success(`Sections written to ${written}`);
  } catch (error) {
    emojiLogger.error('Segmentation failed; no output written', error);
    process.exit(1);
  }
}

// Run the main function if this file is executed directly
if (require.main === module) {
  main().catch(error => {
    logger.error('Unhandled error in main:', error);
    process.exit(1);
  });
}
