/**
 * Fan batches out to the oracle with bounded concurrency and gather their labels
 */
import { Batch, PageLabel, unknownLabel } from '../models/PageClassification';
import BatchProcessor from '../utils/batchProcessor';
import emojiLogger from '../utils/emojiLogger';
import { OracleAuthError } from '../utils/errors';

/**
 * Labels of every batch, sorted by page. Merging waits for the slowest batch,
 * so completion order never matters. A batch that fails outright contributes
 * UNKNOWN labels for its primary pages; OracleAuthError stops the run.
 */
export async function collectBatchLabels(
  batches: readonly Batch[],
  concurrency: number,
  classify: (batch: Batch) => Promise<PageLabel[]>,
  onProgress?: (completed: number, total: number) => void
): Promise<PageLabel[]> {
  const processor = new BatchProcessor<Batch, PageLabel[]>(concurrency, {
    isFatal: error => error instanceof OracleAuthError,
  });
  const results = await processor.processItems(batches, batch => classify(batch), onProgress);

  const stats = processor.getStats(results);
  if (stats.failedItems > 0) {
    emojiLogger.warn(`${stats.failedItems} of ${stats.totalItems} batches failed; their pages stay UNKNOWN`);
  }

  const labels: PageLabel[] = [];
  results.forEach((result, position) => {
    const batch = batches[position];
    if (result.success && result.result) {
      labels.push(...result.result);
      return;
    }
    for (let i = batch.pageRange.start; i <= batch.pageRange.end; i++) {
      labels.push(unknownLabel(i, batch.source));
    }
  });

  // stable: a page labeled twice keeps the later batch's label last
  return labels.sort((a, b) => a.pageIndex - b.pageIndex);
}
