import { logger } from './logger';

/**
 * Result of a batch process, including success/failure status and timing information
 */
export interface BatchProcessResult<T> {
  success: boolean;
  result?: T;
  error?: Error;
  durationMs: number;
}

/**
 * Statistics for batch processing
 */
export interface BatchProcessStats {
  totalItems: number;
  successfulItems: number;
  failedItems: number;
  totalTimeMs: number;
  averageItemTimeMs: number;
}

export interface BatchProcessorOptions {
  /**
   * Errors for which the whole run must stop. They are rethrown from
   * processItems instead of being recorded as a failed item.
   */
  isFatal?: (error: unknown) => boolean;
}

/**
 * Utility class for fanning work out with a concurrency limit
 */
export class BatchProcessor<T, R> {
  private concurrency: number;
  private isFatal: (error: unknown) => boolean;

  /**
   * Create a new BatchProcessor
   * @param concurrency Maximum number of concurrent operations
   */
  constructor(concurrency: number, options: BatchProcessorOptions = {}) {
    this.concurrency = Math.max(1, Math.floor(concurrency));
    this.isFatal = options.isFatal ?? (() => false);
  }

  /**
   * Process items with concurrency control. Results keep the order of `items`
   * whatever order the work completes in.
   * @param items Array of items to process
   * @param processFn Function to process each item
   * @param onProgress Callback for progress updates
   */
  async processItems(
    items: readonly T[],
    processFn: (item: T, index: number) => Promise<R>,
    onProgress?: (completed: number, total: number) => void
  ): Promise<BatchProcessResult<R>[]> {
    const results: BatchProcessResult<R>[] = new Array(items.length);
    let completedCount = 0;
    let currentIndex = 0;
    let fatalError: unknown;

    const processItemAtIndex = async (index: number): Promise<void> => {
      const startTime = Date.now();

      try {
        const result = await processFn(items[index], index);
        results[index] = { success: true, result, durationMs: Date.now() - startTime };
        logger.debug(`Processed item ${index} successfully`, { durationMs: results[index].durationMs });
      } catch (error) {
        if (this.isFatal(error)) {
          fatalError = fatalError ?? error;
          throw error;
        }
        const err = error instanceof Error ? error : new Error(String(error));
        results[index] = { success: false, error: err, durationMs: Date.now() - startTime };
        logger.error(`Failed to process item ${index}`, { error: err.message });
      }

      completedCount++;
      onProgress?.(completedCount, items.length);
    };

    // Each worker pulls the next index until the queue is drained or a fatal error stops everyone
    const runNextItem = async (): Promise<void> => {
      while (fatalError === undefined) {
        const index = currentIndex++;
        if (index >= items.length) {
          return;
        }
        await processItemAtIndex(index);
      }
    };

    const workers = Array.from(
      { length: Math.min(this.concurrency, items.length) },
      () => runNextItem()
    );

    const settled = await Promise.allSettled(workers);
    if (fatalError !== undefined) {
      throw fatalError;
    }
    const rejected = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (rejected) {
      throw rejected.reason;
    }

    return results;
  }

  /**
   * Get batch processing statistics
   * @param results Array of batch results
   */
  getStats(results: BatchProcessResult<R>[]): BatchProcessStats {
    const successfulItems = results.filter(r => r.success).length;
    const failedItems = results.length - successfulItems;
    const totalTimeMs = results.reduce((sum, r) => sum + r.durationMs, 0);

    return {
      totalItems: results.length,
      successfulItems,
      failedItems,
      totalTimeMs,
      averageItemTimeMs: results.length > 0 ? totalTimeMs / results.length : 0,
    };
  }
}

export default BatchProcessor;
