/**
 * Enhanced logger with emoji prefixes for each pipeline stage
 */
import { logger } from './logger';

export const emojiLogger = {
  success: (message: string, data?: unknown) => {
    logger.info(`✅ ${message}`, data);
  },

  warn: (message: string, data?: unknown) => {
    logger.warn(`⚠️ ${message}`, data);
  },

  error: (message: string, data?: unknown) => {
    logger.error(`❌ ${message}`, data);
  },

  classify: (message: string, data?: unknown) => {
    logger.info(`🔠 CLASSIFY: ${message}`, data);
  },

  pipeline: (message: string, data?: unknown) => {
    logger.info(`🔄 PIPELINE: ${message}`, data);
  },

  resolver: (message: string, data?: unknown) => {
    logger.info(`🧭 RESOLVER: ${message}`, data);
  },

  reconcile: (message: string, data?: unknown) => {
    logger.info(`🧩 RECONCILE: ${message}`, data);
  },

  startPhase: (phaseName: string) => {
    logger.info(`🚀 STARTING PHASE: ${phaseName} ${'-'.repeat(50)}`);
  },

  endPhase: (phaseName: string) => {
    logger.info(`✨ COMPLETED PHASE: ${phaseName} ${'-'.repeat(50)}`);
  },

  progress: (current: number, total: number, message: string) => {
    logger.info(`[${current}/${total}] ${message}`);
  },

  apiCall: (message: string, data?: unknown) => {
    logger.debug(`🚀 API CALL: ${message}`, data);
  },

  apiResponse: (message: string, timeMs: number) => {
    logger.debug(`⏱️ API RESPONSE: ${message} - ${timeMs.toFixed(2)}ms`);
  },

  retrying: (attempt: number, maxRetries: number, reason: string) => {
    logger.warn(`🔁 RETRY ${attempt}/${maxRetries}: ${reason}`);
  },

  apiCallFailure: (service: string, model: string, reason: string) => {
    logger.error(`❌ API FAILURE: ${service} (${model}) - Error: ${reason}`);
  },

  apiCallStats: (totalCalls: number, failedCalls: number, avgTime: number, elapsedMs: number) => {
    const successRate = totalCalls > 0 ? (totalCalls - failedCalls) / totalCalls : 1;
    logger.info(
      `📊 API STATS: ${totalCalls} calls, ${(successRate * 100).toFixed(1)}% success rate, ` +
      `avg ${avgTime.toFixed(2)}ms, ${elapsedMs}ms elapsed`
    );
  },

  timerStart: (label: string) => {
    const startTime = Date.now();
    return () => {
      const elapsed = Date.now() - startTime;
      logger.info(`⏱️ TIMER: ${label} completed in ${elapsed}ms`);
      return elapsed;
    };
  },
};

export default emojiLogger;
