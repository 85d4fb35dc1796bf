import dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from '../utils/errors';
import { LogLevel, parseLogLevel } from '../utils/logger';

// Load environment variables from .env file
dotenv.config();

/**
 * Configuration for the application
 */
export interface Config {
  // Classification oracle endpoint
  oracle: {
    apiUrl: string;
    apiKey: string;
    model: string;
    visionModel: string;
    timeoutMs: number;
  };

  // Batching, concurrency and retry settings
  processing: {
    batchSize: number;
    contextPages: number;
    maxParallelRequests: number;
    maxRetries: number;
    retryDelayMs: number;
    maxQueries: number;       // 0 = unlimited
  };

  smoothing: {
    windowSize: number;
    minRunLength: number;
    highConfidence: number;
  };

  resolver: {
    maxIterations: number;
    smallSectionPages: number;
    lowConfidence: number;
    finalThreshold: number;
    contextPages: number;
  };

  reconciler: {
    maxPages: number;
    similarityThreshold: number;
    samplePages: number;
    titleMatch: boolean;
    titleMinScore: number;
    titleRelabelScore: number;
  };

  vision: {
    enabled: boolean;
    ocrQualityThreshold: number;
    lowConfidence: number;    // pages below this confidence are read from their image
    maxPages: number;
  };

  paths: {
    outputDir: string;
  };

  logging: {
    level: LogLevel;
  };
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Config = {
  oracle: {
    apiUrl: 'http://localhost:8080',
    apiKey: '',
    model: 'gemini-2.5-flash',
    visionModel: 'gemini-2.5-flash',
    timeoutMs: 120000, // 2 minutes
  },
  processing: {
    batchSize: 55,
    contextPages: 3,
    maxParallelRequests: 4,
    maxRetries: 3,
    retryDelayMs: 500,
    maxQueries: 0,
  },
  smoothing: {
    windowSize: 3,
    minRunLength: 2,
    highConfidence: 90,
  },
  resolver: {
    maxIterations: 3,
    smallSectionPages: 3,
    lowConfidence: 60,
    finalThreshold: 85,
    contextPages: 3,
  },
  reconciler: {
    maxPages: 1,
    similarityThreshold: 0.6,
    samplePages: 3,
    titleMatch: true,
    titleMinScore: 0.75,
    titleRelabelScore: 0.9,
  },
  vision: {
    enabled: true,
    ocrQualityThreshold: 35,
    lowConfidence: 80,
    maxPages: 40,
  },
  paths: {
    outputDir: path.join(process.cwd(), 'output'),
  },
  logging: {
    level: LogLevel.INFO,
  },
};

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readFloat(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

/**
 * Load configuration from environment variables and merge with defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const defaults = DEFAULT_CONFIG;
  const model = env.ORACLE_MODEL || defaults.oracle.model;

  return {
    oracle: {
      apiUrl: (env.ORACLE_API_URL || defaults.oracle.apiUrl).replace(/\/+$/, ''),
      apiKey: env.ORACLE_API_KEY || defaults.oracle.apiKey,
      model,
      visionModel: env.ORACLE_VISION_MODEL || model,
      timeoutMs: readInt(env.ORACLE_TIMEOUT_MS, defaults.oracle.timeoutMs),
    },
    processing: {
      batchSize: readInt(env.BATCH_SIZE, defaults.processing.batchSize),
      contextPages: readInt(env.CONTEXT_PAGES, defaults.processing.contextPages),
      maxParallelRequests: readInt(env.MAX_PARALLEL_REQUESTS, defaults.processing.maxParallelRequests),
      maxRetries: readInt(env.MAX_RETRIES, defaults.processing.maxRetries),
      retryDelayMs: readInt(env.RETRY_DELAY_MS, defaults.processing.retryDelayMs),
      maxQueries: readInt(env.MAX_QUERIES, defaults.processing.maxQueries),
    },
    smoothing: {
      windowSize: readInt(env.SMOOTHING_WINDOW, defaults.smoothing.windowSize),
      minRunLength: readInt(env.SMOOTHING_MIN_RUN, defaults.smoothing.minRunLength),
      highConfidence: readFloat(env.SMOOTHING_HIGH_CONFIDENCE, defaults.smoothing.highConfidence),
    },
    resolver: {
      maxIterations: readInt(env.MAX_ITERATIONS, defaults.resolver.maxIterations),
      smallSectionPages: readInt(env.SMALL_SECTION_PAGES, defaults.resolver.smallSectionPages),
      lowConfidence: readFloat(env.LOW_CONFIDENCE, defaults.resolver.lowConfidence),
      finalThreshold: readFloat(env.CONFIDENCE_FINAL_THRESHOLD, defaults.resolver.finalThreshold),
      contextPages: readInt(env.RESOLVER_CONTEXT_PAGES, defaults.resolver.contextPages),
    },
    reconciler: {
      maxPages: readInt(env.RECONCILE_MAX_PAGES, defaults.reconciler.maxPages),
      similarityThreshold: readFloat(env.SIMILARITY_THRESHOLD, defaults.reconciler.similarityThreshold),
      samplePages: readInt(env.RECONCILE_SAMPLE_PAGES, defaults.reconciler.samplePages),
      titleMatch: readBool(env.TITLE_MATCH_ENABLED, defaults.reconciler.titleMatch),
      titleMinScore: readFloat(env.TITLE_MATCH_MIN_SCORE, defaults.reconciler.titleMinScore),
      titleRelabelScore: readFloat(env.TITLE_MATCH_RELABEL_SCORE, defaults.reconciler.titleRelabelScore),
    },
    vision: {
      enabled: readBool(env.VISION_FALLBACK_ENABLED, defaults.vision.enabled),
      ocrQualityThreshold: readFloat(env.OCR_QUALITY_THRESHOLD, defaults.vision.ocrQualityThreshold),
      lowConfidence: readFloat(env.VISION_LOW_CONFIDENCE, defaults.vision.lowConfidence),
      maxPages: readInt(env.VISION_MAX_PAGES, defaults.vision.maxPages),
    },
    paths: {
      outputDir: env.OUTPUT_DIR || defaults.paths.outputDir,
    },
    logging: {
      level: env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL) : defaults.logging.level,
    },
  };
}

function checkPercent(name: string, value: number): void {
  if (value < 0 || value > 100) {
    throw new ConfigError(`${name} must be between 0 and 100, got ${value}`);
  }
}

/**
 * Reject settings the algorithms cannot work with
 */
export function validateConfig(config: Config): Config {
  const { processing, smoothing, resolver, reconciler, vision } = config;

  if (processing.batchSize < 1) {
    throw new ConfigError(`BATCH_SIZE must be at least 1, got ${processing.batchSize}`);
  }
  if (processing.contextPages < 0 || resolver.contextPages < 0) {
    throw new ConfigError('Context page counts cannot be negative');
  }
  if (processing.maxParallelRequests < 1) {
    throw new ConfigError(`MAX_PARALLEL_REQUESTS must be at least 1, got ${processing.maxParallelRequests}`);
  }
  if (processing.maxRetries < 0 || processing.retryDelayMs < 0 || processing.maxQueries < 0) {
    throw new ConfigError('Retry and query limits cannot be negative');
  }
  if (smoothing.windowSize < 3 || smoothing.windowSize % 2 === 0) {
    throw new ConfigError(`SMOOTHING_WINDOW must be an odd number >= 3, got ${smoothing.windowSize}`);
  }
  if (smoothing.minRunLength < 1) {
    throw new ConfigError(`SMOOTHING_MIN_RUN must be at least 1, got ${smoothing.minRunLength}`);
  }
  if (resolver.maxIterations < 1) {
    throw new ConfigError(`MAX_ITERATIONS must be at least 1, got ${resolver.maxIterations}`);
  }
  if (reconciler.maxPages >= resolver.smallSectionPages) {
    throw new ConfigError(
      `RECONCILE_MAX_PAGES (${reconciler.maxPages}) must be below SMALL_SECTION_PAGES (${resolver.smallSectionPages})`
    );
  }
  if (reconciler.similarityThreshold < 0 || reconciler.similarityThreshold > 1) {
    throw new ConfigError(`SIMILARITY_THRESHOLD must be between 0 and 1, got ${reconciler.similarityThreshold}`);
  }
  if (reconciler.titleMinScore < 0 || reconciler.titleRelabelScore > 1 || reconciler.titleMinScore > reconciler.titleRelabelScore) {
    throw new ConfigError(
      `Title match scores must satisfy 0 <= TITLE_MATCH_MIN_SCORE (${reconciler.titleMinScore}) ` +
      `<= TITLE_MATCH_RELABEL_SCORE (${reconciler.titleRelabelScore}) <= 1`
    );
  }
  checkPercent('SMOOTHING_HIGH_CONFIDENCE', smoothing.highConfidence);
  checkPercent('LOW_CONFIDENCE', resolver.lowConfidence);
  checkPercent('CONFIDENCE_FINAL_THRESHOLD', resolver.finalThreshold);
  checkPercent('OCR_QUALITY_THRESHOLD', vision.ocrQualityThreshold);
  checkPercent('VISION_LOW_CONFIDENCE', vision.lowConfidence);

  return config;
}

// Export default config instance
export const config = loadConfig();

export default config;
