/**
 * Shared builders for tests
 */
import { Config, DEFAULT_CONFIG } from '../../config';
import { CategoryId } from '../../models/categories';
import { LabelSource, PageLabel } from '../../models/PageClassification';

type ConfigOverrides = { [K in keyof Config]?: Partial<Config[K]> };

/**
 * Defaults with a placeholder key and no retry waits
 */
export function testConfig(overrides: ConfigOverrides = {}): Config {
  return {
    oracle: {
      ...DEFAULT_CONFIG.oracle,
      apiUrl: 'https://oracle.example.com',
      apiKey: 'test-secret',
      model: 'test-model',
      visionModel: 'test-vision-model',
      ...overrides.oracle,
    },
    processing: { ...DEFAULT_CONFIG.processing, retryDelayMs: 0, ...overrides.processing },
    smoothing: { ...DEFAULT_CONFIG.smoothing, ...overrides.smoothing },
    resolver: { ...DEFAULT_CONFIG.resolver, ...overrides.resolver },
    reconciler: { ...DEFAULT_CONFIG.reconciler, ...overrides.reconciler },
    vision: { ...DEFAULT_CONFIG.vision, ...overrides.vision },
    paths: { ...DEFAULT_CONFIG.paths, ...overrides.paths },
    logging: { ...DEFAULT_CONFIG.logging, ...overrides.logging },
  };
}

/**
 * One label per entry, page indices from 0
 */
export function labelsFrom(entries: ReadonlyArray<[CategoryId, number]>): PageLabel[] {
  return entries.map(([category, confidence], pageIndex) => ({
    pageIndex,
    category,
    confidence,
    source: LabelSource.ASK,
  }));
}

/**
 * `count` copies of the same entry
 */
export function repeat(category: CategoryId, confidence: number, count: number): Array<[CategoryId, number]> {
  return Array.from({ length: count }, (): [CategoryId, number] => [category, confidence]);
}
