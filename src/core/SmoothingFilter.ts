/**
 * SmoothingFilter.ts
 * Removes short label flickers sandwiched inside a longer section.
 */
import { CategoryId, isKnownCategory } from '../models/categories';
import { PageLabel } from '../models/PageClassification';
import { logger } from '../utils/logger';

export interface SmoothingOptions {
  windowSize: number;      // odd, >= 3
  minRunLength: number;    // runs shorter than this may be absorbed
  highConfidence: number;  // a page above this confidence pins its run
}

interface LabelRun {
  category: CategoryId;
  start: number;   // position in the label array
  end: number;
}

function buildRuns(labels: readonly PageLabel[]): LabelRun[] {
  const runs: LabelRun[] = [];
  labels.forEach((label, position) => {
    const last = runs[runs.length - 1];
    if (last && last.category === label.category) {
      last.end = position;
    } else {
      runs.push({ category: label.category, start: position, end: position });
    }
  });
  return runs;
}

/**
 * True when `category` holds more than half of the up to `half` pages on each side of the run
 */
function isWindowMajority(labels: readonly PageLabel[], run: LabelRun, half: number, category: CategoryId): boolean {
  const neighbours = [
    ...labels.slice(Math.max(0, run.start - half), run.start),
    ...labels.slice(run.end + 1, run.end + 1 + half),
  ];
  if (neighbours.length === 0) {
    return false;
  }
  const matching = neighbours.filter(label => label.category === category).length;
  return matching * 2 > neighbours.length;
}

function isEligible(runs: readonly LabelRun[], index: number, labels: readonly PageLabel[], options: SmoothingOptions): boolean {
  const run = runs[index];
  const previous = runs[index - 1];
  const next = runs[index + 1];
  if (!previous || !next) {
    return false;
  }

  if (run.end - run.start + 1 >= options.minRunLength || !isKnownCategory(run.category)) {
    return false;
  }

  const flank = previous.category;
  if (flank !== next.category || !isKnownCategory(flank)) {
    return false;
  }

  for (let i = run.start; i <= run.end; i++) {
    if (labels[i].confidence > options.highConfidence) {
      return false;
    }
  }

  return isWindowMajority(labels, run, Math.floor(options.windowSize / 2), flank);
}

/**
 * Relabel the leftmost eligible short run to its flanking category until none is left.
 * Each relabel merges three runs into one, so the loop ends, and the result is a fixpoint:
 * smoothing it again changes nothing. Confidences are kept; UNKNOWN runs are never touched.
 * @param labels one label per page, in page order
 */
export function smoothLabels(labels: readonly PageLabel[], options: SmoothingOptions): PageLabel[] {
  const smoothed = labels.map(label => ({ ...label }));
  let relabeled = 0;

  for (;;) {
    const runs = buildRuns(smoothed);
    const target = runs.findIndex((_, index) => isEligible(runs, index, smoothed, options));
    if (target === -1) {
      break;
    }

    const run = runs[target];
    const category = runs[target - 1].category;
    for (let i = run.start; i <= run.end; i++) {
      smoothed[i] = { ...smoothed[i], category };
      relabeled++;
    }
  }

  if (relabeled > 0) {
    logger.debug(`Smoothing relabeled ${relabeled} pages`);
  }
  return smoothed;
}
