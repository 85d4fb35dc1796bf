/**
 * SectionAggregator.ts
 * Collapses per-page labels into contiguous sections and checks the result.
 */
import { isKnownCategory } from '../models/categories';
import { OutputSection, PageLabel, Section } from '../models/PageClassification';
import { InvariantViolationError } from '../utils/errors';

/**
 * Maximal runs of equal category in page order. Average confidence is the
 * plain mean of the run's page confidences.
 * @param labels one label per page, in page order
 */
export function aggregateSections(labels: readonly PageLabel[]): Section[] {
  const sections: Section[] = [];
  let runStart = 0;
  let confidenceSum = 0;

  labels.forEach((label, position) => {
    confidenceSum += label.confidence;
    const next = labels[position + 1];
    if (next === undefined || next.category !== label.category) {
      const numPages = position - runStart + 1;
      sections.push({
        name: label.category,
        startPage: labels[runStart].pageIndex,
        endPage: label.pageIndex,
        numPages,
        averageConfidence: confidenceSum / numPages,
      });
      runStart = position + 1;
      confidenceSum = 0;
    }
  });

  return sections;
}

export interface SegmentationCheckOptions {
  allowUnknown?: boolean;
}

/**
 * Throws InvariantViolationError unless the sections tile [0, pageCount - 1] in order
 */
export function assertValidSegmentation(
  sections: readonly Section[],
  pageCount: number,
  options: SegmentationCheckOptions = {}
): void {
  if (pageCount === 0) {
    if (sections.length > 0) {
      throw new InvariantViolationError('Sections present for an empty document', sections);
    }
    return;
  }

  if (sections.length === 0) {
    throw new InvariantViolationError(`No sections for a ${pageCount}-page document`);
  }

  let expectedStart = 0;
  for (const section of sections) {
    if (section.startPage !== expectedStart) {
      throw new InvariantViolationError(
        `Section "${section.name}" starts at page ${section.startPage}, expected ${expectedStart} (gap or overlap)`,
        section
      );
    }
    if (section.endPage < section.startPage) {
      throw new InvariantViolationError(`Section "${section.name}" ends before it starts`, section);
    }
    if (section.numPages !== section.endPage - section.startPage + 1) {
      throw new InvariantViolationError(`Section "${section.name}" has an inconsistent page count`, section);
    }
    if (!options.allowUnknown && !isKnownCategory(section.name)) {
      throw new InvariantViolationError(
        `UNKNOWN section at pages ${section.startPage}-${section.endPage} reached the output`,
        section
      );
    }
    expectedStart = section.endPage + 1;
  }

  if (expectedStart !== pageCount) {
    throw new InvariantViolationError(`Sections end at page ${expectedStart - 1}, document ends at ${pageCount - 1}`);
  }
}

/**
 * Output shape: 1-based pages, canonical names only
 */
export function toOutputSections(sections: readonly Section[]): OutputSection[] {
  return sections.map(section => {
    const name = section.name;
    if (!isKnownCategory(name)) {
      throw new InvariantViolationError(
        `UNKNOWN section at pages ${section.startPage}-${section.endPage} cannot be emitted`,
        section
      );
    }
    return { name, startPage: section.startPage + 1, endPage: section.endPage + 1 };
  });
}
