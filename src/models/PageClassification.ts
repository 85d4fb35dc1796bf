/**
 * Models for page classification and section segmentation
 */
import { CategoryId, SectionCategory, UNKNOWN_CATEGORY } from './categories';

/**
 * How a label was obtained from the oracle
 */
export enum LabelSource {
  ASK = 'ASK',       // text excerpt of a page range
  VISION = 'VISION', // rendered image of a single page
}

export interface Page {
  index: number;                 // 0-based position in the document
  lines: readonly string[];      // extracted text, one entry per line
}

export interface PageLabel {
  pageIndex: number;
  category: CategoryId;
  confidence: number;            // 0-100
  source: LabelSource;
  textIncoherent?: boolean;      // oracle reported the page text as unreadable
}

/** Inclusive page index range */
export interface PageRange {
  start: number;
  end: number;
}

export interface Batch {
  id: number;
  pageRange: PageRange;          // primary pages, labeled authoritatively
  contextRange: PageRange;       // primary pages plus context-only neighbours
  overlapPages: ReadonlySet<number>;
  source: LabelSource;
  reasons: readonly string[];    // why the batch was planned (resolver passes)
}

/**
 * What the oracle is told beyond the page text
 */
export interface BatchContext {
  finalLabels?: ReadonlyMap<number, SectionCategory>;  // confirmed pages, shown as anchors
  sectionBefore?: CategoryId;                           // resolver hint: flanking sections
  sectionAfter?: CategoryId;
}

/**
 * Maximal run of pages sharing one label. Page numbers are 0-based.
 */
export interface Section {
  name: CategoryId;
  startPage: number;
  endPage: number;
  numPages: number;
  averageConfidence: number;
}

/**
 * Section as written to the result file. Page numbers are 1-based.
 */
export interface OutputSection {
  name: SectionCategory;
  startPage: number;
  endPage: number;
}

export interface SegmentationOutput {
  sections: OutputSection[];
}

export function rangeLength(range: PageRange): number {
  return range.end - range.start + 1;
}

export function unknownLabel(pageIndex: number, source: LabelSource = LabelSource.ASK): PageLabel {
  return { pageIndex, category: UNKNOWN_CATEGORY, confidence: 0, source };
}
