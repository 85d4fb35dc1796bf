/**
 * Read-only view of a document's pages and their extracted text
 */
import { Page } from '../models/PageClassification';
import { ValidationError } from '../utils/errors';
import { isSalientLine } from '../utils/textSimilarity';

/**
 * Renders one page to a base64 image for VISION queries
 */
export interface PageImageSource {
  hasImage(pageIndex: number): boolean;
  renderPage(pageIndex: number): Promise<string>;
}

export class PageCorpus {
  private readonly pages: readonly Page[];

  constructor(pages: readonly Page[]) {
    pages.forEach((page, position) => {
      if (page.index !== position) {
        throw new ValidationError(`Page indices must be dense from 0, found ${page.index} at position ${position}`);
      }
    });
    this.pages = Object.freeze(
      pages.map(page => Object.freeze({ index: page.index, lines: Object.freeze([...page.lines]) }))
    );
  }

  /**
   * Build a corpus from one string per page, split on line breaks
   */
  static fromTexts(texts: readonly string[]): PageCorpus {
    return new PageCorpus(texts.map((text, index) => ({ index, lines: text.split(/\r?\n/) })));
  }

  get size(): number {
    return this.pages.length;
  }

  page(pageIndex: number): Page {
    const page = this.pages[pageIndex];
    if (!page) {
      throw new ValidationError(`Page ${pageIndex} is outside the document (0-${this.pages.length - 1})`);
    }
    return page;
  }

  text(pageIndex: number): string {
    return this.page(pageIndex).lines.join('\n');
  }

  salientLines(pageIndex: number): string[] {
    return this.page(pageIndex).lines.map(line => line.trim()).filter(isSalientLine);
  }

  /**
   * First and last salient lines of a page, as sent to the oracle
   */
  excerpt(pageIndex: number, first = 3, last = 2): string[] {
    const lines = this.salientLines(pageIndex);
    if (lines.length <= first + last) {
      return lines;
    }
    return [...lines.slice(0, first), ...lines.slice(lines.length - last)];
  }
}

export default PageCorpus;
