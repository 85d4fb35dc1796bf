import fs from 'fs-extra';
import path from 'path';
import { FileError, ValidationError } from './errors';
import { logger } from './logger';
import { PageCorpus, PageImageSource } from '../core/PageCorpus';
import { OutputSection, Page, SegmentationOutput } from '../models/PageClassification';

/**
 * Check if a file exists
 * @param filePath Path to the file
 * @returns True if the file exists, false otherwise
 */
export function fileExists(filePath: string): boolean {
  try {
    return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
  } catch (error) {
    logger.debug(`Could not stat ${filePath}`, error);
    return false;
  }
}

/**
 * Read a file as a Buffer
 */
export async function readFileAsBuffer(filePath: string): Promise<Buffer> {
  try {
    if (!fileExists(filePath)) {
      throw new FileError(`File does not exist: ${filePath}`, 'read', filePath);
    }

    return await fs.readFile(filePath);
  } catch (error) {
    if (error instanceof FileError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new FileError(`Failed to read file: ${message}`, 'read', filePath);
  }
}

/**
 * Convert a Buffer to a base64 string
 * @param mimeType Optional MIME type to include in the data URL
 */
export function bufferToBase64(buffer: Buffer, mimeType?: string): string {
  const base64 = buffer.toString('base64');
  if (mimeType) {
    return `data:${mimeType};base64,${base64}`;
  }
  return base64;
}

/**
 * Page images stored as files beside the corpus, keyed by page index
 */
export class FileImageSource implements PageImageSource {
  private readonly imagePaths: ReadonlyMap<number, string>;

  constructor(imagePaths: ReadonlyMap<number, string>) {
    this.imagePaths = imagePaths;
  }

  get size(): number {
    return this.imagePaths.size;
  }

  hasImage(pageIndex: number): boolean {
    return this.imagePaths.has(pageIndex);
  }

  async renderPage(pageIndex: number): Promise<string> {
    const imagePath = this.imagePaths.get(pageIndex);
    if (imagePath === undefined) {
      throw new FileError(`No image for page ${pageIndex}`, 'read', '');
    }
    return bufferToBase64(await readFileAsBuffer(imagePath));
  }
}

export interface LoadedCorpus {
  corpus: PageCorpus;
  images?: FileImageSource;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Turn parsed corpus JSON into pages and image paths.
 * Accepts `["page 1 text", ...]` or `{ pages: [{ index?, text | lines, image? }] }`.
 */
export function parseCorpus(data: unknown, baseDir = '.'): LoadedCorpus {
  if (isStringArray(data)) {
    return { corpus: PageCorpus.fromTexts(data) };
  }

  if (!isRecord(data) || !Array.isArray(data.pages)) {
    throw new ValidationError('Corpus must be an array of page texts or an object with a "pages" array');
  }

  const pages: Page[] = [];
  const imagePaths = new Map<number, string>();

  data.pages.forEach((entry: unknown, position: number) => {
    if (typeof entry === 'string') {
      pages.push({ index: position, lines: entry.split(/\r?\n/) });
      return;
    }
    if (!isRecord(entry)) {
      throw new ValidationError(`Corpus page at position ${position} is not an object`, entry);
    }

    const index = entry.index === undefined ? position : entry.index;
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      throw new ValidationError(`Corpus page at position ${position} has an invalid index`, entry.index);
    }

    let lines: string[];
    if (typeof entry.text === 'string') {
      lines = entry.text.split(/\r?\n/);
    } else if (isStringArray(entry.lines)) {
      lines = entry.lines;
    } else {
      throw new ValidationError(`Corpus page ${index} has neither "text" nor "lines"`, entry);
    }

    if (typeof entry.image === 'string' && entry.image.length > 0) {
      imagePaths.set(index, path.resolve(baseDir, entry.image));
    }
    pages.push({ index, lines });
  });

  pages.sort((a, b) => a.index - b.index);
  const corpus = new PageCorpus(pages);

  return imagePaths.size > 0 ? { corpus, images: new FileImageSource(imagePaths) } : { corpus };
}

/**
 * Load a page corpus from a JSON file
 */
export async function readCorpusFile(filePath: string): Promise<LoadedCorpus> {
  if (!fileExists(filePath)) {
    throw new FileError(`Corpus file does not exist: ${filePath}`, 'read', filePath);
  }

  let data: unknown;
  try {
    data = await fs.readJson(filePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FileError(`Failed to parse corpus JSON: ${message}`, 'read', filePath);
  }

  const loaded = parseCorpus(data, path.dirname(filePath));
  logger.info(`Loaded ${loaded.corpus.size} pages from ${filePath}`, {
    images: loaded.images?.size ?? 0,
  });
  return loaded;
}

/**
 * Write the segmentation result as `{ "sections": [...] }`
 */
export async function writeSegmentationResult(filePath: string, sections: readonly OutputSection[]): Promise<string> {
  const output: SegmentationOutput = {
    sections: sections.map(section => ({
      name: section.name,
      startPage: section.startPage,
      endPage: section.endPage,
    })),
  };

  try {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeJson(filePath, output, { spaces: 2 });
    logger.info(`Wrote ${output.sections.length} sections to ${filePath}`);
    return filePath;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FileError(`Failed to write result: ${message}`, 'write', filePath);
  }
}
