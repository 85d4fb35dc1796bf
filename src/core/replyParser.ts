/**
 * replyParser.ts
 * Turns the oracle's free-form text into page labels. Nothing in here throws
 * on bad input: unreadable parts of a reply are treated as absent.
 */
import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { canonicalizeCategory, SectionCategory } from '../models/categories';
import { Batch, LabelSource, PageLabel, unknownLabel } from '../models/PageClassification';
import { BatchPredictionReply, PagePrediction, VisionPrediction } from '../models/PagePrediction';
import { OracleMalformedReplyError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ParsedPrediction {
  pageIndex: number;
  category: SectionCategory;
  confidence: number;
  textIncoherent?: boolean;
}

// "12, By Laws, 87" / "- 12; 2; 87%" / "page 12 | Directors Register | 70"
const TRIPLE_LINE = /^\s*[-*•([]?\s*(?:page\s*)?(\d+)\s*[,;|\t]\s*(.+?)\s*[,;|\t]\s*(\d+(?:\.\d+)?)\s*%?\s*[)\]]?\s*$/i;

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(100, Math.max(0, value));
}

/**
 * Outermost `{...}` span of a reply, if any
 */
export function extractJsonObject(text: string): string | undefined {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return undefined;
  }
  return text.slice(start, end + 1);
}

function parseJson(text: string): unknown {
  const json = extractJsonObject(text);
  if (json === undefined) {
    throw new OracleMalformedReplyError('reply contains no JSON object', text);
  }
  try {
    return JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new OracleMalformedReplyError(`invalid JSON (${message})`, text);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read `pagePredictions` from a JSON reply. Entries failing validation are dropped.
 * @throws OracleMalformedReplyError when there is no usable JSON at all
 */
export function readJsonPredictions(text: string): ParsedPrediction[] {
  const parsed = parseJson(text);
  if (!isRecord(parsed) || !Array.isArray(parsed.pagePredictions)) {
    throw new OracleMalformedReplyError('reply has no pagePredictions array', text);
  }

  const reply = plainToInstance(BatchPredictionReply, parsed);
  const predictions: ParsedPrediction[] = [];

  for (const entry of reply.pagePredictions) {
    if (!(entry instanceof PagePrediction)) {
      continue;
    }
    const errors = validateSync(entry);
    if (errors.length > 0) {
      logger.debug('Dropping invalid prediction', errors.map(e => e.property));
      continue;
    }
    const category = canonicalizeCategory(entry.label);
    if (category === undefined) {
      logger.debug(`Dropping prediction with unknown label "${entry.label}"`);
      continue;
    }
    predictions.push({
      pageIndex: entry.pageIndex,
      category,
      confidence: clampConfidence(entry.confidencePercent),
      textIncoherent: entry.isTextIncoherent,
    });
  }

  return predictions;
}

/**
 * Read `pageIndex, category, confidence` lines; any other line is ignored
 */
export function readLinePredictions(text: string): ParsedPrediction[] {
  const predictions: ParsedPrediction[] = [];

  for (const line of text.split(/\r?\n/)) {
    const match = TRIPLE_LINE.exec(line);
    if (!match) {
      continue;
    }
    const category = canonicalizeCategory(match[2]);
    if (category === undefined) {
      continue;
    }
    predictions.push({
      pageIndex: parseInt(match[1], 10),
      category,
      confidence: clampConfidence(parseFloat(match[3])),
    });
  }

  return predictions;
}

/**
 * All predictions found in a reply, JSON first and line triples otherwise
 */
export function readPredictions(raw: string): ParsedPrediction[] {
  try {
    const fromJson = readJsonPredictions(raw);
    if (fromJson.length > 0) {
      return fromJson;
    }
  } catch (error) {
    if (!(error instanceof OracleMalformedReplyError)) {
      throw error;
    }
    logger.debug(error.message);
  }
  return readLinePredictions(raw);
}

/**
 * Labels for exactly the primary pages of `batch`, in page order.
 * Context pages in the reply are discarded, a duplicated page keeps its last
 * entry and a missing page becomes UNKNOWN with confidence 0.
 */
export function parseBatchReply(raw: string, batch: Batch): PageLabel[] {
  const { start, end } = batch.pageRange;
  const byPage = new Map<number, ParsedPrediction>();

  for (const prediction of readPredictions(raw)) {
    if (prediction.pageIndex >= start && prediction.pageIndex <= end) {
      byPage.set(prediction.pageIndex, prediction);
    }
  }

  const missing = end - start + 1 - byPage.size;
  if (missing > 0) {
    logger.warn(`Oracle reply for batch ${batch.id} is missing ${missing} of ${end - start + 1} pages`);
  }

  const labels: PageLabel[] = [];
  for (let i = start; i <= end; i++) {
    const prediction = byPage.get(i);
    if (!prediction) {
      labels.push(unknownLabel(i, batch.source));
      continue;
    }
    const label: PageLabel = {
      pageIndex: i,
      category: prediction.category,
      confidence: prediction.confidence,
      source: batch.source,
    };
    if (prediction.textIncoherent !== undefined) {
      label.textIncoherent = prediction.textIncoherent;
    }
    labels.push(label);
  }

  return labels;
}

function readVisionJson(text: string): ParsedPrediction | undefined {
  const parsed = parseJson(text);
  if (!isRecord(parsed)) {
    return undefined;
  }
  const prediction = plainToInstance(VisionPrediction, parsed);
  if (validateSync(prediction).length > 0) {
    return undefined;
  }
  const category = canonicalizeCategory(prediction.label);
  if (category === undefined) {
    return undefined;
  }
  return { pageIndex: -1, category, confidence: clampConfidence(prediction.confidencePercent) };
}

/**
 * Label of a single page from an image reply: `{ label, confidencePercent }`,
 * or a `category, confidence` line
 */
export function parseVisionReply(raw: string, pageIndex: number): PageLabel {
  let prediction: ParsedPrediction | undefined;
  try {
    prediction = readVisionJson(raw);
  } catch (error) {
    if (!(error instanceof OracleMalformedReplyError)) {
      throw error;
    }
    logger.debug(error.message);
  }

  if (!prediction) {
    // Reuse the triple grammar by prefixing the page index
    prediction = raw
      .split(/\r?\n/)
      .map(line => readLinePredictions(`${pageIndex}, ${line.trim()}`)[0])
      .find((candidate): candidate is ParsedPrediction => candidate !== undefined);
  }

  if (!prediction) {
    logger.warn(`Could not read an image classification for page ${pageIndex}`);
    return unknownLabel(pageIndex, LabelSource.VISION);
  }

  return {
    pageIndex,
    category: prediction.category,
    confidence: prediction.confidence,
    source: LabelSource.VISION,
  };
}
