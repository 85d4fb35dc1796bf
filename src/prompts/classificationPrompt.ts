// src/prompts/classificationPrompt.ts - Prompts for labeling minute book pages

import { ALL_SECTION_CATEGORIES, CategoryId, categoryNumber, isKnownCategory } from '../models/categories';
import { Batch, BatchContext } from '../models/PageClassification';
import { PageCorpus } from '../core/PageCorpus';

/**
 * "1 = Articles & Amendments", one category per line
 */
export const categoryLegend = ALL_SECTION_CATEGORIES
  .map(category => `${categoryNumber(category)} = ${category}`)
  .join('\n');

/**
 * Instructions sent ahead of every text batch
 */
export const classificationSystemPrompt = `You classify the pages of corporate minute books (French and English).

You will receive a JSON object with this structure:

{
  "targetInterval": { "startPageIndex": int, "endPageIndex": int },
  "pages": [
    { "pageIndex": int, "isTarget": boolean, "isFinal": boolean, "text": string, "finalLabel": string | null }
  ],
  "allowedLabels": [ "<label>", ... ],
  "neighbouringSections": { "before": string | null, "after": string | null }
}

Read the pages in ascending pageIndex order as one continuous document.
Pages with isTarget = false are context only and must not be labeled.
A page with isFinal = true has a confirmed finalLabel; use it as an anchor, but do not assume its neighbours share it.
neighbouringSections, when present, names the sections found just before and after the target pages.

For each target page choose exactly one label from allowedLabels and a confidencePercent between 0 and 100
(100 = virtually certain, 50 = several plausible labels, below 40 = highly unsure).
Set isTextIncoherent to true when the page text is unreadable, garbled or empty.

Respond ONLY with a JSON object with no explanation or markdown formatting:

{
  "pagePredictions": [
    { "pageIndex": <int>, "label": "<one of allowedLabels>", "confidencePercent": <0-100>, "isTextIncoherent": <true|false> }
  ]
}

Include exactly one entry per target page. Use labels exactly as written in allowedLabels,
or the category number from this list:

${categoryLegend}`;

/**
 * Instructions sent with a single rendered page
 */
export const visionPrompt = `The image is one page of a corporate minute book (French or English).
Choose the single section it belongs to from this list: ${ALL_SECTION_CATEGORIES.map(c => `"${c}"`).join(', ')}.

Respond ONLY with a JSON object with no explanation or markdown formatting:

{ "label": "<one of the listed sections>", "confidencePercent": <0-100> }`;

export interface PromptPage {
  pageIndex: number;
  isTarget: boolean;
  isFinal: boolean;
  text: string;
  finalLabel: string | null;
}

export interface ClassificationPayload {
  targetInterval: { startPageIndex: number; endPageIndex: number };
  pages: PromptPage[];
  allowedLabels: string[];
  neighbouringSections?: { before: string | null; after: string | null };
}

function hintName(category: CategoryId | undefined): string | null {
  return category !== undefined && isKnownCategory(category) ? category : null;
}

export function buildClassificationPayload(
  batch: Batch,
  corpus: PageCorpus,
  context: BatchContext = {}
): ClassificationPayload {
  const pages: PromptPage[] = [];
  for (let i = batch.contextRange.start; i <= batch.contextRange.end; i++) {
    const finalLabel = context.finalLabels?.get(i);
    pages.push({
      pageIndex: i,
      isTarget: !batch.overlapPages.has(i),
      isFinal: finalLabel !== undefined,
      text: corpus.excerpt(i).join('\n'),
      finalLabel: finalLabel ?? null,
    });
  }

  const payload: ClassificationPayload = {
    targetInterval: { startPageIndex: batch.pageRange.start, endPageIndex: batch.pageRange.end },
    pages,
    allowedLabels: [...ALL_SECTION_CATEGORIES],
  };

  if (context.sectionBefore !== undefined || context.sectionAfter !== undefined) {
    payload.neighbouringSections = {
      before: hintName(context.sectionBefore),
      after: hintName(context.sectionAfter),
    };
  }

  return payload;
}

/**
 * Full query text for the ASK endpoint
 */
export function buildClassificationQuery(batch: Batch, corpus: PageCorpus, context: BatchContext = {}): string {
  const payload = buildClassificationPayload(batch, corpus, context);
  return `${classificationSystemPrompt}\n\nHere is the block to classify:\n\n${JSON.stringify(payload, null, 2)}`;
}
