/**
 * In-process oracle whose answers are scripted per page
 */
import { ASK_ENDPOINT, ClassificationOracle, VISION_ENDPOINT } from '../../core/OracleClient';
import { PageCorpus } from '../../core/PageCorpus';
import { SectionCategory } from '../../models/categories';
import { Batch, BatchContext, LabelSource, PageLabel, rangeLength, unknownLabel } from '../../models/PageClassification';
import { QueryBudget } from '../../utils/QueryBudget';

export interface ScriptedAnswer {
  category: SectionCategory;
  confidence: number;
  textIncoherent?: boolean;
}

/**
 * @param timesAsked how often the page was already a primary page before this call
 * @returns undefined to leave the page out of the reply
 */
export type AnswerFn = (pageIndex: number, timesAsked: number) => ScriptedAnswer | undefined;

export interface ScriptedOracleOptions {
  budget?: QueryBudget;
  vision?: AnswerFn;
  fail?: (batch: Batch) => Error | undefined;
}

export class ScriptedOracle implements ClassificationOracle {
  readonly batches: Batch[] = [];
  readonly contexts: Array<BatchContext | undefined> = [];
  readonly imageCalls: number[] = [];
  private answer: AnswerFn;
  private options: ScriptedOracleOptions;
  private asked = new Map<number, number>();

  constructor(answer: AnswerFn, options: ScriptedOracleOptions = {}) {
    this.answer = answer;
    this.options = options;
  }

  private toLabel(pageIndex: number, source: LabelSource, fn: AnswerFn): PageLabel {
    const timesAsked = this.asked.get(pageIndex) ?? 0;
    this.asked.set(pageIndex, timesAsked + 1);
    const answer = fn(pageIndex, timesAsked);
    if (!answer) {
      return unknownLabel(pageIndex, source);
    }
    const label: PageLabel = { pageIndex, category: answer.category, confidence: answer.confidence, source };
    if (answer.textIncoherent !== undefined) {
      label.textIncoherent = answer.textIncoherent;
    }
    return label;
  }

  async classifyBatch(batch: Batch, _corpus: PageCorpus, context?: BatchContext): Promise<PageLabel[]> {
    this.batches.push(batch);
    this.contexts.push(context);

    const failure = this.options.fail?.(batch);
    this.options.budget?.record({
      source: LabelSource.ASK,
      endpoint: ASK_ENDPOINT,
      durationMs: 0,
      success: failure === undefined,
      attempt: 0,
      pageCount: rangeLength(batch.pageRange),
    });
    if (failure) {
      throw failure;
    }

    const labels: PageLabel[] = [];
    for (let i = batch.pageRange.start; i <= batch.pageRange.end; i++) {
      labels.push(this.toLabel(i, batch.source, this.answer));
    }
    return labels;
  }

  async classifyPageImage(pageIndex: number, _imageBase64: string): Promise<PageLabel> {
    this.imageCalls.push(pageIndex);
    this.options.budget?.record({
      source: LabelSource.VISION,
      endpoint: VISION_ENDPOINT,
      durationMs: 0,
      success: true,
      attempt: 0,
      pageCount: 1,
    });
    return this.toLabel(pageIndex, LabelSource.VISION, this.options.vision ?? this.answer);
  }
}
