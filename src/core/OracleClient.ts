/**
 * Client for the page classification oracle
 */
import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { Config } from '../config';
import { Batch, BatchContext, LabelSource, PageLabel, rangeLength, unknownLabel } from '../models/PageClassification';
import { buildClassificationQuery, visionPrompt } from '../prompts/classificationPrompt';
import { PageCorpus } from './PageCorpus';
import { parseBatchReply, parseVisionReply } from './replyParser';
import emojiLogger from '../utils/emojiLogger';
import {
  ConfigError,
  OracleApiError,
  OracleAuthError,
  OracleTimeoutError,
  withRetry,
} from '../utils/errors';
import { QueryBudget } from '../utils/QueryBudget';

export const ASK_ENDPOINT = '/ask';
export const VISION_ENDPOINT = '/process-pdf';

/**
 * Anything that can label pages. The pipeline only talks to this interface.
 */
export interface ClassificationOracle {
  /**
   * Labels for the primary pages of a batch, in page order. Failed calls
   * yield UNKNOWN labels; only OracleAuthError is thrown.
   */
  classifyBatch(batch: Batch, corpus: PageCorpus, context?: BatchContext): Promise<PageLabel[]>;

  /**
   * Label of one page from its rendered image
   */
  classifyPageImage(pageIndex: number, imageBase64: string): Promise<PageLabel>;
}

export interface OracleClientOptions {
  apiUrl: string;
  apiKey: string;
  model: string;
  visionModel?: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  budget?: QueryBudget;
  adapter?: AxiosRequestConfig['adapter'];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class OracleClient implements ClassificationOracle {
  private client: AxiosInstance;
  private model: string;
  private visionModel: string;
  private timeoutMs: number;
  private maxRetries: number;
  private retryDelayMs: number;
  readonly budget: QueryBudget;

  constructor(options: OracleClientOptions) {
    this.model = options.model;
    this.visionModel = options.visionModel || options.model;
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries;
    this.retryDelayMs = options.retryDelayMs;
    this.budget = options.budget ?? new QueryBudget();

    if (!options.apiKey) {
      throw new ConfigError('Oracle API key is required (ORACLE_API_KEY)');
    }

    this.client = axios.create({
      baseURL: options.apiUrl,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  static fromConfig(config: Config, budget?: QueryBudget): OracleClient {
    return new OracleClient({
      apiUrl: config.oracle.apiUrl,
      apiKey: config.oracle.apiKey,
      model: config.oracle.model,
      visionModel: config.oracle.visionModel,
      timeoutMs: config.oracle.timeoutMs,
      maxRetries: config.processing.maxRetries,
      retryDelayMs: config.processing.retryDelayMs,
      budget: budget ?? new QueryBudget(config.processing.maxQueries),
    });
  }

  /**
   * Map transport failures onto the oracle error taxonomy
   */
  private toOracleError(error: unknown, endpoint: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new OracleAuthError(endpoint, status);
    }
    if (status === undefined && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
      return new OracleTimeoutError(endpoint, this.timeoutMs);
    }

    const wrapped = new OracleApiError(error.message, endpoint, status, error.response?.data);
    if (status === undefined && error.code) {
      wrapped.code = error.code;
    }
    return wrapped;
  }

  private readResult(data: unknown): string {
    if (typeof data === 'string') {
      return data;
    }
    if (typeof data === 'object' && data !== null && 'result' in data && typeof data.result === 'string') {
      return data.result;
    }
    emojiLogger.warn('Oracle response has no "result" text');
    return '';
  }

  /**
   * POST with retries. Every attempt reserves its budget slot before the request
   * goes out and records it when the request settles.
   */
  private async post(endpoint: string, body: object, source: LabelSource, pageCount: number): Promise<string> {
    return withRetry(
      async attempt => {
        if (!this.budget.tryReserve()) {
          throw new OracleApiError('Query budget exhausted', endpoint);
        }

        const startTime = Date.now();
        emojiLogger.apiCall(`${endpoint} (${pageCount} pages, attempt ${attempt + 1})`);

        try {
          const response = await this.client.post<unknown>(endpoint, body);
          const durationMs = Date.now() - startTime;
          this.budget.record({ source, endpoint, durationMs, success: true, attempt, pageCount });
          emojiLogger.apiResponse(`${endpoint} answered`, durationMs);
          return this.readResult(response.data);
        } catch (error) {
          const oracleError = this.toOracleError(error, endpoint);
          this.budget.record({
            source,
            endpoint,
            durationMs: Date.now() - startTime,
            success: false,
            attempt,
            errorMessage: oracleError.message,
            pageCount,
          });
          throw oracleError;
        }
      },
      {
        maxRetries: this.maxRetries,
        baseDelayMs: this.retryDelayMs,
        onRetry: (attempt, error, delayMs) => {
          emojiLogger.retrying(attempt, this.maxRetries, `${error.message} (waiting ${delayMs}ms)`);
        },
      }
    );
  }

  async classifyBatch(batch: Batch, corpus: PageCorpus, context: BatchContext = {}): Promise<PageLabel[]> {
    const query = buildClassificationQuery(batch, corpus, context);

    try {
      const raw = await this.post(ASK_ENDPOINT, { query, model: this.model }, LabelSource.ASK, rangeLength(batch.pageRange));
      return parseBatchReply(raw, batch);
    } catch (error) {
      if (error instanceof OracleAuthError) {
        throw error;
      }
      emojiLogger.apiCallFailure('oracle', this.model, describeError(error));
      const labels: PageLabel[] = [];
      for (let i = batch.pageRange.start; i <= batch.pageRange.end; i++) {
        labels.push(unknownLabel(i, batch.source));
      }
      return labels;
    }
  }

  async classifyPageImage(pageIndex: number, imageBase64: string): Promise<PageLabel> {
    const body = { pdfPage: imageBase64, prompt: visionPrompt, model: this.visionModel };

    try {
      const raw = await this.post(VISION_ENDPOINT, body, LabelSource.VISION, 1);
      return parseVisionReply(raw, pageIndex);
    } catch (error) {
      if (error instanceof OracleAuthError) {
        throw error;
      }
      emojiLogger.apiCallFailure('oracle', this.visionModel, describeError(error));
      return unknownLabel(pageIndex, LabelSource.VISION);
    }
  }
}

export default OracleClient;
