/**
 * QueryBudget.ts
 * Tracks oracle usage so callers can evaluate a run by its cost
 */
import emojiLogger from './emojiLogger';
import { LabelSource } from '../models/PageClassification';

export interface QueryRecord {
  timestamp: string;
  source: LabelSource;
  endpoint: string;
  durationMs: number;
  success: boolean;
  attempt: number;
  errorMessage?: string;
  pageCount: number;
}

export interface QueryStats {
  totalCalls: number;
  askCalls: number;
  visionCalls: number;
  failedCalls: number;
  retriedCalls: number;
  averageDurationMs: number;
  elapsedMs: number;
}

export class QueryBudget {
  private records: QueryRecord[] = [];
  private reserved = 0;
  private readonly startedAt: number;
  private readonly maxQueries: number;
  private readonly now: () => number;

  /**
   * @param maxQueries Upper bound on oracle calls for one run; 0 means unlimited
   */
  constructor(maxQueries = 0, now: () => number = Date.now) {
    this.maxQueries = Math.max(0, maxQueries);
    this.now = now;
    this.startedAt = now();
  }

  /**
   * Claim a slot for an attempt about to start. Returns false once the cap is
   * reached, counting attempts still in flight.
   */
  tryReserve(): boolean {
    if (this.exhausted()) {
      return false;
    }
    this.reserved++;
    return true;
  }

  /**
   * Record one HTTP attempt against the oracle, successful or not.
   * Fills the slot taken by tryReserve, if any.
   */
  record(entry: Omit<QueryRecord, 'timestamp'>): QueryRecord {
    if (this.reserved > 0) {
      this.reserved--;
    }
    const record: QueryRecord = { timestamp: new Date(this.now()).toISOString(), ...entry };
    this.records.push(record);
    return record;
  }

  get callCount(): number {
    return this.records.length;
  }

  /**
   * True once the configured cap has been reached
   */
  exhausted(): boolean {
    return this.maxQueries > 0 && this.records.length + this.reserved >= this.maxQueries;
  }

  getStats(): QueryStats {
    const totalDuration = this.records.reduce((sum, r) => sum + r.durationMs, 0);
    return {
      totalCalls: this.records.length,
      askCalls: this.records.filter(r => r.source === LabelSource.ASK).length,
      visionCalls: this.records.filter(r => r.source === LabelSource.VISION).length,
      failedCalls: this.records.filter(r => !r.success).length,
      retriedCalls: this.records.filter(r => r.attempt > 0).length,
      averageDurationMs: this.records.length > 0 ? totalDuration / this.records.length : 0,
      elapsedMs: this.now() - this.startedAt,
    };
  }

  logSummary(): void {
    const stats = this.getStats();
    emojiLogger.apiCallStats(stats.totalCalls, stats.failedCalls, stats.averageDurationMs, stats.elapsedMs);
  }
}

export default QueryBudget;
