/**
 * Types shared by the momentum filter, the run orchestrator and presentation.
 */

export interface MomentumCriteria {
  /** Minimum close-to-close gain per session, in percent. Inclusive. */
  minDailyGainPct: number;
  /** Minimum last close x last volume, in local currency units. Inclusive. */
  minTradedValue: number;
  /** Number of consecutive sessions that must each clear the gain threshold (2..5). */
  consecutiveDays: number;
}

export const DEFAULT_CRITERIA: Readonly<MomentumCriteria> = {
  minDailyGainPct: 2.0,
  minTradedValue: 15_000_000_000,
  consecutiveDays: 2,
};

export const MIN_CONSECUTIVE_DAYS = 2;
export const MAX_CONSECUTIVE_DAYS = 5;

export type AssessmentReason =
  | 'passed'
  | 'insufficient_bars'
  | 'malformed_series'
  | 'below_gain_threshold'
  | 'below_traded_value';

export type RemovalReason = Exclude<AssessmentReason, 'passed'>;

export interface MomentumAssessment {
  passed: boolean;
  reason: AssessmentReason;
  /** Session changes in percent, oldest first. Empty when they cannot be computed. */
  dailyChanges: number[];
  tradedValue: number | null;
  lastClose: number | null;
  asOf: string | null;
}

export interface TechnicalIndicators {
  rsi14: number | null;
  sma20: number | null;
  ema20: number | null;
  volumeTrendPct: number | null;
}

export interface ScreeningResult {
  readonly symbol: string;
  readonly code: string;
  readonly name: string;
  readonly sector: string | null;
  readonly asOf: string;
  readonly lastClose: number;
  /** Change into the most recent session. */
  readonly changeDay1: number;
  /** Change into the session before that. */
  readonly changeDay2: number;
  readonly dailyChanges: ReadonlyArray<number>;
  readonly tradedValue: number;
  readonly tradedValueFormatted: string;
  readonly indicators?: TechnicalIndicators;
}

export type FailureKind = 'data_unavailable' | 'transient' | 'unexpected';

export interface ScreenFailure {
  symbol: string;
  kind: FailureKind;
  message: string;
  attempts: number;
}

export interface ScreenRunStats {
  attempted: number;
  fetched: number;
  passed: number;
  failed: number;
  retries: number;
  requestCount: number;
  removedBy: Partial<Record<RemovalReason, number>>;
}

export interface ScreenRunOptions {
  lookbackDays: number;
  indicatorLookbackDays: number;
  includeIndicators: boolean;
  maxConcurrency: number;
  maxRetries: number;
  retryBackoffMs: number;
  throttleMs: number;
  batchSize: number;
  batchPauseMs: number;
  maxSymbols: number | null;
}

export const DEFAULT_RUN_OPTIONS: Readonly<ScreenRunOptions> = {
  lookbackDays: 5,
  indicatorLookbackDays: 90,
  includeIndicators: false,
  maxConcurrency: 4,
  maxRetries: 1,
  retryBackoffMs: 500,
  throttleMs: 0,
  batchSize: 50,
  batchPauseMs: 1000,
  maxSymbols: null,
};

export interface ScreenRunReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  universeName: string;
  /** ISO 4217 code traded values are formatted in. */
  currency: string;
  criteria: MomentumCriteria;
  lookbackDays: number;
  includeIndicators: boolean;
  truncated: boolean;
  results: ScreeningResult[];
  failures: ScreenFailure[];
  stats: ScreenRunStats;
}
