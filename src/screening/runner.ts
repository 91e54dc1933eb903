/**
 * Screening run orchestrator
 *
 * Fetches each instrument's series, evaluates it and collects the qualifying
 * rows. Every instrument is attempted on its own: a fetch failure is logged,
 * recorded in the report and never stops the rest of the universe.
 */

import { createChildLogger } from '@/utils/logger';
import { getRunId, sleep as defaultSleep } from '@/core/time';
import { hashObject } from '@/utils/hash';
import { mapWithConcurrency } from '@/utils/pool';
import { RequestThrottler } from '@/utils/throttler';
import { IDR_LOCALE, type CurrencyLocale } from '@/lib/currency';
import {
  DataUnavailableError,
  TransientFetchError,
  type Instrument,
  type PriceSeries,
  type PriceSeriesFetcher,
} from '@/providers/types';
import { calculateIndicators } from './indicators';
import { assessMomentum, resolveCriteria, toScreeningResult } from './momentum';
import {
  DEFAULT_RUN_OPTIONS,
  type FailureKind,
  type MomentumAssessment,
  type MomentumCriteria,
  type ScreenFailure,
  type ScreeningResult,
  type ScreenRunOptions,
  type ScreenRunReport,
  type ScreenRunStats,
} from './types';

const logger = createChildLogger('screen_runner');

export interface ScreenRunDependencies {
  fetcher: PriceSeriesFetcher;
  universeName?: string;
  locale?: CurrencyLocale;
  throttler?: RequestThrottler;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

type InstrumentOutcome =
  | { status: 'evaluated'; assessment: MomentumAssessment; result: ScreeningResult | null; retries: number }
  | { status: 'failed'; failure: ScreenFailure; retries: number };

export function applySymbolLimit(
  universe: ReadonlyArray<Instrument>,
  maxSymbols?: number | null
): { instruments: ReadonlyArray<Instrument>; truncated: boolean } {
  if (!maxSymbols || maxSymbols <= 0 || universe.length <= maxSymbols) {
    return { instruments: universe, truncated: false };
  }
  return { instruments: universe.slice(0, maxSymbols), truncated: true };
}

/** Highest traded value first, symbol as tie-break. */
export function sortResultsDeterministic(results: ReadonlyArray<ScreeningResult>): ScreeningResult[] {
  return [...results].sort((a, b) => {
    if (b.tradedValue !== a.tradedValue) {
      return b.tradedValue - a.tradedValue;
    }
    return a.symbol.localeCompare(b.symbol);
  });
}

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof DataUnavailableError) return 'data_unavailable';
  if (error instanceof TransientFetchError) return 'transient';
  return 'unexpected';
}

async function fetchWithRetry(
  instrument: Instrument,
  lookbackDays: number,
  options: ScreenRunOptions,
  deps: Required<Pick<ScreenRunDependencies, 'fetcher' | 'throttler' | 'sleep'>>
): Promise<{ series: PriceSeries; retries: number } | { error: unknown; attempts: number }> {
  let attempt = 0;
  for (;;) {
    attempt += 1;
    try {
      const series = await deps.throttler.schedule(() => deps.fetcher.fetch(instrument, lookbackDays));
      return { series, retries: attempt - 1 };
    } catch (error) {
      if (!(error instanceof TransientFetchError) || attempt > options.maxRetries) {
        return { error, attempts: attempt };
      }
      const backoffMs = options.retryBackoffMs * Math.pow(2, attempt - 1);
      logger.warn(
        { symbol: instrument.symbol, attempt, backoffMs, error: error.message },
        'Transient fetch failure, retrying'
      );
      await deps.sleep(backoffMs);
    }
  }
}

export async function runScreen(
  universe: ReadonlyArray<Instrument>,
  criteria: Partial<MomentumCriteria>,
  deps: ScreenRunDependencies,
  runOptions: Partial<ScreenRunOptions> = {}
): Promise<ScreenRunReport> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const resolvedCriteria = resolveCriteria(criteria);
  const options: ScreenRunOptions = { ...DEFAULT_RUN_OPTIONS, ...runOptions };
  const lookbackDays = options.includeIndicators
    ? Math.max(options.lookbackDays, options.indicatorLookbackDays)
    : options.lookbackDays;
  const locale = deps.locale ?? IDR_LOCALE;
  const universeName = deps.universeName ?? 'Universe';

  const throttler =
    deps.throttler ??
    new RequestThrottler({
      minIntervalMs: options.throttleMs,
      batchSize: options.batchSize,
      batchPauseMs: options.batchPauseMs,
      sleep: deps.sleep,
    });
  const fetchDeps = { fetcher: deps.fetcher, throttler, sleep: deps.sleep ?? defaultSleep };
  const requestsBefore = deps.fetcher.getRequestCount();

  const { instruments, truncated } = applySymbolLimit(universe, options.maxSymbols);
  if (truncated) {
    logger.warn(
      { requested: universe.length, screened: instruments.length },
      'Universe truncated to maxSymbols'
    );
  }

  logger.info(
    {
      universe: universeName,
      symbolCount: instruments.length,
      criteria: resolvedCriteria,
      lookbackDays,
      concurrency: options.maxConcurrency,
    },
    'Starting screening run'
  );

  const outcomes = await mapWithConcurrency(
    instruments,
    options.maxConcurrency,
    async (instrument): Promise<InstrumentOutcome> => {
      try {
        const fetched = await fetchWithRetry(instrument, lookbackDays, options, fetchDeps);
        if ('error' in fetched) {
          const kind = classifyFailure(fetched.error);
          const message = fetched.error instanceof Error ? fetched.error.message : String(fetched.error);
          const context = { symbol: instrument.symbol, kind, attempts: fetched.attempts, error: message };
          if (kind === 'unexpected') {
            logger.error(context, 'Skipping instrument');
          } else {
            logger.warn(context, 'Skipping instrument');
          }
          return {
            status: 'failed',
            failure: { symbol: instrument.symbol, kind, message, attempts: fetched.attempts },
            retries: fetched.attempts - 1,
          };
        }

        if (fetched.series.currency && fetched.series.currency !== locale.code) {
          logger.warn(
            { symbol: instrument.symbol, quoted: fetched.series.currency, registry: locale.code },
            'Quote currency differs from the registry currency'
          );
        }
        const assessment = assessMomentum(fetched.series, resolvedCriteria);
        let result = toScreeningResult(fetched.series, assessment, locale);
        if (result && options.includeIndicators) {
          result = { ...result, indicators: calculateIndicators(fetched.series.bars) };
        }
        logger.debug(
          { symbol: instrument.symbol, reason: assessment.reason, changes: assessment.dailyChanges },
          'Evaluated instrument'
        );
        return { status: 'evaluated', assessment, result, retries: fetched.retries };
      } catch (error) {
        // Evaluation bugs are contained to the instrument as well
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ symbol: instrument.symbol, error: message }, 'Unexpected error while screening');
        return {
          status: 'failed',
          failure: { symbol: instrument.symbol, kind: 'unexpected', message, attempts: 1 },
          retries: 0,
        };
      }
    }
  );

  const stats: ScreenRunStats = {
    attempted: instruments.length,
    fetched: 0,
    passed: 0,
    failed: 0,
    retries: 0,
    requestCount: deps.fetcher.getRequestCount() - requestsBefore,
    removedBy: {},
  };
  const results: ScreeningResult[] = [];
  const failures: ScreenFailure[] = [];

  for (const outcome of outcomes) {
    stats.retries += outcome.retries;
    if (outcome.status === 'failed') {
      stats.failed += 1;
      failures.push(outcome.failure);
      continue;
    }
    stats.fetched += 1;
    const { reason } = outcome.assessment;
    if (outcome.result) {
      stats.passed += 1;
      results.push(outcome.result);
    } else if (reason !== 'passed') {
      stats.removedBy[reason] = (stats.removedBy[reason] ?? 0) + 1;
    }
  }

  const finishedAt = now();
  const report: ScreenRunReport = {
    runId: getRunId(
      startedAt,
      hashObject({ universeName, symbols: instruments.map((i) => i.symbol), criteria: resolvedCriteria, lookbackDays })
    ),
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    universeName,
    currency: locale.code,
    criteria: resolvedCriteria,
    lookbackDays,
    includeIndicators: options.includeIndicators,
    truncated,
    results: sortResultsDeterministic(results),
    failures: failures.sort((a, b) => a.symbol.localeCompare(b.symbol)),
    stats,
  };

  logger.info(
    {
      runId: report.runId,
      passed: stats.passed,
      failed: stats.failed,
      removedBy: stats.removedBy,
      requestCount: stats.requestCount,
    },
    'Screening run complete'
  );

  return report;
}
