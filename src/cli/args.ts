/**
 * Flag parsing for scripts/run_screen.ts. Accepts `--flag=value` and `--flag value`.
 */

import type { FetcherType } from '@/core/env';
import type { MomentumCriteria, ScreenRunOptions } from '@/screening/types';

export interface ScreenCliArgs {
  universe?: string;
  provider?: FetcherType;
  criteria: Partial<MomentumCriteria>;
  run: Partial<ScreenRunOptions>;
  csvPath?: string;
  jsonPath?: string;
  help: boolean;
}

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

const BOOLEAN_FLAGS = new Set(['--indicators', '--help', '-h']);

const VALUE_FLAGS = new Set([
  '--universe',
  '--provider',
  '--min-gain',
  '--min-value',
  '--min-value-bn',
  '--days',
  '--lookback',
  '--max-symbols',
  '--concurrency',
  '--retries',
  '--csv',
  '--json',
]);

export const USAGE = `Usage: npm run screen -- [options]

  --universe=<name|path>   registry pack under config/universes or a JSON path
  --provider=<yahoo|fixture>
  --min-gain=<pct>         minimum gain per session (default 2)
  --min-value=<rupiah>     minimum traded value (default 15000000000)
  --min-value-bn=<miliar>  minimum traded value in billions of rupiah
  --days=<2..5>            consecutive sessions (default 2)
  --lookback=<days>        calendar days of history to request (default 5)
  --indicators             add RSI, SMA, EMA and volume trend (longer lookback)
  --max-symbols=<n>        screen only the first n instruments
  --concurrency=<n>        parallel fetches (default 4)
  --retries=<n>            retries after a transient fetch failure (default 1)
  --csv=<path>             also write the results as CSV
  --json=<path>            also write the full run report as JSON
`;

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliArgumentError(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

function parseInteger(flag: string, raw: string, min: number): number {
  const value = parseNumber(flag, raw);
  if (!Number.isInteger(value) || value < min) {
    throw new CliArgumentError(`${flag} expects an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function parseScreenArgs(argv: ReadonlyArray<string>): ScreenCliArgs {
  const args: ScreenCliArgs = { criteria: {}, run: {}, help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const eq = token.indexOf('=');
    const flag = eq >= 0 ? token.slice(0, eq) : token;

    if (BOOLEAN_FLAGS.has(flag)) {
      if (flag === '--indicators') args.run.includeIndicators = true;
      else args.help = true;
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new CliArgumentError(`Unknown option: ${flag}`);
    }

    let value: string;
    if (eq >= 0) {
      value = token.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliArgumentError(`${flag} expects a value`);
      }
      value = next;
      i += 1;
    }

    switch (flag) {
      case '--universe':
        args.universe = value;
        break;
      case '--provider':
        if (value !== 'yahoo' && value !== 'fixture') {
          throw new CliArgumentError(`--provider expects yahoo or fixture, got "${value}"`);
        }
        args.provider = value;
        break;
      case '--min-gain':
        args.criteria.minDailyGainPct = parseNumber(flag, value);
        break;
      case '--min-value':
        args.criteria.minTradedValue = parseNumber(flag, value);
        break;
      case '--min-value-bn':
        args.criteria.minTradedValue = Math.round(parseNumber(flag, value) * 1_000_000_000);
        break;
      case '--days': {
        const days = parseInteger(flag, value, 2);
        if (days > 5) throw new CliArgumentError(`--days expects 2..5, got "${value}"`);
        args.criteria.consecutiveDays = days;
        break;
      }
      case '--lookback':
        args.run.lookbackDays = parseInteger(flag, value, 2);
        break;
      case '--max-symbols':
        args.run.maxSymbols = parseInteger(flag, value, 1);
        break;
      case '--concurrency':
        args.run.maxConcurrency = parseInteger(flag, value, 1);
        break;
      case '--retries':
        args.run.maxRetries = parseInteger(flag, value, 0);
        break;
      case '--csv':
        args.csvPath = value;
        break;
      case '--json':
        args.jsonPath = value;
        break;
    }
  }

  return args;
}
