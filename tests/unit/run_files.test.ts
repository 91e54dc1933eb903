import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ReportValidationError, writeCsvExport, writeRunReport } from '@/run/writer';
import { renderCsv } from '@/presentation/table';
import type { ScreenRunReport } from '@/screening/types';

let tempDir: string;

function makeReport(overrides: Partial<ScreenRunReport> = {}): ScreenRunReport {
  return {
    runId: '2026-10-15__0123abcd',
    startedAt: '2026-10-15T09:00:00.000Z',
    finishedAt: '2026-10-15T09:00:02.000Z',
    universeName: 'IDX Liquid',
    currency: 'IDR',
    criteria: { minDailyGainPct: 2, minTradedValue: 15_000_000_000, consecutiveDays: 2 },
    lookbackDays: 5,
    includeIndicators: false,
    truncated: false,
    results: [
      {
        symbol: 'BBCA.JK',
        code: 'BBCA',
        name: 'Bank Central Asia Tbk.',
        sector: 'Financials',
        asOf: '2026-10-15',
        lastClose: 10200,
        changeDay1: 2,
        changeDay2: 2.04,
        dailyChanges: [2.04, 2],
        tradedValue: 816_000_000_000,
        tradedValueFormatted: 'Rp 816.00 M',
      },
    ],
    failures: [{ symbol: 'BUKA.JK', kind: 'data_unavailable', message: 'Only 1 usable bar(s)', attempts: 1 }],
    stats: {
      attempted: 2,
      fetched: 1,
      passed: 1,
      failed: 1,
      retries: 0,
      requestCount: 2,
      removedBy: {},
    },
    ...overrides,
  };
}

describe('run writer', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'run-files-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes the run report as JSON, creating directories', () => {
    const report = makeReport();
    const filePath = join(tempDir, 'nested', 'run.json');

    const written = writeRunReport(filePath, report);

    expect(written).toBe(filePath);
    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual(report);
  });

  it('refuses to write a report that fails the schema', () => {
    const filePath = join(tempDir, 'bad.json');

    expect(() => writeRunReport(filePath, makeReport({ runId: 'not-a-run-id' }))).toThrow(
      ReportValidationError
    );
    expect(existsSync(filePath)).toBe(false);
  });

  it('writes the CSV export', () => {
    const report = makeReport();
    const filePath = join(tempDir, 'screen.csv');

    writeCsvExport(filePath, report);

    expect(readFileSync(filePath, 'utf-8')).toBe(renderCsv(report.results));
  });
});
