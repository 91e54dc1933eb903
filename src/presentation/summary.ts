import { formatLocalCurrency, localeForCurrency } from '@/lib/currency';
import { formatPercent } from '@/lib/percent';
import type { ScreenRunReport } from '@/screening/types';
import { renderTable, toDisplayTable } from './table';

export function describeCriteria(report: ScreenRunReport): string {
  const { minDailyGainPct, minTradedValue, consecutiveDays } = report.criteria;
  return `>= ${formatPercent(minDailyGainPct)} on each of ${consecutiveDays} sessions, traded value >= ${formatLocalCurrency(minTradedValue, localeForCurrency(report.currency))}`;
}

/** Everything the terminal shows after a run. */
export function renderRunSummary(report: ScreenRunReport): string {
  const { stats } = report;
  const lines = [
    `${report.universeName}: ${describeCriteria(report)}`,
    `Run ${report.runId}: ${stats.attempted} screened, ${stats.fetched} fetched, ${stats.failed} failed`,
    '',
  ];

  if (report.results.length === 0) {
    lines.push('No stocks matched the criteria in this run.');
  } else {
    lines.push(`${report.results.length} stock(s) matched:`, '', renderTable(toDisplayTable(report.results)));
  }

  if (report.failures.length > 0) {
    lines.push('', `${report.failures.length} symbol(s) could not be loaded:`);
    for (const failure of report.failures) {
      lines.push(`  ${failure.symbol}  [${failure.kind}] ${failure.message}`);
    }
  }

  return lines.join('\n');
}
