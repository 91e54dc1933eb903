/**
 * Screening run
 * Loads the registry, screens every instrument and prints the matches.
 *
 * Usage: npm run screen -- --universe=idx-liquid --indicators --csv=out/screen.csv
 */

import './load_env';
import { loadConfig, ConfigError } from '@/core/config';
import { getEnvConfig } from '@/core/env';
import { localeForCurrency } from '@/lib/currency';
import { createFetcher } from '@/providers/registry';
import { runScreen } from '@/screening/runner';
import { renderRunSummary } from '@/presentation/summary';
import { writeCsvExport, writeRunReport } from '@/run/writer';
import { CliArgumentError, parseScreenArgs, USAGE } from '@/cli/args';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('run_screen');

async function main(): Promise<void> {
  const args = parseScreenArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(USAGE);
    return;
  }

  const config = loadConfig(args.universe);
  logger.info(
    { universe: config.universe.name, path: config.universePath, symbols: config.universe.instruments.length },
    'Universe loaded'
  );

  const fetcher = createFetcher(args.provider, getEnvConfig());
  try {
    const report = await runScreen(
      config.universe.instruments,
      { ...config.screening.criteria, ...args.criteria },
      { fetcher, universeName: config.universe.name, locale: localeForCurrency(config.universe.currency) },
      { ...config.screening.run, ...args.run }
    );

    process.stdout.write(`${renderRunSummary(report)}\n`);

    if (args.csvPath) {
      writeCsvExport(args.csvPath, report);
    }
    if (args.jsonPath) {
      writeRunReport(args.jsonPath, report);
    }
  } finally {
    fetcher.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof CliArgumentError) {
    process.stderr.write(`${error.message}\n\n${USAGE}`);
  } else if (error instanceof ConfigError) {
    logger.error({ file: error.filePath, details: error.details }, error.message);
  } else {
    logger.error({ error }, 'Screening run failed');
  }
  process.exitCode = 1;
});
