/**
 * Run export writer
 * Writes the CSV table and the JSON run report when the caller asks for them.
 * Nothing here is read back by later runs.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { validateScreenRun } from '@/validation/ajv_instance';
import { renderCsv } from '@/presentation/table';
import type { ScreenRunReport } from '@/screening/types';

const logger = createChildLogger('run_writer');

export class ReportValidationError extends Error {
  constructor(public errors: string[]) {
    super(`Run report failed schema validation: ${errors.join('; ')}`);
    this.name = 'ReportValidationError';
  }
}

function resolveOutputPath(filePath: string): string {
  const resolved = isAbsolute(filePath) ? filePath : join(process.cwd(), filePath);
  mkdirSync(dirname(resolved), { recursive: true });
  return resolved;
}

export function writeCsvExport(filePath: string, report: ScreenRunReport): string {
  const resolved = resolveOutputPath(filePath);
  writeFileSync(resolved, renderCsv(report.results), 'utf-8');
  logger.info({ runId: report.runId, filePath: resolved, rows: report.results.length }, 'CSV export written');
  return resolved;
}

export function writeRunReport(filePath: string, report: ScreenRunReport): string {
  // Round-trip through JSON so the schema sees exactly what lands on disk
  const serialized = JSON.stringify(report, null, 2);
  const validation = validateScreenRun(JSON.parse(serialized));
  if (!validation.valid) {
    throw new ReportValidationError(validation.errors);
  }

  const resolved = resolveOutputPath(filePath);
  writeFileSync(resolved, serialized, 'utf-8');
  logger.info({ runId: report.runId, filePath: resolved }, 'Run report written');
  return resolved;
}
