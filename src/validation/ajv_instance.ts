/**
 * Ajv validation instance with schema validators
 * Config files and exported run reports must validate against schemas/
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { RawScreeningFile, RawUniverseFile } from '@/types/config';
import type { ScreenRunReport } from '@/screening/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, date-time, ...)
addFormats(ajv);

// Lazy-loaded validators
let universeValidator: ValidateFunction<RawUniverseFile> | null = null;
let screeningValidator: ValidateFunction<RawScreeningFile> | null = null;
let screenRunValidator: ValidateFunction<ScreenRunReport> | null = null;

export function getUniverseValidator(): ValidateFunction<RawUniverseFile> {
  if (!universeValidator) {
    universeValidator = ajv.compile<RawUniverseFile>(loadSchema('universe.v1'));
  }
  return universeValidator;
}

export function getScreeningValidator(): ValidateFunction<RawScreeningFile> {
  if (!screeningValidator) {
    screeningValidator = ajv.compile<RawScreeningFile>(loadSchema('screening.v1'));
  }
  return screeningValidator;
}

export function getScreenRunValidator(): ValidateFunction<ScreenRunReport> {
  if (!screenRunValidator) {
    screenRunValidator = ajv.compile<ScreenRunReport>(loadSchema('screen_run.v1'));
  }
  return screenRunValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateUniverseFile(data: unknown): ValidationResult<RawUniverseFile> {
  return runValidator(getUniverseValidator(), data);
}

export function validateScreeningFile(data: unknown): ValidationResult<RawScreeningFile> {
  return runValidator(getScreeningValidator(), data);
}

export function validateScreenRun(data: unknown): ValidationResult<ScreenRunReport> {
  return runValidator(getScreenRunValidator(), data);
}
