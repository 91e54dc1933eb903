/**
 * Schema loading utility
 * Schemas ship with the package, so they resolve from this file rather than cwd.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { SchemaObject } from 'ajv/dist/2020';

export type SchemaName = 'universe.v1' | 'screening.v1' | 'screen_run.v1';

const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

const schemaCache = new Map<SchemaName, SchemaObject>();

export function schemaPath(schemaName: SchemaName): string {
  return `${SCHEMA_DIR}${schemaName}.schema.json`;
}

export function loadSchema(schemaName: SchemaName): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schema: SchemaObject = JSON.parse(readFileSync(schemaPath(schemaName), 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}
