/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { SchemaObject } from 'ajv';

// Schemas ship with the code, so they are found relative to this module rather than the cwd
const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

const schemaCache = new Map<string, SchemaObject>();

export function loadSchema(schemaName: string): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(SCHEMA_DIR, `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema: SchemaObject = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}
