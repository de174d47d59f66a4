/**
 * Ajv validation instance with schema validators
 * Config files and the news cache are checked against the JSON schemas in schemas/
 */

import Ajv2020, { type ErrorObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { ConfigFile } from '@/core/config_types';
import type { StoredDayRecord } from '@/news/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
  useDefaults: true,
});

addFormats(ajv);

// Lazy-loaded validators
let configValidator: ValidateFunction<ConfigFile> | null = null;
let dayRecordValidator: ValidateFunction<StoredDayRecord> | null = null;

export function getConfigValidator(): ValidateFunction<ConfigFile> {
  if (!configValidator) {
    configValidator = ajv.compile<ConfigFile>(loadSchema('config.v1'));
  }
  return configValidator;
}

/** Validator for one entry of a news cache table (`$defs/dayRecord`). */
export function getDayRecordValidator(): ValidateFunction<StoredDayRecord> {
  if (!dayRecordValidator) {
    const tableSchema = loadSchema('news_symbol_table.v1');
    const tableId = tableSchema.$id;
    if (typeof tableId !== 'string') {
      throw new Error('news_symbol_table.v1 schema has no $id');
    }
    if (!ajv.getSchema(tableId)) {
      ajv.addSchema(tableSchema);
    }
    dayRecordValidator = ajv.compile<StoredDayRecord>({ $ref: `${tableId}#/$defs/dayRecord` });
  }
  return dayRecordValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string[] {
  return errors?.map((e) => `${e.instancePath || 'root'}: ${e.message}`) ?? [
    'Unknown validation error',
  ];
}

export function validateDayRecord(data: unknown): ValidationResult<StoredDayRecord> {
  const validate = getDayRecordValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  return { valid: false, data: null, errors: formatValidationErrors(validate.errors) };
}
