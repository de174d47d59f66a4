/**
 * Company name resolution from config/company_names.json
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { isPlainObject } from '@/utils/guards';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('company');

type NameMap = Record<string, string>;

function loadCompanyNames(projectRoot: string): NameMap {
  const path = join(projectRoot, 'config', 'company_names.json');
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    logger.warn({ path, error }, 'Unable to read company names');
    return {};
  }

  const names: NameMap = {};
  const defaults = isPlainObject(raw) ? raw.default : undefined;
  if (isPlainObject(defaults)) {
    for (const [symbol, name] of Object.entries(defaults)) {
      if (typeof name === 'string' && name.trim()) {
        names[symbol.toUpperCase()] = name;
      }
    }
  }
  return names;
}

export function getCompanyName(symbol: string, projectRoot: string = process.cwd()): string {
  const names = loadCompanyNames(projectRoot);
  return names[symbol.toUpperCase()] ?? `Company ${symbol}`;
}
