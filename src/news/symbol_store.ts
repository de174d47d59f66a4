/**
 * Per-symbol news cache on disk.
 *
 * One JSON file per symbol under `data/news_db/`, keyed by `yyyy-MM-dd` and
 * written newest date first. A file that is not a JSON object reads as empty;
 * inside a readable file, entries with a malformed date key or record are
 * dropped one by one and the rest of the table is kept.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { parseDayKey } from '@/core/time';
import { isPlainObject } from '@/utils/guards';
import { createChildLogger } from '@/utils/logger';
import { validateDayRecord } from '@/validation/ajv_instance';
import {
  fromStoredDayRecord,
  toStoredDayRecord,
  type DayRecord,
  type StoredDayRecord,
  type SymbolTable,
} from './types';

const logger = createChildLogger('news_store');

export function getDefaultNewsDir(): string {
  return join(process.cwd(), 'data', 'news_db');
}

export class SymbolStore {
  private readonly dataDir: string;

  constructor(dataDir: string = getDefaultNewsDir()) {
    this.dataDir = dataDir;
    mkdirSync(this.dataDir, { recursive: true });
  }

  getSymbolFilePath(symbol: string): string {
    return join(this.dataDir, `${symbol.toUpperCase()}.json`);
  }

  load(symbol: string): SymbolTable {
    const filePath = this.getSymbolFilePath(symbol);
    if (!existsSync(filePath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      logger.error({ symbol, filePath, error }, 'Error loading news data');
      return {};
    }

    if (!isPlainObject(raw)) {
      logger.error({ symbol, filePath }, 'News cache is not a JSON object, ignoring it');
      return {};
    }

    const table: SymbolTable = {};
    for (const [date, value] of Object.entries(raw)) {
      if (!parseDayKey(date)) {
        logger.warn({ symbol, key: date }, 'Skipping news cache entry with a malformed date key');
        continue;
      }
      const validation = validateDayRecord(value);
      if (!validation.valid || !validation.data) {
        logger.warn(
          { symbol, date, errors: validation.errors },
          'Skipping news cache entry that failed validation'
        );
        continue;
      }
      table[date] = fromStoredDayRecord(validation.data);
    }
    return table;
  }

  /** Replaces the symbol's file. The write goes through a temp file and a rename. */
  save(symbol: string, table: SymbolTable): void {
    const filePath = this.getSymbolFilePath(symbol);
    const sorted: Record<string, StoredDayRecord> = {};
    for (const date of Object.keys(table).sort((a, b) => b.localeCompare(a))) {
      sorted[date] = toStoredDayRecord(table[date]);
    }

    const tmpPath = `${filePath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(sorted, null, 2) + '\n', 'utf-8');
    renameSync(tmpPath, filePath);
    logger.debug({ symbol, days: Object.keys(sorted).length }, 'News data saved');
  }

  get(symbol: string, date: string): DayRecord | null {
    const table = this.load(symbol);
    return Object.hasOwn(table, date) ? table[date] : null;
  }

  put(symbol: string, date: string, record: DayRecord): void {
    const table = this.load(symbol);
    table[date] = record;
    this.save(symbol, table);
  }
}
