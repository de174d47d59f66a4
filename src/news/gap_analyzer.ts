import { eachDayKey, parseDayKey } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { SymbolStore } from './symbol_store';
import type { DayRecord, RefreshPolicy } from './types';

const logger = createChildLogger('gap_analyzer');

/**
 * A cached day needs no refetch when it has articles, falls on a weekend, or
 * was confirmed empty and the policy does not ask to re-check such days.
 */
export function isDaySatisfied(record: DayRecord, policy: RefreshPolicy): boolean {
  if (record.articles.length > 0) return true;
  if (record.isWeekend === true) return true;
  return record.noNews === true && !policy.refreshNoNews;
}

export class GapAnalyzer {
  constructor(private readonly store: SymbolStore) {}

  /** Dates in `[startDate, endDate]` that must be fetched, ascending. */
  missingDates(
    symbol: string,
    startDate: string,
    endDate: string,
    policy: RefreshPolicy
  ): string[] {
    const allDates = eachDayKey(startDate, endDate);
    if (policy.refreshAll) {
      logger.info({ symbol, days: allDates.length }, 'Refreshing all articles in range');
      return allDates;
    }

    const table = this.store.load(symbol);
    const satisfied = new Set<string>();
    for (const [date, record] of Object.entries(table)) {
      if (!parseDayKey(date)) continue;
      if (date < startDate || date > endDate) continue;
      if (isDaySatisfied(record, policy)) {
        satisfied.add(date);
      }
    }

    const missing = allDates.filter((date) => !satisfied.has(date));
    logger.info(
      { symbol, missing: missing.length, total: allDates.length },
      'Missing dates computed'
    );
    return missing;
  }
}
