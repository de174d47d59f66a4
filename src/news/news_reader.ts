import { eachDayKey } from '@/core/time';
import { isPositiveInteger } from '@/utils/guards';
import { createChildLogger } from '@/utils/logger';
import type { SymbolStore } from './symbol_store';
import type { Article } from './types';

const logger = createChildLogger('news_reader');

export class NewsReader {
  constructor(private readonly store: SymbolStore) {}

  /**
   * Articles for every cached weekday in range, oldest date first. Within a
   * day the stored order is kept and a positive `maxArticlesPerDay` caps the count.
   */
  assemble(
    symbol: string,
    startDate: string,
    endDate: string,
    maxArticlesPerDay: number | null
  ): Article[] {
    const table = this.store.load(symbol);
    const cap = isPositiveInteger(maxArticlesPerDay) ? maxArticlesPerDay : null;

    const articles: Article[] = [];
    for (const date of eachDayKey(startDate, endDate)) {
      if (!Object.hasOwn(table, date)) continue;
      const record = table[date];
      if (record.isWeekend === true) continue;
      const dayArticles = record.articles;
      articles.push(...(cap === null ? dayArticles : dayArticles.slice(0, cap)));
    }

    logger.info(
      { symbol, articles: articles.length, maxArticlesPerDay: cap },
      'Assembled cached news'
    );
    return articles;
  }
}
