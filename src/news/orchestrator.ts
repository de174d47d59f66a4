/**
 * News fetch orchestration
 *
 * Serves the requested window from the per-symbol cache and fills the gaps
 * with one remote search covering the missing weekdays. Weekends are never
 * queried. A weekday the search left empty is marked `noNews` once it is more
 * than a week old, since later coverage for it is unlikely.
 */

import type { AppConfig } from '@/core/config';
import { daysBefore, eachDayKey, getCurrentDate, getDateRange, isWeekendDay } from '@/core/time';
import type { NewsSearchClient } from '@/providers/newsapi/types';
import { createChildLogger } from '@/utils/logger';
import { GapAnalyzer } from './gap_analyzer';
import { groupArticlesByDate } from './grouping';
import { NewsReader } from './news_reader';
import type { SymbolStore } from './symbol_store';
import { createDayRecord, type NewsFetchResult, type NewsFetchStats } from './types';

const logger = createChildLogger('news_fetch');

const NO_NEWS_AGE_DAYS = 7;

export type NewsFetchSettings = Pick<
  AppConfig,
  | 'max_articles_per_day'
  | 'news_api_language'
  | 'news_api_sort_by'
  | 'news_api_page_size'
  | 'news_api_query_suffix'
  | 'news_api_refresh_no_news'
  | 'news_api_refresh_articles'
>;

export interface NewsFetchOrchestratorOptions {
  store: SymbolStore;
  client: NewsSearchClient;
  settings: NewsFetchSettings;
  now?: () => Date;
}

export function buildSearchQuery(symbol: string, suffix: string): string {
  const base = symbol.replace(/^\^/, '');
  const extra = suffix.trim();
  return extra ? `${base} OR ${extra}` : base;
}

export class NewsFetchOrchestrator {
  private readonly store: SymbolStore;
  private readonly client: NewsSearchClient;
  private readonly settings: NewsFetchSettings;
  private readonly now: () => Date;
  private readonly gapAnalyzer: GapAnalyzer;
  private readonly reader: NewsReader;

  constructor(options: NewsFetchOrchestratorOptions) {
    this.store = options.store;
    this.client = options.client;
    this.settings = options.settings;
    this.now = options.now ?? getCurrentDate;
    this.gapAnalyzer = new GapAnalyzer(this.store);
    this.reader = new NewsReader(this.store);
  }

  /**
   * Articles for the last `days` days plus today, oldest first. Never throws:
   * any failure is logged and yields no articles with the stats gathered so far.
   */
  async fetch(companyName: string, symbol: string, days = 28): Promise<NewsFetchResult> {
    const stats: NewsFetchStats = { daysFromCache: 0, daysFromRemote: 0, daysWithNoNews: 0 };

    try {
      const now = this.now();
      const { startDate, endDate } = getDateRange(days, now);
      logger.info({ companyName, symbol, startDate, endDate }, 'Fetching news');

      const missing = this.gapAnalyzer.missingDates(symbol, startDate, endDate, {
        refreshAll: this.settings.news_api_refresh_articles,
        refreshNoNews: this.settings.news_api_refresh_no_news,
      });
      stats.daysFromCache = eachDayKey(startDate, endDate).length - missing.length;

      if (missing.length === 0) {
        logger.info({ symbol }, 'All dates are cached, no remote request needed');
        return this.finish(symbol, startDate, endDate, stats);
      }

      const weekendMissing = missing.filter((date) => isWeekendDay(date));
      const weekdayMissing = missing.filter((date) => !isWeekendDay(date));

      for (const date of weekendMissing) {
        this.store.put(symbol, date, createDayRecord(date, [], { isWeekend: true }));
      }
      stats.daysWithNoNews += weekendMissing.length;

      if (weekdayMissing.length === 0) {
        logger.info({ symbol, weekends: weekendMissing.length }, 'Only weekend dates were missing');
        return this.finish(symbol, startDate, endDate, stats);
      }

      const articles = await this.client.searchArticles({
        q: buildSearchQuery(symbol, this.settings.news_api_query_suffix),
        from: weekdayMissing[0],
        to: weekdayMissing[weekdayMissing.length - 1],
        language: this.settings.news_api_language,
        sortBy: this.settings.news_api_sort_by,
        pageSize: this.settings.news_api_page_size,
      });

      const byDate = groupArticlesByDate(articles);
      const requested = new Set(weekdayMissing);
      stats.daysFromRemote = [...byDate.keys()].filter((date) => requested.has(date)).length;
      stats.daysWithNoNews = Math.max(
        0,
        stats.daysWithNoNews + weekdayMissing.length - stats.daysFromRemote
      );

      for (const [date, dayArticles] of byDate) {
        this.store.put(symbol, date, createDayRecord(date, dayArticles));
      }
      for (const date of weekdayMissing) {
        if (byDate.has(date)) continue;
        const noNews = daysBefore(date, now) > NO_NEWS_AGE_DAYS;
        this.store.put(symbol, date, createDayRecord(date, [], { noNews }));
      }

      return this.finish(symbol, startDate, endDate, stats);
    } catch (error) {
      logger.error({ symbol, error }, 'Error while fetching news');
      return { articles: [], stats: { ...stats } };
    }
  }

  private finish(
    symbol: string,
    startDate: string,
    endDate: string,
    stats: NewsFetchStats
  ): NewsFetchResult {
    const articles = this.reader.assemble(
      symbol,
      startDate,
      endDate,
      this.settings.max_articles_per_day
    );
    logger.info({ symbol, articles: articles.length, ...stats }, 'News fetch complete');
    return { articles, stats: { ...stats } };
  }
}
