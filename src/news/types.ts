/**
 * News cache types.
 *
 * `DayRecord` is the in-memory shape; `StoredDayRecord` is what lands in
 * `data/news_db/<SYMBOL>.json`.
 */

export interface Article {
  title: string;
  description: string;
  url: string;
  publishedAt: string;
  source: string;
}

export interface DayRecord {
  date: string;
  articles: Article[];
  totalArticles: number;
  isWeekend?: boolean;
  noNews?: boolean;
}

export interface StoredDayRecord {
  date: string;
  articles: Article[];
  total_articles: number;
  is_weekend?: boolean;
  no_news?: boolean;
}

/** Date key (`yyyy-MM-dd`) to record, one table per symbol. */
export type SymbolTable = Record<string, DayRecord>;

export interface NewsFetchStats {
  daysFromCache: number;
  daysFromRemote: number;
  daysWithNoNews: number;
}

export interface NewsFetchResult {
  articles: Article[];
  stats: NewsFetchStats;
}

export interface RefreshPolicy {
  /** Treat every date in range as missing. */
  refreshAll: boolean;
  /** Re-check weekdays previously confirmed to have no news. */
  refreshNoNews: boolean;
}

export function createDayRecord(
  date: string,
  articles: Article[],
  flags: { isWeekend?: boolean; noNews?: boolean } = {}
): DayRecord {
  const record: DayRecord = {
    date,
    articles,
    totalArticles: articles.length,
  };
  if (flags.isWeekend) record.isWeekend = true;
  if (flags.noNews) record.noNews = true;
  return record;
}

export function toStoredDayRecord(record: DayRecord): StoredDayRecord {
  const stored: StoredDayRecord = {
    date: record.date,
    articles: record.articles,
    total_articles: record.totalArticles,
  };
  if (record.isWeekend !== undefined) stored.is_weekend = record.isWeekend;
  if (record.noNews !== undefined) stored.no_news = record.noNews;
  return stored;
}

export function fromStoredDayRecord(stored: StoredDayRecord): DayRecord {
  const record: DayRecord = {
    date: stored.date,
    articles: stored.articles,
    totalArticles: stored.total_articles,
  };
  if (stored.is_weekend !== undefined) record.isWeekend = stored.is_weekend;
  if (stored.no_news !== undefined) record.noNews = stored.no_news;
  return record;
}
