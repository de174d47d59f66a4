import { appendFileSync } from 'fs';
import type { NewsFetchStats } from '@/news/types';
import type { LogCounters } from '@/utils/logger';

const RULE = '='.repeat(50);

export function formatLogSummary(stats: NewsFetchStats | null, counters: LogCounters): string {
  const lines = ['', RULE, 'LOG SUMMARY:'];

  if (stats) {
    lines.push(
      '',
      'NEWS RETRIEVAL STATISTICS:',
      `- Number of days with news retrieved from Database: ${stats.daysFromCache}`,
      `- Number of days with news retrieved with NewsAPI: ${stats.daysFromRemote}`,
      `- Number of days with no news: ${stats.daysWithNoNews}`
    );
  }

  lines.push(
    '',
    'LOG MESSAGE COUNT:',
    `INFO: ${counters.INFO}`,
    `WARNING: ${counters.WARNING}`,
    `ERROR: ${counters.ERROR}`,
    RULE,
    ''
  );
  return lines.join('\n');
}

export function appendLogSummary(
  logFilePath: string,
  stats: NewsFetchStats | null,
  counters: LogCounters
): void {
  appendFileSync(logFilePath, formatLogSummary(stats, counters), 'utf-8');
}
