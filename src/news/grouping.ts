import type { Article } from './types';

/** `yyyy-MM-dd` part of an ISO timestamp, or null when there is none. */
export function articleDate(article: Article): string | null {
  const [date] = article.publishedAt.split('T');
  return /^\d{4}-\d{2}-\d{2}$/.test(date) ? date : null;
}

/**
 * Appends `incoming` to `existing`, skipping urls already present in either.
 */
export function mergeArticles(existing: Article[], incoming: Article[]): Article[] {
  const seen = new Set(existing.map((article) => article.url));
  const merged = [...existing];
  for (const article of incoming) {
    if (seen.has(article.url)) continue;
    seen.add(article.url);
    merged.push(article);
  }
  return merged;
}

/** Groups articles by publication date, keeping remote order within a day. */
export function groupArticlesByDate(articles: Article[]): Map<string, Article[]> {
  const groups = new Map<string, Article[]>();
  for (const article of articles) {
    const date = articleDate(article);
    if (!date) continue;
    groups.set(date, mergeArticles(groups.get(date) ?? [], [article]));
  }
  return groups;
}
