/**
 * News API response types
 * https://newsapi.org/docs/endpoints/everything
 */

import type { Article } from '@/news/types';

export interface NewsSearchQuery {
  q: string;
  from: string;
  to: string;
  language: string;
  sortBy: string;
  pageSize: number;
}

export interface NewsSearchClient {
  /** One search request; throws when the service reports a failure. */
  searchArticles(query: NewsSearchQuery): Promise<Article[]>;
}

export interface NewsApiSource {
  id: string | null;
  name: string;
}

export interface NewsApiArticle {
  source: NewsApiSource;
  author: string | null;
  title: string;
  description: string | null;
  url: string;
  urlToImage: string | null;
  publishedAt: string;
  content: string | null;
}

export interface NewsApiOkResponse {
  status: 'ok';
  totalResults?: number;
  articles: unknown[];
}
