/**
 * News API client
 * A single GET against /v2/everything per fetch; no retries.
 */

import { createChildLogger } from '@/utils/logger';
import { isPlainObject } from '@/utils/guards';
import type { Article } from '@/news/types';
import { ProviderError } from '../types';
import type { NewsApiOkResponse, NewsSearchClient, NewsSearchQuery } from './types';

const logger = createChildLogger('newsapi');

const BASE_URL = 'https://newsapi.org/v2';

function isOkResponse(body: unknown): body is NewsApiOkResponse {
  return isPlainObject(body) && body.status === 'ok' && Array.isArray(body.articles);
}

function readString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Maps a raw article to the cached shape. Articles without a url or a
 * publication timestamp cannot be keyed and are dropped.
 */
export function normalizeArticle(raw: unknown): Article | null {
  if (!isPlainObject(raw)) return null;

  const url = readString(raw.url);
  const publishedAt = readString(raw.publishedAt);
  if (!url || !publishedAt) return null;

  const source = isPlainObject(raw.source) ? readString(raw.source.name) : '';
  return {
    title: readString(raw.title),
    description: readString(raw.description),
    url,
    publishedAt,
    source,
  };
}

export class NewsApiClient implements NewsSearchClient {
  private readonly apiKey: string;
  private requestCount = 0;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  async searchArticles(query: NewsSearchQuery): Promise<Article[]> {
    const url = new URL(`${BASE_URL}/everything`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }

    logger.info({ q: query.q, from: query.from, to: query.to }, 'News API request');
    const response = await fetch(url.toString(), {
      headers: { 'X-Api-Key': this.apiKey },
    });
    this.requestCount++;

    let body: unknown = null;
    try {
      body = await response.json();
    } catch (error) {
      logger.warn({ status: response.status, error }, 'News API returned a non-JSON body');
    }

    if (!response.ok || !isOkResponse(body)) {
      const message =
        isPlainObject(body) && typeof body.message === 'string'
          ? body.message
          : `${response.status} ${response.statusText}`;
      throw new ProviderError(
        `News API error: ${message}`,
        'newsapi',
        query.q,
        'everything',
        response.status
      );
    }

    const articles: Article[] = [];
    for (const raw of body.articles) {
      const article = normalizeArticle(raw);
      if (article) articles.push(article);
    }

    logger.info(
      { received: body.articles.length, kept: articles.length, totalResults: body.totalResults },
      'News API articles received'
    );
    return articles;
  }
}
