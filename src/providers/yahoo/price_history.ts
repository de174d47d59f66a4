/**
 * Daily price history from Yahoo Finance (yahoo-finance2 chart endpoint)
 */

import YahooFinance from 'yahoo-finance2';
import { subDays } from 'date-fns';
import { formatDate, getCurrentDate } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { PriceBar, PriceHistoryProvider } from '../types';

const logger = createChildLogger('yahoo_price_history');

export interface ChartQuote {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
}

export type ChartFetcher = (
  symbol: string,
  options: { period1: Date; period2: Date; interval: '1d' }
) => Promise<{ quotes: ChartQuote[] }>;

function createChartFetcher(): ChartFetcher {
  const yahooFinance = new YahooFinance({ suppressNotices: ['yahooSurvey'] });
  return (symbol, options) => yahooFinance.chart(symbol, options);
}

export function toPriceBar(quote: ChartQuote): PriceBar | null {
  const close = quote.close;
  if (close === null || close === undefined) return null;
  return {
    date: formatDate(quote.date),
    open: quote.open ?? close,
    high: quote.high ?? close,
    low: quote.low ?? close,
    close,
    volume: quote.volume ?? 0,
  };
}

export class YahooPriceHistoryProvider implements PriceHistoryProvider {
  private readonly fetchChart: ChartFetcher;
  private readonly now: () => Date;

  constructor(options: { fetchChart?: ChartFetcher; now?: () => Date } = {}) {
    this.fetchChart = options.fetchChart ?? createChartFetcher();
    this.now = options.now ?? getCurrentDate;
  }

  async getDailyBars(symbol: string, days: number): Promise<PriceBar[] | null> {
    const period2 = this.now();
    const period1 = subDays(period2, days);
    logger.info({ symbol, from: formatDate(period1), to: formatDate(period2) }, 'Loading price history');

    try {
      const { quotes } = await this.fetchChart(symbol, { period1, period2, interval: '1d' });
      const bars: PriceBar[] = [];
      for (const quote of quotes) {
        const bar = toPriceBar(quote);
        if (bar) bars.push(bar);
      }

      if (bars.length === 0) {
        logger.warn({ symbol }, 'No price history available');
        return null;
      }

      logger.info({ symbol, bars: bars.length }, 'Price history loaded');
      return bars;
    } catch (error) {
      logger.error({ symbol, error }, 'Error while loading price history');
      return null;
    }
  }
}
