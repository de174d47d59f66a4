/**
 * Technical indicators over daily price bars
 */

import type { PriceBar } from '@/providers/types';

const TRADING_DAYS_PER_YEAR = 252;
const RSI_PERIOD = 14;
const MA_PERIOD = 7;

export interface TechnicalIndicators {
  firstPrice: number;
  lastPrice: number;
  /** Percent change from the first to the last close. */
  trendPct: number;
  /** Annualized volatility of daily returns, in percent. */
  volatility: number;
  avgVolume: number;
  rsi: number;
  ma7: number | null;
  periodStart: string;
  periodEnd: string;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance =
    values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function dailyReturns(closes: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    if (closes[i - 1] === 0) continue;
    returns.push(closes[i] / closes[i - 1] - 1);
  }
  return returns;
}

/**
 * RSI from simple means of the last `period` gains and losses. Needs
 * `period` changes (period + 1 closes); returns 0 with fewer.
 */
export function calculateRsi(closes: number[], period: number = RSI_PERIOD): number {
  if (closes.length < period + 1) return 0;

  const recent = closes.slice(-(period + 1));
  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < recent.length; i++) {
    const change = recent[i] - recent[i - 1];
    gains.push(Math.max(change, 0));
    losses.push(Math.max(-change, 0));
  }

  const avgGain = mean(gains);
  const avgLoss = mean(losses);
  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function calculateTechnicalIndicators(bars: PriceBar[]): TechnicalIndicators | null {
  if (bars.length === 0) return null;

  const closes = bars.map((bar) => bar.close);
  const firstPrice = closes[0];
  const lastPrice = closes[closes.length - 1];

  return {
    firstPrice,
    lastPrice,
    trendPct: firstPrice === 0 ? 0 : ((lastPrice - firstPrice) / firstPrice) * 100,
    volatility: sampleStdDev(dailyReturns(closes)) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100,
    avgVolume: mean(bars.map((bar) => bar.volume)),
    rsi: calculateRsi(closes),
    ma7: closes.length >= MA_PERIOD ? mean(closes.slice(-MA_PERIOD)) : null,
    periodStart: bars[0].date,
    periodEnd: bars[bars.length - 1].date,
  };
}
