import { describe, expect, it, vi } from 'vitest';
import {
  toPriceBar,
  YahooPriceHistoryProvider,
  type ChartFetcher,
} from '@/providers/yahoo/price_history';

const NOW = new Date(2024, 2, 15, 12, 0, 0);

describe('toPriceBar', () => {
  it('skips quotes without a close', () => {
    expect(toPriceBar({ date: new Date(2024, 2, 1), close: null })).toBeNull();
  });

  it('fills missing fields from the close', () => {
    expect(toPriceBar({ date: new Date(2024, 2, 1), close: 10, volume: null })).toEqual({
      date: '2024-03-01',
      open: 10,
      high: 10,
      low: 10,
      close: 10,
      volume: 0,
    });
  });
});

describe('YahooPriceHistoryProvider.getDailyBars', () => {
  it('requests daily bars for the period', async () => {
    const fetchChart = vi.fn<ChartFetcher>().mockResolvedValue({
      quotes: [
        { date: new Date(2024, 2, 14), open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 },
        { date: new Date(2024, 2, 15), close: null },
      ],
    });
    const provider = new YahooPriceHistoryProvider({ fetchChart, now: () => NOW });

    const result = await provider.getDailyBars('AAPL', 28);

    expect(result).toEqual([
      { date: '2024-03-14', open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 },
    ]);
    expect(fetchChart).toHaveBeenCalledWith('AAPL', {
      period1: new Date(2024, 1, 16, 12, 0, 0),
      period2: NOW,
      interval: '1d',
    });
  });

  it('returns null when nothing usable comes back', async () => {
    const fetchChart = vi.fn<ChartFetcher>().mockResolvedValue({ quotes: [] });
    const provider = new YahooPriceHistoryProvider({ fetchChart, now: () => NOW });
    expect(await provider.getDailyBars('AAPL', 28)).toBeNull();
  });

  it('returns null when the request fails', async () => {
    const fetchChart = vi.fn<ChartFetcher>().mockRejectedValue(new Error('offline'));
    const provider = new YahooPriceHistoryProvider({ fetchChart, now: () => NOW });
    expect(await provider.getDailyBars('AAPL', 28)).toBeNull();
  });
});
