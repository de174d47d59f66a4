/**
 * Provider types shared by the remote data sources
 */

export interface PriceBar {
  date: string; // yyyy-MM-dd
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface PriceHistoryProvider {
  /** Daily bars for the last `days` calendar days, or null when nothing is available. */
  getDailyBars(symbol: string, days: number): Promise<PriceBar[] | null>;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public status?: number,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
