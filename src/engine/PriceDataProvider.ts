import { Result } from '../core/errors';
import { Interval, Period, PriceSeries } from '../types/market';

export interface PriceDataProvider {
  name: string;
  fetchPriceSeries(symbol: string, period: Period, interval: Interval): Promise<Result<PriceSeries>>;
}

export interface QuoteProvider {
  /** Latest price for `symbol`, or null when it cannot be determined. */
  latest(symbol: string): Promise<number | null>;
}
