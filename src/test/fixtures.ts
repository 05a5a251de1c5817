import { PriceBar } from '../types/market';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2024, 0, 2);

/** Daily bars with the given closes; open/high/low are derived from the close. */
export const makeSeries = (closes: readonly number[]): PriceBar[] =>
  closes.map((close, i) => ({
    timestamp: START + i * DAY_MS,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1000 + i,
  }));
