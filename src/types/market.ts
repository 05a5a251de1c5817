import { INTERVALS, PERIODS } from '../config/env';

export type Period = (typeof PERIODS)[number];
export type Interval = (typeof INTERVALS)[number];

export interface PriceBar {
  timestamp: number; // epoch ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Time-ordered bars, strictly increasing timestamps. */
export type PriceSeries = readonly PriceBar[];

/** Derived values aligned 1:1 with the input; null where history is insufficient. */
export type IndicatorSeries = (number | null)[];
