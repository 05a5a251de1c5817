import { IndicatorSeries, PriceBar, PriceSeries } from '../types/market';

const emptySeries = (length: number): IndicatorSeries => new Array<number | null>(length).fill(null);

const isUsableWindow = (window: number, length: number): boolean =>
  Number.isInteger(window) && window > 0 && window <= length;

/**
 * Simple moving average over a strict trailing window.
 * The first `window - 1` points are null; no partial windows.
 */
export const calculateSMA = (values: readonly number[], window: number): IndicatorSeries => {
  const result = emptySeries(values.length);
  if (!isUsableWindow(window, values.length)) return result;

  for (let i = window - 1; i < values.length; i++) {
    const slice = values.slice(i - window + 1, i + 1);
    result[i] = slice.reduce((a, b) => a + b, 0) / window;
  }
  return result;
};

/**
 * Exponential moving average with α = 2 / (window + 1), seeded from the first
 * available value (adjust-free recursion, no warm-up gap).
 * Null inputs produce null outputs and leave the running average untouched.
 */
export const calculateEMA = (values: ReadonlyArray<number | null>, window: number): IndicatorSeries => {
  const result = emptySeries(values.length);
  if (!isUsableWindow(window, values.length)) return result;

  const alpha = 2 / (window + 1);
  let ema: number | null = null;

  values.forEach((value, i) => {
    if (value === null) return;
    ema = ema === null ? value : alpha * value + (1 - alpha) * ema;
    result[i] = ema;
  });
  return result;
};

/**
 * Relative Strength Index with Wilder smoothing (α = 1 / period) of gains and losses.
 * Saturates at 100 whenever the average loss is zero. The first `period` points are null.
 */
export const calculateRSI = (values: readonly number[], period: number = 14): IndicatorSeries => {
  const result = emptySeries(values.length);
  if (!isUsableWindow(period, values.length)) return result;

  const alpha = 1 / period;
  let avgGain = 0;
  let avgLoss = 0;

  for (let i = 1; i < values.length; i++) {
    const change = values[i] - values[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;

    if (i === 1) {
      avgGain = gain;
      avgLoss = loss;
    } else {
      avgGain = alpha * gain + (1 - alpha) * avgGain;
      avgLoss = alpha * loss + (1 - alpha) * avgLoss;
    }

    if (i >= period) {
      result[i] = avgLoss === 0 ? 100 : 100 - 100 / (1 + avgGain / avgLoss);
    }
  }
  return result;
};

export interface MACDResult {
  macdLine: IndicatorSeries;
  signalLine: IndicatorSeries;
  histogram: IndicatorSeries;
}

const subtract = (left: IndicatorSeries, right: IndicatorSeries): IndicatorSeries =>
  left.map((value, i) => {
    const other = right[i];
    return value === null || other === null ? null : value - other;
  });

export const calculateMACD = (
  values: readonly number[],
  fast: number = 12,
  slow: number = 26,
  signal: number = 9,
): MACDResult => {
  const macdLine = subtract(calculateEMA(values, fast), calculateEMA(values, slow));
  const signalLine = calculateEMA(macdLine, signal);

  return {
    macdLine,
    signalLine,
    histogram: subtract(macdLine, signalLine),
  };
};

export interface IndicatorSettings {
  smaWindow: number;
  emaWindow: number;
  rsiPeriod: number;
}

export interface IndicatorRow extends PriceBar {
  sma: number | null;
  ema: number | null;
  rsi: number | null;
  macd: number | null;
  macdSignal: number | null;
  macdHistogram: number | null;
  dailyChangePct: number | null;
}

export const DEFAULT_INDICATOR_SETTINGS: IndicatorSettings = {
  smaWindow: 20,
  emaWindow: 20,
  rsiPeriod: 14,
};

/**
 * Price table enriched with every indicator, one row per bar.
 */
export const buildIndicatorFrame = (
  series: PriceSeries,
  settings: IndicatorSettings = DEFAULT_INDICATOR_SETTINGS,
): IndicatorRow[] => {
  const closes = series.map(bar => bar.close);
  const sma = calculateSMA(closes, settings.smaWindow);
  const ema = calculateEMA(closes, settings.emaWindow);
  const rsi = calculateRSI(closes, settings.rsiPeriod);
  const { macdLine, signalLine, histogram } = calculateMACD(closes);

  return series.map((bar, i) => ({
    ...bar,
    sma: sma[i],
    ema: ema[i],
    rsi: rsi[i],
    macd: macdLine[i],
    macdSignal: signalLine[i],
    macdHistogram: histogram[i],
    dailyChangePct: i === 0 || closes[i - 1] === 0 ? null : (bar.close / closes[i - 1] - 1) * 100,
  }));
};
