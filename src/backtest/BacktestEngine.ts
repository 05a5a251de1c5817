import { calculateSMA } from '../analysis/indicators';
import { err, ok, Result } from '../core/errors';
import { PriceSeries } from '../types/market';
import { MetricsCalculator } from './Metrics';
import { BacktestFrameRow, BacktestResult, CrossoverWindows, Exposure } from './types';

const validateWindows = (fastWindow: number, slowWindow: number): Result<CrossoverWindows> => {
  if (!Number.isInteger(fastWindow) || fastWindow <= 0) {
    return err('InvalidParameter', `fastWindow must be a positive integer, got ${fastWindow}`);
  }
  if (!Number.isInteger(slowWindow) || slowWindow <= 0) {
    return err('InvalidParameter', `slowWindow must be a positive integer, got ${slowWindow}`);
  }
  if (fastWindow >= slowWindow) {
    return err('InvalidParameter', `fastWindow (${fastWindow}) should be smaller than slowWindow (${slowWindow})`);
  }
  return ok({ fastWindow, slowWindow });
};

const validateSeries = (series: PriceSeries): Result<PriceSeries> => {
  for (let i = 0; i < series.length; i++) {
    const bar = series[i];
    if (!Number.isFinite(bar.close) || bar.close <= 0) {
      return err('InvalidParameter', `Bar ${i} has no usable close price`);
    }
    if (i > 0 && bar.timestamp <= series[i - 1].timestamp) {
      return err('InvalidParameter', `Timestamps must be strictly increasing (bar ${i})`);
    }
  }
  return ok(series);
};

/**
 * Long-only moving average crossover backtest.
 *
 * Rows where either average is still warming up are dropped. The position held on a
 * bar is the previous bar's signal, so a bar's return is only ever earned on a
 * decision made with data available before it.
 */
export const runCrossoverBacktest = (
  series: PriceSeries,
  fastWindow: number = 20,
  slowWindow: number = 50,
): Result<BacktestResult> => {
  const windows = validateWindows(fastWindow, slowWindow);
  if (!windows.ok) return windows;

  const checked = validateSeries(series);
  if (!checked.ok) return checked;

  const closes = series.map(bar => bar.close);
  const fastMa = calculateSMA(closes, fastWindow);
  const slowMa = calculateSMA(closes, slowWindow);

  const frame: BacktestFrameRow[] = [];
  let previous: BacktestFrameRow | undefined;

  series.forEach((bar, i) => {
    const fast = fastMa[i];
    const slow = slowMa[i];
    if (fast === null || slow === null) return;

    const signal: Exposure = fast > slow ? 1 : 0;
    const position: Exposure = previous ? previous.signal : 0;
    const marketReturn = previous ? bar.close / previous.close - 1 : 0;
    const strategyReturn = position * marketReturn;

    const row: BacktestFrameRow = {
      timestamp: bar.timestamp,
      close: bar.close,
      fastMa: fast,
      slowMa: slow,
      signal,
      position,
      marketReturn,
      strategyReturn,
      cumulativeMarket: (previous ? previous.cumulativeMarket : 1) * (1 + marketReturn),
      cumulativeStrategy: (previous ? previous.cumulativeStrategy : 1) * (1 + strategyReturn),
    };
    frame.push(row);
    previous = row;
  });

  if (frame.length === 0) {
    return err(
      'InsufficientData',
      `Not enough data to compute the moving averages: ${series.length} bars for a ${slowWindow}-bar window`,
    );
  }

  return ok({ frame, statistics: MetricsCalculator.calculate(frame) });
};

export class BacktestEngine {
  private readonly fastWindow: number;
  private readonly slowWindow: number;

  constructor(config: Partial<CrossoverWindows> = {}) {
    this.fastWindow = config.fastWindow ?? 20;
    this.slowWindow = config.slowWindow ?? 50;
  }

  public get windows(): CrossoverWindows {
    return { fastWindow: this.fastWindow, slowWindow: this.slowWindow };
  }

  /**
   * Run the crossover backtest, overriding the configured windows where given.
   */
  public run(series: PriceSeries, overrides: Partial<CrossoverWindows> = {}): Result<BacktestResult> {
    return runCrossoverBacktest(
      series,
      overrides.fastWindow ?? this.fastWindow,
      overrides.slowWindow ?? this.slowWindow,
    );
  }
}
