import { BacktestFrameRow, BacktestStatistics } from './types';

const TRADING_DAYS_PER_YEAR = 252;

export class MetricsCalculator {
  public static calculate(frame: readonly BacktestFrameRow[]): BacktestStatistics {
    if (frame.length === 0) {
      return this.createEmptyMetrics();
    }

    let totalTrades = 0;
    let activePeriods = 0;
    let winningPeriods = 0;

    frame.forEach((row, i) => {
      if (i > 0) {
        totalTrades += Math.abs(row.position - frame[i - 1].position);
      }
      if (row.position !== 0) {
        activePeriods++;
        if (row.strategyReturn > 0) winningPeriods++;
      }
    });

    const last = frame[frame.length - 1];

    return {
      totalTrades,
      strategyReturnPct: (last.cumulativeStrategy - 1) * 100,
      marketReturnPct: (last.cumulativeMarket - 1) * 100,
      maxDrawdownPct: this.maxDrawdown(frame.map(row => row.cumulativeStrategy)) * 100,
      winRate: activePeriods === 0 ? 0 : winningPeriods / activePeriods,
      sharpeRatio: this.sharpeRatio(frame.map(row => row.strategyReturn)),
    };
  }

  /**
   * Deepest decline of a cumulative series from its running peak, as a fraction (<= 0).
   */
  public static maxDrawdown(cumulative: readonly number[]): number {
    let peak = -Infinity;
    let maxDrawdown = 0;

    for (const value of cumulative) {
      if (value > peak) peak = value;
      if (peak <= 0) continue;
      const dd = value / peak - 1;
      if (dd < maxDrawdown) maxDrawdown = dd;
    }
    return maxDrawdown;
  }

  /**
   * Annualized mean / sample standard deviation of per-bar returns (risk free = 0).
   */
  public static sharpeRatio(returns: readonly number[]): number {
    if (returns.length < 2) return 0;

    const avgReturn = returns.reduce((a, b) => a + b, 0) / returns.length;
    const variance = returns.reduce((a, b) => a + Math.pow(b - avgReturn, 2), 0) / (returns.length - 1);
    const stdDev = Math.sqrt(variance);

    if (stdDev === 0 || !Number.isFinite(stdDev)) return 0;
    return (avgReturn / stdDev) * Math.sqrt(TRADING_DAYS_PER_YEAR);
  }

  private static createEmptyMetrics(): BacktestStatistics {
    return {
      totalTrades: 0,
      strategyReturnPct: 0,
      marketReturnPct: 0,
      maxDrawdownPct: 0,
      winRate: 0,
      sharpeRatio: 0,
    };
  }
}
