export type Exposure = 0 | 1;

export interface BacktestFrameRow {
  timestamp: number;
  close: number;
  fastMa: number;
  slowMa: number;
  signal: Exposure; // 1 when fastMa > slowMa
  position: Exposure; // previous bar's signal
  marketReturn: number;
  strategyReturn: number;
  cumulativeMarket: number;
  cumulativeStrategy: number;
}

export interface BacktestStatistics {
  totalTrades: number; // position changes; a round trip counts as 2
  strategyReturnPct: number;
  marketReturnPct: number;
  maxDrawdownPct: number; // <= 0
  winRate: number; // 0-1
  sharpeRatio: number;
}

export interface BacktestResult {
  frame: BacktestFrameRow[];
  statistics: BacktestStatistics;
}

export interface CrossoverWindows {
  fastWindow: number;
  slowWindow: number;
}
