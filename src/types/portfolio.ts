export type TradeSide = 'BUY' | 'SELL';

export interface Trade {
  symbol: string;
  tradeDate: string; // YYYY-MM-DD
  quantity: number;
  price: number;
  side: TradeSide;
  fees: number;
}

export interface StoredTrade extends Trade {
  sequence: number; // insertion order within the ledger
}

export interface PositionState {
  netQuantity: number; // positive = long, negative = short
  averageCost: number; // 0 while flat
  realizedPl: number;
  marketPrice: number | null;
  unrealizedPl: number | null;
  marketValue: number | null;
  totalPl: number | null;
}

export interface PortfolioRow extends PositionState {
  symbol: string;
}

export interface PortfolioTotals {
  marketValue: number;
  unrealizedPl: number;
  realizedPl: number;
  unpriced: string[]; // symbols without a market price
}
