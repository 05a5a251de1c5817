export * from './types/market';
export * from './types/portfolio';
export * from './core/errors';
export * from './analysis/indicators';
export * from './backtest/types';
export { BacktestEngine, runCrossoverBacktest } from './backtest/BacktestEngine';
export { MetricsCalculator } from './backtest/Metrics';
export { summarizePosition, summarizePortfolio, sortTrades } from './portfolio/PositionLedger';
export type { LedgerStore } from './portfolio/LedgerStore';
export { InMemoryLedgerStore, JsonFileLedgerStore } from './portfolio/LedgerStore';
export type { PortfolioManagerConfig, PriceLookup } from './portfolio/PortfolioManager';
export { PortfolioManager } from './portfolio/PortfolioManager';
export type { TradeInput } from './portfolio/tradeSchema';
export { tradeInputSchema } from './portfolio/tradeSchema';
export type { PriceDataProvider, QuoteProvider } from './engine/PriceDataProvider';
export { MarketDataEngine } from './engine/MarketDataEngine';
export { YahooAdapter } from './engine/providers/YahooAdapter';
export { YahooFinanceClient } from './client/YahooFinanceClient';
