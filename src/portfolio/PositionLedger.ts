import { PortfolioRow, PortfolioTotals, PositionState, Trade } from '../types/portfolio';

const QUANTITY_EPSILON = 1e-9;

/**
 * Orders trades by trade date; trades on the same date keep their ledger order.
 */
export const sortTrades = <T extends Trade & { sequence?: number }>(trades: readonly T[]): T[] =>
  trades
    .map((trade, index) => ({ trade, order: trade.sequence ?? index }))
    .sort((a, b) => {
      if (a.trade.tradeDate !== b.trade.tradeDate) return a.trade.tradeDate < b.trade.tradeDate ? -1 : 1;
      return a.order - b.order;
    })
    .map(({ trade }) => trade);

/**
 * Replays one symbol's trades into a position with weighted-average cost basis.
 *
 * Shorts are simplified: opening or extending a short resets the cost basis to
 * the sale price, and covering a short through a BUY only adjusts the basis.
 * Realized P&L moves only when a SELL reduces an open long.
 */
export const summarizePosition = (trades: readonly Trade[], currentPrice?: number | null): PositionState => {
  let netQty = 0;
  let avgCost = 0;
  let realized = 0;

  for (const trade of sortTrades(trades)) {
    const { quantity: qty, price, fees } = trade;

    if (trade.side === 'BUY') {
      const totalCost = avgCost * netQty + price * qty + fees;
      netQty += qty;
      if (Math.abs(netQty) < QUANTITY_EPSILON) netQty = 0;
      avgCost = netQty === 0 ? 0 : totalCost / netQty;
      continue;
    }

    if (netQty <= 0) {
      netQty -= qty;
      avgCost = price;
      realized -= fees;
      continue;
    }

    const sellQty = Math.min(qty, netQty);
    realized += (price - avgCost) * sellQty - fees;
    netQty -= sellQty;
    if (Math.abs(netQty) < QUANTITY_EPSILON) netQty = 0;

    const remainder = qty - sellQty;
    if (remainder > QUANTITY_EPSILON) {
      // Sale larger than the long: the excess opens a short at the sale price.
      netQty -= remainder;
      avgCost = price;
    } else if (netQty === 0) {
      avgCost = 0;
    }
  }

  const position = { netQuantity: netQty, averageCost: avgCost, realizedPl: realized };

  // Unknown price stays null: zero is a real P&L.
  if (currentPrice === undefined || currentPrice === null || !Number.isFinite(currentPrice)) {
    return { ...position, marketPrice: null, unrealizedPl: null, marketValue: null, totalPl: null };
  }

  const unrealized = (currentPrice - avgCost) * netQty;
  return {
    ...position,
    marketPrice: currentPrice,
    unrealizedPl: unrealized,
    marketValue: currentPrice * netQty,
    totalPl: realized + unrealized,
  };
};

/**
 * Portfolio-wide totals. Rows without a price add nothing to market value or
 * unrealized P&L and are listed under `unpriced`.
 */
export const summarizePortfolio = (rows: readonly PortfolioRow[]): PortfolioTotals =>
  rows.reduce<PortfolioTotals>(
    (totals, row) => ({
      marketValue: totals.marketValue + (row.marketValue ?? 0),
      unrealizedPl: totals.unrealizedPl + (row.unrealizedPl ?? 0),
      realizedPl: totals.realizedPl + row.realizedPl,
      unpriced: row.marketPrice === null ? [...totals.unpriced, row.symbol] : totals.unpriced,
    }),
    { marketValue: 0, unrealizedPl: 0, realizedPl: 0, unpriced: [] },
  );
