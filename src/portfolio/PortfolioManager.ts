import { err, ok, Result } from '../core/errors';
import { QuoteProvider } from '../engine/PriceDataProvider';
import { PortfolioRow, StoredTrade } from '../types/portfolio';
import { logger } from '../utils/logger';
import { normalizeSymbol } from '../utils/symbols';
import { LedgerStore } from './LedgerStore';
import { sortTrades, summarizePosition } from './PositionLedger';
import { tradeInputSchema } from './tradeSchema';

export interface PortfolioManagerConfig {
  store: LedgerStore;
  quotes: QuoteProvider;
  quoteTimeoutMs?: number;
}

export type PriceLookup = Record<string, number | null | undefined> | Map<string, number | null>;

/**
 * Usable supplied prices keyed by normalized symbol.
 */
const normalizePrices = (prices: PriceLookup): Map<string, number> => {
  const entries = prices instanceof Map ? [...prices.entries()] : Object.entries(prices);
  const normalized = new Map<string, number>();
  for (const [symbol, price] of entries) {
    if (price === undefined || price === null || !Number.isFinite(price)) continue;
    normalized.set(normalizeSymbol(symbol), price);
  }
  return normalized;
};

export class PortfolioManager {
  private readonly store: LedgerStore;
  private readonly quotes: QuoteProvider;
  private readonly quoteTimeoutMs: number;

  constructor(config: PortfolioManagerConfig) {
    this.store = config.store;
    this.quotes = config.quotes;
    this.quoteTimeoutMs = config.quoteTimeoutMs ?? 10000;
  }

  /**
   * Validate and append a trade. Rejected input never reaches the store.
   */
  public async addTrade(input: unknown): Promise<Result<StoredTrade>> {
    const parsed = tradeInputSchema.safeParse(input);
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => issue.message).join('; ');
      return err('InvalidParameter', message, parsed.error);
    }

    const stored = await this.store.append(parsed.data);
    logger.debug({ symbol: stored.symbol, side: stored.side, sequence: stored.sequence }, 'Trade recorded');
    return ok(stored);
  }

  public async clearTrades(): Promise<void> {
    await this.store.clear();
    logger.info('Trade ledger cleared');
  }

  /** Ledger ordered by trade date, same-day trades in insertion order. */
  public async getTrades(): Promise<StoredTrade[]> {
    return sortTrades(await this.store.listAll());
  }

  /**
   * One row per symbol, in order of first appearance in the date-ordered ledger.
   * Symbols without a supplied price are quoted concurrently; a failed quote leaves
   * that row's market fields null.
   */
  public async getPortfolioSummary(latestPrices: PriceLookup = {}): Promise<PortfolioRow[]> {
    const trades = await this.getTrades();
    if (trades.length === 0) return [];

    const bySymbol = new Map<string, StoredTrade[]>();
    for (const trade of trades) {
      const list = bySymbol.get(trade.symbol);
      if (list) list.push(trade);
      else bySymbol.set(trade.symbol, [trade]);
    }

    const symbols = [...bySymbol.keys()];
    const supplied = normalizePrices(latestPrices);
    const prices = new Map<string, number | null>();
    for (const symbol of symbols) prices.set(symbol, supplied.get(symbol) ?? null);

    const missing = symbols.filter(symbol => prices.get(symbol) === null);
    if (missing.length > 0) {
      const fetched = await Promise.all(missing.map(symbol => this.fetchQuote(symbol)));
      missing.forEach((symbol, i) => prices.set(symbol, fetched[i]));
    }

    return symbols.map(symbol => ({
      symbol,
      ...summarizePosition(bySymbol.get(symbol) ?? [], prices.get(symbol)),
    }));
  }

  private async fetchQuote(symbol: string): Promise<number | null> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<null>(resolve => {
      timer = setTimeout(() => {
        logger.warn({ symbol, timeoutMs: this.quoteTimeoutMs }, 'Quote lookup timed out');
        resolve(null);
      }, this.quoteTimeoutMs);
    });

    try {
      const price = await Promise.race([this.quotes.latest(symbol), timeout]);
      return price !== null && Number.isFinite(price) ? price : null;
    } catch (error) {
      logger.warn({ error, symbol }, 'Quote lookup failed, treating price as unavailable');
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
