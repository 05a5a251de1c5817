import { env } from '../config/env';
import { err, ok, Result } from '../core/errors';
import { Interval, Period, PriceSeries } from '../types/market';
import { logger } from '../utils/logger';
import { normalizeSymbol } from '../utils/symbols';
import { PriceDataProvider } from './PriceDataProvider';
import { YahooAdapter } from './providers/YahooAdapter';

export class MarketDataEngine {
  private adapter: PriceDataProvider;
  private cache: Map<string, { data: PriceSeries; timestamp: number }>;
  private readonly cacheTtlMs: number;

  constructor(adapter: PriceDataProvider = new YahooAdapter(), cacheTtlMs: number = env.PRICE_CACHE_TTL_MS) {
    this.adapter = adapter;
    this.cache = new Map();
    this.cacheTtlMs = cacheTtlMs;
  }

  public async getPriceSeries(
    symbol: string,
    period: Period = env.DEFAULT_PERIOD,
    interval: Interval = env.DEFAULT_INTERVAL,
  ): Promise<Result<PriceSeries>> {
    const cleaned = normalizeSymbol(symbol);
    if (!cleaned) {
      return err('InvalidParameter', 'A ticker symbol is required to download price data.');
    }

    const key = `${this.adapter.name}:${cleaned}:${period}:${interval}`;
    const cached = this.cache.get(key);
    const now = Date.now();

    if (cached && now - cached.timestamp < this.cacheTtlMs) {
      logger.debug({ symbol: cleaned, period, interval }, 'Returning cached market data');
      return ok(cached.data);
    }

    const result = await this.adapter.fetchPriceSeries(cleaned, period, interval);
    if (result.ok) {
      this.cache.set(key, { data: result.value, timestamp: now });
    } else {
      logger.warn({ symbol: cleaned, period, interval, kind: result.error.kind }, result.error.message);
    }
    return result;
  }

  public clearCache(): void {
    this.cache.clear();
  }
}
