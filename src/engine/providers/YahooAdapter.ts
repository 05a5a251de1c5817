import axios from 'axios';
import { ZodError } from 'zod';
import { YahooFinanceClient, ChartResult } from '../../client/YahooFinanceClient';
import { err, ok, Result } from '../../core/errors';
import { Interval, Period, PriceBar, PriceSeries } from '../../types/market';
import { logger } from '../../utils/logger';
import { normalizeSymbol } from '../../utils/symbols';
import { PriceDataProvider, QuoteProvider } from '../PriceDataProvider';

export class YahooAdapter implements PriceDataProvider, QuoteProvider {
  public name = 'Yahoo';
  private client: YahooFinanceClient;

  constructor(client: YahooFinanceClient = new YahooFinanceClient()) {
    this.client = client;
  }

  public async fetchPriceSeries(symbol: string, period: Period, interval: Interval): Promise<Result<PriceSeries>> {
    const cleaned = normalizeSymbol(symbol);
    if (!cleaned) {
      return err('InvalidParameter', 'A ticker symbol is required to download price data.');
    }

    try {
      const response = await this.client.getChart(cleaned, { range: period, interval });
      const result = response.chart.result?.[0];
      const bars = result ? this.toBars(result) : [];

      if (bars.length === 0) {
        return err(
          'NotFound',
          `No price data for ${cleaned} (${period}, ${interval}). Double check the ticker symbol and interval.`,
        );
      }
      return ok(bars);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return err('NotFound', `Unknown ticker symbol ${cleaned}`, error);
      }
      if (error instanceof ZodError) {
        logger.error({ symbol: cleaned, issues: error.issues }, 'Unexpected chart payload');
        return err('UpstreamUnavailable', `Unexpected response while downloading ${cleaned}`, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message, symbol: cleaned }, 'Error fetching price data');
      return err('UpstreamUnavailable', `Could not download data for ${cleaned}: ${message}`, error);
    }
  }

  /**
   * Last daily close over the past week, or null when it cannot be determined.
   */
  public async latest(symbol: string): Promise<number | null> {
    const series = await this.fetchPriceSeries(symbol, '5d', '1d');
    if (!series.ok) {
      logger.debug({ symbol, kind: series.error.kind }, 'No latest price available');
      return null;
    }
    return series.value[series.value.length - 1].close;
  }

  /**
   * Zips the column arrays into bars. Bars without a close are skipped, and a
   * repeated timestamp keeps the last bar seen.
   */
  private toBars(result: ChartResult): PriceBar[] {
    const timestamps = result.timestamp ?? [];
    const quote = result.indicators.quote[0];
    if (!quote) return [];

    const byTimestamp = new Map<number, PriceBar>();
    timestamps.forEach((seconds, i) => {
      const close = quote.close?.[i];
      if (close === null || close === undefined) return;

      byTimestamp.set(seconds * 1000, {
        timestamp: seconds * 1000,
        open: quote.open?.[i] ?? close,
        high: quote.high?.[i] ?? close,
        low: quote.low?.[i] ?? close,
        close,
        volume: quote.volume?.[i] ?? 0,
      });
    });

    return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
  }
}
