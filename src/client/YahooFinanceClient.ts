import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { env } from '../config/env';
import { Interval, Period } from '../types/market';
import { logger } from '../utils/logger';

const nullableNumbers = z.array(z.number().nullable());

const chartResultSchema = z.object({
  meta: z
    .object({
      symbol: z.string(),
      currency: z.string().nullable().optional(),
      regularMarketPrice: z.number().optional(),
    })
    .passthrough(),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(
      z.object({
        open: nullableNumbers.optional(),
        high: nullableNumbers.optional(),
        low: nullableNumbers.optional(),
        close: nullableNumbers.optional(),
        volume: nullableNumbers.optional(),
      }),
    ),
  }),
});

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable(),
    error: z
      .object({
        code: z.string(),
        description: z.string(),
      })
      .nullable(),
  }),
});

export type ChartResponse = z.infer<typeof chartResponseSchema>;
export type ChartResult = z.infer<typeof chartResultSchema>;

export interface YahooFinanceClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  axiosInstance?: AxiosInstance;
}

/**
 * Thin client for the Yahoo Finance chart endpoint (`/v8/finance/chart/{symbol}`).
 */
export class YahooFinanceClient {
  private readonly axiosInstance: AxiosInstance;

  constructor(options: YahooFinanceClientOptions = {}) {
    this.axiosInstance =
      options.axiosInstance ??
      axios.create({
        baseURL: options.baseUrl ?? env.PRICE_API_URL,
        timeout: options.timeoutMs ?? env.PRICE_API_TIMEOUT_MS,
        headers: { 'User-Agent': 'stock-analytics-engine' },
      });
  }

  public async getChart(symbol: string, params: { range: Period; interval: Interval }): Promise<ChartResponse> {
    const url = `/v8/finance/chart/${encodeURIComponent(symbol)}`;
    try {
      const response = await this.axiosInstance.get<unknown>(url, {
        params: { ...params, includePrePost: false, events: 'div,splits' },
      });
      return chartResponseSchema.parse(response.data);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        logger.error(
          {
            status: error.response.status,
            data: error.response.data,
            url: error.config?.url,
          },
          'Chart API Request Failed',
        );
      }
      throw error;
    }
  }
}
