import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.join(__dirname, '../../.env') });

export const PERIODS = ['1d', '5d', '1mo', '3mo', '6mo', '1y', '2y', '5y', '10y', 'ytd', 'max'] as const;
export const INTERVALS = ['1m', '2m', '5m', '15m', '30m', '60m', '90m', '1h', '1d', '5d', '1wk', '1mo', '3mo'] as const;

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  PRICE_API_URL: z.string().url().default('https://query1.finance.yahoo.com'),
  PRICE_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PRICE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(300000),
  QUOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  LEDGER_PATH: z.string().min(1).default('data/ledger.json'),
  DEFAULT_FAST_WINDOW: z.coerce.number().int().positive().default(20),
  DEFAULT_SLOW_WINDOW: z.coerce.number().int().positive().default(50),
  DEFAULT_PERIOD: z.enum(PERIODS).default('6mo'),
  DEFAULT_INTERVAL: z.enum(INTERVALS).default('1d'),
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv) => envSchema.safeParse(source);

const parsed = parseEnv(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const env: Env = parsed.data;
