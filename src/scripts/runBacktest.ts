import { z } from 'zod';
import { buildIndicatorFrame } from '../analysis/indicators';
import { BacktestEngine } from '../backtest/BacktestEngine';
import { env, INTERVALS, PERIODS } from '../config/env';
import { MarketDataEngine } from '../engine/MarketDataEngine';
import { logger } from '../utils/logger';

const argsSchema = z.object({
  symbol: z.string().trim().min(1).default('AAPL'),
  fastWindow: z.coerce.number().int().positive().default(env.DEFAULT_FAST_WINDOW),
  slowWindow: z.coerce.number().int().positive().default(env.DEFAULT_SLOW_WINDOW),
  period: z.enum(PERIODS).default(env.DEFAULT_PERIOD),
  interval: z.enum(INTERVALS).default(env.DEFAULT_INTERVAL),
});

const run = async () => {
  const [symbol, fastWindow, slowWindow, period, interval] = process.argv.slice(2);
  const args = argsSchema.parse({ symbol, fastWindow, slowWindow, period, interval });

  const marketData = new MarketDataEngine();
  logger.info(`Fetching data for ${args.symbol} (${args.period}, ${args.interval})...`);

  const series = await marketData.getPriceSeries(args.symbol, args.period, args.interval);
  if (!series.ok) {
    logger.error({ kind: series.error.kind }, series.error.message);
    process.exitCode = 1;
    return;
  }

  const latest = buildIndicatorFrame(series.value).at(-1);
  if (latest) {
    logger.info(
      {
        close: latest.close,
        sma: latest.sma,
        ema: latest.ema,
        rsi: latest.rsi,
        macd: latest.macd,
        macdSignal: latest.macdSignal,
      },
      'Latest indicators',
    );
  }

  const engine = new BacktestEngine({ fastWindow: args.fastWindow, slowWindow: args.slowWindow });
  const result = engine.run(series.value);
  if (!result.ok) {
    logger.error({ kind: result.error.kind }, result.error.message);
    process.exitCode = 1;
    return;
  }

  const s = result.value.statistics;
  logger.info(`📊 BACKTEST RESULTS - ${args.symbol.toUpperCase()} (SMA ${args.fastWindow}/${args.slowWindow})`);
  logger.info(`   Bars Traded: ${result.value.frame.length}`);
  logger.info(`   Strategy Return: ${s.strategyReturnPct.toFixed(2)}%`);
  logger.info(`   Market Return: ${s.marketReturnPct.toFixed(2)}%`);
  logger.info(`   Max Drawdown: ${s.maxDrawdownPct.toFixed(2)}%`);
  logger.info(`   Win Rate: ${(s.winRate * 100).toFixed(2)}%`);
  logger.info(`   Sharpe Ratio: ${s.sharpeRatio.toFixed(2)}`);
  logger.info(`   Total Trades: ${s.totalTrades}`);
};

run().catch((error) => {
  logger.error(error, 'Backtest failed');
  process.exit(1);
});
