import { env } from '../config/env';
import { YahooAdapter } from '../engine/providers/YahooAdapter';
import { JsonFileLedgerStore } from '../portfolio/LedgerStore';
import { PortfolioManager } from '../portfolio/PortfolioManager';
import { summarizePortfolio } from '../portfolio/PositionLedger';
import { logger } from '../utils/logger';

const main = async () => {
  const portfolio = new PortfolioManager({
    store: new JsonFileLedgerStore(env.LEDGER_PATH),
    quotes: new YahooAdapter(),
    quoteTimeoutMs: env.QUOTE_TIMEOUT_MS,
  });

  const rows = await portfolio.getPortfolioSummary();
  if (rows.length === 0) {
    logger.info(`No trades recorded in ${env.LEDGER_PATH}`);
    return;
  }

  for (const row of rows) {
    logger.info(row, `Position ${row.symbol}`);
  }

  const totals = summarizePortfolio(rows);
  if (totals.unpriced.length > 0) {
    logger.warn({ unpriced: totals.unpriced }, 'No price for some symbols; their market value is left out');
  }
  logger.info(totals, `Portfolio: ${rows.length} symbols`);
};

main().catch((err) => {
  logger.error(err, 'Portfolio summary failed');
  process.exit(1);
});
