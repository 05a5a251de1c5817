import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PortfolioManager } from '../PortfolioManager';
import { InMemoryLedgerStore } from '../LedgerStore';
import { QuoteProvider } from '../../engine/PriceDataProvider';

const quotesFrom = (prices: Record<string, number | null>): QuoteProvider => ({
  latest: vi.fn(async (symbol: string) => prices[symbol] ?? null),
});

describe('PortfolioManager', () => {
  let store: InMemoryLedgerStore;

  beforeEach(() => {
    store = new InMemoryLedgerStore();
  });

  describe('addTrade', () => {
    it('normalizes symbol and side and defaults fees to zero', async () => {
      const manager = new PortfolioManager({ store, quotes: quotesFrom({}) });
      const result = await manager.addTrade({
        symbol: '  msft ',
        tradeDate: '2024-05-01',
        quantity: 3,
        price: 410.5,
        side: 'buy',
      });

      expect(result).toEqual({
        ok: true,
        value: {
          symbol: 'MSFT',
          tradeDate: '2024-05-01',
          quantity: 3,
          price: 410.5,
          side: 'BUY',
          fees: 0,
          sequence: 1,
        },
      });
    });

    it('accepts Date objects for the trade date', async () => {
      const manager = new PortfolioManager({ store, quotes: quotesFrom({}) });
      const result = await manager.addTrade({
        symbol: 'AAPL',
        tradeDate: new Date(2024, 1, 29),
        quantity: 1,
        price: 180,
        side: 'SELL',
        fees: 1.25,
      });

      expect(result.ok && result.value.tradeDate).toBe('2024-02-29');
    });

    it('keeps the local calendar day of a Date, whatever the time zone', async () => {
      const manager = new PortfolioManager({ store, quotes: quotesFrom({}) });
      const midnight = await manager.addTrade({
        symbol: 'AAPL',
        tradeDate: new Date(2024, 2, 15),
        quantity: 1,
        price: 180,
        side: 'BUY',
      });
      const lateEvening = await manager.addTrade({
        symbol: 'AAPL',
        tradeDate: new Date(2024, 2, 15, 23, 30),
        quantity: 1,
        price: 181,
        side: 'BUY',
      });

      expect(midnight.ok && midnight.value.tradeDate).toBe('2024-03-15');
      expect(lateEvening.ok && lateEvening.value.tradeDate).toBe('2024-03-15');
    });

    it.each([
      [{ symbol: '', tradeDate: '2024-05-01', quantity: 1, price: 10, side: 'BUY' }, 'A ticker symbol is required'],
      [{ symbol: 'AAPL', tradeDate: '2024-05-01', quantity: 0, price: 10, side: 'BUY' }, 'Quantity must be positive.'],
      [{ symbol: 'AAPL', tradeDate: '2024-05-01', quantity: 1, price: -2, side: 'BUY' }, 'Price must be positive.'],
      [{ symbol: 'AAPL', tradeDate: '2024-05-01', quantity: 1, price: 10, side: 'HOLD' }, "Trade side must be either 'BUY' or 'SELL'."],
      [{ symbol: 'AAPL', tradeDate: '2024-02-30', quantity: 1, price: 10, side: 'BUY' }, 'Trade date must be a valid YYYY-MM-DD date'],
      [{ symbol: 'AAPL', tradeDate: '2024-05-01', quantity: 1, price: 10, side: 'BUY', fees: -1 }, 'Fees cannot be negative'],
    ])('rejects invalid input %#', async (input, message) => {
      const manager = new PortfolioManager({ store, quotes: quotesFrom({}) });
      const result = await manager.addTrade(input);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('InvalidParameter');
        expect(result.error.message).toBe(message);
      }
      expect(await store.listAll()).toEqual([]);
    });
  });

  it('lists trades by date with same-day trades in entry order', async () => {
    const manager = new PortfolioManager({ store, quotes: quotesFrom({}) });
    await manager.addTrade({ symbol: 'B', tradeDate: '2024-01-03', quantity: 1, price: 10, side: 'BUY' });
    await manager.addTrade({ symbol: 'A', tradeDate: '2024-01-01', quantity: 1, price: 10, side: 'BUY' });
    await manager.addTrade({ symbol: 'C', tradeDate: '2024-01-03', quantity: 1, price: 10, side: 'BUY' });

    const trades = await manager.getTrades();
    expect(trades.map(t => t.symbol)).toEqual(['A', 'B', 'C']);
  });

  it('clears the ledger', async () => {
    const manager = new PortfolioManager({ store, quotes: quotesFrom({}) });
    await manager.addTrade({ symbol: 'A', tradeDate: '2024-01-01', quantity: 1, price: 10, side: 'BUY' });
    await manager.clearTrades();

    expect(await manager.getTrades()).toEqual([]);
    expect(await manager.getPortfolioSummary()).toEqual([]);
  });

  describe('getPortfolioSummary', () => {
    const seed = async (manager: PortfolioManager) => {
      await manager.addTrade({ symbol: 'MSFT', tradeDate: '2024-01-05', quantity: 2, price: 300, side: 'BUY' });
      await manager.addTrade({ symbol: 'AAPL', tradeDate: '2024-01-02', quantity: 10, price: 100, side: 'BUY' });
      await manager.addTrade({ symbol: 'AAPL', tradeDate: '2024-01-09', quantity: 4, price: 120, side: 'SELL' });
    };

    it('summarizes each symbol in order of first trade, using supplied prices first', async () => {
      const quotes = quotesFrom({ MSFT: 310 });
      const manager = new PortfolioManager({ store, quotes });
      await seed(manager);

      const rows = await manager.getPortfolioSummary({ AAPL: 110 });

      expect(rows).toEqual([
        {
          symbol: 'AAPL',
          netQuantity: 6,
          averageCost: 100,
          realizedPl: 80,
          marketPrice: 110,
          unrealizedPl: 60,
          marketValue: 660,
          totalPl: 140,
        },
        {
          symbol: 'MSFT',
          netQuantity: 2,
          averageCost: 300,
          realizedPl: 0,
          marketPrice: 310,
          unrealizedPl: 20,
          marketValue: 620,
          totalPl: 20,
        },
      ]);
      expect(quotes.latest).toHaveBeenCalledTimes(1);
      expect(quotes.latest).toHaveBeenCalledWith('MSFT');
    });

    it('accepts a Map of prices', async () => {
      const quotes = quotesFrom({});
      const manager = new PortfolioManager({ store, quotes });
      await seed(manager);

      const rows = await manager.getPortfolioSummary(new Map([['AAPL', 100], ['MSFT', 300]]));
      expect(rows.map(row => row.totalPl)).toEqual([80, 0]);
      expect(quotes.latest).not.toHaveBeenCalled();
    });

    it('matches supplied prices regardless of symbol case or padding', async () => {
      const quotes = quotesFrom({});
      const manager = new PortfolioManager({ store, quotes });
      await seed(manager);

      const rows = await manager.getPortfolioSummary({ aapl: 110, ' msft ': 310 });
      expect(rows.map(row => row.marketPrice)).toEqual([110, 310]);
      expect(quotes.latest).not.toHaveBeenCalled();

      const fromMap = await manager.getPortfolioSummary(new Map([['Aapl', 100]]));
      expect(fromMap[0].marketPrice).toBe(100);
      expect(quotes.latest).toHaveBeenCalledTimes(1);
      expect(quotes.latest).toHaveBeenCalledWith('MSFT');
    });

    it('keeps going when a quote fails', async () => {
      const quotes: QuoteProvider = {
        latest: vi.fn(async (symbol: string) => {
          if (symbol === 'AAPL') throw new Error('socket hang up');
          return 305;
        }),
      };
      const manager = new PortfolioManager({ store, quotes });
      await seed(manager);

      const [aapl, msft] = await manager.getPortfolioSummary();
      expect(aapl).toMatchObject({ symbol: 'AAPL', realizedPl: 80, marketPrice: null, unrealizedPl: null, totalPl: null });
      expect(msft).toMatchObject({ symbol: 'MSFT', marketPrice: 305, unrealizedPl: 10 });
    });

    it('treats a slow quote as unavailable', async () => {
      const quotes: QuoteProvider = {
        latest: (symbol: string) => (symbol === 'MSFT' ? new Promise<number | null>(() => undefined) : Promise.resolve(101)),
      };
      const manager = new PortfolioManager({ store, quotes, quoteTimeoutMs: 20 });
      await seed(manager);

      const [aapl, msft] = await manager.getPortfolioSummary();
      expect(aapl.marketPrice).toBe(101);
      expect(msft.marketPrice).toBeNull();
      expect(msft.marketValue).toBeNull();
    });

    it('requests missing quotes concurrently', async () => {
      const started: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const quotes: QuoteProvider = {
        latest: async (symbol: string) => {
          started.push(symbol);
          await gate;
          return 1;
        },
      };
      const manager = new PortfolioManager({ store, quotes });
      await seed(manager);

      const summary = manager.getPortfolioSummary();
      await vi.waitFor(() => expect(started).toEqual(['AAPL', 'MSFT']));
      release();

      expect((await summary).map(row => row.marketPrice)).toEqual([1, 1]);
    });
  });
});
