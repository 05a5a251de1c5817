import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StoredTrade, Trade } from '../types/portfolio';

/**
 * Ordered trade ledger. Appends are atomic; trades are never edited, only cleared wholesale.
 */
export interface LedgerStore {
  append(trade: Trade): Promise<StoredTrade>;
  listAll(): Promise<StoredTrade[]>;
  clear(): Promise<void>;
}

export class InMemoryLedgerStore implements LedgerStore {
  private trades: StoredTrade[] = [];
  private nextSequence = 1;

  public async append(trade: Trade): Promise<StoredTrade> {
    const stored: StoredTrade = { ...trade, sequence: this.nextSequence++ };
    this.trades.push(stored);
    return { ...stored };
  }

  public async listAll(): Promise<StoredTrade[]> {
    return this.trades.map(trade => ({ ...trade }));
  }

  public async clear(): Promise<void> {
    this.trades = [];
  }
}

const storedTradeSchema = z.object({
  symbol: z.string().min(1),
  tradeDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  quantity: z.number().positive(),
  price: z.number().positive(),
  side: z.enum(['BUY', 'SELL']),
  fees: z.number().nonnegative(),
  sequence: z.number().int().positive(),
});

const ledgerFileSchema = z.object({
  version: z.literal(1),
  trades: z.array(storedTradeSchema),
});

type LedgerFile = z.infer<typeof ledgerFileSchema>;

/**
 * Ledger persisted as a JSON document. Writes go through a single promise chain so
 * concurrent appends land one at a time, and each write replaces the file via rename.
 */
export class JsonFileLedgerStore implements LedgerStore {
  private readonly filePath: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  public append(trade: Trade): Promise<StoredTrade> {
    return this.enqueue(async () => {
      const ledger = await this.read();
      const lastSequence = ledger.trades.reduce((max, t) => Math.max(max, t.sequence), 0);
      const stored: StoredTrade = { ...trade, sequence: lastSequence + 1 };
      await this.write({ ...ledger, trades: [...ledger.trades, stored] });
      return stored;
    });
  }

  public async listAll(): Promise<StoredTrade[]> {
    await this.queue;
    const ledger = await this.read();
    return ledger.trades;
  }

  public clear(): Promise<void> {
    return this.enqueue(() => this.write({ version: 1, trades: [] }));
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async read(): Promise<LedgerFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { version: 1, trades: [] };
      }
      throw error;
    }
    return ledgerFileSchema.parse(JSON.parse(raw));
  }

  private async write(ledger: LedgerFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(ledger, null, 2), 'utf8');
    await fs.rename(tmpPath, this.filePath);
  }
}
