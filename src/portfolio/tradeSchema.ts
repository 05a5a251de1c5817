import { z } from 'zod';
import { normalizeSymbol } from '../utils/symbols';

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local calendar day of a Date, as picked by the user. */
export const toTradeDate = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

const isCalendarDate = (value: string): boolean => {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

/**
 * User-entered trade. Symbols and sides are normalized before storage.
 */
export const tradeInputSchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1, 'A ticker symbol is required')
    .transform(normalizeSymbol),
  tradeDate: z
    .union([z.date(), z.string().trim()])
    .transform(value => (value instanceof Date ? toTradeDate(value) : value))
    .refine(isCalendarDate, 'Trade date must be a valid YYYY-MM-DD date'),
  quantity: z.number().finite().positive('Quantity must be positive.'),
  price: z.number().finite().positive('Price must be positive.'),
  side: z
    .string()
    .trim()
    .transform(side => side.toUpperCase())
    .pipe(z.enum(['BUY', 'SELL'], { errorMap: () => ({ message: "Trade side must be either 'BUY' or 'SELL'." }) })),
  fees: z.number().finite().nonnegative('Fees cannot be negative').default(0),
});

export type TradeInput = z.input<typeof tradeInputSchema>;
