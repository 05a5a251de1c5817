/** Ticker symbols are compared trimmed and upper-cased. */
export const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase();
