import type { Ticker, TickerParts } from '../types/index.js';

/** QUOTE-BASE, 예: KRW-BTC */
export const TICKER_PATTERN = /^[A-Z0-9]+-[A-Z0-9]+$/;

export function parseTicker(ticker: Ticker): TickerParts {
  const idx = ticker.indexOf('-');
  if (idx <= 0 || idx === ticker.length - 1) {
    throw new RangeError(`Malformed ticker: ${ticker}`);
  }
  return { quote: ticker.slice(0, idx), base: ticker.slice(idx + 1) };
}
