import { describe, it, expect } from 'vitest';
import { formatQuote, formatRemaining, messages } from '../src/engine/messages.js';
import { parseTicker } from '../src/market/ticker.js';

describe('operator messages', () => {
  it('formats quote amounts with separators', () => {
    expect(formatQuote(1_234_567.6)).toBe('1,234,568');
    expect(formatQuote(0)).toBe('0');
  });

  it('formats remaining time as mm:ss rounding seconds up', () => {
    expect(formatRemaining(30 * 60_000)).toBe('30:00');
    expect(formatRemaining(61_001)).toBe('01:02');
    expect(formatRemaining(-5)).toBe('00:00');
  });

  it('renders fills with side, reason and order id', () => {
    expect(
      messages.filled('take-profit', {
        orderId: 'sim-sell-2', side: 'SELL', ticker: 'KRW-BTC', price: 1006, quantity: 100, quoteAmount: 100_600, simulated: true,
      }),
    ).toBe('[매도/익절] KRW-BTC 100,600원 @ 1,006 (sim-sell-2)');
  });

  it('renders watch and holding states', () => {
    expect(messages.watching(31.26, 25)).toBe('관망 중 (RSI 31.3 > 25)');
    expect(messages.holding(-1.5)).toBe('보유 중 (수익률 -1.50%)');
    expect(messages.cooldownStarted(3, 30)).toBe('연속 손절 3회, 30분간 진입 중단');
  });
});

describe('parseTicker', () => {
  it('splits quote and base', () => {
    expect(parseTicker('KRW-BTC')).toEqual({ quote: 'KRW', base: 'BTC' });
  });

  it('rejects malformed tickers', () => {
    expect(() => parseTicker('KRWBTC')).toThrow(RangeError);
    expect(() => parseTicker('-BTC')).toThrow(RangeError);
    expect(() => parseTicker('KRW-')).toThrow(RangeError);
  });
});
