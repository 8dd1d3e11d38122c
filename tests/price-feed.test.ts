import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as upbit from '../src/exchange/upbit/rest.js';
import { UpbitPriceFeed, listQuoteMarkets } from '../src/market/price-feed.js';
import { NetworkError } from '../src/errors.js';

vi.mock('../src/exchange/upbit/rest.js');

function candle(tradePrice: number) {
  return {
    market: 'KRW-BTC',
    candle_date_time_utc: '2024-01-01T00:00:00',
    opening_price: tradePrice,
    high_price: tradePrice,
    low_price: tradePrice,
    trade_price: tradePrice,
    candle_acc_trade_volume: 1,
  };
}

function trade(price: number, timestamp: number, askBid: 'ASK' | 'BID' = 'BID') {
  return { market: 'KRW-BTC', timestamp, trade_price: price, trade_volume: 0.01, ask_bid: askBid };
}

describe('UpbitPriceFeed', () => {
  const feed = new UpbitPriceFeed({ candleUnit: 1, now: () => 42 });

  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe('fetchTicker', () => {
    it('uses the ticker endpoint when it answers', async () => {
      vi.mocked(upbit.getTicker).mockResolvedValue([
        { market: 'KRW-BTC', trade_price: 95_000_000, signed_change_rate: -0.0123, timestamp: 1_700_000_000_000 },
      ]);

      const sample = await feed.fetchTicker('KRW-BTC');

      expect(sample).toEqual({ price: 95_000_000, signedChangeRate: -0.0123, observedAt: 1_700_000_000_000, source: 'ticker' });
      expect(upbit.getTicker).toHaveBeenCalledWith('KRW-BTC');
      expect(upbit.getTradesTicks).not.toHaveBeenCalled();
    });

    it('falls back to the latest trade when the ticker fails', async () => {
      vi.mocked(upbit.getTicker).mockRejectedValue(new NetworkError('ticker down', '/v1/ticker', 503));
      vi.mocked(upbit.getTradesTicks).mockResolvedValue([trade(94_500_000, 1_700_000_000_500)]);

      const sample = await feed.fetchTicker('KRW-BTC');

      expect(sample).toEqual({ price: 94_500_000, signedChangeRate: 0, observedAt: 1_700_000_000_500, source: 'trades' });
      expect(upbit.getTradesTicks).toHaveBeenCalledWith('KRW-BTC', 1);
    });

    it('falls back when the ticker response is empty', async () => {
      vi.mocked(upbit.getTicker).mockResolvedValue([]);
      vi.mocked(upbit.getTradesTicks).mockResolvedValue([trade(1000, 0)]);

      const sample = await feed.fetchTicker('KRW-BTC');

      // 체결 시각이 없으면 현재 시각
      expect(sample).toEqual({ price: 1000, signedChangeRate: 0, observedAt: 42, source: 'trades' });
    });

    it('fails with both causes when the fallback also fails', async () => {
      vi.mocked(upbit.getTicker).mockRejectedValue(new Error('ticker down'));
      vi.mocked(upbit.getTradesTicks).mockRejectedValue(new Error('trades down'));

      await expect(feed.fetchTicker('KRW-BTC')).rejects.toThrow(
        'Price unavailable for KRW-BTC: ticker down; fallback: trades down',
      );
    });

    it('fails when the fallback has no trades', async () => {
      vi.mocked(upbit.getTicker).mockRejectedValue(new Error('ticker down'));
      vi.mocked(upbit.getTradesTicks).mockResolvedValue([]);

      await expect(feed.fetchTicker('KRW-BTC')).rejects.toBeInstanceOf(NetworkError);
    });
  });

  it('returns candle closes oldest first', async () => {
    vi.mocked(upbit.getCandlesMinutes).mockResolvedValue([candle(103), candle(102), candle(101)]);

    const closes = await feed.fetchCandles('KRW-BTC', 200);

    expect(closes).toEqual([101, 102, 103]);
    expect(upbit.getCandlesMinutes).toHaveBeenCalledWith(1, 'KRW-BTC', 200);
  });

  it('returns recent trades oldest first', async () => {
    vi.mocked(upbit.getTradesTicks).mockResolvedValue([trade(3, 300, 'ASK'), trade(2, 200), trade(1, 100)]);

    await expect(feed.fetchRecentTrades('KRW-BTC', 3)).resolves.toEqual([1, 2, 3]);
    const ticks = await feed.fetchTradeTicks('KRW-BTC', 3);
    expect(ticks[2]).toEqual({ price: 3, volume: 0.01, timestamp: 300, side: 'SELL' });
    expect(ticks[0]?.side).toBe('BUY');
  });
});

describe('listQuoteMarkets', () => {
  it('keeps only markets quoted in the given currency', async () => {
    vi.mocked(upbit.getMarketAll).mockResolvedValue([
      { market: 'KRW-BTC', korean_name: '비트코인', english_name: 'Bitcoin' },
      { market: 'BTC-ETH', korean_name: '이더리움', english_name: 'Ethereum' },
      { market: 'KRW-ETH', korean_name: '이더리움', english_name: 'Ethereum' },
    ]);

    await expect(listQuoteMarkets('KRW')).resolves.toEqual([
      { market: 'KRW-BTC', koreanName: '비트코인', englishName: 'Bitcoin' },
      { market: 'KRW-ETH', koreanName: '이더리움', englishName: 'Ethereum' },
    ]);
  });
});
