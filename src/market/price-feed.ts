import { createChildLogger } from '../logger.js';
import { config } from '../config.js';
import { NetworkError, describeError } from '../errors.js';
import * as upbit from '../exchange/upbit/rest.js';
import type { CandleSeries, PriceSample, QuoteMarket, Ticker, TradeTick } from '../types/index.js';

const log = createChildLogger('price-feed');

/**
 * 시세 조회 경계: 실패는 NetworkError, 호출자가 해당 틱만 건너뛸지 결정.
 */
export interface PriceFeed {
  fetchTicker(ticker: Ticker): Promise<PriceSample>;
  /** 종가 (과거 → 최신) */
  fetchCandles(ticker: Ticker, count: number): Promise<CandleSeries>;
  /** 최근 체결 가격 (과거 → 최신), 차트용 */
  fetchRecentTrades(ticker: Ticker, count: number): Promise<readonly number[]>;
}

export interface UpbitPriceFeedOptions {
  /** 분봉 단위 (기본 config.engine.candleUnit) */
  candleUnit?: number;
  now?: () => number;
}

/**
 * 업비트 v1 Public REST 기반 PriceFeed.
 * 현재가: /v1/ticker 우선, 실패했을 때만 최근 체결가로 대체 (등락률 0).
 */
export class UpbitPriceFeed implements PriceFeed {
  private readonly candleUnit: number;
  private readonly now: () => number;

  constructor(options: UpbitPriceFeedOptions = {}) {
    this.candleUnit = options.candleUnit ?? config.engine.candleUnit;
    this.now = options.now ?? Date.now;
  }

  async fetchTicker(ticker: Ticker): Promise<PriceSample> {
    try {
      const data = await upbit.getTicker(ticker);
      const t = data[0];
      if (!t) throw new NetworkError(`Empty ticker response for ${ticker}`, 'ticker');
      return {
        price: t.trade_price,
        signedChangeRate: t.signed_change_rate,
        observedAt: t.timestamp,
        source: 'ticker',
      };
    } catch (primaryErr) {
      log.warn({ err: primaryErr, ticker }, 'Ticker failed, falling back to latest trade');
      return this.fetchFallback(ticker, primaryErr);
    }
  }

  async fetchCandles(ticker: Ticker, count: number): Promise<CandleSeries> {
    const data = await upbit.getCandlesMinutes(this.candleUnit, ticker, count);
    // 응답은 최신순 → 과거순으로 뒤집음
    return data.map((c) => c.trade_price).reverse();
  }

  async fetchRecentTrades(ticker: Ticker, count: number): Promise<readonly number[]> {
    const ticks = await this.fetchTradeTicks(ticker, count);
    return ticks.map((t) => t.price);
  }

  /** 최근 체결 (과거 → 최신) */
  async fetchTradeTicks(ticker: Ticker, count: number): Promise<TradeTick[]> {
    const data = await upbit.getTradesTicks(ticker, count);
    return data
      .map((t) => ({
        price: t.trade_price,
        volume: t.trade_volume,
        timestamp: t.timestamp,
        side: t.ask_bid === 'BID' ? 'BUY' as const : 'SELL' as const,
      }))
      .reverse();
  }

  private async fetchFallback(ticker: Ticker, primaryErr: unknown): Promise<PriceSample> {
    let latest: TradeTick | undefined;
    try {
      const ticks = await this.fetchTradeTicks(ticker, 1);
      latest = ticks[ticks.length - 1];
    } catch (fallbackErr) {
      throw new NetworkError(
        `Price unavailable for ${ticker}: ${describeError(primaryErr)}; fallback: ${describeError(fallbackErr)}`,
        'ticker',
        null,
        fallbackErr,
      );
    }
    if (!latest) {
      throw new NetworkError(`Price unavailable for ${ticker}: ${describeError(primaryErr)}`, 'ticker');
    }
    return {
      price: latest.price,
      signedChangeRate: 0,
      observedAt: latest.timestamp || this.now(),
      source: 'trades',
    };
  }
}

/**
 * 마켓 목록 (티커 선택 UI용): quote 통화로 필터, 예: KRW
 */
export async function listQuoteMarkets(quote: string = 'KRW'): Promise<QuoteMarket[]> {
  const markets = await upbit.getMarketAll();
  const prefix = `${quote}-`;
  return markets
    .filter((m) => m.market.startsWith(prefix))
    .map((m) => ({ market: m.market, koreanName: m.korean_name, englishName: m.english_name }));
}
