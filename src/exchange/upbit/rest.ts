/**
 * 업비트 REST API: endpoints 상수 + undici + jose + zod 전용.
 * 모든 URL은 endpoints.ts에서만 가져온다.
 */

import {
  PUBLIC_MARKET_ALL,
  publicCandlesMinutes,
  PUBLIC_TRADES_TICKS,
  PUBLIC_TICKER,
  PRIVATE_ACCOUNTS,
  PRIVATE_ORDERS_POST,
} from './endpoints.js';
import {
  requestPublicValidated,
  requestPrivate,
  requestPrivateValidated,
  type PrivateResponse,
  type RequestOptions,
} from './client.js';
import {
  marketAllSchema,
  candlesSchema,
  tickerSchema,
  tradesTicksSchema,
  accountsSchema,
} from './schemas.js';

// ─── PUBLIC ───────────────────────────────────────────────────────────────

export async function getMarketAll() {
  return requestPublicValidated(PUBLIC_MARKET_ALL, {}, marketAllSchema);
}

/** 분 캔들: 응답은 최신순 */
export async function getCandlesMinutes(unit: number, market: string, count: number, options?: RequestOptions) {
  const path = publicCandlesMinutes(unit);
  return requestPublicValidated(path, { market, count: String(count) }, candlesSchema, options);
}

/** 최근 체결: 응답은 최신순 */
export async function getTradesTicks(market: string, count: number, options?: RequestOptions) {
  return requestPublicValidated(PUBLIC_TRADES_TICKS, { market, count: String(count) }, tradesTicksSchema, options);
}

export async function getTicker(market: string, options?: RequestOptions) {
  return requestPublicValidated(PUBLIC_TICKER, { markets: market }, tickerSchema, options);
}

// ─── PRIVATE ──────────────────────────────────────────────────────────────

export async function getAccounts() {
  return requestPrivateValidated(PRIVATE_ACCOUNTS, { method: 'GET' }, accountsSchema);
}

/** 시장가 매수: ord_type=price, price=원화 금액 */
export interface MarketBuyParams {
  market: string;
  side: 'bid';
  ord_type: 'price';
  price: string;
}

/** 시장가 매도: ord_type=market, volume=수량 */
export interface MarketSellParams {
  market: string;
  side: 'ask';
  ord_type: 'market';
  volume: string;
}

/**
 * 주문 요청: 재시도 없음 (중복 체결 방지).
 * 상태 코드와 원본 응답을 그대로 돌려주고 해석은 호출자 몫.
 */
export async function placeOrder(params: MarketBuyParams | MarketSellParams): Promise<PrivateResponse> {
  const body: Record<string, string> = { ...params };
  return requestPrivate(PRIVATE_ORDERS_POST, { method: 'POST', body, retries: 0 });
}
