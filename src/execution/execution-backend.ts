import type { OrderResult, Ticker } from '../types/index.js';

export type BackendKind = 'live' | 'simulated';

/**
 * 시장가 주문 실행: 실패는 OrderError.
 * 원장 변경은 각 구현이 책임지므로 호출자가 중복 반영하면 안 된다.
 */
export interface ExecutionBackend {
  readonly kind: BackendKind;
  buyMarket(ticker: Ticker, quoteAmount: number): Promise<OrderResult>;
  sellMarket(ticker: Ticker, baseQuantity: number): Promise<OrderResult>;
}
