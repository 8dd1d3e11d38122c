import type { Ticker } from './market.js';

export type OrderSide = 'BUY' | 'SELL';

/** 주문 사유 */
export type OrderReason = 'entry' | 'take-profit' | 'stop-loss' | 'manual';

export interface OrderResult {
  readonly orderId: string;
  readonly side: OrderSide;
  readonly ticker: Ticker;
  /** 모의: 체결가, 실거래: 주문 시점 기준가 */
  readonly price: number;
  /** 코인 수량 (실거래 매수는 price 기준 추정치) */
  readonly quantity: number;
  /** 원화 금액 */
  readonly quoteAmount: number;
  readonly simulated: boolean;
}
