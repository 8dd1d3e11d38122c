import type { OrderResult, PriceSample, Ticker } from '../types/index.js';
import type { ExecutionBackend } from './execution-backend.js';
import type { UpbitPrivateApi } from './upbit-api.js';

export type OrderApi = Pick<UpbitPrivateApi, 'marketBuy' | 'marketSell'>;

/**
 * 실거래 주문: 체결 결과는 다음 틱 계좌 조회로 다시 읽는다.
 * price/quantity는 주문 시점 기준가로 추정한 값.
 */
export class LiveExecution implements ExecutionBackend {
  readonly kind = 'live' as const;

  constructor(
    private readonly api: OrderApi,
    private readonly latestSample: () => PriceSample | null,
  ) {}

  async buyMarket(ticker: Ticker, quoteAmount: number): Promise<OrderResult> {
    const order = await this.api.marketBuy(ticker, quoteAmount);
    const price = this.referencePrice();
    return {
      orderId: order.uuid,
      side: 'BUY',
      ticker,
      price,
      quantity: price > 0 ? quoteAmount / price : 0,
      quoteAmount,
      simulated: false,
    };
  }

  async sellMarket(ticker: Ticker, baseQuantity: number): Promise<OrderResult> {
    const order = await this.api.marketSell(ticker, baseQuantity);
    const price = this.referencePrice();
    return {
      orderId: order.uuid,
      side: 'SELL',
      ticker,
      price,
      quantity: baseQuantity,
      quoteAmount: baseQuantity * price,
      simulated: false,
    };
  }

  private referencePrice(): number {
    return this.latestSample()?.price ?? 0;
  }
}
