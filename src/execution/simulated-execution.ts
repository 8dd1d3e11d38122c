import { createChildLogger } from '../logger.js';
import { OrderError } from '../errors.js';
import type { SimulatedLedger } from '../ledger/simulated-ledger.js';
import type { OrderResult, PriceSample, Ticker } from '../types/index.js';
import type { ExecutionBackend } from './execution-backend.js';

const log = createChildLogger('sim-execution');

/**
 * 모의 체결: 호가창 없이 엔진의 최신 가격 샘플로 즉시 체결.
 * 원장 변경은 여기서만 일어난다.
 */
export class SimulatedExecution implements ExecutionBackend {
  readonly kind = 'simulated' as const;
  private seq = 0;

  constructor(
    private readonly ledger: SimulatedLedger,
    private readonly latestSample: () => PriceSample | null,
  ) {}

  async buyMarket(ticker: Ticker, quoteAmount: number): Promise<OrderResult> {
    const price = this.fillPrice();
    if (!(quoteAmount > 0)) {
      throw new OrderError(`Invalid buy amount: ${quoteAmount}`);
    }
    if (quoteAmount > this.ledger.quoteBalance) {
      throw new OrderError(`Simulated balance ${this.ledger.quoteBalance} below order amount ${quoteAmount}`);
    }
    this.ledger.applyBuy(quoteAmount, price);
    const result: OrderResult = {
      orderId: `sim-buy-${++this.seq}`,
      side: 'BUY',
      ticker,
      price,
      quantity: quoteAmount / price,
      quoteAmount,
      simulated: true,
    };
    log.info({ orderId: result.orderId, price, quoteAmount }, 'Simulated buy filled');
    return result;
  }

  async sellMarket(ticker: Ticker, baseQuantity: number): Promise<OrderResult> {
    const price = this.fillPrice();
    const held = this.ledger.baseQuantity;
    if (!(baseQuantity > 0) || baseQuantity > held) {
      throw new OrderError(`Invalid sell quantity ${baseQuantity} (held ${held})`);
    }
    // 전량 매도만 지원: 원장은 보유 전체를 정리
    const quoteAmount = this.ledger.applyFullSell(price);
    const result: OrderResult = {
      orderId: `sim-sell-${++this.seq}`,
      side: 'SELL',
      ticker,
      price,
      quantity: held,
      quoteAmount,
      simulated: true,
    };
    log.info({ orderId: result.orderId, price, quantity: held }, 'Simulated sell filled');
    return result;
  }

  private fillPrice(): number {
    const sample = this.latestSample();
    if (!sample || !(sample.price > 0)) {
      throw new OrderError('No price sample available for simulated fill');
    }
    return sample.price;
  }
}
