import { InsufficientBalanceError } from '../errors.js';
import type { LedgerSnapshot, SimulatedLedgerState } from '../types/index.js';
import type { PositionLedger } from './position-ledger.js';

/**
 * 모의투자 원장: 메모리 잔고.
 * 변경은 SimulatedExecution만 호출한다.
 */
export class SimulatedLedger implements PositionLedger {
  readonly kind = 'simulated' as const;
  private state: SimulatedLedgerState;

  constructor(initial: SimulatedLedgerState) {
    SimulatedLedger.assertValid(initial);
    this.state = { ...initial };
  }

  static withQuote(quoteBalance: number): SimulatedLedger {
    return new SimulatedLedger({ quoteBalance, baseQuantity: 0, averageCost: 0 });
  }

  get quoteBalance(): number {
    return this.state.quoteBalance;
  }

  get baseQuantity(): number {
    return this.state.baseQuantity;
  }

  get averageCost(): number {
    return this.state.averageCost;
  }

  async snapshot(): Promise<LedgerSnapshot> {
    const { quoteBalance, baseQuantity, averageCost } = this.state;
    return {
      quoteBalance,
      holding: { quantity: baseQuantity, averageCost },
      isHolding: baseQuantity > 0,
    };
  }

  /** 시장가 매수 반영: 평균단가는 수량 가중 평균 (무포지션에서 진입하면 price와 같음) */
  applyBuy(quoteSpent: number, price: number): void {
    if (!(price > 0) || !(quoteSpent > 0)) {
      throw new RangeError(`applyBuy requires positive amount and price (amount=${quoteSpent}, price=${price})`);
    }
    if (quoteSpent > this.state.quoteBalance) {
      throw new InsufficientBalanceError(quoteSpent, this.state.quoteBalance);
    }
    const boughtQty = quoteSpent / price;
    const prevQty = this.state.baseQuantity;
    const nextQty = prevQty + boughtQty;
    const averageCost = prevQty > 0
      ? (prevQty * this.state.averageCost + boughtQty * price) / nextQty
      : price;
    this.state = {
      quoteBalance: this.state.quoteBalance - quoteSpent,
      baseQuantity: nextQty,
      averageCost,
    };
  }

  /** 전량 매도 반영 → 받은 원화 */
  applyFullSell(price: number): number {
    if (!(price > 0)) {
      throw new RangeError(`applyFullSell requires positive price, got ${price}`);
    }
    const quoteReceived = this.state.baseQuantity * price;
    this.state = {
      quoteBalance: this.state.quoteBalance + quoteReceived,
      baseQuantity: 0,
      averageCost: 0,
    };
    return quoteReceived;
  }

  exportState(): SimulatedLedgerState {
    return { ...this.state };
  }

  private static assertValid(s: SimulatedLedgerState): void {
    const ok = [s.quoteBalance, s.baseQuantity, s.averageCost].every((v) => Number.isFinite(v) && v >= 0);
    if (!ok) {
      throw new RangeError(`Invalid simulated ledger state: ${JSON.stringify(s)}`);
    }
  }
}
