import { describe, it, expect } from 'vitest';
import { SimulatedLedger } from '../src/ledger/simulated-ledger.js';
import { SimulatedExecution } from '../src/execution/simulated-execution.js';
import { InsufficientBalanceError, OrderError } from '../src/errors.js';
import type { PriceSample } from '../src/types/index.js';

function sample(price: number): PriceSample {
  return { price, signedChangeRate: 0, observedAt: 0, source: 'ticker' };
}

describe('SimulatedLedger', () => {
  it('is flat with the initial quote balance', async () => {
    const ledger = SimulatedLedger.withQuote(1_000_000);
    expect(await ledger.snapshot()).toEqual({
      quoteBalance: 1_000_000,
      holding: { quantity: 0, averageCost: 0 },
      isHolding: false,
    });
  });

  it('buy from flat sets averageCost to the fill price', async () => {
    const ledger = SimulatedLedger.withQuote(1_000_000);
    ledger.applyBuy(100_000, 1000);
    const snap = await ledger.snapshot();
    expect(snap.quoteBalance).toBe(900_000);
    expect(snap.holding).toEqual({ quantity: 100, averageCost: 1000 });
    expect(snap.isHolding).toBe(true);
  });

  it('averages cost across repeated buys by quantity', () => {
    const ledger = SimulatedLedger.withQuote(1_000_000);
    ledger.applyBuy(100_000, 1000);
    ledger.applyBuy(100_000, 2000);
    expect(ledger.baseQuantity).toBe(150);
    expect(ledger.averageCost).toBeCloseTo(200_000 / 150, 8);
  });

  it('round trip leaves initial - amount + (amount/P1)*P2 and zero quantity', () => {
    const initial = 1_000_000;
    const amount = 100_000;
    const p1 = 3000;
    const p2 = 3300;
    const ledger = SimulatedLedger.withQuote(initial);
    ledger.applyBuy(amount, p1);
    const received = ledger.applyFullSell(p2);

    expect(received).toBeCloseTo((amount / p1) * p2, 6);
    expect(ledger.quoteBalance).toBeCloseTo(initial - amount + (amount / p1) * p2, 6);
    expect(ledger.baseQuantity).toBe(0);
    expect(ledger.averageCost).toBe(0);
  });

  it('rejects a buy larger than the quote balance', () => {
    const ledger = SimulatedLedger.withQuote(50_000);
    expect(() => ledger.applyBuy(100_000, 1000)).toThrow(InsufficientBalanceError);
    expect(ledger.quoteBalance).toBe(50_000);
  });

  it('exports state and rebuilds from it', () => {
    const ledger = SimulatedLedger.withQuote(1_000_000);
    ledger.applyBuy(100_000, 1000);
    const saved = ledger.exportState();

    const other = new SimulatedLedger(saved);
    expect(other.exportState()).toEqual({ quoteBalance: 900_000, baseQuantity: 100, averageCost: 1000 });
  });

  it('refuses a negative state', () => {
    expect(() => new SimulatedLedger({ quoteBalance: -1, baseQuantity: 0, averageCost: 0 })).toThrow(RangeError);
  });
});

describe('SimulatedExecution', () => {
  it('fills at the latest price sample and mutates the ledger once', async () => {
    const ledger = SimulatedLedger.withQuote(1_000_000);
    let latest: PriceSample | null = sample(2000);
    const exec = new SimulatedExecution(ledger, () => latest);

    const buy = await exec.buyMarket('KRW-BTC', 100_000);
    expect(buy).toEqual({
      orderId: 'sim-buy-1',
      side: 'BUY',
      ticker: 'KRW-BTC',
      price: 2000,
      quantity: 50,
      quoteAmount: 100_000,
      simulated: true,
    });
    expect(ledger.quoteBalance).toBe(900_000);

    latest = sample(2200);
    const sell = await exec.sellMarket('KRW-BTC', 50);
    expect(sell).toMatchObject({ orderId: 'sim-sell-2', side: 'SELL', price: 2200, quantity: 50, quoteAmount: 110_000 });
    expect(ledger.quoteBalance).toBe(1_010_000);
    expect(ledger.baseQuantity).toBe(0);
  });

  it('fails with OrderError before any price sample exists', async () => {
    const ledger = SimulatedLedger.withQuote(1_000_000);
    const exec = new SimulatedExecution(ledger, () => null);
    await expect(exec.buyMarket('KRW-BTC', 100_000)).rejects.toBeInstanceOf(OrderError);
    expect(ledger.quoteBalance).toBe(1_000_000);
  });

  it('fails with OrderError when selling more than held', async () => {
    const ledger = SimulatedLedger.withQuote(1_000_000);
    const exec = new SimulatedExecution(ledger, () => sample(1000));
    await exec.buyMarket('KRW-BTC', 100_000);
    await expect(exec.sellMarket('KRW-BTC', 101)).rejects.toBeInstanceOf(OrderError);
    expect(ledger.baseQuantity).toBe(100);
  });
});
