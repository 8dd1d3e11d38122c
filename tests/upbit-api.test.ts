import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as upbit from '../src/exchange/upbit/rest.js';
import { UpbitPrivateApi, formatVolume } from '../src/execution/upbit-api.js';
import { LiveExecution } from '../src/execution/live-execution.js';
import { RateLimiter } from '../src/execution/rate-limiter.js';
import { NetworkError, OrderError } from '../src/errors.js';
import type { UpbitOrder } from '../src/exchange/upbit/schemas.js';

vi.mock('../src/exchange/upbit/rest.js');

const order: UpbitOrder = {
  uuid: 'order-uuid-1',
  side: 'bid',
  ord_type: 'price',
  price: '100000',
  state: 'wait',
  market: 'KRW-BTC',
};

describe('formatVolume', () => {
  it('avoids exponent notation and trailing zeros', () => {
    expect(formatVolume(1e-7)).toBe('0.0000001');
    expect(formatVolume(0.00012345)).toBe('0.00012345');
    expect(formatVolume(1.5)).toBe('1.5');
    expect(formatVolume(100)).toBe('100');
  });
});

describe('UpbitPrivateApi', () => {
  let api: UpbitPrivateApi;

  beforeEach(() => {
    vi.resetAllMocks();
    api = new UpbitPrivateApi(new RateLimiter(100));
  });

  it('places a market buy by quote amount, floored', async () => {
    vi.mocked(upbit.placeOrder).mockResolvedValue({ statusCode: 201, raw: order });

    await expect(api.marketBuy('KRW-BTC', 100_000.7)).resolves.toEqual(order);
    expect(upbit.placeOrder).toHaveBeenCalledWith({ market: 'KRW-BTC', side: 'bid', ord_type: 'price', price: '100000' });
  });

  it('places a market sell by volume', async () => {
    vi.mocked(upbit.placeOrder).mockResolvedValue({ statusCode: 201, raw: { ...order, side: 'ask', ord_type: 'market' } });

    await api.marketSell('KRW-BTC', 0.00012345);
    expect(upbit.placeOrder).toHaveBeenCalledWith({ market: 'KRW-BTC', side: 'ask', ord_type: 'market', volume: '0.00012345' });
  });

  it('rejects with the exchange reason and raw body', async () => {
    const raw = { error: { name: 'insufficient_funds_bid', message: '주문가능한 금액(KRW)이 부족합니다.' } };
    vi.mocked(upbit.placeOrder).mockResolvedValue({ statusCode: 400, raw });

    const err = await api.marketBuy('KRW-BTC', 100_000).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OrderError);
    expect(err).toMatchObject({ message: 'Order rejected: 주문가능한 금액(KRW)이 부족합니다.', raw });
  });

  it('treats a response without uuid as a failed order', async () => {
    const raw = { side: 'bid', state: 'wait' };
    vi.mocked(upbit.placeOrder).mockResolvedValue({ statusCode: 201, raw });

    await expect(api.marketBuy('KRW-BTC', 100_000)).rejects.toMatchObject({
      message: 'Order response has no order id',
      raw,
    });
  });

  it('wraps transport failures in OrderError', async () => {
    vi.mocked(upbit.placeOrder).mockRejectedValue(new NetworkError('POST /v1/orders failed: timeout', '/v1/orders'));

    const err = await api.marketSell('KRW-BTC', 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OrderError);
    expect(err).toMatchObject({ message: 'marketSell failed: POST /v1/orders failed: timeout' });
  });

  it('passes account reads through', async () => {
    vi.mocked(upbit.getAccounts).mockResolvedValue([]);

    await expect(api.getAccounts()).resolves.toEqual([]);
    expect(upbit.getAccounts).toHaveBeenCalledOnce();
  });
});

describe('LiveExecution', () => {
  const sample = { price: 2000, signedChangeRate: 0, observedAt: 0, source: 'ticker' as const };

  it('reports the order uuid with reference-price estimates', async () => {
    const api = { marketBuy: vi.fn().mockResolvedValue(order), marketSell: vi.fn() };
    const exec = new LiveExecution(api, () => sample);

    await expect(exec.buyMarket('KRW-BTC', 100_000)).resolves.toEqual({
      orderId: 'order-uuid-1',
      side: 'BUY',
      ticker: 'KRW-BTC',
      price: 2000,
      quantity: 50,
      quoteAmount: 100_000,
      simulated: false,
    });
    expect(api.marketBuy).toHaveBeenCalledWith('KRW-BTC', 100_000);
  });

  it('sells the given quantity', async () => {
    const api = { marketBuy: vi.fn(), marketSell: vi.fn().mockResolvedValue({ ...order, uuid: 'sell-1', side: 'ask' }) };
    const exec = new LiveExecution(api, () => sample);

    const result = await exec.sellMarket('KRW-BTC', 3);

    expect(result).toMatchObject({ orderId: 'sell-1', side: 'SELL', quantity: 3, quoteAmount: 6000, price: 2000 });
  });

  it('propagates order errors', async () => {
    const api = { marketBuy: vi.fn().mockRejectedValue(new OrderError('Order response has no order id')), marketSell: vi.fn() };
    const exec = new LiveExecution(api, () => null);

    await expect(exec.buyMarket('KRW-BTC', 5000)).rejects.toBeInstanceOf(OrderError);
  });
});
