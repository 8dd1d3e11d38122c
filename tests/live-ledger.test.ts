import { describe, it, expect, vi } from 'vitest';
import { LiveLedger } from '../src/ledger/live-ledger.js';
import { DUST_THRESHOLD_QUOTE } from '../src/ledger/position-ledger.js';
import { NetworkError } from '../src/errors.js';
import type { AccountItem } from '../src/exchange/upbit/schemas.js';

function account(currency: string, balance: string, avg: string = '0'): AccountItem {
  return { currency, balance, locked: '0', avg_buy_price: avg, unit_currency: 'KRW' };
}

describe('LiveLedger', () => {
  it('reads quote balance, quantity and average cost from accounts', async () => {
    const api = {
      getAccounts: vi.fn().mockResolvedValue([
        account('KRW', '250000.5'),
        account('BTC', '0.002', '95000000'),
        account('ETH', '1.5', '4000000'),
      ]),
    };
    const ledger = new LiveLedger(api, 'KRW-BTC');
    const snap = await ledger.snapshot(100_000_000);
    expect(snap).toEqual({
      quoteBalance: 250000.5,
      holding: { quantity: 0.002, averageCost: 95_000_000 },
      isHolding: true,
    });
  });

  it('treats a position worth less than the dust threshold as flat', async () => {
    // 0.00004 * 100,000,000 = 4,000 < 5,000
    const api = { getAccounts: vi.fn().mockResolvedValue([account('KRW', '0'), account('BTC', '0.00004', '90000000')]) };
    const snap = await new LiveLedger(api, 'KRW-BTC').snapshot(100_000_000);
    expect(snap.holding.quantity).toBe(0.00004);
    expect(snap.isHolding).toBe(false);
  });

  it('counts a position worth exactly the threshold as holding', async () => {
    const api = { getAccounts: vi.fn().mockResolvedValue([account('BTC', '1', '4000')]) };
    const snap = await new LiveLedger(api, 'KRW-BTC').snapshot(DUST_THRESHOLD_QUOTE);
    expect(snap.isHolding).toBe(true);
    expect(snap.quoteBalance).toBe(0);
  });

  it('is flat when the base currency has no account', async () => {
    const api = { getAccounts: vi.fn().mockResolvedValue([account('KRW', '10000')]) };
    const snap = await new LiveLedger(api, 'KRW-XRP').snapshot(700);
    expect(snap).toEqual({ quoteBalance: 10000, holding: { quantity: 0, averageCost: 0 }, isHolding: false });
  });

  it('propagates account lookup failures', async () => {
    const api = { getAccounts: vi.fn().mockRejectedValue(new NetworkError('down', '/v1/accounts', 503)) };
    await expect(new LiveLedger(api, 'KRW-BTC').snapshot(1)).rejects.toBeInstanceOf(NetworkError);
  });
});
