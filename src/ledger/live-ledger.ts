import { createChildLogger } from '../logger.js';
import { parseTicker } from '../market/ticker.js';
import type { AccountItem } from '../exchange/upbit/schemas.js';
import type { LedgerSnapshot, Ticker } from '../types/index.js';
import { DUST_THRESHOLD_QUOTE, type PositionLedger } from './position-ledger.js';

const log = createChildLogger('live-ledger');

export interface AccountsSource {
  getAccounts(): Promise<AccountItem[]>;
}

function toNumber(value: string): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

/**
 * 실거래 원장: 매 스냅샷마다 /v1/accounts 조회.
 * 보유 판정은 평가금액 >= DUST_THRESHOLD_QUOTE.
 */
export class LiveLedger implements PositionLedger {
  readonly kind = 'live' as const;
  private readonly quote: string;
  private readonly base: string;

  constructor(
    private readonly api: AccountsSource,
    ticker: Ticker,
  ) {
    const parts = parseTicker(ticker);
    this.quote = parts.quote;
    this.base = parts.base;
  }

  async snapshot(price: number): Promise<LedgerSnapshot> {
    const accounts = await this.api.getAccounts();
    const quoteAccount = accounts.find((a) => a.currency === this.quote);
    const baseAccount = accounts.find((a) => a.currency === this.base && a.unit_currency === this.quote);

    const quantity = baseAccount ? toNumber(baseAccount.balance) : 0;
    const averageCost = baseAccount ? toNumber(baseAccount.avg_buy_price) : 0;
    const quoteBalance = quoteAccount ? toNumber(quoteAccount.balance) : 0;
    const isHolding = quantity * price >= DUST_THRESHOLD_QUOTE;

    if (quantity > 0 && !isHolding) {
      log.debug({ quantity, price }, 'Residual balance below dust threshold');
    }
    return { quoteBalance, holding: { quantity, averageCost }, isHolding };
  }
}
