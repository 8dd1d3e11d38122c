import { RateLimiter } from './rate-limiter.js';
import { createChildLogger } from '../logger.js';
import { config } from '../config.js';
import { OrderError, TradingError, describeError } from '../errors.js';
import * as upbit from '../exchange/upbit/rest.js';
import { errorBodySchema, orderSchema, type AccountItem, type UpbitOrder } from '../exchange/upbit/schemas.js';
import type { PrivateResponse } from '../exchange/upbit/client.js';

const log = createChildLogger('upbit-api');

/** 주문 수량 문자열: 지수 표기(1e-7) 방지, 소수 8자리 */
export function formatVolume(quantity: number): string {
  return quantity.toFixed(8).replace(/\.?0+$/, '');
}

/**
 * 업비트 v1 Private REST API 클라이언트
 *
 * 엔드포인트:
 *   POST /v1/orders   : 시장가 주문 생성
 *   GET /v1/order     : 개별 주문 조회
 *   GET /v1/accounts  : 전체 계좌(잔고) 조회
 *
 * 인증: JWT HS256 (exchange/upbit/auth.ts)
 * 재시도: 조회만 client.ts에서 처리. 주문은 재시도하지 않음
 */
export class UpbitPrivateApi {
  constructor(private readonly limiter: RateLimiter = new RateLimiter(config.execution.privateRatePerSec)) {}

  /**
   * 시장가 매수 (price = 원화 금액)
   * ord_type: 'price'
   */
  async marketBuy(market: string, quoteAmount: number): Promise<UpbitOrder> {
    await this.limiter.acquire();
    const res = await this.submit('marketBuy', () =>
      upbit.placeOrder({
        market,
        side: 'bid',
        ord_type: 'price',
        price: String(Math.floor(quoteAmount)),
      }),
    );
    return this.parseOrderResult(res);
  }

  /**
   * 시장가 매도 (volume = 코인 수량)
   * ord_type: 'market'
   */
  async marketSell(market: string, baseQuantity: number): Promise<UpbitOrder> {
    await this.limiter.acquire();
    const res = await this.submit('marketSell', () =>
      upbit.placeOrder({
        market,
        side: 'ask',
        ord_type: 'market',
        volume: formatVolume(baseQuantity),
      }),
    );
    return this.parseOrderResult(res);
  }

  /** GET /v1/accounts: 실패 시 NetworkError 그대로 전파 */
  async getAccounts(): Promise<AccountItem[]> {
    await this.limiter.acquire();
    return upbit.getAccounts();
  }

  private async submit(label: string, send: () => Promise<PrivateResponse>): Promise<PrivateResponse> {
    try {
      return await send();
    } catch (err) {
      log.warn({ err }, `${label} failed`);
      if (err instanceof TradingError) {
        throw new OrderError(`${label} failed: ${err.message}`, err.toJSON());
      }
      throw new OrderError(`${label} failed: ${describeError(err)}`);
    }
  }

  /** 주문 응답 → 주문 객체. uuid 없으면 체결 확인 불가로 간주 */
  private parseOrderResult(res: PrivateResponse): UpbitOrder {
    if (res.statusCode < 200 || res.statusCode >= 300) {
      const body = errorBodySchema.safeParse(res.raw);
      const reason = body.success ? body.data.error.message ?? String(body.data.error.name) : `status ${res.statusCode}`;
      throw new OrderError(`Order rejected: ${reason}`, res.raw);
    }
    const parsed = orderSchema.safeParse(res.raw);
    if (!parsed.success) {
      throw new OrderError('Order response has no order id', res.raw);
    }
    log.info({ uuid: parsed.data.uuid, side: parsed.data.side, market: parsed.data.market }, 'Order placed');
    return parsed.data;
  }
}
