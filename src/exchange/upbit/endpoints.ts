/**
 * 봇이 호출하는 업비트 경로: 시세 4개(마켓 목록, 1분봉, 체결, 현재가)와
 * 계좌 조회/시장가 주문. 체결 확인은 다음 틱의 계좌 조회로 대신하므로 주문 조회 경로는 없다.
 */

export const UPBIT_REST_BASE = 'https://api.upbit.com';

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET 마켓 코드 조회 */
export const PUBLIC_MARKET_ALL = '/v1/market/all';

/** GET 분 캔들 (RSI는 unit=1) */
export function publicCandlesMinutes(unit: number): string {
  return `/v1/candles/minutes/${unit}`;
}

/** GET 최근 체결: 차트 + 현재가 대체 소스 */
export const PUBLIC_TRADES_TICKS = '/v1/trades/ticks';

/** GET 현재가 + 전일 대비 등락률 */
export const PUBLIC_TICKER = '/v1/ticker';

// ─── PRIVATE ────────────────────────────────────────────────────────────

/** GET 전체 계좌: 원화 잔고와 보유 수량 */
export const PRIVATE_ACCOUNTS = '/v1/accounts';

/** POST 시장가 주문 (재시도 없음) */
export const PRIVATE_ORDERS_POST = '/v1/orders';
