import type { LedgerSnapshot } from '../types/index.js';

export type LedgerKind = 'live' | 'simulated';

/** 실거래 보유 판정 최소 평가금액 (원). 매도 후 잔량이 보유로 잡히지 않도록 */
export const DUST_THRESHOLD_QUOTE = 5_000;

/**
 * 보유 현황 조회: 엔진은 매 틱 이 스냅샷으로 Flat/Holding을 다시 판정한다.
 * price는 실거래 더스트 판정용 현재가.
 */
export interface PositionLedger {
  readonly kind: LedgerKind;
  snapshot(price: number): Promise<LedgerSnapshot>;
}
