/** 보유 현황: quantity === 0 이면 무포지션 (averageCost 무의미) */
export interface Holding {
  readonly quantity: number;      // 코인 수량
  readonly averageCost: number;   // 평균 매수가 (quote 통화)
}

/** 틱마다 원장에서 다시 읽는 스냅샷 */
export interface LedgerSnapshot {
  readonly quoteBalance: number;  // 주문 가능 원화
  readonly holding: Holding;
  /** 보유 판정: 실거래는 더스트 기준, 모의는 수량 > 0 */
  readonly isHolding: boolean;
}

/** 모의투자 원장 상태 (엔진 단독 소유) */
export interface SimulatedLedgerState {
  quoteBalance: number;
  baseQuantity: number;
  averageCost: number;
}
