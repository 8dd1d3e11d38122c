import type { Ticker } from './market.js';
import type { SimulatedLedgerState } from './position.js';

/** 매매 설정: 원자적으로 교체, 다음 틱 경계에서 적용 */
export interface EngineConfig {
  readonly ticker: Ticker;
  readonly indicatorPeriod: number;
  readonly entryThreshold: number;       // RSI <= 이 값이면 진입
  readonly takeProfitPct: number;        // 익절 수익률 (%)
  readonly stopLossPct: number;          // 손절 수익률 (%, 음수)
  readonly orderAmount: number;          // 1회 매수 원화 금액
  readonly maxConsecutiveLosses: number; // 0 = 쿨다운 비활성
  readonly cooldownMinutes: number;
  readonly simulationMode: boolean;
}

export type CooldownPhase = 'ACTIVE' | 'COOLING';

export interface CooldownState {
  consecutiveLosses: number;
  /** Unix ms, 쿨다운 아닐 때 null */
  cooldownUntil: number | null;
}

/** 외부 저장소로 넘기는 엔진 상태 */
export interface EngineCheckpoint {
  readonly config: EngineConfig;
  readonly simulatedLedger: SimulatedLedgerState;
  /** 누적 수익률 기준 자산 (실거래: 최초 관측값) */
  readonly baselineAssetValue: number | null;
  readonly cooldown: CooldownState;
  readonly auto: boolean;
}

export type ManualCommandKind = 'BUY_NOW' | 'SELL_ALL';

export interface CommandOutcome {
  readonly command: ManualCommandKind;
  readonly ok: boolean;
  readonly message: string;
  readonly orderId?: string;
}
