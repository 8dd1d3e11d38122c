import type { CooldownPhase } from './engine.js';
import type { OrderReason, OrderSide } from './order.js';

export type EngineEventType =
  | 'LOG'
  | 'STATUS'
  | 'MESSAGE'
  | 'CHART'
  | 'TRADE'
  | 'COOLDOWN';

export interface BaseEvent {
  readonly type: EngineEventType;
  readonly timestamp: number;
}

export interface LogEvent extends BaseEvent {
  readonly type: 'LOG';
  readonly level: 'info' | 'warn' | 'error';
  readonly text: string;
}

export interface StatusEvent extends BaseEvent {
  readonly type: 'STATUS';
  readonly price: number;
  /** RSI 계산 불가 틱이면 null */
  readonly indicator: number | null;
  readonly profitPct: number;
  readonly totalAssetValue: number;
  readonly changeRate: number;
  readonly cumulativeReturnPct: number;
}

/** 짧은 상태 문구 (관망/잔고 부족/쿨다운 남은 시간 등) */
export interface MessageEvent extends BaseEvent {
  readonly type: 'MESSAGE';
  readonly text: string;
}

export interface ChartEvent extends BaseEvent {
  readonly type: 'CHART';
  readonly prices: readonly number[];   // 과거 → 최신
}

export interface TradeEvent extends BaseEvent {
  readonly type: 'TRADE';
  readonly side: OrderSide;
  readonly reason: OrderReason;
  readonly ticker: string;
  readonly price: number;
  readonly quantity: number;
  readonly quoteAmount: number;
  readonly orderId: string;
  readonly simulated: boolean;
  /** 매도 시 판정 수익률 (%) */
  readonly profitPct?: number;
}

export interface CooldownEvent extends BaseEvent {
  readonly type: 'COOLDOWN';
  readonly state: CooldownPhase;
  readonly until: number | null;
  readonly consecutiveLosses: number;
}

export type EngineEvent =
  | LogEvent
  | StatusEvent
  | MessageEvent
  | ChartEvent
  | TradeEvent
  | CooldownEvent;

export type EngineEventOf<T extends EngineEventType> = Extract<EngineEvent, { type: T }>;
