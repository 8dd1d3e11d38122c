import type {
  EngineEvent,
  StatusEvent,
  TradeEvent,
} from './types/index.js';

/** 대시보드 타임라인 이벤트 (프론트 DTO) */
export interface TimelineEventDto {
  id: string;
  ts: number;
  type: 'log' | 'message' | 'trade' | 'cooldown';
  summary: string;
  level?: 'info' | 'warn' | 'error';
}

const EVENT_LIMIT = 500;
const TRADE_LIMIT = 100;

/**
 * 대시보드 API가 읽는 실시간 상태: 엔진 이벤트 스트림의 투영.
 * main에서 engine.onAny(dashboardState.apply)로 연결한다.
 */
export function createDashboardState() {
  let lastStatus: StatusEvent | null = null;
  let lastMessage: string | null = null;
  let chart: readonly number[] = [];
  let events: TimelineEventDto[] = [];
  let trades: TradeEvent[] = [];
  let seq = 0;

  const append = (ev: Omit<TimelineEventDto, 'id'>): void => {
    events = [...events.slice(-(EVENT_LIMIT - 1)), { ...ev, id: `ev-${ev.ts}-${++seq}` }];
  };

  const apply = (e: EngineEvent): void => {
    switch (e.type) {
      case 'STATUS':
        lastStatus = e;
        break;
      case 'CHART':
        chart = e.prices;
        break;
      case 'MESSAGE':
        lastMessage = e.text;
        append({ ts: e.timestamp, type: 'message', summary: e.text });
        break;
      case 'LOG':
        append({ ts: e.timestamp, type: 'log', summary: e.text, level: e.level });
        break;
      case 'TRADE':
        trades = [...trades.slice(-(TRADE_LIMIT - 1)), e];
        append({
          ts: e.timestamp,
          type: 'trade',
          summary: `${e.side} ${e.ticker} ${e.quantity} @ ${e.price} (${e.reason})`,
        });
        break;
      case 'COOLDOWN':
        append({
          ts: e.timestamp,
          type: 'cooldown',
          summary: e.state === 'COOLING' ? `COOLING (losses ${e.consecutiveLosses})` : 'ACTIVE',
        });
        break;
    }
  };

  return {
    apply,
    getLastStatus: () => lastStatus,
    getLastMessage: () => lastMessage,
    getChart: () => chart,
    getEvents: (limit: number = EVENT_LIMIT) => events.slice(-limit),
    getTrades: () => trades,
  };
}

export type DashboardState = ReturnType<typeof createDashboardState>;

export const dashboardState: DashboardState = createDashboardState();
