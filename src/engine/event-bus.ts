import { createChildLogger } from '../logger.js';
import type { EngineEvent, EngineEventOf, EngineEventType } from '../types/index.js';

const log = createChildLogger('event-bus');

type AnyHandler = (event: EngineEvent) => void;

const DEFAULT_LOG_LIMIT = 500;

/**
 * 타입드 이벤트 버스: 최근 이벤트 보관 (대시보드 재접속 시 리플레이)
 * 핸들러 예외는 로그만 남기고 삼킴. 소비자가 엔진 루프를 막거나 깨지 않도록.
 */
export class EventBus {
  private handlers: Map<EngineEventType, AnyHandler[]> = new Map();
  private anyHandlers: AnyHandler[] = [];
  private log: EngineEvent[] = [];

  constructor(private readonly logLimit: number = DEFAULT_LOG_LIMIT) {}

  /** 구독: 해제 함수 반환 */
  on<T extends EngineEventType>(type: T, handler: (event: EngineEventOf<T>) => void): () => void {
    const wrapped: AnyHandler = (event) => {
      if (isOfType(event, type)) handler(event);
    };
    const list = this.handlers.get(type) ?? [];
    list.push(wrapped);
    this.handlers.set(type, list);
    return () => {
      const current = this.handlers.get(type);
      if (current) this.handlers.set(type, current.filter((h) => h !== wrapped));
    };
  }

  onAny(handler: AnyHandler): () => void {
    this.anyHandlers.push(handler);
    return () => {
      this.anyHandlers = this.anyHandlers.filter((h) => h !== handler);
    };
  }

  emit(event: EngineEvent): void {
    this.log.push(event);
    if (this.log.length > this.logLimit) {
      this.log = this.log.slice(-this.logLimit);
    }
    const handlers = [...(this.handlers.get(event.type) ?? []), ...this.anyHandlers];
    for (const h of handlers) {
      try {
        h(event);
      } catch (err) {
        log.warn({ err, type: event.type }, 'Event handler threw');
      }
    }
  }

  getLog(): readonly EngineEvent[] {
    return this.log;
  }
}

function isOfType<T extends EngineEventType>(event: EngineEvent, type: T): event is EngineEventOf<T> {
  return event.type === type;
}
