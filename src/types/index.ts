export type {
  Ticker,
  TickerParts,
  PriceSample,
  CandleSeries,
  TradeTick,
  QuoteMarket,
} from './market.js';
export type { Holding, LedgerSnapshot, SimulatedLedgerState } from './position.js';
export type { OrderSide, OrderReason, OrderResult } from './order.js';
export type {
  EngineConfig,
  CooldownPhase,
  CooldownState,
  EngineCheckpoint,
  ManualCommandKind,
  CommandOutcome,
} from './engine.js';
export type {
  EngineEventType,
  BaseEvent,
  LogEvent,
  StatusEvent,
  MessageEvent,
  ChartEvent,
  TradeEvent,
  CooldownEvent,
  EngineEvent,
  EngineEventOf,
} from './event.js';
