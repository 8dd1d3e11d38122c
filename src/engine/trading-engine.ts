import { createChildLogger, type EngineLogLevel } from '../logger.js';
import { InsufficientDataError, InvalidConfigError, OrderError, describeError } from '../errors.js';
import { computeRsi } from '../indicators/rsi.js';
import { SimulatedLedger } from '../ledger/simulated-ledger.js';
import type { PriceFeed } from '../market/price-feed.js';
import { CooldownGuard, type CooldownTransition } from '../risk/cooldown-guard.js';
import type {
  CommandOutcome,
  EngineCheckpoint,
  EngineConfig,
  EngineEvent,
  EngineEventOf,
  EngineEventType,
  LedgerSnapshot,
  ManualCommandKind,
  OrderReason,
  OrderResult,
  PriceSample,
} from '../types/index.js';
import { createBackends, type BackendFactory, type EngineBackends } from './backends.js';
import { validateEngineConfig } from './engine-config.js';
import { EventBus } from './event-bus.js';
import { messages } from './messages.js';

const log = createChildLogger('trading-engine');

export interface TradingEngineOptions {
  config: EngineConfig;
  feed: PriceFeed;
  /** 원장/주문 실행 선택 (기본 createBackends) */
  backends?: BackendFactory;
  checkpoint?: EngineCheckpoint | null;
  now?: () => number;
  intervalMs?: number;
  candleCount?: number;
  chartTickCount?: number;
  /** 모의투자 시작 잔고 = 모의 누적 수익률 기준값 */
  initialQuoteBalance?: number;
  /** 체크포인트가 없을 때 자동매매 초기값 */
  auto?: boolean;
  /** 설정 검증 시 실거래 키 보유 여부 (기본: 환경변수 기준) */
  hasLiveCredentials?: boolean;
  bus?: EventBus;
}

/** 틱마다 한 번 계산하는 평가 */
export interface Valuation {
  profitPct: number;
  totalAssetValue: number;
  cumulativeReturnPct: number;
}

export interface EngineStateView {
  running: boolean;
  auto: boolean;
  config: EngineConfig;
  pendingConfig: EngineConfig | null;
  latestSample: PriceSample | null;
  /** 마지막으로 읽은 원장 스냅샷 */
  lastSnapshot: LedgerSnapshot | null;
  cooldown: { state: 'ACTIVE' | 'COOLING'; until: number | null; consecutiveLosses: number };
  /** 쿨다운 전환 이력 (최근 것만 유지) */
  cooldownHistory: readonly CooldownTransition[];
}

interface PendingCommand {
  kind: ManualCommandKind;
  resolve: (outcome: CommandOutcome) => void;
}

/**
 * RSI 역추세 매매 엔진: 단일 마켓, 롱 전용
 *
 * 틱 단위로 직렬화: 틱과 수동 명령은 절대 겹치지 않는다.
 * 포지션(Flat/Holding)은 매 틱 원장 스냅샷으로 다시 판정하며 엔진 자체에는
 * 원장과 쿨다운 가드 외의 포지션 기억이 없다.
 */
export class TradingEngine {
  private config: EngineConfig;
  private pendingConfig: EngineConfig | null = null;
  private backends: EngineBackends;
  private readonly backendFactory: BackendFactory;
  private readonly simLedger: SimulatedLedger;
  private readonly guard: CooldownGuard;
  private readonly feed: PriceFeed;
  private readonly bus: EventBus;
  private readonly now: () => number;
  private readonly intervalMs: number;
  private readonly candleCount: number;
  private readonly chartTickCount: number;
  private readonly initialQuoteBalance: number;
  private readonly hasLiveCredentials: boolean | undefined;

  private latestSample: PriceSample | null = null;
  private lastSnapshot: LedgerSnapshot | null = null;
  /** 실거래 누적 수익률 기준 (최초 관측 총자산) */
  private baselineAssetValue: number | null;
  private auto: boolean;
  private inbox: PendingCommand[] = [];
  private tickChain: Promise<void> = Promise.resolve();
  private loop: Promise<void> | null = null;
  private stopRequested = false;
  private stopped = false;
  private wake: (() => void) | null = null;

  constructor(options: TradingEngineOptions) {
    this.hasLiveCredentials = options.hasLiveCredentials;
    this.config = validateEngineConfig(options.config, { hasLiveCredentials: this.hasLiveCredentials });
    this.feed = options.feed;
    this.bus = options.bus ?? new EventBus();
    this.now = options.now ?? Date.now;
    this.intervalMs = options.intervalMs ?? 1000;
    this.candleCount = options.candleCount ?? 200;
    this.chartTickCount = options.chartTickCount ?? 50;
    this.initialQuoteBalance = options.initialQuoteBalance ?? 10_000_000;
    this.backendFactory = options.backends ?? createBackends;

    const cp = options.checkpoint ?? null;
    this.simLedger = cp
      ? new SimulatedLedger(cp.simulatedLedger)
      : SimulatedLedger.withQuote(this.initialQuoteBalance);
    this.baselineAssetValue = cp?.baselineAssetValue ?? null;
    this.auto = cp?.auto ?? options.auto ?? false;
    this.guard = new CooldownGuard(
      { maxConsecutiveLosses: this.config.maxConsecutiveLosses, cooldownMinutes: this.config.cooldownMinutes },
      cp?.cooldown,
    );
    this.backends = this.buildBackends(this.config);
  }

  // ─── 구독 ───────────────────────────────────────────────────────────────

  on<T extends EngineEventType>(type: T, handler: (event: EngineEventOf<T>) => void): () => void {
    return this.bus.on(type, handler);
  }

  onAny(handler: (event: EngineEvent) => void): () => void {
    return this.bus.onAny(handler);
  }

  get events(): EventBus {
    return this.bus;
  }

  // ─── 수명 주기 ──────────────────────────────────────────────────────────

  get isRunning(): boolean {
    return this.loop !== null;
  }

  /** 루프 시작: stop() 될 때까지 진행되는 Promise 반환 */
  start(): Promise<void> {
    if (this.loop) return this.loop;
    this.stopRequested = false;
    this.stopped = false;
    this.loop = this.runLoop().finally(() => {
      this.loop = null;
    });
    return this.loop;
  }

  /** 협조적 중지: 진행 중인 틱이 끝난 뒤 resolve, 대기 명령은 실패 처리 */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.stopped = true;
    this.wake?.();
    if (this.loop) {
      await this.loop;
    } else {
      await this.tickChain;
    }
    this.failPending(messages.engineStopped());
  }

  /** 한 틱 실행 (루프 밖에서 호출해도 직렬화됨) */
  tick(): Promise<void> {
    const run = this.tickChain.then(() => this.runTick());
    this.tickChain = run.catch((err: unknown) => {
      log.error({ err }, 'Tick chain failure');
    });
    return run;
  }

  private async runLoop(): Promise<void> {
    log.info({ ticker: this.config.ticker, intervalMs: this.intervalMs }, 'Engine loop started');
    while (!this.stopRequested) {
      const startedAt = this.now();
      await this.tick();
      if (this.stopRequested) break;
      const elapsed = this.now() - startedAt;
      await this.sleep(Math.max(0, this.intervalMs - elapsed));
    }
    log.info('Engine loop stopped');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  // ─── 외부 입력 ──────────────────────────────────────────────────────────

  /**
   * 설정 교체: 잘못된 값은 InvalidConfigError로 즉시 거절(기존 설정 유지),
   * 통과하면 다음 틱 경계에서 적용.
   */
  configure(input: unknown): EngineConfig {
    const next = validateEngineConfig(input, { hasLiveCredentials: this.hasLiveCredentials });
    // 모의 원장은 마켓 구분이 없음: 보유 중에는 마켓 변경 불가
    if (next.ticker !== this.config.ticker && this.simLedger.baseQuantity > 0) {
      throw new InvalidConfigError([
        `ticker: simulated position in ${this.config.ticker} must be sold before switching to ${next.ticker}`,
      ]);
    }
    this.pendingConfig = next;
    log.info({ config: next }, 'Configuration queued for next tick');
    return next;
  }

  setAuto(on: boolean): void {
    if (this.auto === on) return;
    this.auto = on;
    this.emitLog('info', on ? '자동매매 시작' : '자동매매 중지');
  }

  get isAuto(): boolean {
    return this.auto;
  }

  requestBuyNow(): Promise<CommandOutcome> {
    return this.enqueue('BUY_NOW');
  }

  requestSellAll(): Promise<CommandOutcome> {
    return this.enqueue('SELL_ALL');
  }

  exportCheckpoint(): EngineCheckpoint {
    return {
      config: this.pendingConfig ?? this.config,
      simulatedLedger: this.simLedger.exportState(),
      baselineAssetValue: this.baselineAssetValue,
      cooldown: this.guard.exportState(),
      auto: this.auto,
    };
  }

  getState(): EngineStateView {
    return {
      running: this.isRunning,
      auto: this.auto,
      config: this.config,
      pendingConfig: this.pendingConfig,
      latestSample: this.latestSample,
      lastSnapshot: this.lastSnapshot,
      cooldown: {
        state: this.guard.state,
        until: this.guard.until,
        consecutiveLosses: this.guard.losses,
      },
      cooldownHistory: this.guard.getHistory(),
    };
  }

  // ─── 틱 ────────────────────────────────────────────────────────────────

  private async runTick(): Promise<void> {
    try {
      this.applyPendingConfig();
      const cfg = this.config;

      let sample: PriceSample | null = null;
      try {
        sample = await this.feed.fetchTicker(cfg.ticker);
        this.latestSample = sample;
      } catch (err) {
        this.emitLog('warn', `현재가 조회 실패: ${describeError(err)}`);
      }

      // 수동 명령은 자동 판단 전에 처리 → 아래 스냅샷이 결과를 반영
      await this.drainInbox();
      if (!sample) return;

      const rsi = await this.computeIndicator(cfg);
      const snap = await this.readLedger(sample.price);
      if (snap) this.lastSnapshot = snap;
      const valuation = snap ? this.valuate(snap, sample.price) : null;

      if (valuation && sample.price > 0) {
        this.bus.emit({
          type: 'STATUS',
          timestamp: this.now(),
          price: sample.price,
          indicator: rsi,
          profitPct: valuation.profitPct,
          totalAssetValue: valuation.totalAssetValue,
          changeRate: sample.signedChangeRate,
          cumulativeReturnPct: valuation.cumulativeReturnPct,
        });
      }

      await this.emitChart(cfg);

      if (!this.auto) return;
      if (!this.pollCooldown()) return;
      if (rsi === null || !snap || !valuation) return;

      if (snap.isHolding) {
        await this.decideHolding(cfg, snap, valuation.profitPct);
      } else {
        await this.decideFlat(cfg, snap, rsi);
      }
    } catch (err) {
      this.emitLog('error', `틱 처리 중 예외: ${describeError(err)}`);
    }
  }

  private applyPendingConfig(): void {
    const next = this.pendingConfig;
    if (!next) return;
    this.pendingConfig = null;
    const prev = this.config;

    if (prev.simulationMode !== next.simulationMode || prev.ticker !== next.ticker) {
      try {
        this.backends = this.buildBackends(next);
      } catch (err) {
        this.emitLog('error', `설정 적용 실패: ${describeError(err)}`);
        return;
      }
      // 마켓/모드가 바뀌면 기존 가격·기준 자산은 무효
      this.latestSample = null;
      this.lastSnapshot = null;
      this.baselineAssetValue = null;
    }

    this.config = next;
    this.guard.updateLimits(
      { maxConsecutiveLosses: next.maxConsecutiveLosses, cooldownMinutes: next.cooldownMinutes },
      this.now(),
    );
    this.emitLog(
      'info',
      `설정 적용: ${next.ticker} RSI(${next.indicatorPeriod}) <= ${next.entryThreshold}, ` +
        `익절 ${next.takeProfitPct}% / 손절 ${next.stopLossPct}%, ${next.simulationMode ? '모의' : '실거래'}`,
    );
  }

  private async computeIndicator(cfg: EngineConfig): Promise<number | null> {
    try {
      const closes = await this.feed.fetchCandles(cfg.ticker, this.candleCount);
      return computeRsi(closes, cfg.indicatorPeriod);
    } catch (err) {
      if (err instanceof InsufficientDataError) {
        log.debug({ required: err.required, actual: err.actual }, 'RSI unavailable this tick');
      } else {
        this.emitLog('warn', `캔들 조회 실패: ${describeError(err)}`);
      }
      return null;
    }
  }

  private async readLedger(price: number): Promise<LedgerSnapshot | null> {
    try {
      return await this.backends.ledger.snapshot(price);
    } catch (err) {
      this.emitLog('warn', `잔고 조회 실패: ${describeError(err)}`);
      return null;
    }
  }

  /** 수익률·총자산·누적 수익률: 틱당 한 번 */
  private valuate(snap: LedgerSnapshot, price: number): Valuation {
    const { quantity, averageCost } = snap.holding;
    const profitPct = quantity > 0 && averageCost > 0 ? ((price - averageCost) / averageCost) * 100 : 0;
    const totalAssetValue = snap.quoteBalance + quantity * price;

    let baseline: number | null;
    if (this.config.simulationMode) {
      baseline = this.initialQuoteBalance;
    } else {
      if (this.baselineAssetValue === null && totalAssetValue > 0) {
        this.baselineAssetValue = totalAssetValue;
      }
      baseline = this.baselineAssetValue;
    }
    const cumulativeReturnPct = baseline && baseline > 0 ? ((totalAssetValue - baseline) / baseline) * 100 : 0;
    return { profitPct, totalAssetValue, cumulativeReturnPct };
  }

  private async emitChart(cfg: EngineConfig): Promise<void> {
    try {
      const prices = await this.feed.fetchRecentTrades(cfg.ticker, this.chartTickCount);
      if (prices.length > 0) {
        this.bus.emit({ type: 'CHART', timestamp: this.now(), prices });
      }
    } catch (err) {
      log.debug({ err }, 'Chart sample unavailable');
    }
  }

  /** 쿨다운 확인 → 판단 진행 가능 여부 */
  private pollCooldown(): boolean {
    const poll = this.guard.poll(this.now());
    if (poll.resumed) {
      this.emitCooldown();
      this.emitMessage(messages.resumed());
    }
    if (poll.state === 'COOLING') {
      this.emitMessage(messages.cooling(poll.remainingMs));
      return false;
    }
    return true;
  }

  private async decideFlat(cfg: EngineConfig, snap: LedgerSnapshot, rsi: number): Promise<void> {
    if (rsi > cfg.entryThreshold) {
      this.emitMessage(messages.watching(rsi, cfg.entryThreshold));
      return;
    }
    if (snap.quoteBalance < cfg.orderAmount) {
      this.emitMessage(messages.insufficientBalance(snap.quoteBalance, cfg.orderAmount));
      return;
    }
    await this.executeBuy(cfg, 'entry');
  }

  private async decideHolding(cfg: EngineConfig, snap: LedgerSnapshot, profitPct: number): Promise<void> {
    if (snap.holding.averageCost <= 0) {
      log.warn({ holding: snap.holding }, 'Holding without average cost; skipping exit check');
      return;
    }
    // 익절 우선 (손절 >= 익절로 잘못 설정된 경우에도)
    let reason: 'take-profit' | 'stop-loss' | null = null;
    if (profitPct >= cfg.takeProfitPct) reason = 'take-profit';
    else if (profitPct <= cfg.stopLossPct) reason = 'stop-loss';

    if (!reason) {
      this.emitMessage(messages.holding(profitPct));
      return;
    }
    const result = await this.executeSell(cfg, reason, snap.holding.quantity, profitPct);
    if (!result) return;

    // 쿨다운 집계는 청산 사유가 아닌 수익률 <= 손절선 기준
    const outcome = profitPct <= cfg.stopLossPct ? 'stop-loss' : 'take-profit';
    const phase = this.guard.recordExit(outcome, this.now());
    if (phase === 'COOLING') {
      this.emitCooldown();
      this.emitMessage(messages.cooldownStarted(this.guard.losses, cfg.cooldownMinutes));
    }
  }

  // ─── 주문 ──────────────────────────────────────────────────────────────

  private async executeBuy(cfg: EngineConfig, reason: OrderReason): Promise<OrderResult | null> {
    try {
      const result = await this.backends.execution.buyMarket(cfg.ticker, cfg.orderAmount);
      this.emitTrade(result, reason);
      return result;
    } catch (err) {
      this.reportOrderFailure('매수', err);
      return null;
    }
  }

  private async executeSell(
    cfg: EngineConfig,
    reason: OrderReason,
    quantity: number,
    profitPct: number,
  ): Promise<OrderResult | null> {
    try {
      const result = await this.backends.execution.sellMarket(cfg.ticker, quantity);
      this.emitTrade(result, reason, profitPct);
      return result;
    } catch (err) {
      this.reportOrderFailure('매도', err);
      return null;
    }
  }

  private reportOrderFailure(label: string, err: unknown): void {
    if (err instanceof OrderError) {
      log.error({ err, raw: err.raw }, `${label} order failed`);
    } else {
      log.error({ err }, `${label} order failed`);
    }
    this.emitLog('error', `${label} 주문 실패: ${describeError(err)}`);
  }

  // ─── 수동 명령 ──────────────────────────────────────────────────────────

  private enqueue(kind: ManualCommandKind): Promise<CommandOutcome> {
    if (this.stopped) {
      return Promise.resolve({ command: kind, ok: false, message: messages.engineStopped() });
    }
    return new Promise((resolve) => {
      this.inbox.push({ kind, resolve });
    });
  }

  private async drainInbox(): Promise<void> {
    if (this.inbox.length === 0) return;
    const commands = this.inbox;
    this.inbox = [];
    for (const cmd of commands) {
      const outcome = await this.runCommand(cmd.kind);
      this.emitMessage(outcome.message);
      cmd.resolve(outcome);
    }
  }

  /** 수동 매매는 쿨다운 카운트에 반영하지 않음 */
  private async runCommand(kind: ManualCommandKind): Promise<CommandOutcome> {
    const cfg = this.config;
    const sample = this.latestSample;
    if (!sample) return { command: kind, ok: false, message: messages.noPrice() };

    const snap = await this.readLedger(sample.price);
    if (!snap) return { command: kind, ok: false, message: '잔고 조회 실패' };

    if (kind === 'BUY_NOW') {
      if (snap.quoteBalance < cfg.orderAmount) {
        return { command: kind, ok: false, message: messages.insufficientBalance(snap.quoteBalance, cfg.orderAmount) };
      }
      const result = await this.executeBuy(cfg, 'manual');
      return result
        ? { command: kind, ok: true, message: messages.filled('manual', result), orderId: result.orderId }
        : { command: kind, ok: false, message: '매수 주문 실패' };
    }

    const { quantity, averageCost } = snap.holding;
    if (!(quantity > 0)) {
      return { command: kind, ok: false, message: messages.noHolding() };
    }
    const profitPct = averageCost > 0 ? ((sample.price - averageCost) / averageCost) * 100 : 0;
    const result = await this.executeSell(cfg, 'manual', quantity, profitPct);
    return result
      ? { command: kind, ok: true, message: messages.filled('manual', result), orderId: result.orderId }
      : { command: kind, ok: false, message: '매도 주문 실패' };
  }

  private failPending(message: string): void {
    const commands = this.inbox;
    this.inbox = [];
    for (const cmd of commands) {
      cmd.resolve({ command: cmd.kind, ok: false, message });
    }
  }

  // ─── 이벤트 ─────────────────────────────────────────────────────────────

  private buildBackends(cfg: EngineConfig): EngineBackends {
    return this.backendFactory(cfg, {
      simulatedLedger: this.simLedger,
      latestSample: () => this.latestSample,
      hasLiveCredentials: this.hasLiveCredentials,
    });
  }

  private emitTrade(result: OrderResult, reason: OrderReason, profitPct?: number): void {
    this.bus.emit({
      type: 'TRADE',
      timestamp: this.now(),
      side: result.side,
      reason,
      ticker: result.ticker,
      price: result.price,
      quantity: result.quantity,
      quoteAmount: result.quoteAmount,
      orderId: result.orderId,
      simulated: result.simulated,
      ...(profitPct !== undefined ? { profitPct } : {}),
    });
    this.emitLog('info', messages.filled(reason, result));
  }

  private emitCooldown(): void {
    this.bus.emit({
      type: 'COOLDOWN',
      timestamp: this.now(),
      state: this.guard.state,
      until: this.guard.until,
      consecutiveLosses: this.guard.losses,
    });
  }

  private emitMessage(text: string): void {
    this.bus.emit({ type: 'MESSAGE', timestamp: this.now(), text });
  }

  private emitLog(level: EngineLogLevel, text: string): void {
    log[level](text);
    this.bus.emit({ type: 'LOG', timestamp: this.now(), level, text });
  }
}
