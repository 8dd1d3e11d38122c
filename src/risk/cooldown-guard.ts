import { createChildLogger } from '../logger.js';
import type { CooldownPhase, CooldownState } from '../types/index.js';

const log = createChildLogger('cooldown-guard');

export type ExitKind = 'take-profit' | 'stop-loss';

export interface CooldownLimits {
  /** 0 = 가드 비활성 */
  maxConsecutiveLosses: number;
  cooldownMinutes: number;
}

export interface CooldownPoll {
  state: CooldownPhase;
  /** COOLING일 때 남은 시간, ACTIVE면 0 */
  remainingMs: number;
  /** 이번 poll에서 COOLING → ACTIVE 전환됨 */
  resumed: boolean;
}

export interface CooldownTransition {
  from: CooldownPhase;
  to: CooldownPhase;
  at: number;
  consecutiveLosses: number;
}

const HISTORY_LIMIT = 100;

/**
 * 연속 손절 쿨다운 상태 머신
 *
 * ACTIVE --손절--> ACTIVE (연속 손절 +1, 한도 도달 시 COOLING)
 * ACTIVE --익절--> ACTIVE (연속 손절 0)
 * COOLING --now >= cooldownUntil--> ACTIVE (연속 손절 0)
 *
 * cooldownUntil은 연속 손절 >= 한도 > 0 일 때만 설정된다.
 */
export class CooldownGuard {
  private limits: CooldownLimits;
  private consecutiveLosses = 0;
  private cooldownUntil: number | null = null;
  private history: CooldownTransition[] = [];

  constructor(limits: CooldownLimits, initial?: CooldownState) {
    this.limits = { ...limits };
    if (initial) {
      this.consecutiveLosses = Math.max(0, Math.floor(initial.consecutiveLosses));
      this.cooldownUntil = limits.maxConsecutiveLosses > 0 ? initial.cooldownUntil : null;
    }
  }

  get state(): CooldownPhase {
    return this.cooldownUntil === null ? 'ACTIVE' : 'COOLING';
  }

  get losses(): number {
    return this.consecutiveLosses;
  }

  get until(): number | null {
    return this.cooldownUntil;
  }

  /** 자동 매도 결과 반영 → 반영 후 상태 */
  recordExit(kind: ExitKind, now: number): CooldownPhase {
    if (this.cooldownUntil !== null) {
      // 쿨다운 중에는 자동 매매 판단이 없으므로 들어오면 안 됨
      log.warn({ kind }, 'Exit recorded while cooling; ignored');
      return 'COOLING';
    }

    if (kind === 'take-profit') {
      this.consecutiveLosses = 0;
      return 'ACTIVE';
    }

    this.consecutiveLosses++;
    const { maxConsecutiveLosses, cooldownMinutes } = this.limits;
    if (maxConsecutiveLosses > 0 && this.consecutiveLosses >= maxConsecutiveLosses) {
      this.cooldownUntil = now + cooldownMinutes * 60_000;
      this.record('ACTIVE', 'COOLING', now);
      log.warn(
        { consecutiveLosses: this.consecutiveLosses, cooldownUntil: new Date(this.cooldownUntil).toISOString() },
        'Consecutive loss limit reached, cooling down',
      );
      return 'COOLING';
    }
    return 'ACTIVE';
  }

  poll(now: number): CooldownPoll {
    if (this.cooldownUntil === null) {
      return { state: 'ACTIVE', remainingMs: 0, resumed: false };
    }
    if (now >= this.cooldownUntil) {
      this.cooldownUntil = null;
      this.consecutiveLosses = 0;
      this.record('COOLING', 'ACTIVE', now);
      log.info('Cooldown finished, trading resumed');
      return { state: 'ACTIVE', remainingMs: 0, resumed: true };
    }
    return { state: 'COOLING', remainingMs: this.cooldownUntil - now, resumed: false };
  }

  /**
   * 한도 변경 (틱 경계에서 호출). 한도 0이면 진행 중 쿨다운도 즉시 해제.
   * 이미 잡힌 cooldownUntil은 시간 변경에 영향받지 않음.
   */
  updateLimits(limits: CooldownLimits, now: number): void {
    this.limits = { ...limits };
    if (limits.maxConsecutiveLosses === 0 && this.cooldownUntil !== null) {
      this.cooldownUntil = null;
      this.consecutiveLosses = 0;
      this.record('COOLING', 'ACTIVE', now);
      log.info('Cooldown guard disabled, cooling cleared');
    }
  }

  exportState(): CooldownState {
    return { consecutiveLosses: this.consecutiveLosses, cooldownUntil: this.cooldownUntil };
  }

  getHistory(): readonly CooldownTransition[] {
    return this.history;
  }

  private record(from: CooldownPhase, to: CooldownPhase, at: number): void {
    this.history.push({ from, to, at, consecutiveLosses: this.consecutiveLosses });
    if (this.history.length > HISTORY_LIMIT) {
      this.history = this.history.slice(-HISTORY_LIMIT / 2);
    }
  }
}
