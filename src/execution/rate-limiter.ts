export interface RateLimiterClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: RateLimiterClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * 토큰 버킷 레이트 리미터
 * 업비트 주문/계좌 API: 초당 8회 기준
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;  // tokens/ms
  private lastRefill: number;

  constructor(
    maxPerSec: number = 8,
    private readonly clock: RateLimiterClock = systemClock,
  ) {
    if (!(maxPerSec > 0)) {
      throw new RangeError(`maxPerSec must be positive, got ${maxPerSec}`);
    }
    this.maxTokens = maxPerSec;
    this.tokens = maxPerSec;
    this.refillRate = maxPerSec / 1000;
    this.lastRefill = clock.now();
  }

  /** 남은 토큰 (소수 포함) */
  get available(): number {
    this.refill();
    return this.tokens;
  }

  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens--;
      return;
    }

    // 토큰 없으면 부족분만큼 대기
    const waitMs = Math.ceil((1 - this.tokens) / this.refillRate);
    await this.clock.sleep(waitMs);
    this.refill();
    this.tokens = Math.max(0, this.tokens - 1);
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
