/**
 * 엔진 에러 분류
 *
 * NETWORK            시세/캔들 조회 실패: 해당 틱 판단만 건너뜀
 * INSUFFICIENT_DATA  지표 계산 불가: 판단만 건너뜀 (운영자 에러 아님)
 * INSUFFICIENT_BALANCE 주문 전제 조건 미충족: 짧은 메시지로 보고
 * ORDER              주문 거절/확인 불가: 원본 응답과 함께 로그
 * INVALID_CONFIG     설정 시점에 동기 거절: 루프에 도달하지 않음
 */
export type TradingErrorCode =
  | 'NETWORK'
  | 'INSUFFICIENT_DATA'
  | 'INSUFFICIENT_BALANCE'
  | 'ORDER'
  | 'INVALID_CONFIG';

export class TradingError extends Error {
  readonly code: TradingErrorCode;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, code: TradingErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class NetworkError extends TradingError {
  readonly endpoint: string;
  readonly status: number | null;

  constructor(message: string, endpoint: string, status: number | null = null, cause?: unknown) {
    super(message, 'NETWORK', { endpoint, status });
    this.endpoint = endpoint;
    this.status = status;
    if (cause !== undefined) this.cause = cause;
  }
}

export class InsufficientDataError extends TradingError {
  readonly required: number;
  readonly actual: number;

  constructor(required: number, actual: number) {
    super(`Need at least ${required} closes, got ${actual}`, 'INSUFFICIENT_DATA', { required, actual });
    this.required = required;
    this.actual = actual;
  }
}

export class InsufficientBalanceError extends TradingError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super(`Insufficient quote balance: ${available} < ${required}`, 'INSUFFICIENT_BALANCE', { required, available });
    this.required = required;
    this.available = available;
  }
}

export class OrderError extends TradingError {
  /** 거래소 원본 응답 (있으면) */
  readonly raw: unknown;

  constructor(message: string, raw?: unknown) {
    super(message, 'ORDER', { raw });
    this.raw = raw;
  }
}

export class InvalidConfigError extends TradingError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid engine config: ${issues.join('; ')}`, 'INVALID_CONFIG', { issues });
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
