import type { OrderReason, OrderResult } from '../types/index.js';

/** 원화 표기 (천 단위 구분, 정수) */
export function formatQuote(amount: number): string {
  return Math.round(amount).toLocaleString('en-US');
}

/** 남은 시간 mm:ss (초 올림) */
export function formatRemaining(ms: number): string {
  const totalSec = Math.max(0, Math.ceil(ms / 1000));
  const m = Math.floor(totalSec / 60);
  const s = totalSec % 60;
  return `${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`;
}

const REASON_LABEL: Record<OrderReason, string> = {
  entry: '진입',
  'take-profit': '익절',
  'stop-loss': '손절',
  manual: '수동',
};

export const messages = {
  watching: (rsi: number, entry: number) => `관망 중 (RSI ${rsi.toFixed(1)} > ${entry})`,
  insufficientBalance: (available: number, required: number) =>
    `잔고 부족 (주문 가능 ${formatQuote(available)}원 < 주문 금액 ${formatQuote(required)}원)`,
  holding: (profitPct: number) => `보유 중 (수익률 ${profitPct.toFixed(2)}%)`,
  cooling: (remainingMs: number) => `쿨다운 중 (남은 시간 ${formatRemaining(remainingMs)})`,
  cooldownStarted: (losses: number, minutes: number) => `연속 손절 ${losses}회, ${minutes}분간 진입 중단`,
  resumed: () => '쿨다운 종료, 자동매매 재개',
  noHolding: () => '매도할 보유 수량 없음',
  noPrice: () => '현재가 없음, 다음 틱에 다시 시도',
  engineStopped: () => 'engine stopped',
  filled: (reason: OrderReason, r: OrderResult) =>
    `[${r.side === 'BUY' ? '매수' : '매도'}/${REASON_LABEL[reason]}] ${r.ticker} ` +
    `${formatQuote(r.quoteAmount)}원 @ ${formatQuote(r.price)} (${r.orderId})`,
} as const;
