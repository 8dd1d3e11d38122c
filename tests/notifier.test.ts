import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { TradeEvent } from '../src/types/index.js';

// config를 먼저 mock (모듈 로딩 전)
vi.mock('../src/config.js', () => ({
  config: {
    telegram: { enabled: true, botToken: 'test-token', chatId: '12345' },
    log: { level: 'silent' },
  },
}));

// fetch mock
const fetchMock = vi.fn().mockResolvedValue({ ok: true });
vi.stubGlobal('fetch', fetchMock);

const { Notifier } = await import('../src/notification/notifier.js');
const { EventBus } = await import('../src/engine/event-bus.js');

const buy: TradeEvent = {
  type: 'TRADE',
  timestamp: 0,
  side: 'BUY',
  reason: 'entry',
  ticker: 'KRW-BTC',
  price: 95_000_000,
  quantity: 0.00105263,
  quoteAmount: 100_000,
  orderId: 'sim-buy-1',
  simulated: true,
};

function sentText(call: number): string {
  const opts = fetchMock.mock.calls[call]?.[1];
  return JSON.parse(opts.body).text;
}

describe('Notifier', () => {
  beforeEach(() => {
    fetchMock.mockClear();
  });

  it('sends entry notification via Telegram', async () => {
    const n = new Notifier();
    n.notifyTrade(buy);
    await n.flush();

    expect(fetchMock).toHaveBeenCalledOnce();
    const [url, opts] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    const body = JSON.parse(opts.body);
    expect(body.chat_id).toBe('12345');
    expect(body.parse_mode).toBe('HTML');
    expect(body.text).toBe(
      '📈 <b>매수 체결 (모의)</b>\n마켓: KRW-BTC\n가격: 95,000,000 KRW\n금액: 100,000 KRW\n사유: RSI 진입',
    );
  });

  it('sends exit notification with profit', async () => {
    const n = new Notifier();
    n.notifyTrade({ ...buy, side: 'SELL', reason: 'stop-loss', price: 92_150_000, profitPct: -3, simulated: false });
    await n.flush();

    expect(sentText(0)).toBe('📉 <b>매도 체결</b>\n마켓: KRW-BTC\n가격: 92,150,000 KRW\n수익률: -3.00%\n사유: 손절');
  });

  it('forwards trades, cooldowns and error logs from the bus', async () => {
    const n = new Notifier();
    const bus = new EventBus();
    n.attach(bus);

    bus.emit({ type: 'LOG', timestamp: 0, level: 'info', text: 'ignored' });
    bus.emit({ type: 'LOG', timestamp: 0, level: 'error', text: '매수 주문 실패: rejected' });
    bus.emit({ type: 'COOLDOWN', timestamp: 0, state: 'COOLING', until: 0, consecutiveLosses: 3 });
    await n.flush();

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sentText(0)).toBe('⚠️ <b>에러</b> [engine]\n매수 주문 실패: rejected');
    expect(sentText(1)).toBe('🧊 <b>쿨다운 시작</b>\n연속 손절 3회\n재개: 1970-01-01T00:00:00.000Z');
  });

  it('does not crash on fetch failure', async () => {
    fetchMock.mockRejectedValueOnce(new Error('network'));
    const n = new Notifier();
    n.notifyError('test', 'some error');

    await expect(n.flush()).resolves.toBeUndefined();
  });

  it('rate limits to 1 message per second', async () => {
    const n = new Notifier();
    n.notifyStartup('SIMULATION');
    n.notifyShutdown();

    // 첫 메시지 즉시, 두번째는 1초 후
    await new Promise((r) => setTimeout(r, 600));
    expect(fetchMock).toHaveBeenCalledTimes(1);

    await new Promise((r) => setTimeout(r, 1200));
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sentText(1)).toBe('🛑 <b>봇 종료</b>');
  });
});
