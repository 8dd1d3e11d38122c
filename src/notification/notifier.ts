import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import { formatQuote } from '../engine/messages.js';
import type { EventBus } from '../engine/event-bus.js';
import type { CooldownEvent, TradeEvent } from '../types/index.js';
import { TelegramNotifier } from './telegram.js';

const log = createChildLogger('notifier');

const REASON_TEXT: Record<TradeEvent['reason'], string> = {
  entry: 'RSI 진입',
  'take-profit': '익절',
  'stop-loss': '손절',
  manual: '수동',
};

/**
 * 엔진 이벤트 → 텔레그램 알림 문구
 * enabled=false이면 모든 호출 무시
 */
export class Notifier {
  private readonly tg: TelegramNotifier | null;

  constructor() {
    if (config.telegram.enabled && config.telegram.botToken && config.telegram.chatId) {
      this.tg = new TelegramNotifier(config.telegram.botToken, config.telegram.chatId);
      log.info('Telegram notifier enabled');
    } else {
      this.tg = null;
      log.debug('Telegram notifier disabled');
    }
  }

  get enabled(): boolean {
    return this.tg !== null;
  }

  /** 엔진 이벤트 구독: 체결, 쿨다운, 에러 로그 */
  attach(bus: Pick<EventBus, 'on'>): void {
    bus.on('TRADE', (e) => this.notifyTrade(e));
    bus.on('COOLDOWN', (e) => this.notifyCooldown(e));
    bus.on('LOG', (e) => {
      if (e.level === 'error') this.notifyError('engine', e.text);
    });
  }

  notifyTrade(e: TradeEvent): void {
    const mode = e.simulated ? ' (모의)' : '';
    if (e.side === 'BUY') {
      this.send(
        `📈 <b>매수 체결${mode}</b>\n` +
        `마켓: ${e.ticker}\n` +
        `가격: ${formatQuote(e.price)} KRW\n` +
        `금액: ${formatQuote(e.quoteAmount)} KRW\n` +
        `사유: ${REASON_TEXT[e.reason]}`,
      );
      return;
    }
    const pct = e.profitPct ?? 0;
    const emoji = pct >= 0 ? '💰' : '📉';
    this.send(
      `${emoji} <b>매도 체결${mode}</b>\n` +
      `마켓: ${e.ticker}\n` +
      `가격: ${formatQuote(e.price)} KRW\n` +
      `수익률: ${pct >= 0 ? '+' : ''}${pct.toFixed(2)}%\n` +
      `사유: ${REASON_TEXT[e.reason]}`,
    );
  }

  notifyCooldown(e: CooldownEvent): void {
    if (e.state === 'COOLING' && e.until !== null) {
      this.send(
        `🧊 <b>쿨다운 시작</b>\n연속 손절 ${e.consecutiveLosses}회\n재개: ${new Date(e.until).toISOString()}`,
      );
    } else {
      this.send('✅ <b>쿨다운 종료</b>, 자동매매 재개');
    }
  }

  notifyError(module: string, message: string): void {
    this.send(`⚠️ <b>에러</b> [${module}]\n${message}`);
  }

  notifyStartup(mode: string): void {
    this.send(`🤖 <b>봇 시작</b>\n모드: ${mode}`);
  }

  notifyShutdown(): void {
    this.send('🛑 <b>봇 종료</b>');
  }

  async flush(): Promise<void> {
    if (this.tg) await this.tg.flush();
  }

  private send(text: string): void {
    if (!this.tg) return;
    try {
      this.tg.send(text);
    } catch (err) {
      log.warn({ err }, 'Notifier send error');
    }
  }
}
