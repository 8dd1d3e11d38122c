import { createChildLogger } from '../logger.js';

const log = createChildLogger('telegram');

const SEND_INTERVAL_MS = 1000;

/**
 * Telegram sendMessage 큐 (HTML parse_mode). 초당 1건씩 순서대로 보냄.
 * 실패한 메시지는 경고 로그 후 버림.
 */
export class TelegramNotifier {
  private readonly queue: string[] = [];
  private processing: Promise<void> | null = null;

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
  ) {}

  send(text: string): void {
    this.queue.push(text);
    if (!this.processing) {
      this.processing = this.processQueue().finally(() => {
        this.processing = null;
      });
    }
  }

  /** 큐가 빌 때까지 대기 (종료 시) */
  async flush(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private async processQueue(): Promise<void> {
    let msg = this.queue.shift();
    while (msg !== undefined) {
      try {
        await this.doSend(msg);
      } catch (err) {
        log.warn({ err }, 'Telegram send failed');
      }
      msg = this.queue.shift();
      // 초당 1건 제한
      if (msg !== undefined) {
        await new Promise((r) => setTimeout(r, SEND_INTERVAL_MS));
      }
    }
  }

  private async doSend(text: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.warn({ status: res.status, body }, 'Telegram API error');
    }
  }
}
