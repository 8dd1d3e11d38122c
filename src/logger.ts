import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.log.level,
  base: { app: 'rsi-scalper' },
  transport: {
    target: 'pino/file',
    options: { destination: 1 }, // stdout
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  // 주문/계좌 요청 로그에 키가 섞여 나가지 않도록
  redact: {
    paths: ['headers.Authorization', 'accessKey', 'secretKey', '*.accessKey', '*.secretKey'],
    censor: '[redacted]',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;
export type EngineLogLevel = 'info' | 'warn' | 'error';

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
