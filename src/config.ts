import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// 저장소 루트 .env 먼저, 이후 cwd의 .env가 있으면 덮어씀
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  if (Number.isNaN(n)) {
    throw new Error(`Invalid numeric env ${key}: ${v}`);
  }
  return n;
}

function envBool(key: string, fallback: boolean): boolean {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  return v.toLowerCase() === 'true';
}

export const config = {
  upbit: {
    accessKey: env('UPBIT_ACCESS_KEY', ''),
    secretKey: env('UPBIT_SECRET_KEY', ''),
    /** 업비트 Open API 베이스 (Public/Private 공통) */
    restBaseUrl: env('UPBIT_BASE_URL', 'https://api.upbit.com'),
  },

  engine: {
    tickIntervalMs: envNum('TICK_INTERVAL_MS', 1000),
    /** RSI 계산용 분봉 단위 (1 = 1분봉) */
    candleUnit: envNum('CANDLE_UNIT', 1),
    candleCount: envNum('CANDLE_COUNT', 200),
    /** 차트용 최근 체결 개수 */
    chartTickCount: envNum('CHART_TICK_COUNT', 50),
    /** 모의투자 시작 원화 잔고 (누적 수익률 기준값) */
    initialSimQuoteBalance: envNum('SIM_INITIAL_KRW', 10_000_000),
    /** 기동 직후 자동매매 ON 여부 */
    autoStart: envBool('AUTO_START', false),
  },

  /** 최초 기동 시 EngineConfig 기본값 (저장된 상태가 있으면 그쪽이 우선) */
  defaults: {
    ticker: env('TICKER', 'KRW-BTC'),
    indicatorPeriod: envNum('RSI_PERIOD', 14),
    entryThreshold: envNum('RSI_ENTRY', 25),
    takeProfitPct: envNum('TAKE_PROFIT_PCT', 0.5),
    stopLossPct: envNum('STOP_LOSS_PCT', -3),
    orderAmount: envNum('ORDER_AMOUNT_KRW', 100_000),
    maxConsecutiveLosses: envNum('MAX_CONSECUTIVE_LOSSES', 3),
    cooldownMinutes: envNum('COOLDOWN_MINUTES', 30),
    simulationMode: envBool('SIMULATION', true),
  },

  execution: {
    orderTimeoutMs: envNum('ORDER_TIMEOUT_MS', 5000),
    maxRetries: envNum('MAX_RETRIES', 2),
    /** 업비트 주문 API: 초당 8회 (여유 있게) */
    privateRatePerSec: envNum('PRIVATE_RATE_PER_SEC', 8),
  },

  db: {
    path: env('DB_PATH', './data/rsi-scalper.db'),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },

  telegram: {
    enabled: envBool('TELEGRAM_ENABLED', false),
    botToken: env('TELEGRAM_BOT_TOKEN', ''),
    chatId: env('TELEGRAM_CHAT_ID', ''),
  },

  /** 대시보드 API/WebSocket 서버 포트 */
  apiServerPort: envNum('API_SERVER_PORT', 4000),
} as const;

export function hasLiveCredentials(): boolean {
  return config.upbit.accessKey !== '' && config.upbit.secretKey !== '';
}
