import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { config } from './config.js';
import { createChildLogger } from './logger.js';
import { InvalidConfigError, describeError } from './errors.js';
import { mergeEngineConfig } from './engine/engine-config.js';
import type { DashboardState } from './dashboard-state.js';
import type { TradingEngine } from './engine/trading-engine.js';
import type { TradeJournal } from './store/trade-journal.js';
import type { EngineConfig, QuoteMarket } from './types/index.js';

const log = createChildLogger('api-server');

export type ApiHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export type EngineControl = Pick<
  TradingEngine,
  'getState' | 'configure' | 'setAuto' | 'requestBuyNow' | 'requestSellAll'
>;

export interface ApiDeps {
  engine: EngineControl;
  state: DashboardState;
  /** 마켓 목록 (티커 선택 UI) */
  listMarkets?: () => Promise<QuoteMarket[]>;
  journal?: Pick<TradeJournal, 'recent'> | null;
  /** 설정/자동매매 변경 후 (체크포인트 저장 등) */
  onChange?: () => void;
  /** 실거래 키 보유 여부: 설정 검증에 전달 */
  hasLiveCredentials?: boolean;
}

const corsHeaders: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Content-Type': 'application/json',
};

class BadRequestError extends Error {}

function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk: Buffer | string) => { body += String(chunk); });
    req.on('error', reject);
    req.on('end', () => {
      if (!body) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new BadRequestError('Invalid JSON body'));
      }
    });
  });
}

function send(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, corsHeaders);
  res.end(JSON.stringify(payload));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * API 요청 핸들러 생성 (서버 없이 테스트 가능)
 */
export function createApiHandler(deps: ApiDeps): ApiHandler {
  const { engine, state } = deps;

  const routes: Record<string, Partial<Record<'GET' | 'POST', (req: IncomingMessage, url: URL) => Promise<[number, unknown]>>>> = {
    '/api/state': {
      GET: async () => {
        const s = engine.getState();
        return [200, {
          mode: s.config.simulationMode ? 'SIMULATION' : 'LIVE',
          running: s.running,
          auto: s.auto,
          ticker: s.config.ticker,
          status: state.getLastStatus(),
          message: state.getLastMessage(),
          cooldown: s.cooldown,
          cooldownHistory: s.cooldownHistory,
          holding: s.lastSnapshot && s.lastSnapshot.isHolding ? s.lastSnapshot.holding : null,
          configPending: s.pendingConfig !== null,
        }];
      },
    },
    '/api/events': {
      GET: async (_req, url) => {
        const raw = Number.parseInt(url.searchParams.get('limit') ?? '200', 10);
        const limit = Math.min(500, Number.isFinite(raw) && raw > 0 ? raw : 200);
        return [200, state.getEvents(limit)];
      },
    },
    '/api/chart': {
      GET: async () => [200, { prices: state.getChart() }],
    },
    '/api/trades': {
      GET: async () => [200, deps.journal ? deps.journal.recent(100) : state.getTrades()],
    },
    '/api/markets': {
      GET: async () => {
        if (!deps.listMarkets) return [200, []];
        try {
          return [200, await deps.listMarkets()];
        } catch (err) {
          log.warn({ err }, 'Market list failed');
          return [502, { error: 'UPSTREAM', message: describeError(err) }];
        }
      },
    },
    '/api/config': {
      GET: async () => {
        const s = engine.getState();
        return [200, { active: s.config, pending: s.pendingConfig }];
      },
      POST: async (req) => {
        const body = await parseBody(req);
        const s = engine.getState();
        const base: EngineConfig = s.pendingConfig ?? s.config;
        const next = mergeEngineConfig(base, body, { hasLiveCredentials: deps.hasLiveCredentials });
        const applied = engine.configure(next);
        deps.onChange?.();
        return [202, { ok: true, pending: applied }];
      },
    },
    '/api/auto': {
      POST: async (req) => {
        const body = await parseBody(req);
        if (!isRecord(body) || typeof body.on !== 'boolean') {
          return [400, { error: 'BAD_REQUEST', message: 'Expected { "on": boolean }' }];
        }
        engine.setAuto(body.on);
        deps.onChange?.();
        return [200, { ok: true, auto: engine.getState().auto }];
      },
    },
    '/api/buy-now': {
      POST: async () => {
        const outcome = await engine.requestBuyNow();
        deps.onChange?.();
        return [outcome.ok ? 200 : 409, outcome];
      },
    },
    '/api/sell-all': {
      POST: async () => {
        const outcome = await engine.requestSellAll();
        deps.onChange?.();
        return [outcome.ok ? 200 : 409, outcome];
      },
    },
  };

  return async function handler(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? '';
    if (method === 'OPTIONS') {
      res.writeHead(204, corsHeaders);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname.length > 1 ? url.pathname.replace(/\/$/, '') : url.pathname;
    const route = routes[path];
    if (!route) {
      send(res, 404, { error: 'Not found' });
      return;
    }
    const fn = method === 'GET' || method === 'POST' ? route[method] : undefined;
    if (!fn) {
      send(res, 405, { error: 'Method not allowed' });
      return;
    }

    try {
      const [status, payload] = await fn(req, url);
      send(res, status, payload);
    } catch (err) {
      if (err instanceof InvalidConfigError) {
        send(res, 400, { error: 'INVALID_CONFIG', issues: err.issues });
      } else if (err instanceof BadRequestError) {
        send(res, 400, { error: 'BAD_REQUEST', message: err.message });
      } else {
        log.error({ err, path }, 'API handler failed');
        send(res, 500, { error: 'INTERNAL', message: describeError(err) });
      }
    }
  };
}

export function startApiServer(deps: ApiDeps, port: number = config.apiServerPort): Server {
  const handler = createApiHandler(deps);
  const server = createServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      log.error({ err }, 'Unhandled API error');
    });
  });
  server.listen(port, () => {
    log.info({ port }, 'Dashboard API server listening');
  });
  return server;
}
