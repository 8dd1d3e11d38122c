import { config, hasLiveCredentials } from './config.js';
import { createChildLogger } from './logger.js';
import { describeError } from './errors.js';
import { getDb, closeDb } from './db/database.js';
import { EngineStateStore } from './store/state-store.js';
import { TradeJournal } from './store/trade-journal.js';
import { UpbitPriceFeed, listQuoteMarkets } from './market/price-feed.js';
import { TradingEngine } from './engine/trading-engine.js';
import { defaultEngineConfig, validateEngineConfig } from './engine/engine-config.js';
import { startCheckpointSchedule } from './engine/scheduler.js';
import { dashboardState } from './dashboard-state.js';
import { startApiServer } from './api-server.js';
import { StatusBroadcaster } from './status-broadcaster.js';
import { Notifier } from './notification/notifier.js';
import type { EngineConfig } from './types/index.js';

const log = createChildLogger('main');

// ── CLI 인자: --live / --sim 은 저장된 모드보다 우선, --auto 는 자동매매 ON ──
function parseArgs(argv: readonly string[]): { simulation: boolean | null; auto: boolean } {
  let simulation: boolean | null = null;
  if (argv.includes('--live')) simulation = false;
  if (argv.includes('--sim')) simulation = true;
  return { simulation, auto: argv.includes('--auto') };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  // ── 저장 상태 복원 ──
  const db = getDb();
  const store = new EngineStateStore(db);
  const journal = new TradeJournal(db);
  const checkpoint = store.load();

  let engineConfig: EngineConfig = checkpoint?.config ?? defaultEngineConfig();
  if (args.simulation !== null && engineConfig.simulationMode !== args.simulation) {
    engineConfig = validateEngineConfig({ ...engineConfig, simulationMode: args.simulation });
  }
  log.info(
    { ticker: engineConfig.ticker, simulation: engineConfig.simulationMode, restored: checkpoint !== null },
    'Starting RSI bot',
  );

  const engine = new TradingEngine({
    config: engineConfig,
    feed: new UpbitPriceFeed(),
    checkpoint,
    intervalMs: config.engine.tickIntervalMs,
    candleCount: config.engine.candleCount,
    chartTickCount: config.engine.chartTickCount,
    initialQuoteBalance: config.engine.initialSimQuoteBalance,
    auto: config.engine.autoStart,
  });
  if (args.auto) engine.setAuto(true);

  const saveCheckpoint = (): void => {
    try {
      store.save(engine.exportCheckpoint());
    } catch (err) {
      log.error({ err }, 'Checkpoint save failed');
    }
  };

  // ── 이벤트 소비자 ──
  engine.onAny(dashboardState.apply);
  engine.on('TRADE', (e) => {
    journal.record(e);
    saveCheckpoint();
  });
  engine.on('COOLDOWN', () => saveCheckpoint());

  const notifier = new Notifier();
  notifier.attach(engine.events);

  // ── 대시보드 API + WebSocket ──
  const server = startApiServer({
    engine,
    state: dashboardState,
    listMarkets: () => listQuoteMarkets('KRW'),
    journal,
    onChange: saveCheckpoint,
    hasLiveCredentials: hasLiveCredentials(),
  });
  const broadcaster = new StatusBroadcaster({ server });
  engine.onAny((e) => broadcaster.broadcast(e));

  const checkpointTask = startCheckpointSchedule(saveCheckpoint);
  notifier.notifyStartup(engineConfig.simulationMode ? 'SIMULATION' : 'LIVE');

  const loop = engine.start();

  // ── Graceful shutdown ──
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    checkpointTask.stop();
    await engine.stop();
    saveCheckpoint();
    await broadcaster.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));

    notifier.notifyShutdown();
    await notifier.flush();
    closeDb();
    log.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal('SIGINT'));
  process.on('SIGTERM', onSignal('SIGTERM'));

  await loop;
}

main().catch((err: unknown) => {
  log.fatal({ err }, `Fatal error: ${describeError(err)}`);
  process.exit(1);
});
