import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

let _db: Database.Database | null = null;

/** 파일 또는 ':memory:' DB 열기 + 스키마 보장 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  return db;
}

export function getDb(): Database.Database {
  if (!_db) {
    _db = openDatabase(config.db.path);
    log.info({ path: config.db.path }, 'Database initialized');
  }
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS engine_state (
      id          INTEGER PRIMARY KEY CHECK (id = 1),
      checkpoint  TEXT NOT NULL,
      updated_at  INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS trade_journal (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp   INTEGER NOT NULL,
      ticker      TEXT NOT NULL,
      side        TEXT NOT NULL,
      reason      TEXT NOT NULL,
      price       REAL NOT NULL,
      quantity    REAL NOT NULL,
      quote_amount REAL NOT NULL,
      profit_pct  REAL,
      order_id    TEXT NOT NULL,
      simulated   INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_trade_journal_ts ON trade_journal(timestamp);
  `);
}
