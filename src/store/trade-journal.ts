import type Database from 'better-sqlite3';
import type { OrderReason, OrderSide, TradeEvent } from '../types/index.js';

type InsertParams = [number, string, string, string, number, number, number, number | null, string, number];

interface JournalRow {
  id: number;
  timestamp: number;
  ticker: string;
  side: string;
  reason: string;
  price: number;
  quantity: number;
  quote_amount: number;
  profit_pct: number | null;
  order_id: string;
  simulated: number;
}

export interface JournalEntry {
  id: number;
  timestamp: number;
  ticker: string;
  side: OrderSide;
  reason: OrderReason;
  price: number;
  quantity: number;
  quoteAmount: number;
  profitPct: number | null;
  orderId: string;
  simulated: boolean;
}

const REASONS: readonly OrderReason[] = ['entry', 'take-profit', 'stop-loss', 'manual'];

function toReason(value: string): OrderReason {
  return REASONS.find((r) => r === value) ?? 'manual';
}

/** 체결 기록 (trade_journal) */
export class TradeJournal {
  private readonly insertStmt: Database.Statement<InsertParams>;
  private readonly recentStmt: Database.Statement<[number], JournalRow>;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare<InsertParams>(
      `INSERT INTO trade_journal
        (timestamp, ticker, side, reason, price, quantity, quote_amount, profit_pct, order_id, simulated)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.recentStmt = db.prepare<[number], JournalRow>('SELECT * FROM trade_journal ORDER BY id DESC LIMIT ?');
  }

  record(e: TradeEvent): void {
    this.insertStmt.run(
      e.timestamp,
      e.ticker,
      e.side,
      e.reason,
      e.price,
      e.quantity,
      e.quoteAmount,
      e.profitPct ?? null,
      e.orderId,
      e.simulated ? 1 : 0,
    );
  }

  /** 최신순 */
  recent(limit: number = 50): JournalEntry[] {
    return this.recentStmt.all(limit).map((r) => ({
      id: r.id,
      timestamp: r.timestamp,
      ticker: r.ticker,
      side: r.side === 'BUY' ? 'BUY' : 'SELL',
      reason: toReason(r.reason),
      price: r.price,
      quantity: r.quantity,
      quoteAmount: r.quote_amount,
      profitPct: r.profit_pct,
      orderId: r.order_id,
      simulated: r.simulated === 1,
    }));
  }
}
