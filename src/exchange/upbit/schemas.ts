import { z } from 'zod';

// ─── PUBLIC 응답 ───────────────────────────────────────────────────────────

export const marketAllItemSchema = z.object({
  market: z.string(),
  korean_name: z.string(),
  english_name: z.string(),
});
export const marketAllSchema = z.array(marketAllItemSchema);

export const candleSchema = z.object({
  market: z.string(),
  candle_date_time_utc: z.string(),
  candle_date_time_kst: z.string().optional(),
  opening_price: z.number(),
  high_price: z.number(),
  low_price: z.number(),
  trade_price: z.number(),
  timestamp: z.number().optional(),
  candle_acc_trade_price: z.number().optional(),
  candle_acc_trade_volume: z.number(),
  unit: z.number().optional(),
});
export const candlesSchema = z.array(candleSchema);

export const tickerItemSchema = z.object({
  market: z.string(),
  trade_price: z.number(),
  opening_price: z.number().optional(),
  high_price: z.number().optional(),
  low_price: z.number().optional(),
  prev_closing_price: z.number().optional(),
  change: z.enum(['RISE', 'EVEN', 'FALL']).optional(),
  signed_change_price: z.number().optional(),
  signed_change_rate: z.number(),
  timestamp: z.number(),
});
export const tickerSchema = z.array(tickerItemSchema);

export const tradeTickSchema = z.object({
  market: z.string(),
  trade_date_utc: z.string().optional(),
  trade_time_utc: z.string().optional(),
  timestamp: z.number(),
  trade_price: z.number(),
  trade_volume: z.number(),
  ask_bid: z.enum(['ASK', 'BID']),
  sequential_id: z.number().optional(),
});
export const tradesTicksSchema = z.array(tradeTickSchema);

// ─── PRIVATE 응답 ──────────────────────────────────────────────────────────

/** GET /v1/accounts: 통화별 잔고 (숫자는 문자열로 옴) */
export const accountItemSchema = z.object({
  currency: z.string(),
  balance: z.string(),
  locked: z.string(),
  avg_buy_price: z.string(),
  avg_buy_price_modified: z.boolean().optional(),
  unit_currency: z.string(),
});
export const accountsSchema = z.array(accountItemSchema);

/** POST /v1/orders, GET /v1/order 성공 응답 */
export const orderSchema = z.object({
  uuid: z.string().min(1),
  side: z.enum(['bid', 'ask']),
  ord_type: z.string(),
  price: z.string().nullable().optional(),
  state: z.string(),
  market: z.string(),
  created_at: z.string().optional(),
  volume: z.string().nullable().optional(),
  remaining_volume: z.string().nullable().optional(),
  executed_volume: z.string().optional(),
  trades_count: z.number().optional(),
});

/** 업비트 에러 바디: { error: { name, message } } */
export const errorBodySchema = z.object({
  error: z.object({
    name: z.union([z.string(), z.number()]).optional(),
    message: z.string().optional(),
  }),
});

export type AccountItem = z.infer<typeof accountItemSchema>;
export type UpbitOrder = z.infer<typeof orderSchema>;
