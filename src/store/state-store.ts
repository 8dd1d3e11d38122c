import type Database from 'better-sqlite3';
import { z } from 'zod';
import { createChildLogger } from '../logger.js';
import { engineConfigSchema } from '../engine/engine-config.js';
import type { EngineCheckpoint } from '../types/index.js';

const log = createChildLogger('state-store');

const nonNegative = z.number().finite().min(0);

const checkpointSchema = z.object({
  config: engineConfigSchema,
  simulatedLedger: z.object({
    quoteBalance: nonNegative,
    baseQuantity: nonNegative,
    averageCost: nonNegative,
  }),
  baselineAssetValue: z.number().finite().nullable(),
  cooldown: z.object({
    consecutiveLosses: z.number().int().min(0),
    cooldownUntil: z.number().nullable(),
  }),
  auto: z.boolean().default(false),
});

/**
 * 엔진 체크포인트 저장소: engine_state 단일 행(JSON).
 * 엔진은 파일/DB를 직접 만지지 않고 main.ts가 이 저장소로 복원·저장한다.
 */
export class EngineStateStore {
  private readonly selectStmt: Database.Statement<[], { checkpoint: string }>;
  private readonly upsertStmt: Database.Statement<[string, number]>;

  constructor(db: Database.Database) {
    this.selectStmt = db.prepare<[], { checkpoint: string }>('SELECT checkpoint FROM engine_state WHERE id = 1');
    this.upsertStmt = db.prepare<[string, number]>(
      `INSERT INTO engine_state (id, checkpoint, updated_at) VALUES (1, ?, ?)
       ON CONFLICT(id) DO UPDATE SET checkpoint = excluded.checkpoint, updated_at = excluded.updated_at`,
    );
  }

  /** 저장된 상태 없음/손상 → null (손상은 경고 로그) */
  load(): EngineCheckpoint | null {
    const row = this.selectStmt.get();
    if (!row) return null;
    let json: unknown;
    try {
      json = JSON.parse(row.checkpoint);
    } catch (err) {
      log.warn({ err }, 'Stored checkpoint is not valid JSON; ignoring');
      return null;
    }
    const parsed = checkpointSchema.safeParse(json);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues }, 'Stored checkpoint failed validation; ignoring');
      return null;
    }
    return parsed.data;
  }

  save(checkpoint: EngineCheckpoint, now: number = Date.now()): void {
    this.upsertStmt.run(JSON.stringify(checkpoint), now);
  }
}
