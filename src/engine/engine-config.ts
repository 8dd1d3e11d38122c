import { z } from 'zod';
import { config, hasLiveCredentials } from '../config.js';
import { InvalidConfigError } from '../errors.js';
import { TICKER_PATTERN } from '../market/ticker.js';
import type { EngineConfig } from '../types/index.js';

export const engineConfigSchema = z.object({
  ticker: z.string().min(1, 'ticker must not be empty').regex(TICKER_PATTERN, 'ticker must look like QUOTE-BASE'),
  indicatorPeriod: z.number().int().min(1).max(200),
  entryThreshold: z.number().min(0).max(100),
  takeProfitPct: z.number().finite(),
  stopLossPct: z.number().finite(),
  orderAmount: z.number().finite().positive(),
  maxConsecutiveLosses: z.number().int().min(0),
  cooldownMinutes: z.number().finite().min(0),
  simulationMode: z.boolean(),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export interface ValidateOptions {
  /** 실거래 키 보유 여부 (기본: 환경변수 기준) */
  hasLiveCredentials?: boolean;
}

/**
 * 설정 검증: 위반 시 InvalidConfigError (이슈 목록 포함), 루프에 도달하지 않음.
 */
export function validateEngineConfig(input: unknown, options: ValidateOptions = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`),
    );
  }
  const hasKeys = options.hasLiveCredentials ?? hasLiveCredentials();
  if (!parsed.data.simulationMode && !hasKeys) {
    throw new InvalidConfigError(['simulationMode: live trading requires UPBIT_ACCESS_KEY and UPBIT_SECRET_KEY']);
  }
  return Object.freeze({ ...parsed.data });
}

/** 부분 변경 (API POST /api/config) → 기존 설정과 합쳐 검증 */
export function mergeEngineConfig(
  current: EngineConfig,
  patch: unknown,
  options: ValidateOptions = {},
): EngineConfig {
  const partial = engineConfigSchema.partial().safeParse(patch);
  if (!partial.success) {
    throw new InvalidConfigError(
      partial.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`),
    );
  }
  return validateEngineConfig({ ...current, ...partial.data }, options);
}

/** 환경변수 기본값 → 최초 설정 */
export function defaultEngineConfig(): EngineConfig {
  return validateEngineConfig({ ...config.defaults });
}
