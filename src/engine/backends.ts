import { hasLiveCredentials } from '../config.js';
import { InvalidConfigError } from '../errors.js';
import { LiveExecution } from '../execution/live-execution.js';
import { SimulatedExecution } from '../execution/simulated-execution.js';
import { UpbitPrivateApi } from '../execution/upbit-api.js';
import type { ExecutionBackend } from '../execution/execution-backend.js';
import { LiveLedger } from '../ledger/live-ledger.js';
import type { PositionLedger } from '../ledger/position-ledger.js';
import type { SimulatedLedger } from '../ledger/simulated-ledger.js';
import type { EngineConfig, PriceSample } from '../types/index.js';

/** 원장 + 주문 실행 한 쌍: 설정 시점에 모드별로 선택 */
export interface EngineBackends {
  readonly ledger: PositionLedger;
  readonly execution: ExecutionBackend;
}

export interface BackendDeps {
  /** 엔진 소유 모의 원장 (모드 전환 후에도 유지) */
  readonly simulatedLedger: SimulatedLedger;
  /** 엔진의 최신 가격 샘플 */
  readonly latestSample: () => PriceSample | null;
  readonly privateApi?: UpbitPrivateApi;
  readonly hasLiveCredentials?: boolean;
}

export type BackendFactory = (config: EngineConfig, deps: BackendDeps) => EngineBackends;

export const createBackends: BackendFactory = (config, deps) => {
  if (config.simulationMode) {
    return {
      ledger: deps.simulatedLedger,
      execution: new SimulatedExecution(deps.simulatedLedger, deps.latestSample),
    };
  }
  if (!(deps.hasLiveCredentials ?? hasLiveCredentials())) {
    throw new InvalidConfigError(['simulationMode: live trading requires UPBIT_ACCESS_KEY and UPBIT_SECRET_KEY']);
  }
  const api = deps.privateApi ?? new UpbitPrivateApi();
  return {
    ledger: new LiveLedger(api, config.ticker),
    execution: new LiveExecution(api, deps.latestSample),
  };
};
