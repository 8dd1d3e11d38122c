import cron, { type ScheduledTask } from 'node-cron';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('scheduler');

export type OnCheckpoint = () => void | Promise<void>;

/** 매 분 0초 */
export const CHECKPOINT_CRON = '* * * * *';

/**
 * 정기 체크포인트 스케줄: 엔진 상태를 저장소에 기록
 */
export function startCheckpointSchedule(onCheckpoint: OnCheckpoint, expression: string = CHECKPOINT_CRON): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new RangeError(`Invalid cron expression: ${expression}`);
  }
  const task = cron.schedule(expression, () => {
    Promise.resolve()
      .then(onCheckpoint)
      .catch((err: unknown) => {
        log.error({ err }, 'Scheduled checkpoint failed');
      });
  });
  log.info({ expression }, 'Checkpoint scheduler started');
  return task;
}
