import { describe, it, expect, vi, beforeEach } from 'vitest';
import cron from 'node-cron';
import { startCheckpointSchedule } from '../src/engine/scheduler.js';

vi.mock('node-cron', () => ({
  default: {
    validate: vi.fn((expr: string) => expr.split(' ').length === 5),
    schedule: vi.fn(() => ({ stop: vi.fn(), start: vi.fn() })),
  },
}));

describe('startCheckpointSchedule', () => {
  beforeEach(() => {
    vi.mocked(cron.schedule).mockClear();
  });

  it('schedules every minute by default and runs the checkpoint', async () => {
    const save = vi.fn<() => void>();
    startCheckpointSchedule(save);

    expect(cron.schedule).toHaveBeenCalledWith('* * * * *', expect.any(Function));
    const job = vi.mocked(cron.schedule).mock.calls[0]?.[1];
    if (typeof job !== 'function') throw new Error('no job registered');
    job(new Date());
    await vi.waitFor(() => expect(save).toHaveBeenCalledOnce());
  });

  it('keeps running when a checkpoint throws', async () => {
    const save = vi.fn<() => void>(() => {
      throw new Error('disk full');
    });
    startCheckpointSchedule(save, '*/5 * * * *');

    const job = vi.mocked(cron.schedule).mock.calls[0]?.[1];
    if (typeof job !== 'function') throw new Error('no job registered');
    expect(() => job(new Date())).not.toThrow();
    await vi.waitFor(() => expect(save).toHaveBeenCalledOnce());
  });

  it('rejects an invalid expression', () => {
    expect(() => startCheckpointSchedule(() => undefined, 'every minute')).toThrow('Invalid cron expression: every minute');
    expect(cron.schedule).not.toHaveBeenCalled();
  });
});
