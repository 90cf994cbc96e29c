import { describe, it, expect, vi } from 'vitest';
import { SyncScheduler } from '../src/scheduler';
import type { RunSummary } from '../src/types';
import type { SyncRequestInput } from '../src/utils';
import { InvalidConfigurationError } from '../src/utils/errors';

const options = {
  symbol: 'BTCUSDT',
  dailyCron: '30 1 * * *',
  monthlyCron: '30 2 1 * *',
  timezone: 'Etc/UTC',
};

function summaryFor(request: SyncRequestInput): RunSummary {
  return {
    mode: request.type,
    symbol: request.symbol ?? 'BTCUSDT',
    incremental: request.incremental ?? false,
    total: 2,
    succeeded: 1,
    skipped: 1,
    failed: 0,
    bytesWritten: 100,
    failures: [],
    stopReason: 'completed',
    startedAt: new Date(0),
    finishedAt: new Date(0),
    durationMs: 0,
    filesPerSecond: 0,
  };
}

describe('SyncScheduler', () => {
  it('should reject an invalid cron expression', () => {
    const runner = vi.fn(async (request: SyncRequestInput) => summaryFor(request));

    expect(() => new SyncScheduler(runner, { ...options, dailyCron: 'every morning' })).toThrow(
      InvalidConfigurationError
    );
    expect(() => new SyncScheduler(runner, { ...options, monthlyCron: 'every morning' })).toThrow(
      'Invalid cron expression "every morning"'
    );
  });

  it('should run an incremental sync for the triggered mode', async () => {
    const runner = vi.fn(async (request: SyncRequestInput) => summaryFor(request));
    const scheduler = new SyncScheduler(runner, options);

    const summary = await scheduler.trigger('monthly');

    expect(runner).toHaveBeenCalledWith({ type: 'monthly', symbol: 'BTCUSDT', incremental: true });
    expect(summary?.mode).toBe('monthly');
    expect(scheduler.isRunning('monthly')).toBe(false);
  });

  it('should skip a tick while the previous run of that mode is going', async () => {
    let finish: () => void = () => undefined;
    const runner = vi.fn(
      (request: SyncRequestInput) =>
        new Promise<RunSummary>((resolve) => {
          finish = () => resolve(summaryFor(request));
        })
    );
    const scheduler = new SyncScheduler(runner, options);

    const first = scheduler.trigger('daily');
    expect(scheduler.isRunning('daily')).toBe(true);

    expect(await scheduler.trigger('daily')).toBeNull();
    expect(runner).toHaveBeenCalledTimes(1);

    finish();
    expect((await first)?.succeeded).toBe(1);
    expect(scheduler.isRunning('daily')).toBe(false);
  });

  it('should return null when the run fails', async () => {
    const runner = vi.fn(async (): Promise<RunSummary> => {
      throw new Error('disk full');
    });
    const scheduler = new SyncScheduler(runner, options);

    expect(await scheduler.trigger('daily')).toBeNull();
    expect(scheduler.isRunning('daily')).toBe(false);
  });
});
