import { describe, it, expect, vi } from 'vitest';
import { CommanderError } from 'commander';
import { buildProgram, toSyncRequest, CONFIG_ERROR_EXIT_CODE } from '../src/cli';
import { loadConfig } from '../src/config';
import type { RunSyncOptions } from '../src/sync';
import type { AppConfig, RunSummary } from '../src/types';
import type { SyncRequestInput } from '../src/utils';
import { InvalidConfigurationError } from '../src/utils/errors';

const config = loadConfig({ DATA_ROOT: '/tmp/kline-archive-cli-test' });

const summary: RunSummary = {
  mode: 'daily',
  symbol: 'ETHUSDT',
  incremental: true,
  total: 2,
  succeeded: 2,
  skipped: 0,
  failed: 0,
  bytesWritten: 20,
  failures: [],
  stopReason: 'completed',
  startedAt: new Date(0),
  finishedAt: new Date(0),
  durationMs: 0,
  filesPerSecond: 0,
};

function setup(result: () => Promise<RunSummary>) {
  const sync = vi.fn((_config: AppConfig, _request: SyncRequestInput, _options?: RunSyncOptions) => result());
  const setExitCode = vi.fn();
  const dispose = vi.fn();
  const onShutdown = vi.fn(() => dispose);
  const program = buildProgram({ config, sync, setExitCode, onShutdown });
  return { program, sync, setExitCode, onShutdown, dispose };
}

describe('toSyncRequest', () => {
  it('should map command options to a sync request', () => {
    expect(
      toSyncRequest({ type: 'monthly', symbol: 'BTCUSDT', incr: true, intervals: ['1d'], start: '2020-01-01' })
    ).toEqual({
      type: 'monthly',
      symbol: 'BTCUSDT',
      incremental: true,
      intervals: ['1d'],
      startDate: '2020-01-01',
    });
  });

  it('should reject an unknown type', () => {
    expect(() => toSyncRequest({ type: 'weekly', symbol: 'BTCUSDT' })).toThrow(InvalidConfigurationError);
  });
});

describe('CLI', () => {
  it('should run a sync with the parsed options', async () => {
    const { program, sync, setExitCode, dispose } = setup(async () => summary);

    await program.parseAsync([
      'node',
      'kline-archive',
      'sync',
      '--type',
      'daily',
      '--symbol',
      'ethusdt',
      '--incr',
      '--intervals',
      '1h, 4h',
      '--start',
      '2024-01-01',
      '--end',
      '2024-01-02',
      '--concurrency',
      '3',
    ]);

    expect(sync).toHaveBeenCalledWith(
      config,
      {
        type: 'daily',
        symbol: 'ethusdt',
        incremental: true,
        intervals: ['1h', '4h'],
        startDate: '2024-01-01',
        endDate: '2024-01-02',
      },
      { signal: expect.any(AbortSignal), concurrency: 3 }
    );
    expect(setExitCode).toHaveBeenCalledWith(0);
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('should default to a full BTCUSDT run', async () => {
    const { program, sync } = setup(async () => summary);

    await program.parseAsync(['node', 'kline-archive', 'sync', '--type', 'monthly']);

    expect(sync).toHaveBeenCalledWith(
      config,
      { type: 'monthly', symbol: 'BTCUSDT', incremental: false },
      { signal: expect.any(AbortSignal), concurrency: undefined }
    );
  });

  it('should exit with 1 when downloads failed', async () => {
    const { program, setExitCode } = setup(async () => ({ ...summary, failed: 1 }));

    await program.parseAsync(['node', 'kline-archive', 'sync', '--type', 'daily']);

    expect(setExitCode).toHaveBeenCalledWith(1);
  });

  it('should exit with the configuration code when the request is invalid', async () => {
    const { program, setExitCode, dispose } = setup(async () => {
      throw new InvalidConfigurationError('Interval(s) 7m not available in daily mode', 'intervals');
    });

    await program.parseAsync(['node', 'kline-archive', 'sync', '--type', 'daily', '--intervals', '7m']);

    expect(setExitCode).toHaveBeenCalledWith(CONFIG_ERROR_EXIT_CODE);
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('should abort the run when a shutdown is requested', async () => {
    let signal: AbortSignal | undefined;
    const sync = vi.fn(async (_config: AppConfig, _request: SyncRequestInput, options?: RunSyncOptions) => {
      signal = options?.signal;
      return summary;
    });
    const program = buildProgram({
      config,
      sync,
      setExitCode: vi.fn(),
      onShutdown: (handler) => {
        handler();
        return () => undefined;
      },
    });

    await program.parseAsync(['node', 'kline-archive', 'sync', '--type', 'daily']);

    expect(signal?.aborted).toBe(true);
  });

  it('should reject an unknown type', async () => {
    const { program, sync } = setup(async () => summary);

    await expect(program.parseAsync(['node', 'kline-archive', 'sync', '--type', 'weekly'])).rejects.toBeInstanceOf(
      CommanderError
    );
    expect(sync).not.toHaveBeenCalled();
  });

  it('should require --type', async () => {
    const { program } = setup(async () => summary);

    await expect(program.parseAsync(['node', 'kline-archive', 'sync'])).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
  });
});
