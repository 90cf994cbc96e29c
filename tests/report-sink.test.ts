import { describe, it, expect } from 'vitest';
import { formatSummary } from '../src/monitoring/report-sink';
import { createIdentifier } from '../src/archive';
import type { RunSummary } from '../src/types';

const base: RunSummary = {
  mode: 'daily',
  symbol: 'BTCUSDT',
  incremental: true,
  total: 3,
  succeeded: 3,
  skipped: 0,
  failed: 0,
  bytesWritten: 2048,
  failures: [],
  stopReason: 'completed',
  startedAt: new Date(Date.UTC(2024, 0, 1)),
  finishedAt: new Date(Date.UTC(2024, 0, 1, 0, 0, 6)),
  durationMs: 6000,
  filesPerSecond: 0.5,
};

describe('formatSummary', () => {
  it('should list counts, time and speed', () => {
    expect(formatSummary(base)).toEqual([
      '=== Download Summary ===',
      'Mode: daily (incremental) BTCUSDT',
      'Total files: 3',
      'Files skipped (already exist): 0',
      'Successfully downloaded: 3 (2.0 KiB)',
      'Failed downloads: 0',
      'Total time: 0:00:06',
      'Average download speed: 0.50 files/second',
    ]);
  });

  it('should list failures and an early stop', () => {
    const id = createIdentifier('BTCUSDT', 'monthly', '1d', '2023-05');
    const lines = formatSummary({
      ...base,
      mode: 'monthly',
      incremental: false,
      total: 1,
      succeeded: 0,
      failed: 1,
      bytesWritten: 0,
      durationMs: 3_725_000,
      stopReason: 'cancelled',
      failures: [
        {
          identifier: id,
          key: 'monthly/1d/BTCUSDT-1d-2023-05.zip',
          errorKind: 'NotFound',
          attemptsMade: 1,
          message: 'Archive file not published',
        },
      ],
    });

    expect(lines).toEqual([
      '=== Download Summary ===',
      'Mode: monthly (full) BTCUSDT',
      'Total files: 1',
      'Files skipped (already exist): 0',
      'Successfully downloaded: 0 (0 B)',
      'Failed downloads: 1',
      'Total time: 1:02:05',
      'Run stopped early: cancelled',
      'Failed downloads:',
      '- monthly/1d/BTCUSDT-1d-2023-05.zip [NotFound, 1 attempt(s)]',
    ]);
  });
});
