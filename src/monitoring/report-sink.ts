import type { FetchOutcome, Mode, ResourceIdentifier, RunProgress, RunSummary } from '../types';
import { identifierKey } from '../archive';
import { logger } from '../utils';

export interface RunStartInfo {
  mode: Mode;
  symbol: string;
  incremental: boolean;
  intervals: readonly string[];
  startDate: string;
  endDate: string;
  total: number;
  concurrency: number;
}

/**
 * Receives the coordinator's progress and summary events. Calls arrive from
 * the coordinator's collector loop only, one at a time.
 */
export interface ReportSink {
  runStarted(info: RunStartInfo): void;
  outcome(id: ResourceIdentifier, outcome: FetchOutcome): void;
  progress(progress: RunProgress): void;
  summary(summary: RunSummary): void;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GiB`;
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}`;
}

/** Human-readable summary block, one entry per line. */
export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    '=== Download Summary ===',
    `Mode: ${summary.mode} (${summary.incremental ? 'incremental' : 'full'}) ${summary.symbol}`,
    `Total files: ${summary.total}`,
    `Files skipped (already exist): ${summary.skipped}`,
    `Successfully downloaded: ${summary.succeeded} (${formatBytes(summary.bytesWritten)})`,
    `Failed downloads: ${summary.failed}`,
    `Total time: ${formatDuration(summary.durationMs)}`,
  ];

  if (summary.succeeded > 0) {
    lines.push(`Average download speed: ${summary.filesPerSecond.toFixed(2)} files/second`);
  }
  if (summary.stopReason !== 'completed') {
    lines.push(`Run stopped early: ${summary.stopReason}`);
  }
  if (summary.failures.length > 0) {
    lines.push('Failed downloads:');
    for (const failure of summary.failures) {
      lines.push(`- ${failure.key} [${failure.errorKind}, ${failure.attemptsMade} attempt(s)]`);
    }
  }

  return lines;
}

export class LogReportSink implements ReportSink {
  runStarted(info: RunStartInfo): void {
    logger.info('Sync', `Found ${info.total} files to process`, { ...info, intervals: [...info.intervals], type: 'run_started' });
  }

  outcome(id: ResourceIdentifier, outcome: FetchOutcome): void {
    const target = identifierKey(id);

    switch (outcome.status) {
      case 'skipped':
        logger.transfer('target_skipped', { target, reason: outcome.reason });
        break;
      case 'succeeded':
        logger.transfer('transfer_succeeded', {
          target,
          bytesWritten: outcome.bytesWritten,
          attempts: outcome.attempts,
        });
        break;
      case 'failed':
        logger.transfer(
          'transfer_failed',
          {
            target,
            symbol: id.symbol,
            mode: id.mode,
            interval: id.interval,
            calendarKey: id.calendarKey,
            errorKind: outcome.errorKind,
            attemptsMade: outcome.attemptsMade,
            error: outcome.message,
          },
          outcome.errorKind === 'NotFound' ? 'info' : 'warn'
        );
        break;
    }
  }

  progress(progress: RunProgress): void {
    logger.info(
      'Sync',
      `Progress: ${progress.percent.toFixed(2)}% (${progress.processed}/${progress.total}) ` +
        `[Skipped: ${progress.skipped}, Downloaded: ${progress.downloaded}, Failed: ${progress.failed}]`,
      { type: 'progress' }
    );
  }

  summary(summary: RunSummary): void {
    for (const line of formatSummary(summary)) {
      logger.info('Sync', line);
    }

    logger.info('Sync', 'Run finished', {
      type: 'run_summary',
      total: summary.total,
      succeeded: summary.succeeded,
      skipped: summary.skipped,
      failed: summary.failed,
      bytesWritten: summary.bytesWritten,
      stopReason: summary.stopReason,
      startedAt: summary.startedAt.toISOString(),
      finishedAt: summary.finishedAt.toISOString(),
      durationMs: summary.durationMs,
      failures: summary.failures.map((failure) => ({
        target: failure.key,
        ...failure.identifier,
        errorKind: failure.errorKind,
        attemptsMade: failure.attemptsMade,
        error: failure.message,
      })),
    });
  }
}
