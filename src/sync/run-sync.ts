import { join } from 'path';
import { randomUUID } from 'crypto';
import type { AppConfig, Mode, RunSummary } from '../types';
import { ArchiveClient, type ArchiveSource } from '../archive';
import type { ReportSink } from '../monitoring/report-sink';
import { fileTimestamp, logger, type SyncRequestInput } from '../utils';
import { FetchPool } from './fetch-pool';
import { LocalStore } from './local-store';
import { RunCoordinator } from './run-coordinator';

export interface RunSyncOptions {
  signal?: AbortSignal;
  sink?: ReportSink;
  source?: ArchiveSource;
  concurrency?: number;
}

export function runLogPath(logDir: string, mode: Mode, incremental: boolean, at: Date = new Date()): string {
  return join(logDir, `sync_${mode}_${incremental ? 'incr' : 'full'}_${fileTimestamp(at)}.log`);
}

/**
 * Wire a coordinator from configuration and run one sync, recording the run
 * in its own log file.
 */
export async function runSync(
  config: AppConfig,
  request: SyncRequestInput,
  options: RunSyncOptions = {}
): Promise<RunSummary> {
  const source =
    options.source ?? new ArchiveClient({ baseUrl: config.archive.baseUrl, timeoutMs: config.archive.timeoutMs });
  const store = new LocalStore(config.storage.dataRoot);
  const pool = new FetchPool(source, store, {
    concurrency: options.concurrency ?? config.sync.concurrency,
    retryPolicy: {
      maxAttempts: config.sync.maxAttempts,
      initialDelayMs: config.sync.retryDelayMs,
    },
  });
  const coordinator = new RunCoordinator(pool, store, options.sink, {
    localIoErrorLimit: config.sync.localIoErrorLimit,
  });

  const logPath = runLogPath(config.app.logDir, request.type, request.incremental ?? false);
  const runId = randomUUID();
  return logger.withRunLog(logPath, runId, () => {
    logger.info('Sync', 'Run log opened', { path: logPath, runId });
    return coordinator.run(request, { signal: options.signal });
  });
}
