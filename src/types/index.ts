import type { FetchErrorKind } from '../utils/errors';

// Archive granularity: one file per UTC day, or one per completed UTC month
export type Mode = 'daily' | 'monthly';

export const MODES: readonly Mode[] = ['daily', 'monthly'];

/**
 * One fetchable archive file. Remote URL and local path are both derived
 * from these four fields alone.
 */
export interface ResourceIdentifier {
  readonly symbol: string;
  readonly mode: Mode;
  readonly interval: string;
  readonly calendarKey: string;  // YYYY-MM-DD (daily) or YYYY-MM (monthly)
}

export type FetchOutcome =
  | { status: 'succeeded'; bytesWritten: number; attempts: number }
  | { status: 'skipped'; reason: 'already-present' }
  | { status: 'failed'; errorKind: FetchErrorKind; attemptsMade: number; message: string };

export interface FailedTarget {
  identifier: ResourceIdentifier;
  key: string;
  errorKind: FetchErrorKind;
  attemptsMade: number;
  message: string;
}

export type StopReason = 'completed' | 'cancelled' | 'local-io-errors';

export interface RunSummary {
  mode: Mode;
  symbol: string;
  incremental: boolean;
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  bytesWritten: number;
  failures: FailedTarget[];
  stopReason: StopReason;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  filesPerSecond: number;
}

export interface RunProgress {
  processed: number;
  total: number;
  percent: number;
  skipped: number;
  downloaded: number;
  failed: number;
}

export type RunState = 'idle' | 'enumerating' | 'filtering' | 'dispatching' | 'collecting' | 'finalized';

export interface AppConfig {
  archive: {
    baseUrl: string;
    timeoutMs: number;
  };
  storage: {
    dataRoot: string;
  };
  sync: {
    concurrency: number;
    maxAttempts: number;
    retryDelayMs: number;
    localIoErrorLimit: number;
  };
  schedule: {
    dailyCron: string;
    monthlyCron: string;
  };
  app: {
    logDir: string;
    logLevel: 'debug' | 'info' | 'warn' | 'error';
    nodeEnv: string;
  };
}
