export { logger } from './logger';
export type { LogLevel } from './logger';
export {
  ArchiveError,
  TransientError,
  RateLimitError,
  NotFoundError,
  LocalIOError,
  InvalidConfigurationError,
  ErrorCode,
  toArchiveError,
  isArchiveError,
  isLocalIoFailure,
} from './errors';
export type { ErrorKind, FetchErrorKind } from './errors';
export { withRetry, calculateDelay, DEFAULT_RETRY_POLICY } from './retry';
export type { RetryPolicy, RetryResult } from './retry';
export {
  parseOrThrow,
  syncRequestSchema,
  envConfigSchema,
  symbolSchema,
  modeSchema,
} from './validation';
export type { SyncRequest, SyncRequestInput, EnvConfig } from './validation';
export { Channel } from './channel';
export {
  parseUtcDay,
  startOfUtcDay,
  addUtcDays,
  utcDaysBetween,
  monthIndex,
  monthFromIndex,
  formatUtcDay,
  formatYearMonth,
  fileTimestamp,
} from './dates';
