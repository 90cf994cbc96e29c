export { HISTORY_START, enumerateTargets, countTargets } from './target-enumerator';
export type { EnumerationRequest } from './target-enumerator';
export { LocalStore } from './local-store';
export { FetchPool } from './fetch-pool';
export type { FetchPoolOptions, FetchPoolStats } from './fetch-pool';
export { RunCoordinator, exitCodeFor } from './run-coordinator';
export type { RunCoordinatorOptions, RunOptions } from './run-coordinator';
export { runSync, runLogPath } from './run-sync';
export type { RunSyncOptions } from './run-sync';
