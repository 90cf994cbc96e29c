import type { FetchOutcome, ResourceIdentifier, RunState, RunSummary, StopReason } from '../types';
import { LogReportSink, type ReportSink } from '../monitoring/report-sink';
import {
  logger,
  parseOrThrow,
  syncRequestSchema,
  startOfUtcDay,
  formatUtcDay,
  Channel,
  type SyncRequest,
  type SyncRequestInput,
} from '../utils';
import { identifierKey, intervalsFor } from '../archive';
import { FetchPool } from './fetch-pool';
import { LocalStore } from './local-store';
import { HISTORY_START, countTargets, enumerateTargets, type EnumerationRequest } from './target-enumerator';

const STATE_ORDER: readonly RunState[] = ['idle', 'enumerating', 'filtering', 'dispatching', 'collecting', 'finalized'];

const ALREADY_PRESENT: FetchOutcome = { status: 'skipped', reason: 'already-present' };

interface OutcomeMessage {
  id: ResourceIdentifier;
  outcome: FetchOutcome;
}

interface PreparedRun {
  request: SyncRequest;
  enumeration: EnumerationRequest;
  targets: Iterable<ResourceIdentifier>;
  planned: number;
}

export interface RunCoordinatorOptions {
  localIoErrorLimit: number;
  progressEvery: number;
  now: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RunCoordinatorOptions = {
  localIoErrorLimit: 5,
  progressEvery: 10,
  now: () => new Date(),
};

/**
 * Drives one sync run: enumerate targets, skip the ones already mirrored
 * (incremental runs), stream the rest into the fetch pool and fold every
 * outcome into a RunSummary. Outcomes reach the summary only through the
 * coordinator's channel, consumed by a single collector loop.
 */
export class RunCoordinator {
  private pool: FetchPool;
  private store: LocalStore;
  private sink: ReportSink;
  private options: RunCoordinatorOptions;
  private state: RunState = 'idle';
  private stopReason: StopReason = 'completed';
  private localIoErrors = 0;

  constructor(
    pool: FetchPool,
    store: LocalStore,
    sink: ReportSink = new LogReportSink(),
    options: Partial<RunCoordinatorOptions> = {}
  ) {
    this.pool = pool;
    this.store = store;
    this.sink = sink;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  getState(): RunState {
    return this.state;
  }

  async run(input: SyncRequestInput, runOptions: RunOptions = {}): Promise<RunSummary> {
    if (this.state !== 'idle') {
      throw new Error(`RunCoordinator has already been used (state: ${this.state})`);
    }
    const { signal } = runOptions;

    this.transition('enumerating');

    const { request, enumeration, targets, planned } = this.prepare(input);

    const { incremental } = request;
    const startedAt = this.options.now();
    const summary: RunSummary = {
      mode: enumeration.mode,
      symbol: enumeration.symbol,
      incremental,
      total: 0,
      succeeded: 0,
      skipped: 0,
      failed: 0,
      bytesWritten: 0,
      failures: [],
      stopReason: 'completed',
      startedAt,
      finishedAt: startedAt,
      durationMs: 0,
      filesPerSecond: 0,
    };

    this.notify((sink) => sink.runStarted({
      mode: enumeration.mode,
      symbol: enumeration.symbol,
      incremental,
      intervals: enumeration.intervals ?? intervalsFor(enumeration.mode),
      startDate: formatUtcDay(enumeration.startDate),
      endDate: formatUtcDay(enumeration.endDate),
      total: planned,
      concurrency: this.pool.concurrency,
    }));

    if (incremental) {
      this.transition('filtering');
    }
    this.transition('dispatching');

    const channel = new Channel<OutcomeMessage>();
    const collector = this.collect(channel, summary, planned);
    const inFlight = await this.dispatch(targets, incremental, channel, signal);

    this.transition('collecting');
    await Promise.all(inFlight);
    channel.close();
    await collector;

    const finishedAt = this.options.now();
    summary.stopReason = this.stopReason;
    summary.finishedAt = finishedAt;
    summary.durationMs = Math.max(0, finishedAt.getTime() - startedAt.getTime());
    summary.filesPerSecond = summary.durationMs > 0 ? summary.succeeded / (summary.durationMs / 1000) : 0;

    this.transition('finalized');
    this.notify((sink) => sink.summary(summary));
    return summary;
  }

  private prepare(input: SyncRequestInput): PreparedRun {
    try {
      const request = parseOrThrow(syncRequestSchema, input, 'sync request');
      const now = this.options.now();
      const enumeration: EnumerationRequest = {
        symbol: request.symbol,
        mode: request.type,
        intervals: request.intervals,
        startDate: request.startDate ?? HISTORY_START,
        endDate: request.endDate ?? startOfUtcDay(now),
        now,
      };
      return {
        request,
        enumeration,
        targets: enumerateTargets(enumeration),
        planned: countTargets(enumeration),
      };
    } catch (error) {
      this.transition('finalized');
      throw error;
    }
  }

  private async dispatch(
    targets: Iterable<ResourceIdentifier>,
    incremental: boolean,
    channel: Channel<OutcomeMessage>,
    signal?: AbortSignal
  ): Promise<Set<Promise<void>>> {
    const inFlight = new Set<Promise<void>>();

    for (const id of targets) {
      if (this.shouldStop(signal)) break;

      if (incremental && (await this.store.exists(id))) {
        channel.push({ id, outcome: ALREADY_PRESENT });
        continue;
      }

      await this.pool.whenReady();
      if (this.shouldStop(signal)) break;

      const task: Promise<void> = this.pool.submit(id).then((outcome) => {
        channel.push({ id, outcome });
        inFlight.delete(task);
      });
      inFlight.add(task);
    }

    return inFlight;
  }

  private shouldStop(signal?: AbortSignal): boolean {
    if (this.stopReason !== 'completed') return true;
    if (signal?.aborted) {
      this.stopReason = 'cancelled';
      logger.warn('Sync', 'Cancellation requested, no further files will be dispatched', {
        inFlight: this.pool.stats().active,
      });
      return true;
    }
    return false;
  }

  private async collect(channel: Channel<OutcomeMessage>, summary: RunSummary, planned: number): Promise<void> {
    for await (const { id, outcome } of channel) {
      summary.total++;

      switch (outcome.status) {
        case 'skipped':
          summary.skipped++;
          break;
        case 'succeeded':
          summary.succeeded++;
          summary.bytesWritten += outcome.bytesWritten;
          break;
        case 'failed':
          summary.failed++;
          summary.failures.push({
            identifier: id,
            key: identifierKey(id),
            errorKind: outcome.errorKind,
            attemptsMade: outcome.attemptsMade,
            message: outcome.message,
          });
          if (outcome.errorKind === 'LocalIOError') {
            this.noteLocalIoError();
          }
          break;
      }

      this.notify((sink) => sink.outcome(id, outcome));

      if (summary.total % this.options.progressEvery === 0 || summary.total === planned) {
        const progress = {
          processed: summary.total,
          total: planned,
          percent: planned > 0 ? (summary.total / planned) * 100 : 100,
          skipped: summary.skipped,
          downloaded: summary.succeeded,
          failed: summary.failed,
        };
        this.notify((sink) => sink.progress(progress));
      }
    }
  }

  // Sink failures are logged and otherwise ignored
  private notify(event: (sink: ReportSink) => void): void {
    try {
      event(this.sink);
    } catch (error) {
      logger.error('Sync', 'Report sink failed', {
        error: error instanceof Error ? error.message : 'Unknown',
      });
    }
  }

  private noteLocalIoError(): void {
    this.localIoErrors++;
    if (this.localIoErrors >= this.options.localIoErrorLimit && this.stopReason === 'completed') {
      this.stopReason = 'local-io-errors';
      logger.error('Sync', 'Too many local storage errors, stopping dispatch', {
        localIoErrors: this.localIoErrors,
        limit: this.options.localIoErrorLimit,
      });
    }
  }

  private transition(next: RunState): void {
    if (STATE_ORDER.indexOf(next) <= STATE_ORDER.indexOf(this.state)) {
      throw new Error(`Invalid run state transition ${this.state} -> ${next}`);
    }
    logger.debug('Sync', `State ${this.state} -> ${next}`);
    this.state = next;
  }
}

/** Process exit status for a finished run. */
export function exitCodeFor(summary: RunSummary): number {
  if (summary.stopReason === 'cancelled') return 130;
  return summary.failed > 0 || summary.stopReason !== 'completed' ? 1 : 0;
}
