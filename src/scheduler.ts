import cron, { type ScheduledTask } from 'node-cron';
import type { Mode, RunSummary } from './types';
import { InvalidConfigurationError, logger, type SyncRequestInput } from './utils';

export type SyncRunner = (request: SyncRequestInput) => Promise<RunSummary>;

export interface SchedulerOptions {
  symbol: string;
  dailyCron: string;
  monthlyCron: string;
  timezone: string;
}

/**
 * Runs an incremental daily sync and an incremental monthly sync on cron
 * schedules. A mode whose previous run is still going skips its next tick.
 */
export class SyncScheduler {
  private runner: SyncRunner;
  private options: SchedulerOptions;
  private tasks: ScheduledTask[] = [];
  private running = new Set<Mode>();

  constructor(runner: SyncRunner, options: SchedulerOptions) {
    for (const [field, expression] of [
      ['dailyCron', options.dailyCron],
      ['monthlyCron', options.monthlyCron],
    ] as const) {
      if (!cron.validate(expression)) {
        throw new InvalidConfigurationError(`Invalid cron expression "${expression}"`, field);
      }
    }

    this.runner = runner;
    this.options = options;
  }

  start(): void {
    if (this.tasks.length > 0) return;

    const { dailyCron, monthlyCron, timezone } = this.options;
    this.tasks = [
      cron.schedule(dailyCron, () => this.trigger('daily'), { timezone }),
      cron.schedule(monthlyCron, () => this.trigger('monthly'), { timezone }),
    ];

    logger.info('Scheduler', 'Sync schedule started', {
      symbol: this.options.symbol,
      dailyCron,
      monthlyCron,
      timezone,
    });
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    logger.info('Scheduler', 'Sync schedule stopped');
  }

  isRunning(mode: Mode): boolean {
    return this.running.has(mode);
  }

  /** Run one incremental sync for `mode` unless one is already in progress. */
  async trigger(mode: Mode): Promise<RunSummary | null> {
    if (this.running.has(mode)) {
      logger.warn('Scheduler', `Previous ${mode} sync still running, skipping this tick`);
      return null;
    }

    this.running.add(mode);
    try {
      const summary = await this.runner({ type: mode, symbol: this.options.symbol, incremental: true });
      logger.info('Scheduler', `Scheduled ${mode} sync finished`, {
        succeeded: summary.succeeded,
        skipped: summary.skipped,
        failed: summary.failed,
      });
      return summary;
    } catch (error) {
      logger.error('Scheduler', `Scheduled ${mode} sync failed`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      return null;
    } finally {
      this.running.delete(mode);
    }
  }
}
