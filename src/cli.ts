import { Command, InvalidArgumentError, Option } from 'commander';
import type { AppConfig, RunSummary } from './types';
import { exitCodeFor, runSync } from './sync';
import { SyncScheduler } from './scheduler';
import { isArchiveError, logger, modeSchema, parseOrThrow, type SyncRequestInput } from './utils';

export const CONFIG_ERROR_EXIT_CODE = 2;

interface SyncCommandOptions {
  type: string;
  symbol: string;
  incr?: boolean;
  intervals?: string[];
  start?: string;
  end?: string;
  concurrency?: number;
}

interface ScheduleCommandOptions {
  symbol: string;
  timezone: string;
}

export interface CliContext {
  config: AppConfig;
  sync?: typeof runSync;
  setExitCode: (code: number) => void;
  /** Registers a cancel hook for SIGINT/SIGTERM; returns a disposer. */
  onShutdown: (handler: () => void) => () => void;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function toSyncRequest(options: SyncCommandOptions): SyncRequestInput {
  return {
    type: parseOrThrow(modeSchema, options.type, '--type'),
    symbol: options.symbol,
    incremental: options.incr ?? false,
    ...(options.intervals && { intervals: options.intervals }),
    ...(options.start && { startDate: options.start }),
    ...(options.end && { endDate: options.end }),
  };
}

export function buildProgram(context: CliContext): Command {
  const { config } = context;
  const sync = context.sync ?? runSync;
  const program = new Command();

  program
    .name('kline-archive')
    .description('Mirror the public kline archive to a local directory')
    .version('1.0.0')
    .exitOverride();

  program
    .command('sync')
    .description('Download one batch of daily or monthly kline archives')
    .addOption(new Option('--type <type>', 'archive granularity').choices(['daily', 'monthly']).makeOptionMandatory())
    .option('--symbol <symbol>', 'trading pair symbol', 'BTCUSDT')
    .option('--incr', 'skip files that are already downloaded')
    .option('--intervals <list>', 'comma-separated intervals (default: all for the type)', parseList)
    .option('--start <date>', 'first day to fetch, YYYY-MM-DD (default: 2017-01-01)')
    .option('--end <date>', 'current day for the run, YYYY-MM-DD (default: today, UTC)')
    .option('--concurrency <n>', 'simultaneous downloads', parsePositiveInt)
    .action(async (options: SyncCommandOptions) => {
      const controller = new AbortController();
      const dispose = context.onShutdown(() => controller.abort());

      try {
        const summary: RunSummary = await sync(config, toSyncRequest(options), {
          signal: controller.signal,
          concurrency: options.concurrency,
        });
        context.setExitCode(exitCodeFor(summary));
      } catch (error) {
        if (isArchiveError(error) && error.kind === 'InvalidConfiguration') {
          logger.error('CLI', `Invalid configuration: ${error.message}`, error.toJSON());
          context.setExitCode(CONFIG_ERROR_EXIT_CODE);
          return;
        }
        throw error;
      } finally {
        dispose();
      }
    });

  program
    .command('schedule')
    .description('Keep running and sync incrementally on a cron schedule')
    .option('--symbol <symbol>', 'trading pair symbol', 'BTCUSDT')
    .option('--timezone <tz>', 'timezone the cron expressions are evaluated in', 'Etc/UTC')
    .action((options: ScheduleCommandOptions) => {
      const scheduler = new SyncScheduler((request) => sync(config, request), {
        symbol: options.symbol,
        dailyCron: config.schedule.dailyCron,
        monthlyCron: config.schedule.monthlyCron,
        timezone: options.timezone,
      });
      scheduler.start();
      context.onShutdown(() => scheduler.stop());
    });

  return program;
}
