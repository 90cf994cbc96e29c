import { randomBytes } from 'crypto';
import { createWriteStream } from 'fs';
import { mkdir, rename, rm, stat } from 'fs/promises';
import { dirname } from 'path';
import { pipeline } from 'stream/promises';
import type { FetchOutcome, ResourceIdentifier } from '../types';
import { extractCsv, identifierKey, type ArchiveSource } from '../archive';
import {
  logger,
  withRetry,
  toArchiveError,
  ErrorCode,
  LocalIOError,
  TransientError,
  DEFAULT_RETRY_POLICY,
  type ArchiveError,
  type FetchErrorKind,
  type RetryPolicy,
} from '../utils';
import type { LocalStore } from './local-store';

export interface FetchPoolOptions {
  concurrency: number;
  retryPolicy: RetryPolicy;
}

export interface FetchPoolStats {
  active: number;
  queued: number;
  peakActive: number;
  completed: number;
}

const DEFAULT_OPTIONS: FetchPoolOptions = {
  concurrency: 5,
  retryPolicy: DEFAULT_RETRY_POLICY,
};

function outcomeKind(error: ArchiveError): FetchErrorKind {
  // Configuration problems are caught before dispatch; anything else is retryable in spirit
  return error.kind === 'InvalidConfiguration' ? 'Transient' : error.kind;
}

async function onLocalDisk<T>(operation: () => Promise<T>, description: string, path: string): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LocalIOError(`Failed to ${description}: ${message}`, { path });
  }
}

/**
 * Downloads archive files with at most `concurrency` transfers in flight.
 * Each archive is streamed into a temporary file beside its destination, its
 * CSV extracted to a `.part` file, and that file renamed into place only
 * once complete.
 */
export class FetchPool {
  private source: ArchiveSource;
  private store: LocalStore;
  private options: FetchPoolOptions;
  private active = 0;
  private peakActive = 0;
  private completed = 0;
  private waiting: Array<() => void> = [];
  private readyWaiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(
    source: ArchiveSource,
    store: LocalStore,
    options: Partial<Omit<FetchPoolOptions, 'retryPolicy'>> & { retryPolicy?: Partial<RetryPolicy> } = {}
  ) {
    if (options.concurrency !== undefined && (!Number.isInteger(options.concurrency) || options.concurrency < 1)) {
      throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
    }

    this.source = source;
    this.store = store;
    this.options = {
      concurrency: options.concurrency ?? DEFAULT_OPTIONS.concurrency,
      retryPolicy: { ...DEFAULT_OPTIONS.retryPolicy, ...options.retryPolicy },
    };
  }

  get concurrency(): number {
    return this.options.concurrency;
  }

  get retryPolicy(): RetryPolicy {
    return { ...this.options.retryPolicy };
  }

  /**
   * Queue one identifier for download. Resolves with its outcome once the
   * transfer has finished; never rejects.
   */
  async submit(id: ResourceIdentifier): Promise<FetchOutcome> {
    await this.acquire();
    try {
      return await this.transfer(id);
    } finally {
      this.release();
    }
  }

  /** Resolves once fewer submissions are waiting than there are slots. */
  whenReady(): Promise<void> {
    if (this.waiting.length < this.options.concurrency) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.readyWaiters.push(resolve));
  }

  /** Resolves once nothing is running or waiting. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.waiting.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  stats(): FetchPoolStats {
    return {
      active: this.active,
      queued: this.waiting.length,
      peakActive: this.peakActive,
      completed: this.completed,
    };
  }

  private acquire(): Promise<void> {
    if (this.active < this.options.concurrency) {
      this.active++;
      this.peakActive = Math.max(this.peakActive, this.active);
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    this.completed++;

    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next waiter
      next();
      if (this.waiting.length < this.options.concurrency) {
        for (const resolve of this.readyWaiters.splice(0)) resolve();
      }
      return;
    }

    this.active--;
    for (const resolve of this.readyWaiters.splice(0)) resolve();
    if (this.active === 0) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }

  private async transfer(id: ResourceIdentifier): Promise<FetchOutcome> {
    const key = identifierKey(id);
    const destination = this.store.pathFor(id);

    logger.transfer('transfer_started', { target: key, url: this.source.urlFor(id) });

    const result = await withRetry(
      (attempt) => this.attemptTransfer(id, destination, attempt),
      `download ${key}`,
      this.options.retryPolicy
    );

    if (result.success && result.data !== undefined) {
      return { status: 'succeeded', bytesWritten: result.data, attempts: result.attempts };
    }

    const error = toArchiveError(result.error);
    return {
      status: 'failed',
      errorKind: outcomeKind(error),
      attemptsMade: result.attempts,
      message: error.message,
    };
  }

  private async attemptTransfer(id: ResourceIdentifier, destination: string, attempt: number): Promise<number> {
    const suffix = randomBytes(6).toString('hex');
    const archivePath = `${destination}.${suffix}.zip.part`;
    const tempPath = `${destination}.${suffix}.part`;

    try {
      const body = await this.source.open(id);

      try {
        await onLocalDisk(() => mkdir(dirname(destination), { recursive: true }), 'create directory', destination);
      } catch (error) {
        body.destroy();
        throw error;
      }

      await pipeline(body, createWriteStream(archivePath, { flags: 'w' }));

      const archive = await onLocalDisk(() => stat(archivePath), 'inspect download', archivePath);
      if (archive.size === 0) {
        throw new TransientError('Archive body was empty', { target: identifierKey(id), attempt }, ErrorCode.EMPTY_RESPONSE);
      }

      await extractCsv(archivePath, tempPath);

      const { size } = await onLocalDisk(() => stat(tempPath), 'inspect extracted file', tempPath);
      if (size === 0) {
        throw new TransientError('Extracted file was empty', { target: identifierKey(id), attempt }, ErrorCode.EMPTY_RESPONSE);
      }

      await onLocalDisk(() => rename(tempPath, destination), 'move download into place', destination);
      return size;
    } catch (error) {
      await this.discard(tempPath);
      throw toArchiveError(error);
    } finally {
      // The archive itself is not kept once its CSV is extracted
      await this.discard(archivePath);
    }
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (error) {
      logger.warn('FetchPool', 'Failed to remove partial download', {
        path: tempPath,
        error: error instanceof Error ? error.message : 'Unknown',
      });
    }
  }
}
