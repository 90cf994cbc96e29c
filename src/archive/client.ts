import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Readable } from 'stream';
import { ResourceIdentifier } from '../types';
import {
  logger,
  ErrorCode,
  NotFoundError,
  RateLimitError,
  TransientError,
} from '../utils';
import { DEFAULT_ARCHIVE_BASE_URL, identifierKey, remoteUrl } from './resource';

/**
 * Where the fetch pool reads archive bodies from. Implementations throw
 * ArchiveErrors so the pool can tell retryable failures from final ones.
 */
export interface ArchiveSource {
  open(id: ResourceIdentifier): Promise<Readable>;
  urlFor(id: ResourceIdentifier): string;
}

export type StatusClass = 'ok' | 'not-found' | 'rate-limited' | 'transient';

/**
 * Map an HTTP status to how the transfer should be treated. Only 404 and
 * 410 are final; every other non-2xx status is retried.
 */
export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) return 'ok';
  if (status === 404 || status === 410) return 'not-found';
  if (status === 429) return 'rate-limited';
  return 'transient';
}

const DEFAULT_RETRY_AFTER_MS = 60000;

function parseRetryAfter(value: unknown): number {
  if (typeof value === 'string' || typeof value === 'number') {
    const seconds = Number(value);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return seconds * 1000;
    }
  }
  return DEFAULT_RETRY_AFTER_MS;
}

export interface ArchiveClientOptions {
  baseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

const DEFAULT_OPTIONS: ArchiveClientOptions = {
  baseUrl: DEFAULT_ARCHIVE_BASE_URL,
  timeoutMs: 30000,
};

export class ArchiveClient implements ArchiveSource {
  private client: AxiosInstance;
  private baseUrl: string;

  constructor(options: Partial<ArchiveClientOptions> = {}) {
    const { baseUrl, timeoutMs, http } = { ...DEFAULT_OPTIONS, ...options };
    this.baseUrl = baseUrl;
    this.client = http ?? axios.create({ timeout: timeoutMs });
  }

  urlFor(id: ResourceIdentifier): string {
    return remoteUrl(id, this.baseUrl);
  }

  async open(id: ResourceIdentifier): Promise<Readable> {
    const url = this.urlFor(id);
    const startTime = Date.now();

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(url, {
        responseType: 'stream',
        validateStatus: () => true,
      });
    } catch (error) {
      throw this.toRequestError(error, url);
    }

    const { status } = response;
    logger.api('GET', url, status, Date.now() - startTime, { target: identifierKey(id) });

    const statusClass = classifyStatus(status);
    if (statusClass === 'ok') {
      if (!(response.data instanceof Readable)) {
        throw new TransientError('Response body is not a stream', { url, status });
      }
      return response.data;
    }

    // Release the socket; the body of an error response is not needed
    if (response.data instanceof Readable) {
      response.data.destroy();
    }

    switch (statusClass) {
      case 'not-found':
        throw new NotFoundError(`Archive file not published: ${url}`, { url, status });
      case 'rate-limited':
        throw new RateLimitError(parseRetryAfter(response.headers['retry-after']), { url, status });
      default:
        throw new TransientError(`Unexpected status ${status} for ${url}`, { url, status }, ErrorCode.SERVER_ERROR);
    }
  }

  private toRequestError(error: unknown, url: string): TransientError {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TransientError(`Request timeout: ${error.message}`, { url, code: error.code }, ErrorCode.REQUEST_TIMEOUT);
      }
      return new TransientError(`Network error: ${error.message}`, { url, code: error.code });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransientError(`Network error: ${message}`, { url });
  }
}
