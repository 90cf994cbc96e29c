import { join } from 'path';
import { Mode, ResourceIdentifier } from '../types';

export const DEFAULT_ARCHIVE_BASE_URL = 'https://data.binance.vision';

export function createIdentifier(
  symbol: string,
  mode: Mode,
  interval: string,
  calendarKey: string
): ResourceIdentifier {
  return Object.freeze({ symbol, mode, interval, calendarKey });
}

export function archiveFileName(id: ResourceIdentifier): string {
  return `${id.symbol}-${id.interval}-${id.calendarKey}.zip`;
}

/** Name of the extracted CSV kept in the mirror. */
export function localFileName(id: ResourceIdentifier): string {
  return `${id.symbol}-${id.interval}-${id.calendarKey}.csv`;
}

/** Stable name of a target, used in logs and failure lists. */
export function identifierKey(id: ResourceIdentifier): string {
  return `${id.mode}/${id.interval}/${archiveFileName(id)}`;
}

export function remoteUrl(id: ResourceIdentifier, baseUrl: string = DEFAULT_ARCHIVE_BASE_URL): string {
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}/data/spot/${id.mode}/klines/${id.symbol}/${id.interval}/${archiveFileName(id)}`;
}

export function localPath(id: ResourceIdentifier, root: string): string {
  return join(root, id.mode, id.interval, localFileName(id));
}
