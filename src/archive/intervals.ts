import { Mode } from '../types';

// Kline intervals the archive publishes per granularity
export const INTERVAL_CATALOG: Record<Mode, readonly string[]> = {
  daily: ['1s', '1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '8h', '12h'],
  monthly: ['1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '8h', '12h', '1d', '3d', '1w', '1mo'],
};

export function intervalsFor(mode: Mode): readonly string[] {
  return INTERVAL_CATALOG[mode];
}

export function isSupportedInterval(mode: Mode, interval: string): boolean {
  return INTERVAL_CATALOG[mode].includes(interval);
}
