import { Mode, ResourceIdentifier } from '../types';
import { createIdentifier, intervalsFor, isSupportedInterval } from '../archive';
import {
  ErrorCode,
  InvalidConfigurationError,
  addUtcDays,
  formatUtcDay,
  formatYearMonth,
  monthFromIndex,
  monthIndex,
  startOfUtcDay,
  utcDaysBetween,
} from '../utils';

// First day the exchange archive has kline files for
export const HISTORY_START = new Date(Date.UTC(2017, 0, 1));

export interface EnumerationRequest {
  symbol: string;
  mode: Mode;
  intervals?: readonly string[];
  startDate: Date;
  endDate: Date;
  /** Reference time deciding which month is still open; defaults to the wall clock. */
  now?: Date;
}

interface ValidatedRequest {
  symbol: string;
  mode: Mode;
  intervals: readonly string[];
  start: Date;
  end: Date;
  now: Date;
}

function validate(request: EnumerationRequest): ValidatedRequest {
  const { symbol, mode } = request;

  if (!/^[A-Z0-9]+$/.test(symbol)) {
    throw new InvalidConfigurationError(
      `Invalid symbol "${symbol}": expected upper-case letters and digits`,
      'symbol',
      undefined,
      ErrorCode.INVALID_SYMBOL
    );
  }

  const intervals = request.intervals ?? intervalsFor(mode);
  const unsupported = intervals.filter((interval) => !isSupportedInterval(mode, interval));
  if (unsupported.length > 0) {
    throw new InvalidConfigurationError(
      `Interval(s) ${unsupported.join(', ')} not available in ${mode} mode`,
      'intervals',
      { unsupported, supported: [...intervalsFor(mode)] },
      ErrorCode.INVALID_INTERVAL
    );
  }
  if (new Set(intervals).size !== intervals.length) {
    throw new InvalidConfigurationError('Duplicate intervals requested', 'intervals', undefined, ErrorCode.INVALID_INTERVAL);
  }

  const start = startOfUtcDay(request.startDate);
  const end = startOfUtcDay(request.endDate);
  if (start.getTime() > end.getTime()) {
    throw new InvalidConfigurationError(
      `Start date ${formatUtcDay(start)} is after end date ${formatUtcDay(end)}`,
      'startDate',
      undefined,
      ErrorCode.INVALID_DATE_RANGE
    );
  }

  return { symbol, mode, intervals: [...intervals], start, end, now: request.now ?? new Date() };
}

// Months are listed up to and including the end month, but the month
// containing `now` is still open and never published.
function monthBounds(start: Date, end: Date, now: Date): [number, number] {
  return [monthIndex(start), Math.min(monthIndex(end) + 1, monthIndex(now))];
}

function* calendarKeys(mode: Mode, start: Date, end: Date, now: Date): Generator<string> {
  if (mode === 'daily') {
    const days = utcDaysBetween(start, end);
    for (let i = 0; i <= days; i++) {
      yield formatUtcDay(addUtcDays(start, i));
    }
    return;
  }

  const [first, stop] = monthBounds(start, end, now);
  for (let index = first; index < stop; index++) {
    const { year, month } = monthFromIndex(index);
    yield formatYearMonth(year, month);
  }
}

function keyCount(mode: Mode, start: Date, end: Date, now: Date): number {
  if (mode === 'daily') {
    return utcDaysBetween(start, end) + 1;
  }
  const [first, stop] = monthBounds(start, end, now);
  return Math.max(0, stop - first);
}

/**
 * Lazily enumerate every archive file for the request, interval by interval
 * with calendar keys ascending. The request is validated up front, so a bad
 * interval or range throws here rather than on first iteration. The result
 * can be iterated any number of times and always yields the same sequence.
 */
export function enumerateTargets(request: EnumerationRequest): Iterable<ResourceIdentifier> {
  const { symbol, mode, intervals, start, end, now } = validate(request);

  return {
    *[Symbol.iterator]() {
      for (const interval of intervals) {
        for (const key of calendarKeys(mode, start, end, now)) {
          yield createIdentifier(symbol, mode, interval, key);
        }
      }
    },
  };
}

export function countTargets(request: EnumerationRequest): number {
  const { mode, intervals, start, end, now } = validate(request);
  return intervals.length * keyCount(mode, start, end, now);
}
