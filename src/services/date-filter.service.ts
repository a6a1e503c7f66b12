import type { DateFilter } from '../types/purge.types';
import { ConflictingFilterError, InvalidRangeError, ValidationError } from '../utils/errors';

const DAY_MS = 24 * 60 * 60 * 1000;
export const MAX_RANGE_DAYS = 365;

export interface DateFilterInput {
  olderThanDays?: number;
  before?: Date;
  start?: Date;
  end?: Date;
}

function isValidDate(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}

function isMidnightUtc(value: Date): boolean {
  return value.getTime() % DAY_MS === 0;
}

// A date-only end covers that whole day; the span cap is checked on the dates as given
function endOfDayIfDateOnly(end: Date): Date {
  return new Date(isMidnightUtc(end) ? end.getTime() + DAY_MS - 1 : end.getTime());
}

/** ISO instant as sent to either backend; whole seconds drop the millisecond part. */
export function formatFilterInstant(value: Date): string {
  return value.toISOString().replace(/\.000Z$/, 'Z');
}

/**
 * Normalizes the scope parameters into exactly one filter mode.
 * Pure: `now` is only used to resolve an age in days into a cutoff.
 */
export function buildDateFilter(input: DateFilterInput, now: Date): DateFilter {
  const hasCutoffStyle = input.olderThanDays !== undefined || input.before !== undefined;
  const hasRangeStyle = input.start !== undefined || input.end !== undefined;

  if (hasCutoffStyle && hasRangeStyle) {
    throw new ConflictingFilterError();
  }

  if (hasRangeStyle) {
    const { start, end } = input;
    if (!start || !end) {
      throw new InvalidRangeError('Both a start and an end date are required for a date range');
    }
    if (!isValidDate(start) || !isValidDate(end)) {
      throw new InvalidRangeError('Date range contains an invalid date');
    }
    if (start.getTime() > end.getTime()) {
      throw new InvalidRangeError('Start date must not be after end date');
    }
    if (end.getTime() - start.getTime() > MAX_RANGE_DAYS * DAY_MS) {
      throw new InvalidRangeError(`Date range may span at most ${MAX_RANGE_DAYS} days`);
    }
    const range: DateFilter = { mode: 'range', start: new Date(start.getTime()), end: endOfDayIfDateOnly(end) };
    return Object.freeze(range);
  }

  if (input.olderThanDays !== undefined && input.before !== undefined) {
    throw new ConflictingFilterError('Use either an age in days or a cutoff date, not both');
  }

  if (input.olderThanDays !== undefined) {
    const days = input.olderThanDays;
    if (!Number.isInteger(days) || days < 0) {
      throw new ValidationError('Age in days must be a non-negative whole number', [
        'Example: --older-than-days 365',
      ]);
    }
    const byAge: DateFilter = { mode: 'cutoff', cutoff: new Date(now.getTime() - days * DAY_MS) };
    return Object.freeze(byAge);
  }

  if (input.before !== undefined) {
    if (!isValidDate(input.before)) {
      throw new ValidationError('Cutoff date is not a valid date', ['Example: --before 2023-01-01']);
    }
    const byDate: DateFilter = { mode: 'cutoff', cutoff: new Date(input.before.getTime()) };
    return Object.freeze(byDate);
  }

  throw new ValidationError('A date filter is required', [
    'Pass --older-than-days <n>, --before <date>, or --start <date> --end <date>',
  ]);
}

export function describeFilter(filter: DateFilter): string {
  if (filter.mode === 'cutoff') return `received before ${filter.cutoff.toISOString()}`;
  return `received between ${filter.start.toISOString()} and ${filter.end.toISOString()}`;
}
