import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { UsageError } from '../errors/custom-errors';
import type { BroadcastDate } from '../types/broadcast.types';

dayjs.extend(customParseFormat);

/**
 * Local time at which the day's edition goes on air
 */
export const BROADCAST_TIME = '20:00';

const CUTOFF_HOUR = 20;

const DATE_FORMAT = 'YYYY-MM-DD';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Local calendar day of a Date as YYYY-MM-DD
 */
export function formatBroadcastDate(date: Date): BroadcastDate {
  return dayjs(date).format(DATE_FORMAT);
}

/**
 * Date of the most recent edition that should already be on air.
 * Before 20:00 local time that is yesterday's, from 20:00 on today's.
 *
 * @param now - Current time; injected by tests
 */
export function resolveSearchDate(now: Date = new Date()): BroadcastDate {
  const today = dayjs(now);
  const day = today.hour() < CUTOFF_HOUR ? today.subtract(1, 'day') : today;
  return day.format(DATE_FORMAT);
}

/**
 * Validate a user supplied date
 *
 * @throws UsageError unless the input is an existing calendar day in YYYY-MM-DD form
 */
export function parseBroadcastDate(input: string): BroadcastDate {
  const value = input.trim();
  if (!DATE_PATTERN.test(value)) {
    throw new UsageError(`Invalid date "${input}". Expected YYYY-MM-DD`);
  }

  // Strict parsing rejects days that would roll over, like 2023-02-30
  if (!dayjs(value, DATE_FORMAT, true).isValid()) {
    throw new UsageError(`Invalid date "${input}": no such calendar day`);
  }

  return value;
}

export function isBroadcastDate(value: string): boolean {
  try {
    parseBroadcastDate(value);
    return true;
  } catch {
    return false;
  }
}
