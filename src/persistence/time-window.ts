/**
 * Time-window predicates and local-time grouping for ledger queries.
 *
 * Stored timestamps are UTC text (`YYYY-MM-DDTHH:MM:SS.mmm`), so windows are
 * plain string comparisons against bounds in the same format. Grouping by
 * the client's local date or hour shifts the UTC timestamp with an SQLite
 * `'+N minutes'` modifier.
 */

import { RequestValidationError } from '../shared/errors.js';

export const MIN_TIMEZONE_OFFSET = -720;
export const MAX_TIMEZONE_OFFSET = 840;
export const DEFAULT_DAILY_WINDOW_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Named parameters bound alongside a fragment. */
export type SqlParams = Record<string, string | number>;

/** A parameterized SQL fragment; `sql` is empty when there is nothing to filter. */
export interface SqlFragment {
  sql: string;
  params: SqlParams;
}

export interface TimeWindowInput {
  hours?: number;
  startDate?: string;
  endDate?: string;
  /** Minutes east of UTC (negative west), e.g. -480 for PST. */
  timezoneOffset?: number;
}

export interface DailyWindow {
  startDate: string;
  endDate: string;
  filter: SqlFragment;
  grouping: SqlFragment;
}

export interface HourlyWindow {
  date: string;
  filter: SqlFragment;
  grouping: SqlFragment;
}

/** Ledger timestamp format: ISO-8601 UTC with milliseconds and no zone suffix. */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, -1);
}

function formatUtcSeconds(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19);
}

function formatUtcDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Parse `YYYY-MM-DD` into epoch milliseconds of its UTC midnight.
 * @throws RequestValidationError for malformed or impossible dates
 */
export function parseIsoDate(date: string): number {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new RequestValidationError(`Invalid date '${date}': expected YYYY-MM-DD`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);

  // Date.UTC rolls 2025-02-30 over to March; reject instead
  const roundTrip = new Date(ms);
  if (
    roundTrip.getUTCFullYear() !== year ||
    roundTrip.getUTCMonth() !== month - 1 ||
    roundTrip.getUTCDate() !== day
  ) {
    throw new RequestValidationError(`Invalid date '${date}': no such calendar day`);
  }

  return ms;
}

/** @throws RequestValidationError when the offset is not an integer in [-720, 840] */
export function validateTimezoneOffset(offset: number): number {
  if (!Number.isInteger(offset) || offset < MIN_TIMEZONE_OFFSET || offset > MAX_TIMEZONE_OFFSET) {
    throw new RequestValidationError(
      `Invalid timezone_offset ${offset}: expected an integer between ${MIN_TIMEZONE_OFFSET} and ${MAX_TIMEZONE_OFFSET}`,
    );
  }
  return offset;
}

/**
 * Convert a local calendar date to its UTC range `[start, end)`.
 * `("2025-10-06", -480)` -> `["2025-10-06T08:00:00", "2025-10-07T08:00:00"]`.
 */
export function convertLocalDateToUtcRange(date: string, timezoneOffset: number): [string, string] {
  const offset = validateTimezoneOffset(timezoneOffset);
  const startMs = parseIsoDate(date) - offset * 60_000;
  return [formatUtcSeconds(startMs), formatUtcSeconds(startMs + DAY_MS)];
}

/**
 * Build the WHERE fragment for a query window.
 * `hours` wins over dates and is relative to `now`. Date bounds use the
 * client's local midnights when an offset is given, UTC midnights otherwise.
 */
export function buildTimeFilter(input: TimeWindowInput, now: Date = new Date()): SqlFragment {
  if (input.hours !== undefined) {
    if (!Number.isInteger(input.hours) || input.hours <= 0) {
      throw new RequestValidationError(`Invalid hours ${input.hours}: expected a positive integer`);
    }
    return {
      sql: 'timestamp >= @windowStart',
      params: { windowStart: formatUtcTimestamp(new Date(now.getTime() - input.hours * 3_600_000)) },
    };
  }

  const clauses: string[] = [];
  const params: SqlParams = {};
  const windowStart = input.startDate !== undefined ? dayBounds(input.startDate, input.timezoneOffset)[0] : undefined;
  const windowEnd = input.endDate !== undefined ? dayBounds(input.endDate, input.timezoneOffset)[1] : undefined;

  if (windowStart !== undefined && windowEnd !== undefined && windowStart >= windowEnd) {
    throw new RequestValidationError('start_date must not be after end_date');
  }
  if (windowStart !== undefined) {
    clauses.push('timestamp >= @windowStart');
    params['windowStart'] = windowStart;
  }
  if (windowEnd !== undefined) {
    clauses.push('timestamp < @windowEnd');
    params['windowEnd'] = windowEnd;
  }

  return { sql: clauses.join(' AND '), params };
}

function dayBounds(date: string, timezoneOffset: number | undefined): [string, string] {
  if (timezoneOffset !== undefined) {
    return convertLocalDateToUtcRange(date, timezoneOffset);
  }
  const startMs = parseIsoDate(date);
  return [formatUtcSeconds(startMs), formatUtcSeconds(startMs + DAY_MS)];
}

function tzModifier(timezoneOffset: number): string {
  const offset = validateTimezoneOffset(timezoneOffset);
  return `${offset >= 0 ? '+' : '-'}${Math.abs(offset)} minutes`;
}

/** Expression bucketing rows by local calendar date. */
export function buildDateGrouping(timezoneOffset?: number): SqlFragment {
  if (timezoneOffset === undefined) {
    return { sql: 'DATE(timestamp)', params: {} };
  }
  return { sql: 'DATE(timestamp, @tzModifier)', params: { tzModifier: tzModifier(timezoneOffset) } };
}

/** Expression bucketing rows by local hour of day (0-23). */
export function buildHourGrouping(timezoneOffset?: number): SqlFragment {
  if (timezoneOffset === undefined) {
    return { sql: "CAST(strftime('%H', timestamp) AS INTEGER)", params: {} };
  }
  return {
    sql: "CAST(strftime('%H', timestamp, @tzModifier) AS INTEGER)",
    params: { tzModifier: tzModifier(timezoneOffset) },
  };
}

/**
 * Window for the daily rollup. Defaults to the last 30 days ending today
 * (UTC), inclusive of both ends.
 */
export function buildDailyWindow(
  input: { startDate?: string; endDate?: string; timezoneOffset?: number },
  now: Date = new Date(),
): DailyWindow {
  const endDate = input.endDate ?? formatUtcDate(now.getTime());
  const startDate = input.startDate ?? formatUtcDate(now.getTime() - DEFAULT_DAILY_WINDOW_DAYS * DAY_MS);

  return {
    startDate,
    endDate,
    filter: buildTimeFilter({ startDate, endDate, timezoneOffset: input.timezoneOffset }, now),
    grouping: buildDateGrouping(input.timezoneOffset),
  };
}

/** Window for the hourly rollup of one local day. */
export function buildHourlyWindow(date: string, timezoneOffset?: number): HourlyWindow {
  return {
    date,
    filter: buildTimeFilter({ startDate: date, endDate: date, timezoneOffset }),
    grouping: buildHourGrouping(timezoneOffset),
  };
}
