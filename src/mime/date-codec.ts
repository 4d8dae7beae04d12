/**
 * Date Codec
 *
 * Parses and renders RFC 1123 date-times (`Thu, 3 Dec 2020 00:00:00 +0100`),
 * keeping the offset the value was written in.
 *
 * @packageDocumentation
 */

import { FormatError, ValidationError } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';
import type { LocalDateTimeFields, ZonedDateTime } from '../types/message.js';

const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
const FULL_DAY_NAMES = [
  'Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'
] as const;
const MONTH_NAMES = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'
] as const;

const MINUTE_MS = 60_000;
const DAY_MINUTES = 24 * 60;

// RFC 1123 carries a four-digit year
const MIN_YEAR = 1000;
const MAX_YEAR = 9999;

// [Day, ]D[D] Mon YYYY HH:MM[:SS] (+HHMM|-HHMM|GMT)
const RFC1123_PATTERN =
  /^(?:([A-Za-z]{3}), )?(\d{1,2}) ([A-Za-z]{3}) (\d{4}) (\d{2}):(\d{2})(?::(\d{2}))? (GMT|[+-]\d{4})$/;

function indexOfName(names: readonly string[], name: string): number {
  const lower = name.toLowerCase();
  return names.findIndex(candidate => candidate.toLowerCase() === lower);
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  const last = new Date(0);
  last.setUTCFullYear(year, month, 0);
  return last.getUTCDate();
}

/**
 * Shifts an instant into its own offset so the UTC getters read local fields
 */
function localView(value: ZonedDateTime): Date {
  return new Date(value.epochMillis + value.offsetMinutes * MINUTE_MS);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function formatOffset(offsetMinutes: number, separator: string): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad2(Math.floor(abs / 60))}${separator}${pad2(abs % 60)}`;
}

/**
 * Builds a ZonedDateTime from local calendar fields and a UTC offset
 *
 * @param fields - Local date and time; time fields default to zero
 * @param offsetMinutes - Offset east of UTC
 */
export function zonedDateTime(
  fields: LocalDateTimeFields,
  offsetMinutes: number
): Result<ZonedDateTime> {
  const { year, month, day, hour = 0, minute = 0, second = 0 } = fields;
  const checks: Array<[string, boolean]> = [
    ['year', Number.isInteger(year) && year >= MIN_YEAR && year <= MAX_YEAR],
    ['month', Number.isInteger(month) && month >= 1 && month <= 12],
    ['hour', Number.isInteger(hour) && hour >= 0 && hour <= 23],
    ['minute', Number.isInteger(minute) && minute >= 0 && minute <= 59],
    ['second', Number.isInteger(second) && second >= 0 && second <= 59],
    ['offset', Number.isInteger(offsetMinutes) && Math.abs(offsetMinutes) < DAY_MINUTES],
  ];
  for (const [field, valid] of checks) {
    if (!valid) {
      return err(new ValidationError(`Date ${field} is out of range`, field));
    }
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) {
    return err(new ValidationError('Date day is out of range', 'day'));
  }

  const local = new Date(0);
  local.setUTCFullYear(year, month - 1, day);
  local.setUTCHours(hour, minute, second, 0);
  return ok(Object.freeze({
    epochMillis: local.getTime() - offsetMinutes * MINUTE_MS,
    offsetMinutes,
  }));
}

/**
 * Offset of an IANA time zone at a given instant, in minutes
 */
export function offsetMinutesAt(epochMillis: number, timeZone: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour12: false,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  });
  const fields: Record<string, number> = {};
  for (const part of formatter.formatToParts(new Date(epochMillis))) {
    if (part.type !== 'literal') {
      fields[part.type] = Number(part.value);
    }
  }
  const asUtc = Date.UTC(
    fields.year,
    fields.month - 1,
    fields.day,
    fields.hour === 24 ? 0 : fields.hour,
    fields.minute,
    fields.second
  );
  const wholeSeconds = Math.floor(epochMillis / 1000) * 1000;
  return Math.round((asUtc - wholeSeconds) / MINUTE_MS);
}

/**
 * Builds a ZonedDateTime for local fields in an IANA time zone
 *
 * @param fields - Local date and time in that zone
 * @param timeZone - IANA zone name such as `Europe/Rome`
 */
export function zonedDateTimeInZone(
  fields: LocalDateTimeFields,
  timeZone: string
): Result<ZonedDateTime> {
  const asUtc = zonedDateTime(fields, 0);
  if (!asUtc.ok) return asUtc;

  // The offset at the guessed instant can differ around DST transitions
  let offset = offsetMinutesAt(asUtc.value.epochMillis, timeZone);
  const corrected = offsetMinutesAt(asUtc.value.epochMillis - offset * MINUTE_MS, timeZone);
  if (corrected !== offset) {
    offset = corrected;
  }
  return zonedDateTime(fields, offset);
}

/**
 * Parses an RFC 1123 date-time
 *
 * @param text - e.g. `Thu, 3 Dec 2020 00:00:00 +0100`
 * @returns The instant together with the offset it was written in
 */
export function decodeDate(text: string): Result<ZonedDateTime> {
  const match = RFC1123_PATTERN.exec(text.trim());
  if (!match) {
    return err(new FormatError('Date is not in RFC 1123 form', text));
  }

  const [, dayName, day, monthName, year, hour, minute, second, zone] = match;
  const month = indexOfName(MONTH_NAMES, monthName) + 1;
  if (month === 0) {
    return err(new FormatError(`Unknown month "${monthName}"`, text));
  }

  let offsetMinutes = 0;
  if (zone !== 'GMT') {
    const hours = Number(zone.substring(1, 3));
    const minutes = Number(zone.substring(3, 5));
    if (minutes > 59) {
      return err(new FormatError(`Invalid offset "${zone}"`, text));
    }
    offsetMinutes = (zone[0] === '-' ? -1 : 1) * (hours * 60 + minutes);
  }

  const value = zonedDateTime({
    year: Number(year),
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: second === undefined ? 0 : Number(second),
  }, offsetMinutes);
  if (!value.ok) {
    return err(new FormatError(value.error.message, text));
  }

  if (dayName !== undefined) {
    const expected = localView(value.value).getUTCDay();
    if (indexOfName(DAY_NAMES, dayName) !== expected) {
      return err(new FormatError(`Day name "${dayName}" does not match the date`, text));
    }
  }

  return value;
}

/**
 * Whether a value has an RFC 1123 rendering: a four-digit year in its own
 * offset, and an offset under a day
 */
export function isEncodableDate(value: ZonedDateTime): boolean {
  if (!Number.isInteger(value.offsetMinutes) || Math.abs(value.offsetMinutes) >= DAY_MINUTES) {
    return false;
  }
  // NaN outside the Date range
  const year = localView(value).getUTCFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * Renders a date-time in RFC 1123 form, in its own offset
 */
export function encodeDate(value: ZonedDateTime): string {
  const local = localView(value);
  const zone = value.offsetMinutes === 0 ? 'GMT' : formatOffset(value.offsetMinutes, '');
  return [
    `${DAY_NAMES[local.getUTCDay()]},`,
    String(local.getUTCDate()),
    MONTH_NAMES[local.getUTCMonth()],
    String(local.getUTCFullYear()),
    `${pad2(local.getUTCHours())}:${pad2(local.getUTCMinutes())}:${pad2(local.getUTCSeconds())}`,
    zone,
  ].join(' ');
}

/**
 * Renders a date-time as ISO 8601 with offset (`2020-12-03T00:00:00+01:00`)
 */
export function formatIsoOffset(value: ZonedDateTime): string {
  const local = localView(value);
  const date = [
    String(local.getUTCFullYear()).padStart(4, '0'),
    pad2(local.getUTCMonth() + 1),
    pad2(local.getUTCDate()),
  ].join('-');
  const time = `${pad2(local.getUTCHours())}:${pad2(local.getUTCMinutes())}:${pad2(local.getUTCSeconds())}`;
  const zone = value.offsetMinutes === 0 ? 'Z' : formatOffset(value.offsetMinutes, ':');
  return `${date}T${time}${zone}`;
}

/**
 * English weekday name in the value's own offset
 */
export function dayOfWeek(value: ZonedDateTime): string {
  return FULL_DAY_NAMES[localView(value).getUTCDay()];
}

/**
 * Chronological order; equal instants order by offset
 */
export function compareZonedDateTimes(a: ZonedDateTime, b: ZonedDateTime): number {
  if (a.epochMillis !== b.epochMillis) {
    return a.epochMillis < b.epochMillis ? -1 : 1;
  }
  return Math.sign(a.offsetMinutes - b.offsetMinutes);
}

/**
 * Drops the sub-second part, which the wire form cannot carry
 */
export function truncateToSeconds(value: ZonedDateTime): ZonedDateTime {
  return Object.freeze({
    epochMillis: Math.floor(value.epochMillis / 1000) * 1000,
    offsetMinutes: value.offsetMinutes,
  });
}

/**
 * The current instant, written in the given time zone
 */
export function nowInZone(timeZone: string): ZonedDateTime {
  const epochMillis = Math.floor(Date.now() / 1000) * 1000;
  return Object.freeze({ epochMillis, offsetMinutes: offsetMinutesAt(epochMillis, timeZone) });
}
