import { TimestampError } from './errors.js';

const WIRE_FORMAT = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;
const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

// Proleptic Gregorian, every four-digit year including 0000-0099.
function daysInMonth(year: number, month: number): number {
  const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
  return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
}

/**
 * Convert an EDDN timestamp (`yyyy-mm-ddThh:mm:ssZ`) to the
 * `yyyy-mm-dd hh:mm:ss` form TradeDangerous stores in `modified`.
 * The clock value is kept as-is; no timezone shift is applied.
 */
export function normalizeTimestamp(wire: unknown): string {
  if (typeof wire !== 'string') throw new TimestampError(wire);
  const m = WIRE_FORMAT.exec(wire);
  if (!m) throw new TimestampError(wire);
  const [, y, mo, d, h, mi, s] = m;
  const year = Number(y), month = Number(mo), day = Number(d);
  const hour = Number(h), minute = Number(mi), second = Number(s);

  if (
    month < 1 || month > 12 ||
    day < 1 || day > daysInMonth(year, month) ||
    hour > 23 || minute > 59 || second > 59
  ) {
    throw new TimestampError(wire);
  }
  return `${y}-${mo}-${d} ${h}:${mi}:${s}`;
}
