/**
 * Wall-Clock Time
 *
 * The history file and the repository service's stop times are compared as
 * naive wall-clock date-times: no offset is stored, and elapsed time is the
 * plain difference of the calendar fields. A wall-clock value is encoded as
 * the number of milliseconds `Date.UTC()` yields for those fields, so that
 * arithmetic and formatting never consult the host time zone again.
 *
 * Which zone the fields are read in when converting a real instant is an
 * explicit {@link TimeBasis}. With `local`, two values straddling a daylight
 * saving transition are an hour off from the true elapsed time.
 *
 * @module time/wallClock
 */

// ─── Types ───────────────────────────────────────────────────────────────────

/** Zone in which real instants are read as wall-clock fields. */
export type TimeBasis = 'local' | 'utc';

/** Naive date-time encoded as `Date.UTC(fields)` milliseconds. */
export type WallClock = number;

// ─── Constants ───────────────────────────────────────────────────────────────

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/** Length of a `YYYY-MM-DD HH:MM` minute string. */
export const MINUTE_STRING_LENGTH = 16;

const WALL_CLOCK_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})(?::(\d{2}))?$/;

// ─── Conversion ──────────────────────────────────────────────────────────────

/** Read an instant (epoch milliseconds) as wall-clock fields in the given basis. */
export function toWallClock(epochMs: number, basis: TimeBasis): WallClock {
  if (basis === 'utc') return epochMs;
  const d = new Date(epochMs);
  return Date.UTC(
    d.getFullYear(),
    d.getMonth(),
    d.getDate(),
    d.getHours(),
    d.getMinutes(),
    d.getSeconds(),
    d.getMilliseconds(),
  );
}

/** Drop seconds and milliseconds. */
export function truncateToMinute(value: WallClock): WallClock {
  return value - (((value % MS_PER_MINUTE) + MS_PER_MINUTE) % MS_PER_MINUTE);
}

// ─── Formatting ──────────────────────────────────────────────────────────────

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** Format as `YYYY-MM-DD HH:MM`. */
export function formatWallClockMinute(value: WallClock): string {
  const d = new Date(value);
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`
  );
}

/** Format as `YYYY-MM-DD HH:MM:SS`. */
export function formatWallClockSeconds(value: WallClock): string {
  return `${formatWallClockMinute(value)}:${pad(new Date(value).getUTCSeconds())}`;
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Parse `YYYY-MM-DD HH:MM[:SS]` into a wall-clock value.
 * Returns null for anything else, including out-of-range fields such as
 * `2026-02-30`.
 */
export function parseWallClock(text: string): WallClock | null {
  const match = WALL_CLOCK_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s] = match;
  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = s === undefined ? 0 : Number(s);

  const value = Date.UTC(year, month, day, hour, minute, second);
  const check = new Date(value);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }
  return value;
}

/**
 * Convert an ISO-8601 instant (as reported by the repository service, usually
 * with a trailing `Z`) into a `YYYY-MM-DD HH:MM` string in the given basis.
 * Returns null when the input is missing or unparsable.
 */
export function isoToWallClockMinute(
  iso: string | null | undefined,
  basis: TimeBasis,
): string | null {
  if (!iso) return null;
  const epochMs = Date.parse(iso);
  if (Number.isNaN(epochMs)) return null;
  return formatWallClockMinute(truncateToMinute(toWallClock(epochMs, basis)));
}
