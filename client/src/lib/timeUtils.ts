/**
 * Time utilities for dashboard date inputs and Synoptic timestamps.
 *
 * Date inputs are UTC-naive: the wall-clock fields are used as written and
 * never shifted between timezones.
 */

export type DateParts = {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
};

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
// Accept picker values ("YYYY-MM-DD"), local date-times ("YYYY-MM-DDTHH:mm") and ISO UTC ("...:ss(.sss)Z").
const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d{1,3})?(?:Z)?$/;
// Synoptic date_time entries: ISO 8601 with "Z", "+hh:mm" or "+hhmm".
const OBSERVATION_TIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

function buildDateParts(
  year: number,
  month: number,
  day: number,
  hour?: number,
  minute?: number
): DateParts | null {
  if (!Number.isFinite(year) || !Number.isFinite(month) || !Number.isFinite(day)) return null;
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (!isCalendarDate(year, month, day)) return null;
  if (hour !== undefined && (hour < 0 || hour > 23)) return null;
  if (minute !== undefined && (minute < 0 || minute > 59)) return null;

  return {
    year,
    month,
    day,
    hour,
    minute
  };
}

export function parseDate(value: string): DateParts | null {
  const match = DATE_RE.exec(value);
  if (!match) return null;
  const [year, month, day] = match.slice(1).map(Number);
  return buildDateParts(year, month, day);
}

export function parseDateTime(value: string): DateParts | null {
  const match = DATETIME_RE.exec(value);
  if (!match) return null;
  const [year, month, day, hour, minute] = match.slice(1, 6).map(Number);
  return buildDateParts(year, month, day, hour, minute);
}

/**
 * Resolve a date input (string or Date) to its wall-clock parts.
 * A Date contributes its local wall-clock fields.
 */
export function parseDateInput(value: Date | string): DateParts | null {
  if (value instanceof Date) {
    if (!Number.isFinite(value.getTime())) return null;
    return {
      year: value.getFullYear(),
      month: value.getMonth() + 1,
      day: value.getDate(),
      hour: value.getHours(),
      minute: value.getMinutes()
    };
  }
  const trimmed = value.trim();
  return parseDateTime(trimmed) || parseDate(trimmed);
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatDateKey(parts: DateParts): string {
  return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

/** "YYYYMMDDhhmm" as the timeseries endpoint expects; a bare date is midnight. */
export function formatSynopticTimestamp(parts: DateParts): string {
  return `${parts.year}${pad2(parts.month)}${pad2(parts.day)}${pad2(parts.hour ?? 0)}${pad2(parts.minute ?? 0)}`;
}

function parseOffsetMinutes(offset: string | undefined): number {
  if (!offset || offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

/**
 * Parse one entry of an OBSERVATIONS.date_time array to epoch ms.
 * Returns null for anything that is not a valid ISO 8601 timestamp;
 * a timestamp without an offset is read as UTC.
 */
export function parseObservationTime(value: unknown): number | null {
  if (typeof value !== 'string') return null;
  const match = OBSERVATION_TIME_RE.exec(value.trim());
  if (!match) return null;

  const [year, month, day, hour, minute] = match.slice(1, 6).map(Number);
  const second = match[6] === undefined ? 0 : Number(match[6]);
  if (!buildDateParts(year, month, day, hour, minute) || second > 59) return null;

  const utcMs = Date.UTC(year, month - 1, day, hour, minute, second);
  return utcMs - parseOffsetMinutes(match[7]) * 60_000;
}

/** Table rendering of an epoch-ms timestamp: "YYYY-MM-DD HH:mm:ss" in UTC. */
export function formatTableTime(ms: number): string {
  const date = new Date(ms);
  const datePart = formatDateKey({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate()
  });
  return `${datePart} ${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
}

/** Short axis label: "MM-DD HH:mm" in UTC. */
export function formatAxisTime(ms: number): string {
  const date = new Date(ms);
  return `${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} ${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`;
}

/** Value for an `<input type="date">` control; empty when the input is unusable. */
export function toDateInputValue(value: Date | string | null): string {
  if (value === null) return '';
  const parts = parseDateInput(value);
  return parts ? formatDateKey(parts) : '';
}
