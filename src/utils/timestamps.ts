/**
 * ISO-8601-like timestamp handling. Session files write UTC instants such as
 * `2026-02-19T08:37:11.936Z`; anything that does not look like that is
 * treated as absent rather than guessed at.
 */

const ISO_LIKE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

/** Parse a timestamp field. Non-strings, empty strings and malformed values yield undefined. */
export function parseTimestamp(value: unknown): Date | undefined {
  if (typeof value !== 'string' || !value) return undefined;

  const m = ISO_LIKE.exec(value.trim());
  if (!m) return undefined;

  const [, year, month, day, hour, minute, second, fraction, zone] = m;
  if (Number(month) < 1 || Number(month) > 12 || Number(day) < 1 || Number(day) > 31) return undefined;
  if (hour !== undefined && (Number(hour) > 23 || Number(minute) > 59)) return undefined;
  if (second !== undefined && Number(second) > 59) return undefined;

  // Date.UTC would read years 0-99 as 19xx; an ISO string keeps them as written.
  const time = `${hour ?? '00'}:${minute ?? '00'}:${second ?? '00'}.${(fraction ?? '').slice(0, 3).padEnd(3, '0')}`;
  const date = new Date(`${year}-${month}-${day}T${time}${normalizeZone(zone)}`);
  if (isNaN(date.getTime())) return undefined;

  // Reject roll-over dates such as 2026-02-31.
  const calendar = new Date(`${year}-${month}-${day}T00:00:00Z`);
  if (calendar.getUTCDate() !== Number(day) || calendar.getUTCMonth() !== Number(month) - 1) return undefined;

  return date;
}

function normalizeZone(zone: string | undefined): string {
  if (!zone || zone.toUpperCase() === 'Z') return 'Z';
  const digits = zone.slice(1).replace(':', '');
  return `${zone[0]}${digits.slice(0, 2)}:${digits.slice(2, 4)}`;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

export function sameInstant(a: Date, b: Date): boolean {
  return a.getTime() === b.getTime();
}
