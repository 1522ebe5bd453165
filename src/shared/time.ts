/**
 * Local wall-clock formatting helpers.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYY-MM-DD HH:MM` in the local time zone.
 */
export function formatLocalDateTime(epochMs: number): string {
  const d = new Date(epochMs);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

/**
 * `YYYY-MM-DD HH:MM:SS` in the local time zone.
 */
export function formatLocalTimestamp(epochMs: number): string {
  const d = new Date(epochMs);
  return `${formatLocalDateTime(epochMs)}:${pad(d.getSeconds())}`;
}

/**
 * Local UTC offset at the given instant, e.g. `+01:00`.
 */
export function formatUtcOffset(epochMs: number): string {
  const offsetMinutes = -new Date(epochMs).getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

export function formatWeekday(epochMs: number, locale: string): string {
  return new Date(epochMs).toLocaleDateString(locale, { weekday: 'long' });
}
