/**
 * Time formatting utilities.
 *
 * - formatDurationSeconds: fixed three-decimal seconds for the results CSV
 * - formatLocalTimestamp: ISO-8601 local time with UTC offset
 */

/** Simulated seconds covered by a number of fixed ticks. */
export function ticksToSeconds(ticks: number, fps: number): number {
  return ticks / fps;
}

/** e.g. 12.3456 -> "12.346" */
export function formatDurationSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local wall time with offset, e.g. "2026-10-19T14:03:05.123+02:00". */
export function formatLocalTimestamp(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const abs = Math.abs(offsetMinutes);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}
