/**
 * Local-time timestamps.
 *
 * Rows store `YYYY-MM-DDTHH:mm:ss.SSS` without an offset so SQLite's
 * date()/strftime() group by the host's local day and hour.
 */

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

export function localTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}`
  );
}

/** Local calendar day, `YYYY-MM-DD`. */
export function localDay(date: Date = new Date()): string {
  return localTimestamp(date).slice(0, 10);
}

/** Offset-less ISO strings parse as local time. */
export function parseTimestamp(value: string): Date {
  return new Date(value);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
