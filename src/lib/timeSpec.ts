// src/lib/timeSpec.ts
export type TimeSpec = {
  start: string;     // YYYY-MM-DDTHH:MM:SSZ
  end: string;
  interval: string;  // ISO-8601 duration, e.g. PT1H
};

const HOUR_MS = 60 * 60 * 1000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatUtcTimestamp(d: Date): string {
  const y = pad(d.getUTCFullYear(), 4);
  const m = pad(d.getUTCMonth() + 1);
  const dd = pad(d.getUTCDate());
  return `${y}-${m}-${dd}T${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}Z`;
}

/** Compact form used in artifact file names: YYYYMMDDTHHMMSSZ */
export function formatUtcLabel(d: Date): string {
  return formatUtcTimestamp(d).replace(/[-:]/g, "");
}

export function generateTimeSpec(hours: number, interval: string, now: Date = new Date()): TimeSpec {
  const start = new Date(now.getTime());
  start.setUTCMinutes(0, 0, 0);
  const end = new Date(start.getTime() + hours * HOUR_MS);
  return { start: formatUtcTimestamp(start), end: formatUtcTimestamp(end), interval };
}

export function explicitTimeSpec(start: string, end: string, interval: string): TimeSpec {
  return { start, end, interval };
}

export function timeSegment(t: TimeSpec): string {
  return `${t.start}--${t.end}:${t.interval}`;
}
