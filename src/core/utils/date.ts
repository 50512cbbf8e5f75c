/**
 * Date formatting utilities
 */

const DAY_MS = 86_400_000;

interface ZonedParts {
  y: string;
  m: string;
  d: string;
  hh: string;
  mm: string;
  ss: string;
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  const dtf = new Intl.DateTimeFormat("sv-SE", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  });
  const parts = dtf.formatToParts(date);
  const get = (t: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === t)?.value || "00";
  return {
    y: get("year"),
    m: get("month"),
    d: get("day"),
    hh: get("hour"),
    mm: get("minute"),
    ss: get("second"),
  };
}

/** Format ISO med tidszon (Europe/Stockholm), ex: 2025-09-02T10:42:05+02:00 */
export function formatZonedISO(
  date: Date,
  timeZone = "Europe/Stockholm",
): string {
  const { y, m, d, hh, mm, ss } = zonedParts(date, timeZone);

  // väggklockan tolkad som UTC minus det faktiska ögonblicket = offset
  const utc = Date.UTC(+y, +m - 1, +d, +hh, +mm, +ss);
  const offsetMin = Math.round((utc - date.getTime()) / 60000);
  const sign = offsetMin >= 0 ? "+" : "-";
  const abs = Math.abs(offsetMin);
  const offH = String(Math.floor(abs / 60)).padStart(2, "0");
  const offM = String(abs % 60).padStart(2, "0");

  return `${y}-${m}-${d}T${hh}:${mm}:${ss}${sign}${offH}:${offM}`;
}

/** Kalenderdatum i tidszonen, ex: 2025-09-02 */
export function toDateKey(date: Date, timeZone = "Europe/Stockholm"): string {
  const { y, m, d } = zonedParts(date, timeZone);
  return `${y}-${m}-${d}`;
}

/** Tidsstämpel för rapportens sidfot, ex: 2025-09-02 kl 10:42 */
export function formatReportTimestamp(
  date: Date,
  timeZone = "Europe/Stockholm",
): string {
  const { y, m, d, hh, mm } = zonedParts(date, timeZone);
  return `${y}-${m}-${d} kl ${hh}:${mm}`;
}

/**
 * ISO-8601 week number and week-year of a calendar date
 * @param year - Full year
 * @param month - Month, 1-12
 * @param day - Day of month
 */
export function isoWeek(
  year: number,
  month: number,
  day: number,
): { week: number; year: number } {
  const d = new Date(Date.UTC(year, month - 1, day));
  const weekday = d.getUTCDay() || 7;
  // torsdagen i samma vecka avgör vilket år veckan tillhör
  d.setUTCDate(d.getUTCDate() + 4 - weekday);
  const weekYear = d.getUTCFullYear();
  const yearStart = Date.UTC(weekYear, 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / DAY_MS + 1) / 7);
  return { week, year: weekYear };
}

const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Checks that a string is a real YYYY-MM-DD calendar date
 */
export function isDateKey(value: string): boolean {
  const m = DATE_KEY_RE.exec(value);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(y, mo - 1, d));
  return (
    date.getUTCFullYear() === y &&
    date.getUTCMonth() === mo - 1 &&
    date.getUTCDate() === d
  );
}

/**
 * Moves a YYYY-MM-DD date back by whole calendar months.
 * The day is clamped to the end of a shorter target month.
 * @returns The shifted date as YYYY-MM-DD
 */
export function subtractMonths(dateKey: string, months: number): string {
  const m = DATE_KEY_RE.exec(dateKey);
  if (!m) throw new RangeError(`Not a YYYY-MM-DD date: ${dateKey}`);
  const total = Number(m[1]) * 12 + (Number(m[2]) - 1) - months;
  const year = Math.floor(total / 12);
  const month = total - year * 12 + 1;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  const day = Math.min(Number(m[3]), lastDay);
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/**
 * Formats a duration in seconds to a human-readable string
 * @param sec - Duration in seconds
 * @returns Formatted duration string (e.g., "1h30m45s")
 */
export function formatDuration(sec: number): string {
  const s = Math.max(0, Math.floor(sec));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  return (h ? `${h}h` : "") + (h || m ? `${m}m` : "") + `${ss}s`;
}
