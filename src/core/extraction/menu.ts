/**
 * Menu extraction from lunch page HTML
 */

import { load, type CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import { WEEKDAYS } from "../constants/index";
import { ExtractionError } from "../errors";
import type { MenuItem, MenuSource, WeekInfo } from "../types/index";
import { groupBy } from "../utils/array";
import { isoWeek, toDateKey } from "../utils/date";
import { weekLabel } from "../validation/index";

const WEEK_RE = /[Vv]ecka\s*(\d+)/;
const DAY_DATE_RE = /(\d{1,2})\/(\d{1,2})/;

/** Collapses whitespace; <br> counts as a space */
export function elementText($: CheerioAPI, el: AnyNode): string {
  const $el = $(el).clone();
  $el.find("br").replaceWith(" ");
  return $el.text().normalize("NFC").replace(/\s+/g, " ").trim();
}

/**
 * Extracts the week's dishes in page order.
 * Each day heading owns the paragraphs that follow it, up to the next
 * heading or the price block. Repeated (day, dish) pairs are dropped.
 */
export function extractMenu(html: string, source: MenuSource): MenuItem[] {
  const $ = load(html);
  const sel = source.selectors;
  const items: MenuItem[] = [];
  const seen = new Set<string>();

  for (const heading of $(sel.dayHeading).toArray()) {
    const day = elementText($, heading);
    if (!day) continue;

    for (const el of $(heading).nextAll().toArray()) {
      const $el = $(el);
      if ($el.is("h3") || $el.is(sel.menuEnd)) break;
      if (!$el.is("p") || $el.hasClass(sel.skipClass)) continue;

      const name = elementText($, el);
      if (name.length < source.minItemLength) continue;

      const key = `${day}\n${name}`;
      if (seen.has(key)) continue;
      seen.add(key);
      items.push({ day, name });
    }
  }

  return items;
}

function parseDayDate(day: string): { day: number; month: number } | null {
  const m = DAY_DATE_RE.exec(day);
  if (!m) return null;
  const d = Number(m[1]);
  const month = Number(m[2]);
  if (d < 1 || d > 31 || month < 1 || month > 12) return null;
  return { day: d, month };
}

/**
 * Reads the week number from the page, or derives it from the first
 * day heading's d/m date. The year follows the run date, moved by one
 * when the page and the run sit on opposite sides of New Year.
 * @throws ExtractionError when neither source gives a week
 */
export function extractWeek(
  html: string,
  items: readonly MenuItem[],
  source: MenuSource,
  now: Date,
  timeZone = "Europe/Stockholm",
): WeekInfo {
  const $ = load(html);
  const [runYear, runMonth] = toDateKey(now, timeZone).split("-").map(Number);

  let pageWeek: number | null = null;
  for (const el of $(source.selectors.weekCandidates).toArray()) {
    const m = WEEK_RE.exec($(el).text());
    if (!m) continue;
    const w = Number(m[1]);
    if (w >= 1 && w <= 53) {
      pageWeek = w;
      break;
    }
  }

  const firstDay = items[0] ? parseDayDate(items[0].day) : null;

  if (firstDay) {
    let year = runYear;
    if (firstDay.month === 12 && runMonth === 1) year -= 1;
    if (firstDay.month === 1 && runMonth === 12) year += 1;
    const iso = isoWeek(year, firstDay.month, firstDay.day);
    const week = pageWeek ?? iso.week;
    return { week, year: iso.year, weekLabel: weekLabel(week) };
  }

  if (pageWeek !== null) {
    let year = runYear;
    if (pageWeek >= 52 && runMonth === 1) year -= 1;
    if (pageWeek === 1 && runMonth === 12) year += 1;
    return { week: pageWeek, year, weekLabel: weekLabel(pageWeek) };
  }

  throw new ExtractionError(
    "Could not determine the week number from the page",
    "No 'Vecka N' text and no d/m date in the day headings",
  );
}

/**
 * Position of a day heading's weekday name, Monday first; unknown last
 */
export function weekdayIndex(day: string): number {
  const name = day.trim().split(/\s+/)[0]?.toLowerCase() ?? "";
  const idx = WEEKDAYS.findIndex((w) => w === name);
  return idx >= 0 ? idx : WEEKDAYS.length;
}

/**
 * Day headings in weekday order (stable for unknown days)
 */
export function sortDays(days: readonly string[]): string[] {
  return [...days].sort((a, b) => weekdayIndex(a) - weekdayIndex(b));
}

/**
 * Dishes grouped per day, days in weekday order
 */
export function groupByDay(items: readonly MenuItem[]): Map<string, string[]> {
  const groups = groupBy(items, (i) => i.day);
  const sorted = new Map<string, string[]>();
  for (const day of sortDays([...groups.keys()])) {
    sorted.set(day, (groups.get(day) ?? []).map((i) => i.name));
  }
  return sorted;
}
