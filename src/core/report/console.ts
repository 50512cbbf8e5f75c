/**
 * Run summary through the logger
 */

import { movedPrices, type MenuDiff, type PriceDiff } from "../compare/index";
import { PRICE_CATEGORIES, REPORT_CONSTANTS } from "../constants/index";
import type { PriceMap, WeekInfo } from "../types/index";
import { Logger } from "../utils/logger";
import { arrow, describeChange } from "./format";

export interface SummaryInput {
  week: WeekInfo;
  days: ReadonlyMap<string, readonly string[]>;
  prices: PriceMap;
  menuDiff: MenuDiff;
  priceDiff?: PriceDiff;
  trend?: PriceDiff;
}

/** First n entries, plus "... och N till" when more were left out */
export function truncateList(items: readonly string[], max: number): string[] {
  if (items.length <= max) return [...items];
  return [...items.slice(0, max), `... och ${items.length - max} till`];
}

/**
 * Builds the summary lines; kept apart from logging so they can be tested
 */
export function summaryLines(input: SummaryInput): string[] {
  const lines: string[] = [`Lunchmeny ${input.week.weekLabel} (${input.week.year})`];
  const max = REPORT_CONSTANTS.SUMMARY_MAX_DISHES;

  for (const [day, dishes] of input.days) {
    lines.push(`${day}:`);
    for (const dish of dishes) lines.push(`  • ${dish}`);
  }

  const priced = PRICE_CATEGORIES.filter((c) => input.prices[c] !== undefined);
  if (priced.length > 0) {
    lines.push("Priser:");
    for (const c of priced) lines.push(`  ${c}: ${input.prices[c]} kr`);
  }

  const moved = input.priceDiff ? movedPrices(input.priceDiff) : [];
  if (moved.length > 0) {
    lines.push("Prisändringar:");
    for (const c of moved) {
      lines.push(`  ${arrow(c.delta ?? 0)} ${c.category}: ${c.previous} → ${c.current} kr`);
    }
  }

  const trend = input.trend;
  const drift = trend ? movedPrices(trend) : [];
  if (trend?.previousDate && drift.length > 0) {
    lines.push(`Prisutveckling sedan ${trend.previousDate}:`);
    for (const c of drift) lines.push(`  ${c.category}: ${describeChange(c)}`);
  }

  const diff = input.menuDiff;
  if (!diff.hasBaseline) {
    lines.push("Ingen tidigare vecka att jämföra med");
  } else if (diff.newDishes.length === 0 && diff.removedDishes.length === 0) {
    lines.push("Samma rätter som förra veckan");
  } else {
    if (diff.newDishes.length > 0) {
      lines.push(`Nya rätter (${diff.newDishes.length}):`);
      for (const d of truncateList(diff.newDishes, max)) lines.push(`  + ${d}`);
    }
    if (diff.removedDishes.length > 0) {
      lines.push(`Borttagna rätter (${diff.removedDishes.length}):`);
      for (const d of truncateList(diff.removedDishes, max)) lines.push(`  - ${d}`);
    }
  }

  return lines;
}

export function printSummary(input: SummaryInput): void {
  for (const line of summaryLines(input)) Logger.info(line);
}
