/**
 * Capture-over-capture price comparison and chart series
 */

import { PRICE_CATEGORIES } from "../constants/index";
import type { PriceCategory, PriceSnapshot } from "../types/index";

export type PriceDirection = "up" | "down" | "unchanged";

export interface PriceChange {
  category: PriceCategory;
  current: number;
  /** null when the category had no earlier price */
  previous: number | null;
  delta: number | null;
  percent: number | null;
  direction: PriceDirection | null;
}

export interface PriceDiff {
  date: string;
  previousDate: string | null;
  changes: PriceChange[];
}

export interface PriceSeries {
  labels: string[];
  datasets: { category: PriceCategory; data: (number | null)[] }[];
}

const round1 = (n: number): number => Math.round(n * 10) / 10;

/**
 * Compares two price captures category by category, in display order.
 * Categories missing from the current capture are left out; a category
 * without an earlier price is reported with no delta.
 */
export function comparePrices(
  current: PriceSnapshot,
  previous?: PriceSnapshot,
): PriceDiff {
  const changes: PriceChange[] = [];

  for (const category of PRICE_CATEGORIES) {
    const now = current.prices[category];
    if (now === undefined) continue;

    const before = previous?.prices[category];
    if (before === undefined) {
      changes.push({
        category,
        current: now,
        previous: null,
        delta: null,
        percent: null,
        direction: null,
      });
      continue;
    }

    const delta = now - before;
    changes.push({
      category,
      current: now,
      previous: before,
      delta,
      percent: before === 0 ? null : round1((delta / before) * 100),
      direction: delta > 0 ? "up" : delta < 0 ? "down" : "unchanged",
    });
  }

  return {
    date: current.date,
    previousDate: previous?.date ?? null,
    changes,
  };
}

/** Changes with an actual price movement */
export const movedPrices = (diff: PriceDiff): PriceChange[] =>
  diff.changes.filter((c) => c.delta !== null && c.delta !== 0);

/**
 * Newest capture against the oldest one still retained.
 * @returns undefined with fewer than two captures
 */
export function priceTrend(history: readonly PriceSnapshot[]): PriceDiff | undefined {
  const oldest = history[0];
  const newest = history.at(-1);
  if (history.length < 2 || !oldest || !newest) return undefined;
  return comparePrices(newest, oldest);
}

/**
 * Chart series over the whole history. A capture without a category
 * yields null for that point, never 0.
 */
export function buildPriceSeries(history: readonly PriceSnapshot[]): PriceSeries {
  const present = PRICE_CATEGORIES.filter((c) =>
    history.some((s) => s.prices[c] !== undefined),
  );
  return {
    labels: history.map((s) => s.date),
    datasets: present.map((category) => ({
      category,
      data: history.map((s) => s.prices[category] ?? null),
    })),
  };
}
