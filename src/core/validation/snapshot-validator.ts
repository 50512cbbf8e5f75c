/**
 * Snapshot validation utilities
 */

import { PRICE_CATEGORIES } from "../constants/index";
import type {
  MenuRecord,
  MenuSnapshot,
  PriceCategory,
  PriceMap,
  PriceRecord,
  PriceSnapshot,
} from "../types/index";
import { isDateKey } from "../utils/date";

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

export const isPriceCategory = (v: string): v is PriceCategory =>
  PRICE_CATEGORIES.some((c) => c === v);

export const weekLabel = (week: number): string => `Vecka ${week}`;

function requireWeek(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, field);
  }
  if (value < 1 || value > 53) {
    throw new ValidationError(`${field} must be between 1 and 53`, field);
  }
  return value;
}

function requireYear(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer`, field);
  }
  return value;
}

function requireTimestamp(value: unknown, field: string): string {
  if (typeof value !== "string" || Number.isNaN(Date.parse(value))) {
    throw new ValidationError(`${field} must be an ISO-8601 timestamp`, field);
  }
  return value;
}

function requireItems(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array of strings`, field);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      throw new ValidationError(`${field} must be an array of strings`, field);
    }
    items.push(item);
  }
  return items;
}

function requireDate(value: unknown, field: string): string {
  if (typeof value !== "string" || !isDateKey(value)) {
    throw new ValidationError(`${field} must be a YYYY-MM-DD date`, field);
  }
  return value;
}

/**
 * Validates a category → amount mapping
 * @throws ValidationError on unknown categories or non-integer amounts
 */
export function validatePriceMap(value: unknown, field = "prices"): PriceMap {
  if (!isRecord(value)) {
    throw new ValidationError(`${field} must be an object`, field);
  }
  const prices: PriceMap = {};
  for (const [category, amount] of Object.entries(value)) {
    if (!isPriceCategory(category)) {
      throw new ValidationError(`Unknown price category '${category}'`, field);
    }
    if (typeof amount !== "number" || !Number.isInteger(amount) || amount < 0) {
      throw new ValidationError(
        `Price for '${category}' must be a non-negative integer`,
        field,
      );
    }
    prices[category] = amount;
  }
  return prices;
}

/**
 * Validates one persisted menu_history.json element
 * @param record - The parsed JSON value
 * @returns The menu snapshot it describes
 * @throws ValidationError if a required field is missing or has the wrong type
 */
export function validateMenuRecord(record: unknown): MenuSnapshot {
  if (!isRecord(record)) {
    throw new ValidationError("Menu record must be an object");
  }

  const week = requireWeek(record.week, "week");
  const year = requireYear(record.year, "year");

  if (typeof record.week_number !== "string") {
    throw new ValidationError("week_number must be a string", "week_number");
  }

  return {
    week,
    year,
    weekLabel: record.week_number,
    items: requireItems(record.items, "items"),
    scrapedAt: requireTimestamp(record.scraped_at, "scraped_at"),
    updatedAt: requireTimestamp(record.updated_at, "updated_at"),
  };
}

/**
 * Validates one persisted price_history.json element
 */
export function validatePriceRecord(record: unknown): PriceSnapshot {
  if (!isRecord(record)) {
    throw new ValidationError("Price record must be an object");
  }
  return {
    date: requireDate(record.date, "date"),
    prices: validatePriceMap(record.prices),
  };
}

export function toMenuRecord(s: MenuSnapshot): MenuRecord {
  return {
    week: s.week,
    year: s.year,
    week_number: s.weekLabel,
    items: [...s.items],
    scraped_at: s.scrapedAt,
    updated_at: s.updatedAt,
  };
}

export function toPriceRecord(s: PriceSnapshot): PriceRecord {
  return { date: s.date, prices: { ...s.prices } };
}

/**
 * Builds a menu snapshot for a fresh capture.
 * An empty item list is valid; the caller decides whether to warn.
 */
export function createMenuSnapshot(input: {
  week: number;
  year: number;
  items: readonly string[];
  at: string;
}): MenuSnapshot {
  const week = requireWeek(input.week, "week");
  return {
    week,
    year: requireYear(input.year, "year"),
    weekLabel: weekLabel(week),
    items: requireItems([...input.items], "items"),
    scrapedAt: requireTimestamp(input.at, "at"),
    updatedAt: input.at,
  };
}

/**
 * Builds a price snapshot for a fresh capture
 */
export function createPriceSnapshot(input: {
  date: string;
  prices: PriceMap;
}): PriceSnapshot {
  return {
    date: requireDate(input.date, "date"),
    prices: validatePriceMap(input.prices),
  };
}
