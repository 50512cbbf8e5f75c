/**
 * Menu and price snapshot types
 */

import type { PRICE_CATEGORIES } from "../constants/index";

/** En av de fyra priskategorierna på lunchsidan */
export type PriceCategory = (typeof PRICE_CATEGORIES)[number];

/** Kategori → belopp i hela kronor. Saknad kategori utelämnas, aldrig 0. */
export type PriceMap = Partial<Record<PriceCategory, number>>;

/** En rätt som den står på sidan */
export interface MenuItem {
  day: string; // rubriktext, ex "MÅNDAG 24/11"
  name: string;
}

/** En veckas meny (nyckel: week + year) */
export interface MenuSnapshot {
  week: number;
  year: number;
  weekLabel: string; // ex "Vecka 48"
  items: string[];
  scrapedAt: string; // ISO med tz, första fångsten
  updatedAt: string; // ISO med tz, senaste fångsten
}

/** En dags priser (nyckel: date) */
export interface PriceSnapshot {
  date: string; // YYYY-MM-DD
  prices: PriceMap;
}

/** Persisted shape of one menu_history.json element */
export interface MenuRecord {
  week: number;
  year: number;
  week_number: string;
  items: string[];
  scraped_at: string;
  updated_at: string;
}

/** Persisted shape of one price_history.json element */
export interface PriceRecord {
  date: string;
  prices: PriceMap;
}

/** Week number and year as read off the page */
export interface WeekInfo {
  week: number;
  year: number;
  weekLabel: string;
}
