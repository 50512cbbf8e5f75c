/**
 * Application constants
 */

// History constants
export const HISTORY_CONSTANTS = {
  MAX_MENU_WEEKS: 12,
  PRICE_RETENTION_MONTHS: 6,
  MENU_HISTORY_FILE: "menu_history.json",
  PRICE_HISTORY_FILE: "price_history.json",
} as const;

// Price categories, in display order
export const PRICE_CATEGORIES = [
  "Lunchbuffé",
  "Tidig lunch",
  "Pensionärspris",
  "Take away",
] as const;

// Swedish weekdays, Monday first
export const WEEKDAYS = [
  "måndag",
  "tisdag",
  "onsdag",
  "torsdag",
  "fredag",
  "lördag",
  "söndag",
] as const;

// Browser constants
export const BROWSER_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  DEFAULT_TIMEOUT_MS: 30000,
  READY_TIMEOUT_MS: 10000,
} as const;

// Report constants
export const REPORT_CONSTANTS = {
  CHART_COLORS: ["#e53e3e", "#3182ce", "#38a169", "#d69e2e"],
  TABLE_CAPTURES: 5,
  SUMMARY_MAX_DISHES: 5,
  CHART_JS_URL: "https://cdn.jsdelivr.net/npm/chart.js@4.4.6/dist/chart.umd.min.js",
} as const;
