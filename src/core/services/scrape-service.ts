/**
 * Scrape Service - one complete run: fetch, extract, record, compare, report
 * Used by the CLI; takes a resolved ScraperConfig so tests can drive it directly
 */

import { registry } from "../../sites/registry";
import { fetchMenuPage } from "../browser/index";
import {
  compareMenus,
  comparePrices,
  priceTrend,
  type MenuDiff,
  type PriceDiff,
} from "../compare/index";
import { AppConfig } from "../config/index";
import { ConfigError } from "../errors";
import {
  extractMenu,
  extractPrices,
  extractWeek,
  groupByDay,
} from "../extraction/index";
import { MenuHistoryStore, PriceHistoryStore, menuKey } from "../history/index";
import {
  exportItems,
  printSummary,
  renderReport,
  writeReport,
} from "../report/index";
import type {
  MenuItem,
  MenuSnapshot,
  MenuSource,
  PriceSnapshot,
  ScraperConfig,
} from "../types/index";
import { formatDuration, formatZonedISO, toDateKey } from "../utils/date";
import { Logger } from "../utils/logger";
import { createMenuSnapshot, createPriceSnapshot } from "../validation/index";

export interface ScrapeOptions {
  /** Clock for the run (default: now) */
  now?: Date;
  /** Adapter to use instead of the one named by config.sourceKey */
  source?: MenuSource;
}

export interface ScrapeResult {
  menu: MenuSnapshot;
  items: MenuItem[];
  /** Undefined when the page carried no prices */
  prices?: PriceSnapshot;
  menuDiff: MenuDiff;
  priceDiff?: PriceDiff;
  trend?: PriceDiff;
  reportPath: string | null;
  exportPath: string | null;
  /** Operator-facing warnings raised during the run */
  warnings: string[];
}

/**
 * Looks up the adapter for a source key
 * @throws ConfigError for unknown keys
 */
export function resolveSource(key: string): MenuSource {
  const source = registry.get(key);
  if (!source) {
    throw new ConfigError(
      `Unknown menu source: ${key}`,
      `Available: ${Array.from(registry.keys()).join(", ")}`,
    );
  }
  return source;
}

/**
 * Runs one scrape. History is persisted before anything is rendered, so a
 * report failure never loses the capture.
 * @throws HistoryWriteError if either history file cannot be written
 */
export async function runScrape(
  config: ScraperConfig,
  options: ScrapeOptions = {},
): Promise<ScrapeResult> {
  const started = Date.now();
  const now = options.now ?? new Date();
  const source = options.source ?? resolveSource(config.sourceKey);
  const warnings: string[] = [];

  Logger.info(`Starting scrape: ${source.displayName}`, { source: source.key });

  const { html, origin } = await fetchMenuPage(source, config);

  // Extrahera
  const items = extractMenu(html, source);
  const week = extractWeek(html, items, source, now, config.timeZone);
  const priceMap = extractPrices(html, source);

  if (items.length === 0) {
    Logger.emptyExtraction("menu", origin);
    warnings.push(`No menu items found for ${week.weekLabel}`);
  }
  const hasPrices = Object.keys(priceMap).length > 0;
  if (!hasPrices) {
    Logger.emptyExtraction("prices", origin);
    warnings.push("No prices found");
  }

  // Spara historik
  const menuStore = new MenuHistoryStore(AppConfig.menuHistoryPath(config));
  const priceStore = new PriceHistoryStore(AppConfig.priceHistoryPath(config));

  const menu = createMenuSnapshot({
    week: week.week,
    year: week.year,
    items: items.map((i) => i.name),
    at: formatZonedISO(now, config.timeZone),
  });
  const key = menuKey(menu);
  const menuResult = await menuStore.upsert(menu);
  await menuStore.persist();
  if (menuResult.evictedEntries.some((e) => menuKey(e) === key)) {
    const message = `${week.weekLabel} ${week.year} is older than the weeks kept in history and was not stored`;
    Logger.warn(message, { week: week.week, year: week.year, file: menuStore.filePath });
    warnings.push(message);
  } else {
    Logger.snapshotSaved("menu", key, menuResult.inserted, menuStore.filePath);
  }
  if (menuResult.evicted) {
    Logger.historyEvicted("menu", menuResult.evictedEntries.length, menuStore.filePath);
  }

  let prices: PriceSnapshot | undefined;
  let priceDiff: PriceDiff | undefined;
  if (hasPrices) {
    prices = createPriceSnapshot({ date: toDateKey(now, config.timeZone), prices: priceMap });
    const priceResult = await priceStore.upsert(prices);
    await priceStore.persist();
    Logger.snapshotSaved("price", prices.date, priceResult.inserted, priceStore.filePath);
    if (priceResult.evicted) {
      Logger.historyEvicted("price", priceResult.evictedEntries.length, priceStore.filePath);
    }
    const pair = await priceStore.latestPair(prices.date);
    priceDiff = comparePrices(pair?.current ?? prices, pair?.previous);
  }

  // Jämför
  const menuPair = await menuStore.latestPair(key);
  const storedMenu = menuPair?.current ?? menu;
  const menuDiff = compareMenus(storedMenu, menuPair?.previous);
  const history = await priceStore.fullPriceHistory();
  const trend = priceTrend(history);
  const days = groupByDay(items);

  printSummary({ week, days, prices: priceMap, menuDiff, priceDiff, trend });

  let reportPath: string | null = null;
  if (config.reportPath) {
    const html = renderReport({
      week,
      days,
      menuDiff,
      priceDiff,
      trend,
      history,
      generatedAt: now,
      timeZone: config.timeZone,
    });
    try {
      await writeReport(config.reportPath, html);
    } catch (error) {
      Logger.error(
        `Could not write report ${config.reportPath}`,
        error instanceof Error ? error : undefined,
      );
      throw error;
    }
    reportPath = config.reportPath;
    Logger.info(`Report written: ${reportPath}`, { file: reportPath });
  }

  let exportPath: string | null = null;
  if (config.exportFormat) {
    exportPath = await exportItems(items, config.exportFormat, config.exportPath, menu.scrapedAt);
    Logger.info(`Exported ${items.length} items: ${exportPath}`, {
      file: exportPath,
      count: items.length,
    });
  }

  Logger.info(`Scrape finished in ${formatDuration((Date.now() - started) / 1000)}`, {
    source: source.key,
    week: week.week,
    year: week.year,
    count: items.length,
  });

  return {
    menu: storedMenu,
    items,
    prices,
    menuDiff,
    priceDiff,
    trend,
    reportPath,
    exportPath,
    warnings,
  };
}
