/**
 * Price extraction from lunch page HTML
 */

import { load } from "cheerio";
import type { MenuSource, PriceMap } from "../types/index";
import { elementText } from "./menu";

const PRICE_RE = /(\d+)\s*kr/;

/**
 * Reads "<label> ... NNN kr" paragraphs into the price categories.
 * A category not on the page stays absent from the result.
 */
export function extractPrices(html: string, source: MenuSource): PriceMap {
  const $ = load(html);
  const prices: PriceMap = {};

  for (const el of $(source.selectors.priceParagraph).toArray()) {
    const text = elementText($, el).toLowerCase();
    const m = PRICE_RE.exec(text);
    if (!m) continue;

    const hit = source.priceKeywords.find(([keyword]) => text.includes(keyword));
    if (!hit) continue;

    const [, category] = hit;
    if (prices[category] === undefined) prices[category] = Number(m[1]);
  }

  return prices;
}
