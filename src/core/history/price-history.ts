/**
 * Price history: one entry per capture date, trailing 6 months kept
 */

import { HISTORY_CONSTANTS } from "../constants/index";
import type { PriceRecord, PriceSnapshot } from "../types/index";
import { subtractMonths } from "../utils/date";
import { toPriceRecord, validatePriceRecord } from "../validation/index";
import { HistoryStore, type HistoryPolicy } from "./store";

export function priceHistoryPolicy(
  retentionMonths: number = HISTORY_CONSTANTS.PRICE_RETENTION_MONTHS,
): HistoryPolicy<PriceSnapshot, PriceRecord> {
  return {
    kind: "price",
    keyOf: (s) => s.date,
    compare: (a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0),
    merge: (existing, incoming) => ({ ...existing, prices: { ...incoming.prices } }),
    retain: (sorted) => {
      const newest = sorted.at(-1);
      if (!newest) return sorted;
      const cutoff = subtractMonths(newest.date, retentionMonths);
      return sorted.filter((s) => s.date >= cutoff);
    },
    decode: validatePriceRecord,
    encode: toPriceRecord,
  };
}

export class PriceHistoryStore extends HistoryStore<PriceSnapshot, PriceRecord> {
  constructor(filePath: string, retentionMonths?: number) {
    super(filePath, priceHistoryPolicy(retentionMonths));
  }

  /**
   * The whole retained log for charting, oldest first.
   * Dates are irregular; nothing is filled in between captures.
   */
  async fullPriceHistory(): Promise<PriceSnapshot[]> {
    return [...(await this.current())];
  }
}
