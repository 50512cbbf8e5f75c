/**
 * Menu history: one entry per (week, year), newest 12 weeks kept
 */

import { HISTORY_CONSTANTS } from "../constants/index";
import type { MenuRecord, MenuSnapshot } from "../types/index";
import { toMenuRecord, validateMenuRecord } from "../validation/index";
import { HistoryStore, type HistoryPolicy } from "./store";

export const menuKey = (s: Pick<MenuSnapshot, "week" | "year">): string =>
  `${s.year}-W${String(s.week).padStart(2, "0")}`;

export function menuHistoryPolicy(
  maxWeeks: number = HISTORY_CONSTANTS.MAX_MENU_WEEKS,
): HistoryPolicy<MenuSnapshot, MenuRecord> {
  return {
    kind: "menu",
    keyOf: menuKey,
    compare: (a, b) => a.year - b.year || a.week - b.week,
    // scrapedAt är första fångsten och skrivs aldrig över
    merge: (existing, incoming) => ({
      ...existing,
      weekLabel: incoming.weekLabel,
      items: [...incoming.items],
      updatedAt: incoming.updatedAt,
    }),
    retain: (sorted) => sorted.slice(-maxWeeks),
    decode: validateMenuRecord,
    encode: toMenuRecord,
  };
}

export class MenuHistoryStore extends HistoryStore<MenuSnapshot, MenuRecord> {
  constructor(filePath: string, maxWeeks?: number) {
    super(filePath, menuHistoryPolicy(maxWeeks));
  }
}
