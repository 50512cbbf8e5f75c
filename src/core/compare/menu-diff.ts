/**
 * Week-over-week menu comparison
 */

import type { MenuSnapshot } from "../types/index";
import { uniq } from "../utils/array";

export type DishStatus = "new" | "continuing";

export interface TaggedDish {
  name: string;
  status: DishStatus;
}

export interface MenuDiff {
  /** false when there was no earlier week to compare with */
  hasBaseline: boolean;
  /**
   * Every entry of current.items in page order, trimmed and tagged.
   * Blank entries stay in place as "continuing"; they never count as dishes.
   */
  items: TaggedDish[];
  newDishes: string[];
  removedDishes: string[];
  continuingDishes: string[];
}

const clean = (items: readonly string[]): string[] =>
  items.map((s) => s.trim()).filter(Boolean);

/**
 * Classifies the current week's dishes against the previous week.
 * Dishes compare as trimmed, case-sensitive sets, so repeats within a week
 * do not matter. Without a previous week every dish counts as continuing.
 */
export function compareMenus(
  current: Pick<MenuSnapshot, "items">,
  previous?: Pick<MenuSnapshot, "items">,
): MenuDiff {
  const currentItems = clean(current.items);

  if (!previous) {
    return {
      hasBaseline: false,
      items: current.items.map((s): TaggedDish => ({ name: s.trim(), status: "continuing" })),
      newDishes: [],
      removedDishes: [],
      continuingDishes: uniq(currentItems),
    };
  }

  const previousItems = clean(previous.items);
  const before = new Set(previousItems);
  const now = new Set(currentItems);

  return {
    hasBaseline: true,
    items: current.items.map((s): TaggedDish => {
      const name = s.trim();
      return { name, status: name && !before.has(name) ? "new" : "continuing" };
    }),
    newDishes: uniq(currentItems.filter((d) => !before.has(d))),
    removedDishes: uniq(previousItems.filter((d) => !now.has(d))),
    continuingDishes: uniq(currentItems.filter((d) => before.has(d))),
  };
}
