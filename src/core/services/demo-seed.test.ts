import { promises as fs } from "fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { compareMenus, priceTrend } from "../compare/index";
import { MenuHistoryStore, PriceHistoryStore } from "../history/index";
import { seedDemoHistory } from "./demo-seed";

describe("seedDemoHistory", () => {
  let dir: string;
  let paths: { menuHistory: string; priceHistory: string };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "demo-seed-"));
    paths = {
      menuHistory: path.join(dir, "menu_history.json"),
      priceHistory: path.join(dir, "price_history.json"),
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should write two consecutive weeks that differ", async () => {
    await seedDemoHistory(paths, new Date("2024-11-27T10:00:00Z"));

    const menus = await new MenuHistoryStore(paths.menuHistory).loadAll();
    expect(menus.map((m) => [m.year, m.week])).toEqual([
      [2024, 47],
      [2024, 48],
    ]);

    const [previous, current] = menus;
    const diff = compareMenus(current, previous);
    expect(diff.newDishes).toHaveLength(4);
    expect(diff.removedDishes).toEqual([
      "Köttbullar med potatismos",
      "Kycklinggryta med ris",
      "Laxfilé med dillsås",
      "Pannbiff med lök",
    ]);
    expect(diff.continuingDishes).toHaveLength(6);
  });

  it("should write three weekly price captures ending today", async () => {
    await seedDemoHistory(paths, new Date("2024-11-27T10:00:00Z"));

    const history = await new PriceHistoryStore(paths.priceHistory).fullPriceHistory();
    expect(history.map((s) => s.date)).toEqual(["2024-11-13", "2024-11-20", "2024-11-27"]);
    expect(priceTrend(history)?.changes.map((c) => c.delta)).toEqual([4, 5, 5, 4]);
  });
});
