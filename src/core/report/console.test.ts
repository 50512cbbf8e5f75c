import { afterEach, describe, expect, it, vi } from "vitest";
import { compareMenus, comparePrices } from "../compare/index";
import { Logger } from "../utils/logger";
import { printSummary, summaryLines, truncateList, type SummaryInput } from "./console";

const week = { week: 48, year: 2024, weekLabel: "Vecka 48" };

const base: SummaryInput = {
  week,
  days: new Map([
    ["MÅNDAG 25/11", ["Köttbullar", "Fisk"]],
    ["TISDAG 26/11", ["Soppa"]],
  ]),
  prices: { "Take away": 99, Lunchbuffé: 129 },
  menuDiff: compareMenus({ items: ["Köttbullar", "Fisk", "Soppa"] }),
};

describe("truncateList", () => {
  it("should keep short lists as they are", () => {
    expect(truncateList(["a", "b"], 5)).toEqual(["a", "b"]);
  });

  it("should cut long lists and say how many were left out", () => {
    expect(truncateList(["a", "b", "c", "d"], 2)).toEqual(["a", "b", "... och 2 till"]);
  });
});

describe("summaryLines", () => {
  it("should list the menu and prices on a first run", () => {
    expect(summaryLines(base)).toEqual([
      "Lunchmeny Vecka 48 (2024)",
      "MÅNDAG 25/11:",
      "  • Köttbullar",
      "  • Fisk",
      "TISDAG 26/11:",
      "  • Soppa",
      "Priser:",
      "  Lunchbuffé: 129 kr",
      "  Take away: 99 kr",
      "Ingen tidigare vecka att jämföra med",
    ]);
  });

  it("should report price moves and menu changes", () => {
    const lines = summaryLines({
      ...base,
      prices: {},
      menuDiff: compareMenus(
        { items: ["Köttbullar", "Fisk", "Soppa"] },
        { items: ["Fisk", "Pannkakor"] },
      ),
      priceDiff: comparePrices(
        { date: "2024-11-25", prices: { Lunchbuffé: 129 } },
        { date: "2024-11-18", prices: { Lunchbuffé: 125 } },
      ),
    });

    expect(lines.slice(6)).toEqual([
      "Prisändringar:",
      "  ↑ Lunchbuffé: 125 → 129 kr",
      "Nya rätter (2):",
      "  + Köttbullar",
      "  + Soppa",
      "Borttagna rätter (1):",
      "  - Pannkakor",
    ]);
  });

  it("should cap the dish lists at five", () => {
    const items = ["A1", "A2", "A3", "A4", "A5", "A6", "A7"];
    const lines = summaryLines({
      ...base,
      days: new Map(),
      prices: {},
      menuDiff: compareMenus({ items }, { items: ["B"] }),
    });

    expect(lines).toEqual([
      "Lunchmeny Vecka 48 (2024)",
      "Nya rätter (7):",
      "  + A1",
      "  + A2",
      "  + A3",
      "  + A4",
      "  + A5",
      "  + ... och 2 till",
      "Borttagna rätter (1):",
      "  - B",
    ]);
  });

  it("should say when the menu is unchanged", () => {
    const lines = summaryLines({
      ...base,
      menuDiff: compareMenus({ items: ["Fisk"] }, { items: ["Fisk"] }),
    });

    expect(lines.at(-1)).toBe("Samma rätter som förra veckan");
  });
});

describe("printSummary", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log every line", () => {
    const info = vi.spyOn(Logger, "info").mockImplementation(() => undefined);

    printSummary(base);

    expect(info).toHaveBeenCalledTimes(10);
    expect(info).toHaveBeenNthCalledWith(1, "Lunchmeny Vecka 48 (2024)");
  });
});
