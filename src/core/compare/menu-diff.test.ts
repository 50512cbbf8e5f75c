import { describe, expect, it } from "vitest";
import { compareMenus } from "./menu-diff";

describe("compareMenus", () => {
  it("should classify added and kept dishes", () => {
    const diff = compareMenus({ items: ["A", "B", "C"] }, { items: ["A", "B"] });

    expect(diff.hasBaseline).toBe(true);
    expect(diff.newDishes).toEqual(["C"]);
    expect(diff.removedDishes).toEqual([]);
    expect(diff.continuingDishes).toEqual(["A", "B"]);
  });

  it("should report dishes dropped since last week", () => {
    const diff = compareMenus(
      { items: ["Pasta carbonara", "Raggmunk"] },
      { items: ["Köttbullar", "Pasta carbonara", "Laxfilé"] },
    );

    expect(diff.newDishes).toEqual(["Raggmunk"]);
    expect(diff.removedDishes).toEqual(["Köttbullar", "Laxfilé"]);
    expect(diff.continuingDishes).toEqual(["Pasta carbonara"]);
  });

  it("should tag every item in page order, repeats included", () => {
    const diff = compareMenus(
      { items: ["Fisk", "Soppa", "Fisk"] },
      { items: ["Fisk"] },
    );

    expect(diff.items).toEqual([
      { name: "Fisk", status: "continuing" },
      { name: "Soppa", status: "new" },
      { name: "Fisk", status: "continuing" },
    ]);
    expect(diff.continuingDishes).toEqual(["Fisk"]);
  });

  it("should ignore multiplicity and surrounding whitespace", () => {
    const diff = compareMenus({ items: ["  Fisk ", "Fisk"] }, { items: ["Fisk"] });

    expect(diff.newDishes).toEqual([]);
    expect(diff.items.map((i) => i.name)).toEqual(["Fisk", "Fisk"]);
  });

  it("should keep blank entries in place without counting them as dishes", () => {
    const diff = compareMenus({ items: ["A", "  ", "B"] }, { items: ["A", ""] });

    expect(diff.items).toEqual([
      { name: "A", status: "continuing" },
      { name: "", status: "continuing" },
      { name: "B", status: "new" },
    ]);
    expect(diff.newDishes).toEqual(["B"]);
    expect(diff.removedDishes).toEqual([]);
    expect(diff.continuingDishes).toEqual(["A"]);
  });

  it("should compare case-sensitively", () => {
    const diff = compareMenus({ items: ["fisk"] }, { items: ["Fisk"] });

    expect(diff.newDishes).toEqual(["fisk"]);
    expect(diff.removedDishes).toEqual(["Fisk"]);
  });

  it("should treat every dish as continuing without a previous week", () => {
    const diff = compareMenus({ items: ["A", "B", "A"] });

    expect(diff.hasBaseline).toBe(false);
    expect(diff.newDishes).toEqual([]);
    expect(diff.removedDishes).toEqual([]);
    expect(diff.continuingDishes).toEqual(["A", "B"]);
    expect(diff.items.every((i) => i.status === "continuing")).toBe(true);
  });

  it("should partition both weeks completely", () => {
    const cases: [string[], string[]][] = [
      [["A", "B", "C"], ["B", "C", "D"]],
      [[], ["A"]],
      [["A"], []],
      [["A", "A", "B"], ["B", "B"]],
    ];

    for (const [current, previous] of cases) {
      const d = compareMenus({ items: current }, { items: previous });
      const newSet = new Set(d.newDishes);
      const removedSet = new Set(d.removedDishes);

      expect(new Set([...d.newDishes, ...d.continuingDishes])).toEqual(new Set(current));
      expect(new Set([...d.removedDishes, ...d.continuingDishes])).toEqual(new Set(previous));
      expect([...newSet].filter((x) => removedSet.has(x))).toEqual([]);
    }
  });
});
