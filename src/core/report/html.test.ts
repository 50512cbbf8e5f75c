import { describe, expect, it } from "vitest";
import { compareMenus, comparePrices, priceTrend } from "../compare/index";
import type { PriceSnapshot } from "../types/index";
import { renderReport, type ReportInput } from "./html";

const week = { week: 48, year: 2024, weekLabel: "Vecka 48" };
const generatedAt = new Date("2024-11-27T10:00:00Z");

const captures: PriceSnapshot[] = [
  { date: "2024-11-11", prices: { Lunchbuffé: 125, "Take away": 99 } },
  { date: "2024-11-18", prices: { Lunchbuffé: 125 } },
  { date: "2024-11-25", prices: { Lunchbuffé: 129, "Take away": 95 } },
];

function input(overrides: Partial<ReportInput> = {}): ReportInput {
  const days = new Map([["MÅNDAG 25/11", ["Pasta & sås", "Fisk"]]]);
  return {
    week,
    days,
    menuDiff: compareMenus({ items: ["Pasta & sås", "Fisk"] }, { items: ["Fisk"] }),
    history: captures.slice(0, 1),
    generatedAt,
    timeZone: "Europe/Stockholm",
    ...overrides,
  };
}

const lines = (html: string) => html.split("\n").map((l) => l.trim());

describe("renderReport", () => {
  it("should title the page with the week", () => {
    const html = renderReport(input());

    expect(html.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(lines(html)).toContain("<title>Lunchmeny – Vecka 48</title>");
    expect(lines(html)).toContain('<div class="week-badge">Vecka 48</div>');
  });

  it("should tag new dishes and escape their names", () => {
    const out = lines(renderReport(input()));

    expect(out).toContain("<h2>MÅNDAG 25/11</h2>");
    expect(out).toContain('<div class="menu-item new">Pasta &amp; sås</div>');
    expect(out).toContain('<div class="menu-item">Fisk</div>');
  });

  it("should count dishes, new dishes and days", () => {
    const out = lines(renderReport(input()));

    expect(out).toContain(
      '<div class="stat"><div class="stat-value">2</div><div class="stat-label">Rätter</div></div>',
    );
    expect(out).toContain(
      '<div class="stat"><div class="stat-value">1</div><div class="stat-label">Nya rätter</div></div>',
    );
    expect(out).toContain(
      '<div class="stat"><div class="stat-value">1</div><div class="stat-label">Dagar</div></div>',
    );
  });

  it("should show the placeholder and skip the chart with a single capture", () => {
    const html = renderReport(input());

    expect(lines(html)).toContain('<p class="empty">Ingen prishistorik tillgänglig än.</p>');
    expect(html).not.toContain("chart.umd.min.js");
    expect(html).not.toContain('class="alert');
  });

  it("should stamp the footer in local time", () => {
    expect(lines(renderReport(input()))).toContain(
      "<footer>Uppdaterad 2024-11-27 kl 11:00</footer>",
    );
  });

  describe("with price history", () => {
    const latest = captures[2];
    const previous = captures[1];
    const html = renderReport(
      input({
        history: captures,
        priceDiff: latest && previous ? comparePrices(latest, previous) : undefined,
        trend: priceTrend(captures),
      }),
    );
    const out = lines(html);

    it("should alert on changes since the previous capture", () => {
      expect(out).toContain("↑ Lunchbuffé: 125 → 129 kr<br>");
      expect(html).not.toContain("Take away: undefined");
    });

    it("should alert on the trend since the oldest capture", () => {
      expect(out).toContain("<strong>Prisutveckling sedan 2024-11-11</strong><br>");
      expect(out).toContain("Lunchbuffé: 125 → 129 kr (+4 kr, +3.2%)<br>");
      expect(out).toContain("Take away: 99 → 95 kr (-4 kr, -4.0%)<br>");
    });

    it("should tabulate captures with a dash for missing prices", () => {
      expect(out).toContain(
        "<thead><tr><th>Typ</th><th>2024-11-11</th><th>2024-11-18</th><th>2024-11-25</th><th>Förändring</th></tr></thead>",
      );
      expect(out).toContain(
        '<tr><td>Lunchbuffé</td><td>125 kr</td><td>125 kr</td><td>129 kr</td><td class="price-change up">↑ +4 kr (+3.2%)</td></tr>',
      );
      expect(out).toContain(
        '<tr><td>Take away</td><td>99 kr</td><td>–</td><td>95 kr</td><td class="price-change down">↓ -4 kr (-4.0%)</td></tr>',
      );
    });

    it("should feed the chart with gaps as null", () => {
      expect(html).toContain("chart.umd.min.js");
      expect(html).toContain('{"label":"Take away","data":[99,null,95]');
      expect(html).toContain('"spanGaps":true');
    });
  });

  it("should keep only the last five captures in the table", () => {
    const history: PriceSnapshot[] = [1, 2, 3, 4, 5, 6].map((d) => ({
      date: `2024-10-0${d}`,
      prices: { Lunchbuffé: 120 + d },
    }));
    const out = lines(renderReport(input({ history })));

    expect(out).toContain(
      "<thead><tr><th>Typ</th><th>2024-10-02</th><th>2024-10-03</th><th>2024-10-04</th><th>2024-10-05</th><th>2024-10-06</th><th>Förändring</th></tr></thead>",
    );
  });

  it("should not let page text break out of the chart script", () => {
    const history: PriceSnapshot[] = [
      { date: "2024-11-18", prices: { Lunchbuffé: 125 } },
      { date: "2024-11-25", prices: { Lunchbuffé: 129 } },
    ];
    const html = renderReport(
      input({ history, days: new Map([["</script><b>", ["Fisk"]]]) }),
    );

    expect(html).toContain("<h2>&lt;/script&gt;&lt;b&gt;</h2>");
    expect(html.match(/<\/script>/g)).toHaveLength(2);
  });
});
