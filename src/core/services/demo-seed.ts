/**
 * Demo history for previewing the report without scraping:
 * two weeks of menus and three price captures a week apart
 */

import type { PriceMap } from "../types/index";
import { formatZonedISO, isoWeek, toDateKey } from "../utils/date";
import { MenuHistoryStore, PriceHistoryStore } from "../history/index";
import { createMenuSnapshot, createPriceSnapshot } from "../validation/index";

const DAY_MS = 86_400_000;

const LAST_WEEK = [
  "Köttbullar med potatismos",
  "Pasta carbonara",
  "Pocherad fisk med hummersås & kokt potatis",
  "Raggmunk med lingon, stekt fläsk & löksås",
  "Kycklinggryta med ris",
  "Ångad fisk med äggsås",
  "Laxfilé med dillsås",
  "Boeuf bourguignon med potatispuré",
  "Pannbiff med lök",
  "Fish and chips med remouladsås",
];

const THIS_WEEK = [
  "Honungsglaserad kotlettrad med rostad potatis & sötpotatis",
  "Pasta carbonara",
  "Pocherad fisk med hummersås & kokt potatis",
  "Raggmunk med lingon, stekt fläsk & löksås",
  "Kycklingklubba med grönsaksris & srirachamayo",
  "Ångad fisk med äggsås",
  "Friterad kyckling med pommes & chilibearnaise",
  "Boeuf bourguignon med potatispuré",
  "Kryddiga köttfärsbiffar med rostade rotfrukter & rödvinssås",
  "Fish and chips med remouladsås",
];

// två veckor sedan, förra veckan, idag
const PRICE_STEPS: PriceMap[] = [
  { Lunchbuffé: 125, "Tidig lunch": 110, Pensionärspris: 100, "Take away": 95 },
  { Lunchbuffé: 125, "Tidig lunch": 115, Pensionärspris: 105, "Take away": 99 },
  { Lunchbuffé: 129, "Tidig lunch": 115, Pensionärspris: 105, "Take away": 99 },
];

export interface SeedPaths {
  menuHistory: string;
  priceHistory: string;
}

function weekOf(date: Date, timeZone: string) {
  const [y, m, d] = toDateKey(date, timeZone).split("-").map(Number);
  return isoWeek(y, m, d);
}

/**
 * Writes the demo entries through the history stores, so retention and
 * canonical order apply as in a real run
 */
export async function seedDemoHistory(
  paths: SeedPaths,
  now: Date,
  timeZone = "Europe/Stockholm",
): Promise<void> {
  const menus = new MenuHistoryStore(paths.menuHistory);
  const weeks: [Date, string[]][] = [
    [new Date(now.getTime() - 7 * DAY_MS), LAST_WEEK],
    [now, THIS_WEEK],
  ];
  for (const [at, items] of weeks) {
    const { week, year } = weekOf(at, timeZone);
    await menus.upsert(
      createMenuSnapshot({ week, year, items, at: formatZonedISO(at, timeZone) }),
    );
  }
  await menus.persist();

  const prices = new PriceHistoryStore(paths.priceHistory);
  for (const [i, map] of PRICE_STEPS.entries()) {
    const at = new Date(now.getTime() - (PRICE_STEPS.length - 1 - i) * 7 * DAY_MS);
    await prices.upsert(createPriceSnapshot({ date: toDateKey(at, timeZone), prices: map }));
  }
  await prices.persist();
}
