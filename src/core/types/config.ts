/**
 * Configuration-related types
 */

import type { Page } from "playwright";
import type { PriceCategory } from "./menu";

/** Selektorer för lunchsidans struktur */
export interface MenuSelectors {
  /** Rubrik per veckodag, ex h3.matochmat-wrap__day-heading */
  dayHeading: string;
  /** Element som avslutar menyn (prisblocket) */
  menuEnd: string;
  /** Stycken med prisinformation */
  priceParagraph: string;
  /** Klass på stycken som inte är rätter */
  skipClass: string;
  /** Där veckonumret kan stå */
  weekCandidates: string;
}

/** Nyckelord (gemener) i prisstycket → kategori */
export type PriceKeywords = ReadonlyArray<readonly [string, PriceCategory]>;

/** MenuSource – kontrakt för en lunchsajt */
export interface MenuSource {
  key: string;
  displayName: string;

  /** Standard-URL om RESTAURANT_URL saknas */
  defaultUrl?: string;

  selectors: MenuSelectors;
  priceKeywords: PriceKeywords;

  /** Kortare rader än så här räknas inte som rätter */
  minItemLength: number;

  /** Vänta på detta innan sidan läses (ms) */
  readyTimeoutMs?: number;

  /** Hantera cookie/consent innan sidan läses */
  consent?: (page: Page) => Promise<void>;
}

export type ExportFormat = "json" | "csv";

/** Fully resolved settings for one run */
export interface ScraperConfig {
  sourceKey: string;
  targetUrl: string;
  localFile: string;
  timeoutMs: number;
  headless: boolean;
  useInstalledChrome: boolean;
  userAgent: string;
  verifySsl: boolean;
  historyDir: string;
  reportPath: string | null;
  exportFormat: ExportFormat | null;
  exportPath: string;
  timeZone: string;
}
