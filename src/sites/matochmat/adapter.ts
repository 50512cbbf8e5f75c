// src/sites/matochmat/adapter.ts
import { BROWSER_CONSTANTS } from "../../core/constants/index";
import type { MenuSource } from "../../core/types/index";

/**
 * Lunchsidor byggda på WordPress-blocket "matochmat-wrap"
 * - En h3-rubrik per veckodag, följd av ett <p> per rätt
 * - Prisblocket (div.matochmat__menu-text) avslutar menyn
 * - Priser står i centrerade stycken: "Lunchbuffé 129 kr" osv
 */
export const adapter: MenuSource = {
  key: "matochmat",
  displayName: "Mat & Mat lunchmeny",

  selectors: {
    dayHeading: "h3.matochmat-wrap__day-heading",
    menuEnd: "div.matochmat__menu-text",
    priceParagraph: "p.has-text-align-center",
    skipClass: "has-text-align-center",
    weekCandidates: "h2, h3, p",
  },

  // första träffen per kategori vinner
  priceKeywords: [
    ["lunchbuffé", "Lunchbuffé"],
    ["10-11", "Tidig lunch"],
    ["pensionär", "Pensionärspris"],
    ["take away", "Take away"],
  ],

  // kortare rader är rubriker/skräp, inte rätter
  minItemLength: 6,

  readyTimeoutMs: BROWSER_CONSTANTS.READY_TIMEOUT_MS,

  consent: async (page) => {
    const candidates = [
      "#onetrust-accept-btn-handler",
      'button:has-text("Acceptera")',
      'button:has-text("Godkänn")',
    ];
    for (const sel of candidates) {
      const btn = page.locator(sel).first();
      if (await btn.isVisible().catch(() => false)) {
        await btn.click({ timeout: 1500 }).catch(() => undefined);
        break;
      }
    }
  },
};

export default adapter;
