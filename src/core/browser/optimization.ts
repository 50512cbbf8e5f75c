/**
 * Browser optimization utilities
 */

import type { Page } from "playwright";
import { Logger } from "../utils/logger";

/**
 * Blocks images, fonts and media; the menu only needs the DOM
 * @param page - Playwright page instance to optimize
 */
export async function optimizePage(page: Page): Promise<void> {
  try {
    await page.route("**/*", (route) => {
      const t = route.request().resourceType();
      if (t === "image" || t === "font" || t === "media") return route.abort();
      return route.continue();
    });
  } catch (error) {
    Logger.debug("Could not install resource blocking", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
