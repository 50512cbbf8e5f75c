/**
 * Browser launching and configuration
 */

import { type Browser, chromium } from "playwright";

export interface LaunchOptions {
  headless: boolean;
  /** Use the locally installed Chrome (picks up system proxy settings) */
  useInstalledChrome?: boolean;
}

/**
 * Launches a Chromium browser instance with optimized settings
 * @returns Promise resolving to the browser instance
 */
export async function launchBrowser(options: LaunchOptions): Promise<Browser> {
  return await chromium.launch({
    headless: options.headless,
    channel: options.useInstalledChrome ? "chrome" : undefined,
    args: ["--disable-dev-shm-usage", "--no-sandbox"],
  });
}
