/**
 * Loads the lunch page HTML, from the web or from a saved copy
 */

import { promises as fs } from "fs";
import { errors } from "playwright";
import { FetchError, describeError } from "../errors";
import type { MenuSource, ScraperConfig } from "../types/index";
import { Logger } from "../utils/logger";
import { BROWSER_RETRY_OPTIONS, RetryError, withRetry } from "../utils/retry";
import { launchBrowser } from "./launcher";
import { optimizePage } from "./optimization";

export type FetchOptions = Pick<
  ScraperConfig,
  | "targetUrl"
  | "localFile"
  | "timeoutMs"
  | "headless"
  | "useInstalledChrome"
  | "userAgent"
  | "verifySsl"
>;

export interface FetchedPage {
  html: string;
  /** URL or file path the HTML came from */
  origin: string;
}

/**
 * Reads a saved copy of the page
 * @throws FetchError if the file cannot be read
 */
export async function readLocalPage(file: string): Promise<FetchedPage> {
  Logger.info(`Reading local file: ${file}`, { file });
  try {
    const html = await fs.readFile(file, "utf8");
    Logger.info(`File loaded (${html.length} characters)`, { file, count: html.length });
    return { html, origin: file };
  } catch (error) {
    throw new FetchError(
      `Could not read local file ${file}: ${describeError(error)}`,
      "Check LOCAL_FILE or the --file flag",
    );
  }
}

/**
 * Loads the page in Chromium and returns the rendered HTML.
 * The browser is closed on every path.
 * @throws FetchError on timeout or navigation failure
 */
export async function fetchRenderedPage(
  source: MenuSource,
  options: FetchOptions,
): Promise<FetchedPage> {
  const url = options.targetUrl || source.defaultUrl;
  if (!url) {
    throw new FetchError(
      "No page to fetch",
      "Set RESTAURANT_URL, pass --url, or use --file with a saved page",
    );
  }

  Logger.info(`Fetching page: ${url}`, {
    url,
    timeoutMs: options.timeoutMs,
    headless: options.headless,
    chrome: options.useInstalledChrome ? "system" : "bundled",
  });

  const browser = await launchBrowser({
    headless: options.headless,
    useInstalledChrome: options.useInstalledChrome,
  }).catch((error: unknown) => {
    throw new FetchError(
      `Could not launch the browser: ${describeError(error)}`,
      "Run `npx playwright install chromium`, or set USE_INSTALLED_CHROME=true",
    );
  });

  try {
    const context = await browser.newContext({
      userAgent: options.userAgent,
      bypassCSP: true,
      ignoreHTTPSErrors: !options.verifySsl,
    });
    const page = await context.newPage();
    await optimizePage(page);

    await withRetry(
      () => page.goto(url, { waitUntil: "domcontentloaded", timeout: options.timeoutMs }),
      {
        ...BROWSER_RETRY_OPTIONS,
        onRetry: (error, attempt) =>
          Logger.warn(`Navigation failed, retrying (${attempt})`, { url, error: error.message }),
      },
    );

    if (source.consent) await source.consent(page);

    Logger.info("Waiting for the menu to render...");
    await page.waitForSelector(source.selectors.dayHeading, {
      timeout: source.readyTimeoutMs ?? options.timeoutMs,
    });
    Logger.info("Page loaded", { url });

    return { html: await page.content(), origin: url };
  } catch (error) {
    throw toFetchError(error, url, options.timeoutMs);
  } finally {
    await browser.close();
  }
}

function toFetchError(error: unknown, url: string, timeoutMs: number): FetchError {
  const cause = error instanceof RetryError ? error.originalError : error;
  if (cause instanceof errors.TimeoutError) {
    return new FetchError(
      `Timed out after ${timeoutMs / 1000} seconds loading ${url}`,
      "Raise TIMEOUT_SECONDS, or save the page and use LOCAL_FILE",
    );
  }
  return new FetchError(
    `Could not fetch ${url}: ${describeError(cause)}`,
    "Save the page manually and use LOCAL_FILE",
  );
}

/**
 * Local file when configured, otherwise the live page
 */
export async function fetchMenuPage(
  source: MenuSource,
  options: FetchOptions,
): Promise<FetchedPage> {
  if (options.localFile) return readLocalPage(options.localFile);
  return fetchRenderedPage(source, options);
}
