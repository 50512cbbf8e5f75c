/**
 * Centralized application configuration
 */

import path from "node:path";
import { BROWSER_CONSTANTS, HISTORY_CONSTANTS } from "../constants/index";
import { ConfigError } from "../errors";
import type { ExportFormat, ScraperConfig } from "../types/index";
import { type Env, envBool, envInt, envStr } from "./env";

export class AppConfig {
  // Source configuration
  static readonly DEFAULT_SOURCE = "matochmat";

  // History configuration
  static readonly DEFAULT_HISTORY_DIR = "state";

  // Output configuration
  static readonly DEFAULT_REPORT_PATH = "out/menu.html";
  static readonly DEFAULT_EXPORT_PATH = "out/menu_data";

  static readonly DEFAULT_TIME_ZONE = "Europe/Stockholm";

  /**
   * Resolves the run configuration from environment variables.
   * Values in `overrides` (CLI flags) win over the environment.
   */
  static load(
    env: Env = process.env,
    overrides: Partial<ScraperConfig> = {},
  ): ScraperConfig {
    const timeoutSeconds = envInt(
      "TIMEOUT_SECONDS",
      BROWSER_CONSTANTS.DEFAULT_TIMEOUT_MS / 1000,
      env,
    );
    if (timeoutSeconds <= 0) {
      throw new ConfigError(
        `TIMEOUT_SECONDS must be positive, got ${timeoutSeconds}`,
      );
    }

    const reportPath = envStr("REPORT_PATH", AppConfig.DEFAULT_REPORT_PATH, env);

    const config: ScraperConfig = {
      sourceKey: envStr("MENU_SOURCE", AppConfig.DEFAULT_SOURCE, env),
      targetUrl: envStr("RESTAURANT_URL", "", env),
      localFile: envStr("LOCAL_FILE", "", env),
      timeoutMs: timeoutSeconds * 1000,
      headless: envBool("HEADLESS", true, env),
      useInstalledChrome: envBool("USE_INSTALLED_CHROME", false, env),
      userAgent: envStr("USER_AGENT", BROWSER_CONSTANTS.USER_AGENT, env),
      verifySsl: envBool("VERIFY_SSL", true, env),
      historyDir: envStr("HISTORY_DIR", AppConfig.DEFAULT_HISTORY_DIR, env),
      reportPath: reportPath || null,
      exportFormat: AppConfig.parseExportFormat(envStr("EXPORT_FORMAT", "", env)),
      exportPath: envStr("EXPORT_PATH", AppConfig.DEFAULT_EXPORT_PATH, env),
      timeZone: envStr("TIME_ZONE", AppConfig.DEFAULT_TIME_ZONE, env),
    };

    return { ...config, ...overrides };
  }

  /**
   * Parses an export format name; empty means no export
   */
  static parseExportFormat(value: string): ExportFormat | null {
    const v = value.trim().toLowerCase();
    if (!v) return null;
    if (v === "json" || v === "csv") return v;
    throw new ConfigError(
      `Unsupported export format '${value}'`,
      "Use json or csv",
    );
  }

  static menuHistoryPath(config: Pick<ScraperConfig, "historyDir">): string {
    return path.join(config.historyDir, HISTORY_CONSTANTS.MENU_HISTORY_FILE);
  }

  static priceHistoryPath(config: Pick<ScraperConfig, "historyDir">): string {
    return path.join(config.historyDir, HISTORY_CONSTANTS.PRICE_HISTORY_FILE);
  }
}
