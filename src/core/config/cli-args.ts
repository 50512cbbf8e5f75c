/**
 * Command-line flags; they override the environment
 */

import { ConfigError } from "../errors";
import type { ScraperConfig } from "../types/index";
import { AppConfig } from "./app-config";

export interface CliArgs {
  help: boolean;
  list: boolean;
  overrides: Partial<ScraperConfig>;
}

const VALUE_FLAGS = [
  "--url",
  "--file",
  "--source",
  "--history-dir",
  "--report",
  "--export",
  "--export-path",
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

const isValueFlag = (arg: string): arg is ValueFlag =>
  VALUE_FLAGS.some((f) => f === arg);

export const USAGE = `Usage:
  npm run cli -- [options]

Options:
  --url <url>          Lunch page to fetch (RESTAURANT_URL)
  --file <path>        Read a saved HTML page instead of fetching (LOCAL_FILE)
  --source <key>       Site adapter (MENU_SOURCE, default: matochmat)
  --history-dir <dir>  Where the history files live (HISTORY_DIR, default: state)
  --report <path>      HTML report path (REPORT_PATH, default: out/menu.html)
  --no-report          Skip the HTML report
  --export json|csv    Also export the week's dishes (EXPORT_FORMAT)
  --export-path <base> Export path without extension (EXPORT_PATH)
  --list               List available sources
  --help               Show this help`;

/**
 * Parses argv (without node and script)
 * @throws ConfigError on unknown flags or missing values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false, list: false, overrides: {} };
  const o = args.overrides;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }
    if (arg === "--list") {
      args.list = true;
      continue;
    }
    if (arg === "--no-report") {
      o.reportPath = null;
      continue;
    }
    if (!isValueFlag(arg)) {
      throw new ConfigError(`Unknown option: ${arg}`, "See --help");
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigError(`Missing value for ${arg}`, "See --help");
    }
    i++;

    switch (arg) {
      case "--url":
        o.targetUrl = value;
        // en URL på kommandoraden går före LOCAL_FILE i miljön
        o.localFile ??= "";
        break;
      case "--file":
        o.localFile = value;
        break;
      case "--source":
        o.sourceKey = value;
        break;
      case "--history-dir":
        o.historyDir = value;
        break;
      case "--report":
        o.reportPath = value;
        break;
      case "--export":
        o.exportFormat = AppConfig.parseExportFormat(value);
        break;
      case "--export-path":
        o.exportPath = value;
        break;
    }
  }

  return args;
}
