import "dotenv/config";
import {
  AppConfig,
  Logger,
  USAGE,
  describeError,
  parseCliArgs,
  runScrape,
} from "./core/index";
import { getSourceKeys } from "./sites/registry";

async function main() {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    Logger.info(`${USAGE}\n\nAvailable sources: ${getSourceKeys().join(", ")}`);
    return;
  }

  if (args.list) {
    Logger.info(`Available sources: ${getSourceKeys().join(", ")}`);
    return;
  }

  const config = AppConfig.load(process.env, args.overrides);
  const result = await runScrape(config);

  for (const warning of result.warnings) Logger.warn(`⚠️ ${warning}`);
  Logger.info(
    `✅ ${result.menu.weekLabel}: ${result.items.length} dishes, ${result.menuDiff.newDishes.length} new`,
  );
}

main().catch((error: unknown) => {
  Logger.error(`❌ ${describeError(error)}`);
  process.exitCode = 1;
});
