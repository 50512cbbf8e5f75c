import "dotenv/config";
import { AppConfig, Logger, describeError, seedDemoHistory } from "./core/index";

async function main() {
  const config = AppConfig.load();
  const paths = {
    menuHistory: AppConfig.menuHistoryPath(config),
    priceHistory: AppConfig.priceHistoryPath(config),
  };

  Logger.info("🎭 Seeding demo history", { dir: config.historyDir });
  await seedDemoHistory(paths, new Date(), config.timeZone);

  Logger.info(`✅ Demo history written: ${paths.menuHistory}, ${paths.priceHistory}`);
  Logger.info("Run the scraper now (npm run cli) to see the comparison in the report");
}

main().catch((error: unknown) => {
  Logger.error(`❌ ${describeError(error)}`);
  process.exitCode = 1;
});
