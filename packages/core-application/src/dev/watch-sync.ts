import path from "node:path";
import { config as loadDotenv } from "dotenv";

import { ConsoleLogger } from "../adapters/console-logger";
import { ChokidarFileWatcher } from "../adapters/chokidar-file-watcher";
import { createPathIgnore } from "../adapters/path-exclusions";
import { cliArgsToEnv, loadSyncConfig } from "../application/config";
import { createSyncRuntime, describeConfig } from "../application/create-sync-runtime";
import { describeError } from "../application/errors";
import { formatSummary } from "../services/sync-summary";
import { WatchSyncScheduler } from "../services/watch-sync-scheduler";

async function main() {
  loadDotenv({ path: path.resolve(".env") });

  const config = loadSyncConfig({ ...process.env, ...cliArgsToEnv(process.argv.slice(2)) });
  const logger = new ConsoleLogger({ verbose: config.verbose });
  for (const line of describeConfig(config)) logger.info(line);

  const { store, service, runParams, exclusions } = createSyncRuntime(config, logger);
  await store.checkBucket();

  const scheduler = new WatchSyncScheduler({
    watcher: new ChokidarFileWatcher(logger),
    rootDir: config.rootDir,
    ignore: createPathIgnore(config.rootDir, exclusions),
    logger,
    runSync: async () => {
      const summary = await service.syncOnce(runParams);
      for (const line of formatSummary(summary)) logger.info(line);
    },
  });

  await scheduler.start();
  // initial pass so the bucket catches up before waiting for changes
  scheduler.trigger();

  process.once("SIGINT", () => {
    logger.info("Stopping watcher...");
    scheduler.stop().catch((err) => {
      logger.error(`Failed to stop cleanly: ${describeError(err)}`);
      process.exitCode = 1;
    });
  });
}

main().catch((err) => {
  console.error(`Fatal error: ${describeError(err)}`);
  process.exit(1);
});
