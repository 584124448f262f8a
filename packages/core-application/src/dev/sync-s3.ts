import path from "node:path";
import { config as loadDotenv } from "dotenv";

import { ConsoleLogger } from "../adapters/console-logger";
import { cliArgsToEnv, loadSyncConfig } from "../application/config";
import { createSyncRuntime, describeConfig } from "../application/create-sync-runtime";
import { describeError } from "../application/errors";
import { formatSummary } from "../services/sync-summary";

async function main(): Promise<number> {
  loadDotenv({ path: path.resolve(".env") });

  const config = loadSyncConfig({ ...process.env, ...cliArgsToEnv(process.argv.slice(2)) });
  const logger = new ConsoleLogger({ verbose: config.verbose });

  for (const line of describeConfig(config)) logger.info(line);

  const { store, service, runParams } = createSyncRuntime(config, logger);
  await store.checkBucket();
  logger.info(`✓ Bucket '${config.bucket}' verified`);

  // Ctrl+C: stop taking new files, let in-flight uploads finish, save manifest.
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted, finishing in-flight uploads...");
    controller.abort();
  });

  const summary = await service.syncOnce({ ...runParams, signal: controller.signal });
  for (const line of formatSummary(summary)) logger.info(line);

  return summary.failed === 0 && summary.manifestSaved ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(`\nFatal error: ${describeError(err)}`);
    process.exitCode = 1;
  });
