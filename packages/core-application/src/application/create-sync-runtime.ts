import type { Logger } from "../ports/logger";
import type { SyncConfig } from "./config";
import { S3RemoteStore, createS3Client } from "../adapters/s3-remote-store";
import { NodeManifestStore } from "../adapters/node-manifest-store";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { NodeFileCollector } from "../adapters/node-file-collector";
import { DEFAULT_PATH_EXCLUSIONS, withExcludedFile, type PathExclusions } from "../adapters/path-exclusions";
import { LoggingFileObserver } from "../adapters/logging-file-observer";
import { SyncService, type SyncRunParams } from "../services/sync-service";
import { defaultNetworkRetryPolicy } from "./default-network-retry-policy";

export type SyncRuntime = {
  store: S3RemoteStore;
  service: SyncService;
  runParams: SyncRunParams;
  /** Exclusions shared by the collector and the watch-mode ignore predicate. */
  exclusions: PathExclusions;
};

/** Wires the S3 adapters and the engine from a validated config. */
export function createSyncRuntime(config: SyncConfig, logger: Logger): SyncRuntime {
  const client = createS3Client(config);
  // Listing pages are retried by RemoteInventory, so the SDK makes a single attempt for them.
  const listClient = createS3Client({ ...config, maxAttempts: 1 });
  const store = new S3RemoteStore(client, config.bucket, { logger, listClient });
  const exclusions = withExcludedFile(DEFAULT_PATH_EXCLUSIONS, config.manifestPath);

  const service = new SyncService({
    store,
    manifestStore: new NodeManifestStore(),
    hasher: new NodeFileHasher(),
    collector: new NodeFileCollector(exclusions, logger),
    logger,
    retryPolicy: defaultNetworkRetryPolicy({ maxAttempts: config.maxAttempts }),
    observer: new LoggingFileObserver(logger),
  });

  return {
    store,
    service,
    exclusions,
    runParams: {
      rootDir: config.rootDir,
      prefix: config.prefix,
      manifestPath: config.manifestPath,
      maxWorkers: config.maxWorkers,
      incrementalEnabled: config.incrementalEnabled,
      verifyUploads: config.verifyUploads,
    },
  };
}

export function describeConfig(config: SyncConfig): string[] {
  return [
    "=".repeat(60),
    "S3 Sync Started",
    "=".repeat(60),
    `Bucket: ${config.bucket}`,
    `Source: ${config.rootDir}`,
    `S3 Prefix: ${config.prefix || "(root)"}`,
    `Max Workers: ${config.maxWorkers}`,
    `Incremental: ${config.incrementalEnabled ? "yes" : "no (full upload)"}`,
    `Manifest: ${config.manifestPath}`,
  ];
}
