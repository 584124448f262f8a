import type { UploadCandidate } from "@mirror-sync/core-domain";

import type { RemoteStore } from "../ports/remote-store";
import type { ManifestStore } from "../ports/manifest-store";
import type { FileHasher } from "../ports/file-hasher";
import type { FileCollector } from "../ports/file-collector";
import type { Logger } from "../ports/logger";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { FileEventObserver } from "../ports/file-event-observer";
import { systemClock, type Clock } from "../ports/clock";
import { describeError } from "../application/errors";
import { normalizePrefix } from "../application/remote-keys";

import { ManifestTracker } from "./manifest-tracker";
import { RemoteInventory } from "./remote-inventory";
import { HybridSyncPlanner } from "./hybrid-sync-planner";
import { UploadExecutor } from "./upload-executor";
import { formatSize, type SyncRunSummary } from "./sync-summary";

export type SyncServiceDeps = {
  store: RemoteStore;
  manifestStore: ManifestStore;
  hasher: FileHasher;
  collector: FileCollector;
  logger: Logger;
  observer?: FileEventObserver;
  clock?: Clock;
  retryPolicy?: RetryPolicy;
  sleep?: Sleeper;
};

export type SyncRunParams = {
  rootDir: string;
  prefix: string;
  manifestPath: string;
  maxWorkers: number;
  incrementalEnabled: boolean;
  verifyUploads?: boolean;
  signal?: AbortSignal;
};

function sumBytes(candidates: readonly UploadCandidate[]): number {
  return candidates.reduce((acc, c) => acc + c.sizeBytes, 0);
}

/**
 * One complete run: manifest → collect → plan → upload → persist manifest.
 *
 * ManifestCorruptError and RemoteUnavailableError escape before any upload
 * starts. Everything per-file is counted in the summary instead.
 */
export class SyncService {
  constructor(private readonly deps: SyncServiceDeps) {}

  async syncOnce(params: SyncRunParams): Promise<SyncRunSummary> {
    const { store, manifestStore, hasher, collector, logger, observer, retryPolicy, sleep } = this.deps;
    const clock = this.deps.clock ?? systemClock;
    const startedMs = clock.now().getTime();
    const prefix = normalizePrefix(params.prefix);

    const tracker = await ManifestTracker.load(params.manifestPath, { store: manifestStore, hasher, clock });
    logger.info(
      `Manifest: ${tracker.size} entries` +
        (tracker.lastSyncIso ? ` (last sync ${tracker.lastSyncIso})` : " (first run)")
    );

    logger.info(`Collecting files from: ${params.rootDir}`);
    const candidates = await collector.collect(params.rootDir, prefix);
    logger.info(`  → Collected ${candidates.length} files (${formatSize(sumBytes(candidates))})`);

    const inventory = new RemoteInventory({ store, retryPolicy, sleep, logger });
    const planner = new HybridSyncPlanner({ tracker, inventory, logger, observer });
    const plan = await planner.plan(candidates, prefix, { incremental: params.incrementalEnabled });

    const executor = new UploadExecutor({ store, tracker, logger, observer });
    const tally = await executor.run(plan.uploads, params.maxWorkers, {
      verifyUploads: params.verifyUploads,
      signal: params.signal,
    });

    let manifestSaved = true;
    try {
      await tracker.save(params.manifestPath);
      logger.debug(`Manifest saved: ${params.manifestPath} (${tracker.size} entries)`);
    } catch (err) {
      manifestSaved = false;
      logger.error(`Could not save manifest ${params.manifestPath}: ${describeError(err)}`);
    }

    const elapsedMs = Math.max(0, clock.now().getTime() - startedMs);
    const { stats } = plan;

    return {
      stats,
      uploaded: tally.uploaded,
      failed: tally.failed + plan.failures.length,
      skipped: stats.manifestSkips + stats.remoteMatches,
      totalBytes: tally.totalBytes,
      elapsedMs,
      bytesPerSecond: elapsedMs > 0 ? tally.totalBytes / (elapsedMs / 1000) : 0,
      manifestSaved,
      failures: [...plan.failures, ...tally.failures],
    };
  }
}
