import type { RemoteObjectInfo, SyncStats, UploadCandidate } from "@mirror-sync/core-domain";

import type { Logger } from "../ports/logger";
import { noopFileEventObserver, type FileEventObserver } from "../ports/file-event-observer";
import { NullLogger } from "../adapters/console-logger";
import { candidateFailure, type CandidateFailure } from "../value-objects/candidate-failure";
import { describeError } from "../application/errors";
import { statFile } from "../infra/stat-file";

import type { ManifestTracker } from "./manifest-tracker";
import type { RemoteInventory } from "./remote-inventory";
import { classifyAgainstRemote, etagMatches } from "./change-detector";

export type SyncPlan = {
  uploads: UploadCandidate[];
  stats: SyncStats;
  /** Candidates dropped because of a local error (stat/hash). */
  failures: CandidateFailure[];
};

export type PlanOptions = {
  /** false plans every candidate for upload without looking at manifest or remote. */
  incremental?: boolean;
};

export type HybridSyncPlannerDeps = {
  tracker: ManifestTracker;
  inventory: RemoteInventory;
  logger?: Logger;
  observer?: FileEventObserver;
};

type CrossCheck = "upload" | "skip";

/**
 * Two-phase filter producing the minimal upload set:
 *
 * 1. manifest: size, then hash, against the last recorded upload
 * 2. remote inventory (one listing for all survivors): presence, size,
 *    mtime, and for touched-but-same-size files, hash against etag
 *
 * Files found already present remotely are written back to the manifest
 * (self-healing) without being uploaded.
 */
export class HybridSyncPlanner {
  private readonly logger: Logger;
  private readonly observer: FileEventObserver;

  constructor(private readonly deps: HybridSyncPlannerDeps) {
    this.logger = deps.logger ?? new NullLogger();
    this.observer = deps.observer ?? noopFileEventObserver;
  }

  async plan(
    candidates: readonly UploadCandidate[],
    prefix: string,
    options: PlanOptions = {}
  ): Promise<SyncPlan> {
    const total = candidates.length;

    if (options.incremental === false) {
      this.logger.info(`Incremental sync disabled: planning all ${total} files for upload`);
      return {
        uploads: [...candidates],
        stats: { total, manifestSkips: 0, remoteMatches: 0, needsUpload: total },
        failures: [],
      };
    }

    const failures: CandidateFailure[] = [];

    /* ---------------- phase 1: manifest ---------------- */
    const survivors: UploadCandidate[] = [];
    let manifestSkips = 0;

    for (const c of candidates) {
      try {
        if (await this.deps.tracker.needsUpload(c.localPath, c.remoteKey)) {
          survivors.push(c);
        } else {
          manifestSkips++;
          this.observer.onFileEvent(c.remoteKey, c.sizeBytes, "skipped");
        }
      } catch (err) {
        failures.push(candidateFailure(c, err));
        this.logger.warn(`Skipping ${c.remoteKey}: ${describeError(err)}`);
      }
    }

    this.logger.info(
      `Phase 1 (manifest): ${manifestSkips} unchanged, ${survivors.length} to verify against remote`
    );

    if (survivors.length === 0) {
      return {
        uploads: [],
        stats: { total, manifestSkips, remoteMatches: 0, needsUpload: 0 },
        failures,
      };
    }

    /* ---------------- phase 2: remote inventory ---------------- */
    // RemoteUnavailableError propagates: a partial view of the bucket is not safe to plan on.
    const inventory = await this.deps.inventory.listAll(prefix);

    const uploads: UploadCandidate[] = [];
    let remoteMatches = 0;

    for (const c of survivors) {
      try {
        const decision = await this.crossCheck(c, inventory.get(c.remoteKey));
        if (decision === "upload") {
          uploads.push(c);
        } else {
          remoteMatches++;
          this.observer.onFileEvent(c.remoteKey, c.sizeBytes, "skipped");
        }
      } catch (err) {
        failures.push(candidateFailure(c, err));
        this.logger.warn(`Skipping ${c.remoteKey}: ${describeError(err)}`);
      }
    }

    this.logger.info(
      `Phase 2 (remote): ${remoteMatches} already present, ${uploads.length} need upload`
    );

    return {
      uploads,
      stats: { total, manifestSkips, remoteMatches, needsUpload: uploads.length },
      failures,
    };
  }

  private async crossCheck(
    c: UploadCandidate,
    remote: RemoteObjectInfo | undefined
  ): Promise<CrossCheck> {
    const { tracker } = this.deps;
    const local = await statFile(c.localPath);
    const comparison = classifyAgainstRemote(local, remote);

    switch (comparison.kind) {
      case "missing":
      case "size_mismatch":
        return "upload";

      case "older_or_equal":
        await tracker.recordUpload(c.localPath, c.remoteKey);
        return "skip";

      case "newer_ambiguous": {
        const hash = await tracker.hash(c.localPath);
        if (!etagMatches(hash, comparison.remote.etag)) return "upload";
        await tracker.recordUpload(c.localPath, c.remoteKey, hash);
        return "skip";
      }
    }
  }
}
