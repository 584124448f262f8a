import type { UploadCandidate } from "@mirror-sync/core-domain";

import type { RemoteStore } from "../ports/remote-store";
import type { Logger } from "../ports/logger";
import { noopFileEventObserver, type FileEventObserver } from "../ports/file-event-observer";
import { NullLogger } from "../adapters/console-logger";
import { UploadFailedError, describeError } from "../application/errors";
import { DEFAULT_MAX_WORKERS } from "../application/config";
import { emptyUploadTally, type UploadTally } from "../value-objects/upload-tally";

import type { ManifestTracker } from "./manifest-tracker";
import { runWithConcurrency } from "./run-with-concurrency";

export type UploadExecutorDeps = {
  store: RemoteStore;
  tracker: ManifestTracker;
  logger?: Logger;
  observer?: FileEventObserver;
};

export type UploadRunOptions = {
  /** HEAD each object after upload and fail it when size or presence is wrong. */
  verifyUploads?: boolean;
  signal?: AbortSignal;
};

type UploadOutcome = { ok: true } | { ok: false; error: UploadFailedError };

export class UploadExecutor {
  private readonly logger: Logger;
  private readonly observer: FileEventObserver;

  constructor(private readonly deps: UploadExecutorDeps) {
    this.logger = deps.logger ?? new NullLogger();
    this.observer = deps.observer ?? noopFileEventObserver;
  }

  /**
   * Uploads every candidate with at most `maxConcurrency` in flight. A
   * failure is counted and reported for its own candidate only; nothing is
   * retried here.
   */
  async run(
    candidates: readonly UploadCandidate[],
    maxConcurrency: number = DEFAULT_MAX_WORKERS,
    options: UploadRunOptions = {}
  ): Promise<UploadTally> {
    const tally = emptyUploadTally();
    const total = candidates.length;
    if (total === 0) return tally;

    this.logger.info(`Uploading ${total} files with ${maxConcurrency} parallel workers...`);

    const progressStep = Math.max(1, Math.floor(total / 10));
    let completed = 0;

    await runWithConcurrency(
      candidates,
      maxConcurrency,
      async (c) => {
        const outcome = await this.uploadOne(c, options.verifyUploads === true);

        if (outcome.ok) {
          tally.uploaded++;
          tally.totalBytes += c.sizeBytes;
          this.observer.onFileEvent(c.remoteKey, c.sizeBytes, "uploaded");
        } else {
          tally.failed++;
          tally.failures.push({ remoteKey: c.remoteKey, localPath: c.localPath, error: outcome.error });
          this.observer.onFileEvent(c.remoteKey, c.sizeBytes, "failed", outcome.error);
        }

        completed++;
        if (completed % progressStep === 0 || completed === total) {
          const pct = ((completed / total) * 100).toFixed(1);
          this.logger.info(`Progress: ${completed}/${total} (${pct}%)`);
        }
      },
      options.signal
    );

    if (options.signal?.aborted && completed < total) {
      this.logger.warn(`Upload aborted: ${total - completed} files not attempted`);
    }

    return tally;
  }

  private async uploadOne(c: UploadCandidate, verify: boolean): Promise<UploadOutcome> {
    const { store, tracker } = this.deps;

    try {
      await store.upload(c.localPath, c.remoteKey, c.sizeBytes);
    } catch (err) {
      return {
        ok: false,
        error: new UploadFailedError(`Failed to upload ${c.remoteKey}: ${describeError(err)}`, c.remoteKey, err),
      };
    }

    if (verify) {
      try {
        const head = await store.head(c.remoteKey);
        if (!head.exists || head.sizeBytes !== c.sizeBytes) {
          return {
            ok: false,
            error: new UploadFailedError(
              `Verification failed for ${c.remoteKey}: expected ${c.sizeBytes} bytes, remote has ${
                head.exists ? `${head.sizeBytes ?? "unknown"} bytes` : "no object"
              }`,
              c.remoteKey
            ),
          };
        }
      } catch (err) {
        return {
          ok: false,
          error: new UploadFailedError(`Verification failed for ${c.remoteKey}: ${describeError(err)}`, c.remoteKey, err),
        };
      }
    }

    try {
      await tracker.recordUpload(c.localPath, c.remoteKey);
    } catch (err) {
      // The object is in the bucket; the next run's remote cross-check will pick it up.
      this.logger.warn(`Uploaded ${c.remoteKey} but could not record it in the manifest: ${describeError(err)}`);
    }

    return { ok: true };
  }
}
