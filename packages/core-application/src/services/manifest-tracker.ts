import type { Manifest, ManifestEntry } from "@mirror-sync/core-domain";

import type { FileHasher } from "../ports/file-hasher";
import type { ManifestStore } from "../ports/manifest-store";
import { systemClock, type Clock } from "../ports/clock";
import { statFile } from "../infra/stat-file";

export type ManifestTrackerDeps = {
  store: ManifestStore;
  hasher: FileHasher;
  clock?: Clock;
};

/**
 * In-memory view of the manifest for one sync run.
 *
 * Reads are free-threaded; every mutation of the entries map goes through a
 * single promise chain, so completions of concurrent uploads are applied one
 * at a time. Nothing touches the disk until `save`.
 */
export class ManifestTracker {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly manifest: Manifest,
    private readonly deps: ManifestTrackerDeps
  ) {}

  static async load(manifestPath: string, deps: ManifestTrackerDeps): Promise<ManifestTracker> {
    const manifest = await deps.store.load(manifestPath);
    return new ManifestTracker(manifest, deps);
  }

  get version(): string {
    return this.manifest.version;
  }

  get lastSyncIso(): string | null {
    return this.manifest.lastSyncIso;
  }

  get size(): number {
    return this.manifest.entries.size;
  }

  getEntry(remoteKey: string): ManifestEntry | undefined {
    return this.manifest.entries.get(remoteKey);
  }

  entries(): ManifestEntry[] {
    return [...this.manifest.entries.values()];
  }

  async hash(localPath: string): Promise<string> {
    const h = await this.deps.hasher.hashFile(localPath);
    return h.value;
  }

  /**
   * Cheap checks first: a missing entry or a size change answers without
   * reading the file. Only an equal size pays for a full hash.
   */
  async needsUpload(localPath: string, remoteKey: string): Promise<boolean> {
    const entry = this.manifest.entries.get(remoteKey);
    if (!entry) return true;

    const { sizeBytes } = await statFile(localPath);
    if (sizeBytes !== entry.sizeBytes) return true;

    const current = await this.hash(localPath);
    return current !== entry.contentHash;
  }

  /**
   * Fingerprints the file as it is now and overwrites the entry for
   * `remoteKey`. `knownHash` skips re-hashing when the caller already has it.
   */
  async recordUpload(localPath: string, remoteKey: string, knownHash?: string): Promise<ManifestEntry> {
    const { sizeBytes } = await statFile(localPath);
    const contentHash = knownHash ?? (await this.hash(localPath));

    return this.exclusive(() => {
      const previous = this.manifest.entries.get(remoteKey);
      const entry: ManifestEntry = {
        remoteKey,
        localPath,
        sizeBytes,
        contentHash,
        uploadedAtIso: this.now().toISOString(),
      };
      if (previous?.extra) entry.extra = previous.extra;
      this.manifest.entries.set(remoteKey, entry);
      return entry;
    });
  }

  /** Stamps `lastSyncIso` and persists through the store. */
  async save(manifestPath: string): Promise<void> {
    await this.exclusive(() => {
      this.manifest.lastSyncIso = this.now().toISOString();
    });
    await this.deps.store.save(manifestPath, this.manifest);
  }

  private now(): Date {
    return (this.deps.clock ?? systemClock).now();
  }

  private exclusive<T>(fn: () => T): Promise<T> {
    const run = this.writeChain.then(fn);
    this.writeChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
