import type { Manifest } from "@mirror-sync/core-domain";

export interface ManifestStore {
  /** Missing file yields an empty manifest; unreadable content throws ManifestCorruptError. */
  load(manifestPath: string): Promise<Manifest>;
  /** Persists the manifest as given, replacing the previous file atomically. */
  save(manifestPath: string, manifest: Manifest): Promise<void>;
}
