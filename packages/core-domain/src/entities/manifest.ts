import type { ManifestEntry, RemoteKey } from './manifest-entry';

export const MANIFEST_VERSION = '1.0';

export interface Manifest {
  version: string;
  lastSyncIso: string | null;
  entries: Map<RemoteKey, ManifestEntry>;
  extra?: Record<string, unknown>;
}

export function createEmptyManifest(): Manifest {
  return {
    version: MANIFEST_VERSION,
    lastSyncIso: null,
    entries: new Map(),
  };
}
