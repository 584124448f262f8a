export type RemoteKey = string;

export interface ManifestEntry {
  remoteKey: RemoteKey;
  /** Last known source path. Informational only. */
  localPath: string;
  sizeBytes: number;
  /** Lowercase hex MD5 of the full content at `uploadedAtIso`. */
  contentHash: string;
  uploadedAtIso: string;
  /** Fields found on disk that this version does not know about. */
  extra?: Record<string, unknown>;
}
