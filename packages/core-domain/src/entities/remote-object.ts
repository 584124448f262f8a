import type { RemoteKey } from './manifest-entry';

export interface RemoteObjectInfo {
  remoteKey: RemoteKey;
  sizeBytes: number;
  lastModified: Date;
  /**
   * Store-computed digest. A quoted MD5 for single-part objects on S3, a
   * composite `<hex>-<parts>` value for multipart ones.
   */
  etag: string | null;
}
