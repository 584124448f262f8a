import type { RemoteObjectInfo } from "@mirror-sync/core-domain";

export type RemoteHead = {
  exists: boolean;
  sizeBytes?: number;
};

export type RemoteListPage = {
  objects: RemoteObjectInfo[];
  nextToken: string | null;
};

/**
 * Remote primitives the engine needs. Implementations are bound to one
 * bucket at construction.
 */
export interface RemoteStore {
  head(key: string): Promise<RemoteHead>;
  listPage(prefix: string, continuationToken: string | null): Promise<RemoteListPage>;
  upload(localPath: string, key: string, sizeBytes: number): Promise<void>;
  checkBucket(): Promise<void>;
}
