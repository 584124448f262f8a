import type { UploadCandidate } from "@mirror-sync/core-domain";

export interface FileCollector {
  collect(rootDir: string, prefix: string): Promise<UploadCandidate[]>;
}
