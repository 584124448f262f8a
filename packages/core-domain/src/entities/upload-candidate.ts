import type { RemoteKey } from './manifest-entry';

export interface UploadCandidate {
  localPath: string;
  remoteKey: RemoteKey;
  sizeBytes: number;
}
