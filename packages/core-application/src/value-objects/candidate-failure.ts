import type { UploadCandidate } from "@mirror-sync/core-domain";
import { toError } from "../application/errors";

export type CandidateFailure = {
  remoteKey: string;
  localPath: string;
  error: Error;
};

export function candidateFailure(candidate: UploadCandidate, err: unknown): CandidateFailure {
  return {
    remoteKey: candidate.remoteKey,
    localPath: candidate.localPath,
    error: toError(err),
  };
}
