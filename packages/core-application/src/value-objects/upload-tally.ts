import type { CandidateFailure } from "./candidate-failure";

export type UploadTally = {
  uploaded: number;
  failed: number;
  totalBytes: number;
  failures: CandidateFailure[];
};

export function emptyUploadTally(): UploadTally {
  return { uploaded: 0, failed: 0, totalBytes: 0, failures: [] };
}
