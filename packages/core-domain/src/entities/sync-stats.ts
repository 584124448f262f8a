export interface SyncStats {
  total: number;
  manifestSkips: number;
  remoteMatches: number;
  needsUpload: number;
}

export function emptySyncStats(total = 0): SyncStats {
  return { total, manifestSkips: 0, remoteMatches: 0, needsUpload: 0 };
}
