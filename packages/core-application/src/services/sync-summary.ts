import type { SyncStats } from "@mirror-sync/core-domain";
import type { CandidateFailure } from "../value-objects/candidate-failure";

export type SyncRunSummary = {
  stats: SyncStats;
  uploaded: number;
  /** Upload failures plus candidates dropped during planning. */
  failed: number;
  skipped: number;
  totalBytes: number;
  elapsedMs: number;
  bytesPerSecond: number;
  manifestSaved: boolean;
  failures: CandidateFailure[];
};

const KB = 1024;
const MB = KB ** 2;
const GB = KB ** 3;

export function formatSize(bytes: number): string {
  if (bytes >= GB) return `${(bytes / GB).toFixed(2)} GB`;
  if (bytes >= MB) return `${(bytes / MB).toFixed(2)} MB`;
  if (bytes >= KB) return `${(bytes / KB).toFixed(2)} KB`;
  return `${Math.round(bytes)} B`;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

const RULE = "=".repeat(60);

export function formatSummary(summary: SyncRunSummary): string[] {
  const { stats } = summary;
  const lines = [
    RULE,
    "Sync Summary",
    RULE,
    `✓ Uploaded:  ${summary.uploaded} files (${formatSize(summary.totalBytes)})`,
    `✗ Failed:    ${summary.failed} files`,
    `⊘ Skipped:   ${summary.skipped} files (manifest: ${stats.manifestSkips}, remote: ${stats.remoteMatches})`,
    `⏱ Time:      ${formatDuration(summary.elapsedMs)}`,
  ];

  if (summary.totalBytes > 0 && summary.elapsedMs > 0) {
    lines.push(`⚡ Speed:     ${formatSize(summary.bytesPerSecond)}/s`);
  }
  lines.push(RULE);

  if (!summary.manifestSaved) {
    lines.push("⚠ Manifest was not saved; the next run will re-check every file.");
  }
  if (summary.failed > 0) {
    lines.push(`⚠ ${summary.failed} file(s) failed. Review errors above.`);
  }

  return lines;
}
