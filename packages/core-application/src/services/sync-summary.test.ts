import { describe, expect, it } from "vitest";

import { formatDuration, formatSize, formatSummary, type SyncRunSummary } from "./sync-summary";

const RULE = "=".repeat(60);

function summary(overrides: Partial<SyncRunSummary> = {}): SyncRunSummary {
  return {
    stats: { total: 10, manifestSkips: 6, remoteMatches: 1, needsUpload: 3 },
    uploaded: 3,
    failed: 0,
    skipped: 7,
    totalBytes: 3 * 1024 * 1024,
    elapsedMs: 2000,
    bytesPerSecond: 1.5 * 1024 * 1024,
    manifestSaved: true,
    failures: [],
    ...overrides,
  };
}

describe("formatSize", () => {
  it("picks the largest fitting unit", () => {
    expect(formatSize(512)).toBe("512 B");
    expect(formatSize(1536)).toBe("1.50 KB");
    expect(formatSize(5 * 1024 * 1024)).toBe("5.00 MB");
    expect(formatSize(3 * 1024 ** 3)).toBe("3.00 GB");
  });
});

describe("formatDuration", () => {
  it("drops leading zero units", () => {
    expect(formatDuration(5_400)).toBe("5s");
    expect(formatDuration(125_000)).toBe("2m 5s");
    expect(formatDuration(3_723_000)).toBe("1h 2m 3s");
  });
});

describe("formatSummary", () => {
  it("renders counts, time and throughput", () => {
    expect(formatSummary(summary())).toEqual([
      RULE,
      "Sync Summary",
      RULE,
      "✓ Uploaded:  3 files (3.00 MB)",
      "✗ Failed:    0 files",
      "⊘ Skipped:   7 files (manifest: 6, remote: 1)",
      "⏱ Time:      2s",
      "⚡ Speed:     1.50 MB/s",
      RULE,
    ]);
  });

  it("omits speed when nothing was uploaded and warns about failures and an unsaved manifest", () => {
    const lines = formatSummary(
      summary({ uploaded: 0, totalBytes: 0, bytesPerSecond: 0, failed: 2, manifestSaved: false })
    );

    expect(lines.slice(3)).toEqual([
      "✓ Uploaded:  0 files (0 B)",
      "✗ Failed:    2 files",
      "⊘ Skipped:   7 files (manifest: 6, remote: 1)",
      "⏱ Time:      2s",
      RULE,
      "⚠ Manifest was not saved; the next run will re-check every file.",
      "⚠ 2 file(s) failed. Review errors above.",
    ]);
  });
});
