import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import path from "node:path";

import { createEmptyManifest } from "@mirror-sync/core-domain";
import { ManifestTracker } from "./manifest-tracker";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import { NodeManifestStore } from "../adapters/node-manifest-store";
import type { ManifestStore } from "../ports/manifest-store";
import type { Clock } from "../ports/clock";
import { LocalIoError } from "../application/errors";
import { makeTempDir, removeTempDir, writeFixture } from "../testing/temp-dir";

const fixedClock: Clock = { now: () => new Date("2024-05-01T10:00:00.000Z") };

function countingHasher() {
  const inner = new NodeFileHasher();
  const hashFile = vi.fn((p: string) => inner.hashFile(p));
  return { hasher: { hashFile }, hashFile };
}

const noopStore: ManifestStore = {
  load: async () => createEmptyManifest(),
  save: async () => {},
};

describe("ManifestTracker", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("tracker");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("needs upload for an unknown key without reading the file", async () => {
    const { hasher, hashFile } = countingHasher();
    const tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher });

    await expect(tracker.needsUpload(path.join(dir, "nope.txt"), "nope.txt")).resolves.toBe(true);
    expect(hashFile).not.toHaveBeenCalled();
  });

  it("records an upload with size, md5 and the clock's timestamp", async () => {
    const file = await writeFixture(dir, "a.txt", "hello");
    const { hasher } = countingHasher();
    const tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher, clock: fixedClock });

    const entry = await tracker.recordUpload(file, "backup/a.txt");

    expect(entry).toEqual({
      remoteKey: "backup/a.txt",
      localPath: file,
      sizeBytes: 5,
      contentHash: "5d41402abc4b2a76b9719d911017c592",
      uploadedAtIso: "2024-05-01T10:00:00.000Z",
    });
    expect(tracker.getEntry("backup/a.txt")).toEqual(entry);
    expect(tracker.size).toBe(1);
  });

  it("reports an unchanged file as not needing upload", async () => {
    const file = await writeFixture(dir, "a.txt", "hello");
    const { hasher } = countingHasher();
    const tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher });
    await tracker.recordUpload(file, "a.txt");

    await expect(tracker.needsUpload(file, "a.txt")).resolves.toBe(false);
  });

  it("detects a size change without hashing", async () => {
    const file = await writeFixture(dir, "a.txt", "hello");
    const { hasher, hashFile } = countingHasher();
    const tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher });
    await tracker.recordUpload(file, "a.txt");
    hashFile.mockClear();

    await writeFixture(dir, "a.txt", "hello, world");

    await expect(tracker.needsUpload(file, "a.txt")).resolves.toBe(true);
    expect(hashFile).not.toHaveBeenCalled();
  });

  it("detects a same-size content change through the hash", async () => {
    const file = await writeFixture(dir, "a.txt", "hello");
    const { hasher, hashFile } = countingHasher();
    const tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher });
    await tracker.recordUpload(file, "a.txt");
    hashFile.mockClear();

    await writeFixture(dir, "a.txt", "jello");

    await expect(tracker.needsUpload(file, "a.txt")).resolves.toBe(true);
    expect(hashFile).toHaveBeenCalledTimes(1);
  });

  it("skips hashing when the caller already knows the hash", async () => {
    const file = await writeFixture(dir, "a.txt", "hello");
    const { hasher, hashFile } = countingHasher();
    const tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher });

    const entry = await tracker.recordUpload(file, "a.txt", "5d41402abc4b2a76b9719d911017c592");

    expect(entry.contentHash).toBe("5d41402abc4b2a76b9719d911017c592");
    expect(hashFile).not.toHaveBeenCalled();
  });

  it("keeps unknown entry fields when an entry is overwritten", async () => {
    const file = await writeFixture(dir, "a.txt", "hello");
    const manifest = createEmptyManifest();
    manifest.entries.set("a.txt", {
      remoteKey: "a.txt",
      localPath: file,
      sizeBytes: 1,
      contentHash: "0".repeat(32),
      uploadedAtIso: "2023-01-01T00:00:00.000Z",
      extra: { storage_class: "GLACIER" },
    });
    const tracker = new ManifestTracker(manifest, { store: noopStore, hasher: new NodeFileHasher() });

    const entry = await tracker.recordUpload(file, "a.txt");

    expect(entry.sizeBytes).toBe(5);
    expect(entry.extra).toEqual({ storage_class: "GLACIER" });
  });

  it("applies concurrent records without losing any", async () => {
    const files = await Promise.all(
      Array.from({ length: 20 }, (_, i) => writeFixture(dir, `f${i}.txt`, `content ${i}`))
    );
    const tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher: new NodeFileHasher() });

    await Promise.all(files.map((f, i) => tracker.recordUpload(f, `f${i}.txt`)));

    expect(tracker.size).toBe(20);
    expect(tracker.entries().map((e) => e.remoteKey).sort()).toEqual(
      Array.from({ length: 20 }, (_, i) => `f${i}.txt`).sort()
    );
  });

  it("fails recordUpload with LocalIoError when the file is gone", async () => {
    const tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher: new NodeFileHasher() });
    await expect(tracker.recordUpload(path.join(dir, "gone.txt"), "gone.txt")).rejects.toBeInstanceOf(LocalIoError);
    expect(tracker.size).toBe(0);
  });

  it("stamps last sync and persists through the store on save", async () => {
    const file = await writeFixture(dir, "a.txt", "hello");
    const store = new NodeManifestStore();
    const manifestPath = path.join(dir, "state", "manifest.json");
    const tracker = await ManifestTracker.load(manifestPath, {
      store,
      hasher: new NodeFileHasher(),
      clock: fixedClock,
    });
    expect(tracker.lastSyncIso).toBeNull();

    await tracker.recordUpload(file, "a.txt");
    await tracker.save(manifestPath);

    expect(tracker.lastSyncIso).toBe("2024-05-01T10:00:00.000Z");
    const reloaded = await store.load(manifestPath);
    expect(reloaded.lastSyncIso).toBe("2024-05-01T10:00:00.000Z");
    expect(reloaded.entries.get("a.txt")?.contentHash).toBe("5d41402abc4b2a76b9719d911017c592");
  });
});
