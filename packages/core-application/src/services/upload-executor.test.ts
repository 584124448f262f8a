import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createEmptyManifest, type UploadCandidate } from "@mirror-sync/core-domain";
import { UploadExecutor } from "./upload-executor";
import { ManifestTracker } from "./manifest-tracker";
import { NodeFileHasher } from "../adapters/node-file-hasher";
import type { ManifestStore } from "../ports/manifest-store";
import type { RemoteHead } from "../ports/remote-store";
import type { FileOutcome } from "../ports/file-event-observer";
import { UploadFailedError } from "../application/errors";
import { InMemoryRemoteStore } from "../testing/in-memory-remote-store";
import { makeTempDir, removeTempDir, writeFixture } from "../testing/temp-dir";

const noopStore: ManifestStore = {
  load: async () => createEmptyManifest(),
  save: async () => {},
};

class TrackingRemoteStore extends InMemoryRemoteStore {
  inFlight = 0;
  maxInFlight = 0;

  override async upload(localPath: string, key: string): Promise<void> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await super.upload(localPath, key);
    } finally {
      this.inFlight--;
    }
  }
}

class MissingAfterUploadStore extends InMemoryRemoteStore {
  override async head(): Promise<RemoteHead> {
    return { exists: false };
  }
}

describe("UploadExecutor", () => {
  let dir: string;
  let tracker: ManifestTracker;

  beforeEach(async () => {
    dir = await makeTempDir("executor");
    tracker = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher: new NodeFileHasher() });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function candidates(n: number): Promise<UploadCandidate[]> {
    const out: UploadCandidate[] = [];
    for (let i = 0; i < n; i++) {
      const content = `file-${i}-`.repeat(i + 1);
      const localPath = await writeFixture(dir, `f${String(i).padStart(2, "0")}.txt`, content);
      out.push({ localPath, remoteKey: `k/f${String(i).padStart(2, "0")}.txt`, sizeBytes: Buffer.byteLength(content) });
    }
    return out;
  }

  it("returns an empty tally for no candidates", async () => {
    const store = new InMemoryRemoteStore();
    const tally = await new UploadExecutor({ store, tracker }).run([], 4);
    expect(tally).toEqual({ uploaded: 0, failed: 0, totalBytes: 0, failures: [] });
  });

  it("uploads every candidate and records each one in the manifest", async () => {
    const store = new InMemoryRemoteStore();
    const cs = await candidates(3);

    const tally = await new UploadExecutor({ store, tracker }).run(cs, 2);

    expect(tally.uploaded).toBe(3);
    expect(tally.failed).toBe(0);
    expect(tally.totalBytes).toBe(cs.reduce((sum, c) => sum + c.sizeBytes, 0));
    expect([...store.uploadedKeys].sort()).toEqual(["k/f00.txt", "k/f01.txt", "k/f02.txt"]);
    expect(tracker.size).toBe(3);
  });

  it("keeps at most the worker count in flight and loses no manifest update", async () => {
    for (const workers of [1, 3, 8]) {
      const store = new TrackingRemoteStore();
      store.uploadDelayMs = () => Math.floor(Math.random() * 10);
      const local = new ManifestTracker(createEmptyManifest(), { store: noopStore, hasher: new NodeFileHasher() });
      const cs = await candidates(25);

      const tally = await new UploadExecutor({ store, tracker: local }).run(cs, workers);

      expect(tally.uploaded).toBe(25);
      expect(store.maxInFlight).toBeLessThanOrEqual(workers);
      expect(new Set(store.uploadedKeys).size).toBe(25);
      expect(local.size).toBe(25);
    }
  });

  it("isolates a failed upload from the rest of the batch", async () => {
    const store = new InMemoryRemoteStore();
    store.failingKeys.add("k/f01.txt");
    const events: Array<[string, FileOutcome]> = [];
    const cs = await candidates(3);

    const tally = await new UploadExecutor({
      store,
      tracker,
      observer: { onFileEvent: (key, _bytes, outcome) => events.push([key, outcome]) },
    }).run(cs, 1);

    expect(tally.uploaded).toBe(2);
    expect(tally.failed).toBe(1);
    expect(tally.totalBytes).toBe(cs[0].sizeBytes + cs[2].sizeBytes);
    expect(tally.failures).toHaveLength(1);
    const failure = tally.failures[0];
    expect(failure.remoteKey).toBe("k/f01.txt");
    expect(failure.error).toBeInstanceOf(UploadFailedError);
    expect(failure.error.message).toBe("Failed to upload k/f01.txt: simulated failure for k/f01.txt");
    expect(tracker.getEntry("k/f01.txt")).toBeUndefined();
    expect(events).toEqual([
      ["k/f00.txt", "uploaded"],
      ["k/f01.txt", "failed"],
      ["k/f02.txt", "uploaded"],
    ]);
  });

  it("fails an upload that verification cannot find", async () => {
    const store = new MissingAfterUploadStore();
    const [c] = await candidates(1);

    const tally = await new UploadExecutor({ store, tracker }).run([c], 1, { verifyUploads: true });

    expect(tally.uploaded).toBe(0);
    expect(tally.failed).toBe(1);
    expect(tally.failures[0].error.message).toBe(
      `Verification failed for k/f00.txt: expected ${c.sizeBytes} bytes, remote has no object`
    );
    expect(tracker.size).toBe(0);
  });

  it("passes verification when the remote size matches", async () => {
    const store = new InMemoryRemoteStore();
    const cs = await candidates(2);

    const tally = await new UploadExecutor({ store, tracker }).run(cs, 2, { verifyUploads: true });

    expect(tally.uploaded).toBe(2);
    expect(tally.failed).toBe(0);
  });

  it("starts nothing when the signal is already aborted", async () => {
    const store = new InMemoryRemoteStore();
    const controller = new AbortController();
    controller.abort();

    const tally = await new UploadExecutor({ store, tracker }).run(await candidates(3), 2, {
      signal: controller.signal,
    });

    expect(tally.uploaded).toBe(0);
    expect(store.uploadedKeys).toEqual([]);
  });

  it("stops taking new files after an abort and finishes the one in flight", async () => {
    const store = new InMemoryRemoteStore();
    const controller = new AbortController();

    const tally = await new UploadExecutor({
      store,
      tracker,
      observer: { onFileEvent: () => controller.abort() },
    }).run(await candidates(5), 1, { signal: controller.signal });

    expect(tally.uploaded).toBe(1);
    expect(store.uploadedKeys).toEqual(["k/f00.txt"]);
    expect(tracker.size).toBe(1);
  });
});
