import { afterEach, beforeEach, describe, expect, it } from "vitest";
import path from "node:path";

import { NodeFileHasher } from "./node-file-hasher";
import { LocalIoError } from "../application/errors";
import { makeTempDir, removeTempDir, writeFixture } from "../testing/temp-dir";

describe("NodeFileHasher", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("hasher");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("returns the md5 hex digest of the file content", async () => {
    const file = await writeFixture(dir, "hello.txt", "hello");
    const h = await new NodeFileHasher().hashFile(file);
    expect(h).toEqual({ algorithm: "md5", value: "5d41402abc4b2a76b9719d911017c592" });
  });

  it("produces the same digest when the file is read in many small chunks", async () => {
    const file = await writeFixture(dir, "hello.txt", "hello");
    const h = await new NodeFileHasher(2).hashFile(file);
    expect(h.value).toBe("5d41402abc4b2a76b9719d911017c592");
  });

  it("hashes an empty file", async () => {
    const file = await writeFixture(dir, "empty.bin", "");
    const h = await new NodeFileHasher().hashFile(file);
    expect(h.value).toBe("d41d8cd98f00b204e9800998ecf8427e");
  });

  it("rejects with LocalIoError when the file cannot be read", async () => {
    const missing = path.join(dir, "missing.txt");
    await expect(new NodeFileHasher().hashFile(missing)).rejects.toBeInstanceOf(LocalIoError);
    await expect(new NodeFileHasher().hashFile(missing)).rejects.toMatchObject({ path: missing });
  });
});
