import { createHash } from "crypto";
import { createReadStream } from "fs";
import type { FileHasher, FileHash } from "../ports/file-hasher";
import { LocalIoError } from "../application/errors";

/** Read size per chunk; the whole file is never held in memory. */
export const HASH_CHUNK_BYTES = 8 * 1024 * 1024;

export class NodeFileHasher implements FileHasher {
  constructor(private readonly chunkBytes: number = HASH_CHUNK_BYTES) {}

  async hashFile(absolutePath: string): Promise<FileHash> {
    const algo: FileHash["algorithm"] = "md5";

    return new Promise((resolve, reject) => {
      const hash = createHash(algo);
      const stream = createReadStream(absolutePath, { highWaterMark: this.chunkBytes });

      stream.on("data", (chunk) => hash.update(chunk));
      stream.on("error", (err) => {
        reject(new LocalIoError(`Failed to hash ${absolutePath}`, absolutePath, err));
      });
      stream.on("end", () => {
        resolve({ algorithm: algo, value: hash.digest("hex") });
      });
    });
  }
}
