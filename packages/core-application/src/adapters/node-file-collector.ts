import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

import type { UploadCandidate } from "@mirror-sync/core-domain";
import type { FileCollector } from "../ports/file-collector";
import type { Logger } from "../ports/logger";
import { LocalIoError, describeError } from "../application/errors";
import { toRemoteKey } from "../application/remote-keys";
import { NullLogger } from "./console-logger";
import {
  DEFAULT_PATH_EXCLUSIONS,
  isExcludedFile,
  isExcludedRelativePath,
  type PathExclusions,
} from "./path-exclusions";

/**
 * Walks a directory tree and turns every regular file into an upload
 * candidate keyed by `prefix + relative path` (forward slashes). Excluded
 * directories are not descended into.
 */
export class NodeFileCollector implements FileCollector {
  private readonly logger: Logger;

  constructor(
    private readonly exclusions: PathExclusions = DEFAULT_PATH_EXCLUSIONS,
    logger?: Logger
  ) {
    this.logger = logger ?? new NullLogger();
  }

  async collect(rootDir: string, prefix: string): Promise<UploadCandidate[]> {
    const root = path.resolve(rootDir);

    try {
      const stat = await fs.stat(root);
      if (!stat.isDirectory()) {
        throw new LocalIoError(`Not a directory: ${root}`, root);
      }
    } catch (err) {
      if (err instanceof LocalIoError) throw err;
      throw new LocalIoError(`Directory not found: ${root}`, root, err);
    }

    const out: UploadCandidate[] = [];
    let skipped = 0;

    const walk = async (current: string): Promise<void> => {
      const dir = path.join(root, current);
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (err) {
        this.logger.warn(`Cannot read directory ${dir}: ${describeError(err)}`);
        return;
      }

      for (const entry of entries) {
        const rel = current ? path.join(current, entry.name) : entry.name;
        if (isExcludedRelativePath(rel, this.exclusions)) {
          skipped++;
          continue;
        }

        if (entry.isDirectory()) {
          await walk(rel);
        } else if (entry.isFile()) {
          const abs = path.join(root, rel);
          if (isExcludedFile(abs, this.exclusions)) {
            skipped++;
            continue;
          }
          try {
            const stat = await fs.stat(abs);
            out.push({ localPath: abs, remoteKey: toRemoteKey(prefix, rel), sizeBytes: stat.size });
          } catch (err) {
            this.logger.warn(`Cannot stat ${abs}: ${describeError(err)}`);
          }
        }
      }
    };

    await walk("");

    if (skipped > 0) this.logger.info(`  → Skipped ${skipped} excluded files/directories`);
    return out.sort((a, b) => (a.remoteKey < b.remoteKey ? -1 : a.remoteKey > b.remoteKey ? 1 : 0));
  }
}
