import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { createEmptyManifest, type Manifest, type ManifestEntry } from "@mirror-sync/core-domain";
import type { ManifestStore } from "../ports/manifest-store";
import { LocalIoError, ManifestCorruptError, isErrnoCode } from "../application/errors";

// Unknown fields pass through so a newer writer's data survives a rewrite.
const fileEntrySchema = z
  .object({
    local_path: z.string(),
    size: z.number().int().nonnegative(),
    md5: z.string().min(1),
    uploaded_at: z.string(),
  })
  .passthrough();

// `files` is validated entry by entry: z.record drops a `__proto__` key, which
// is a legal file name.
const manifestFileSchema = z
  .object({
    version: z.string(),
    last_sync: z.string().nullable().default(null),
    files: z.unknown().optional(),
  })
  .passthrough();

type ManifestFile = z.infer<typeof manifestFileSchema>;
type FileEntryRecord = z.infer<typeof fileEntrySchema>;

function hasKeys(obj: Record<string, unknown>): boolean {
  return Object.keys(obj).length > 0;
}

function formatIssue(issuePath: Array<string | number>, message: string): string {
  return `${issuePath.join(".") || "<root>"}: ${message}`;
}

function parseEntries(files: unknown, issues: string[]): Array<[string, FileEntryRecord]> {
  if (files === undefined) return [];
  if (typeof files !== "object" || files === null || Array.isArray(files)) {
    issues.push(formatIssue(["files"], "Expected object"));
    return [];
  }

  const entries: Array<[string, FileEntryRecord]> = [];
  for (const [remoteKey, raw] of Object.entries(files)) {
    const parsed = fileEntrySchema.safeParse(raw);
    if (parsed.success) {
      entries.push([remoteKey, parsed.data]);
    } else {
      for (const i of parsed.error.issues) issues.push(formatIssue(["files", remoteKey, ...i.path], i.message));
    }
  }
  return entries;
}

function fromFile(file: ManifestFile, entries: Array<[string, FileEntryRecord]>): Manifest {
  const { version, last_sync, files: _files, ...extra } = file;
  const manifest = createEmptyManifest();
  manifest.version = version;
  manifest.lastSyncIso = last_sync;
  if (hasKeys(extra)) manifest.extra = extra;

  for (const [remoteKey, raw] of entries) {
    const { local_path, size, md5, uploaded_at, ...entryExtra } = raw;
    const entry: ManifestEntry = {
      remoteKey,
      localPath: local_path,
      sizeBytes: size,
      contentHash: md5,
      uploadedAtIso: uploaded_at,
    };
    if (hasKeys(entryExtra)) entry.extra = entryExtra;
    manifest.entries.set(remoteKey, entry);
  }

  return manifest;
}

export function serializeManifest(manifest: Manifest): string {
  const keys = [...manifest.entries.keys()].sort();
  // fromEntries defines own properties, so a `__proto__` key is written like any other
  const files = Object.fromEntries(
    keys.flatMap((key) => {
      const entry = manifest.entries.get(key);
      if (!entry) return [];
      const record = {
        local_path: entry.localPath,
        size: entry.sizeBytes,
        md5: entry.contentHash,
        uploaded_at: entry.uploadedAtIso,
        ...entry.extra,
      };
      return [[key, record] as const];
    })
  );

  const body = {
    version: manifest.version,
    last_sync: manifest.lastSyncIso,
    files,
    ...manifest.extra,
  };
  return JSON.stringify(body, null, 2) + "\n";
}

/**
 * JSON manifest on local disk. Saves go through a temp file in the same
 * directory followed by a rename, so a crash leaves either the old or the
 * new manifest, never a partial one.
 */
export class NodeManifestStore implements ManifestStore {
  private tmpSeq = 0;

  async load(manifestPath: string): Promise<Manifest> {
    let raw: string;
    try {
      raw = await fs.readFile(manifestPath, "utf-8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return createEmptyManifest();
      throw new LocalIoError(`Failed to read manifest ${manifestPath}`, manifestPath, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ManifestCorruptError(`Manifest is not valid JSON: ${manifestPath}`, manifestPath, err);
    }

    const parsed = manifestFileSchema.safeParse(json);
    const issues = parsed.success ? [] : parsed.error.issues.map((i) => formatIssue(i.path, i.message));
    const entries = parseEntries(parsed.success ? parsed.data.files : undefined, issues);

    if (!parsed.success || issues.length > 0) {
      throw new ManifestCorruptError(
        `Manifest has an unexpected structure: ${manifestPath} (${issues.join("; ")})`,
        manifestPath,
        parsed.success ? undefined : parsed.error
      );
    }

    return fromFile(parsed.data, entries);
  }

  async save(manifestPath: string, manifest: Manifest): Promise<void> {
    const body = serializeManifest(manifest);
    const tmpPath = `${manifestPath}.${process.pid}.${++this.tmpSeq}.tmp`;
    let tmpCreated = false;

    try {
      await fs.mkdir(path.dirname(manifestPath), { recursive: true });
      const handle = await fs.open(tmpPath, "w");
      tmpCreated = true;
      try {
        await handle.writeFile(body, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, manifestPath);
    } catch (err) {
      if (tmpCreated) await fs.rm(tmpPath, { force: true });
      throw new LocalIoError(`Failed to save manifest ${manifestPath}`, manifestPath, err);
    }
  }
}
