import type { RemoteObjectInfo } from "@mirror-sync/core-domain";
import type { LocalFileState } from "../infra/stat-file";

export type RemoteComparison =
  | { kind: "missing" }
  | { kind: "size_mismatch"; remote: RemoteObjectInfo }
  | { kind: "older_or_equal"; remote: RemoteObjectInfo }
  | { kind: "newer_ambiguous"; remote: RemoteObjectInfo };

/**
 * Size + mtime tier of the cascade. Only `newer_ambiguous` needs the
 * content hash to decide.
 */
export function classifyAgainstRemote(
  local: LocalFileState,
  remote: RemoteObjectInfo | undefined
): RemoteComparison {
  if (!remote) return { kind: "missing" };
  if (remote.sizeBytes !== local.sizeBytes) return { kind: "size_mismatch", remote };
  if (local.mtimeMs <= remote.lastModified.getTime()) return { kind: "older_or_equal", remote };
  return { kind: "newer_ambiguous", remote };
}

const MD5_HEX = /^[0-9a-f]{32}$/;

/**
 * Returns the MD5 carried by a single-part etag, or null when the etag is
 * not a plain content digest (multipart `<hex>-<n>`, weak, or unknown).
 */
export function parseSimpleEtag(etag: string | null | undefined): string | null {
  if (!etag) return null;

  const trimmed = etag.trim();
  if (trimmed.startsWith("W/")) return null;

  const unquoted = trimmed.replace(/^"(.*)"$/, "$1").toLowerCase();
  return MD5_HEX.test(unquoted) ? unquoted : null;
}

/** Unrecognized etag formats never match, which sends the file to upload. */
export function etagMatches(localHash: string, etag: string | null | undefined): boolean {
  const remoteHash = parseSimpleEtag(etag);
  return remoteHash !== null && remoteHash === localHash.toLowerCase();
}
