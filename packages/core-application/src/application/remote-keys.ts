/**
 * Key prefix without leading slash and with a single trailing slash, or ""
 * for the bucket root. Backslashes are treated as separators.
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replaceAll("\\", "/").replace(/^\/+/, "").replace(/\/+$/, "");
  if (!trimmed) return "";
  return `${trimmed}/`;
}

/** Joins prefix and a relative path into a forward-slash key on every OS. */
export function toRemoteKey(prefix: string, relativePath: string): string {
  const rel = relativePath.replaceAll("\\", "/").replace(/^\/+/, "");
  return `${normalizePrefix(prefix)}${rel}`;
}
