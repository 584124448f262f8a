import path from "node:path";

import { MANIFEST_DIR } from "../application/config";

export type PathExclusions = {
  /** Matched against every segment of the relative path, files included. */
  names: ReadonlySet<string>;
  extensions: ReadonlySet<string>;
  /** Absolute files skipped along with their `<path>.*.tmp` siblings. */
  files?: ReadonlySet<string>;
};

export const DEFAULT_PATH_EXCLUSIONS: PathExclusions = {
  names: new Set([
    ".git",
    ".venv",
    "__pycache__",
    ".pytest_cache",
    "node_modules",
    ".env",
    ".DS_Store",
    MANIFEST_DIR,
  ]),
  extensions: new Set([".pyc", ".pyo", ".pyd", ".so", ".o", ".a"]),
};

export function isExcludedRelativePath(relPath: string, exclusions: PathExclusions): boolean {
  const rel = relPath.replaceAll("\\", "/");
  const segments = rel.split("/").filter(Boolean);

  if (segments.some((s) => exclusions.names.has(s))) return true;
  return exclusions.extensions.has(path.posix.extname(rel));
}

/** Copy of `exclusions` that also skips `filePath` (e.g. the manifest) and its temp files. */
export function withExcludedFile(exclusions: PathExclusions, filePath: string): PathExclusions {
  const files = new Set(exclusions.files ?? []);
  files.add(path.resolve(filePath));
  return { ...exclusions, files };
}

export function isExcludedFile(absPath: string, exclusions: PathExclusions): boolean {
  if (!exclusions.files) return false;
  const p = path.resolve(absPath);
  for (const file of exclusions.files) {
    if (p === file) return true;
    if (p.startsWith(`${file}.`) && p.endsWith(".tmp")) return true;
  }
  return false;
}

/** Absolute-path predicate for watchers; anything outside `rootDir` is ignored. */
export function createPathIgnore(rootDir: string, exclusions: PathExclusions = DEFAULT_PATH_EXCLUSIONS) {
  const root = path.resolve(rootDir);

  return (absPath: string) => {
    const p = path.resolve(absPath);
    if (p === root) return false;

    const rel = path.relative(root, p);
    if (rel.startsWith("..") || path.isAbsolute(rel)) return true;

    return isExcludedFile(p, exclusions) || isExcludedRelativePath(rel, exclusions);
  };
}
