import path from "path";

export const MANIFEST_FILE_NAME = "manifest.json";

/** Store keys use forward slashes; the scan root itself is ".". */
export function toStoreKey(relativeDir: string): string {
  const normalized = relativeDir.replace(/\\/g, "/");
  return normalized === "" ? "." : normalized;
}

export function storeKeyFor(rootDir: string, manifestPath: string): string {
  return toStoreKey(path.relative(rootDir, path.dirname(manifestPath)));
}

/**
 * Absolute directory for a store key under `baseDir`, or null when the key
 * would land outside it.
 */
export function resolveStoreKey(baseDir: string, key: string): string | null {
  const base = path.resolve(baseDir);
  const target = path.resolve(base, key.replace(/\\/g, "/"));
  const relative = path.relative(base, target);
  if (relative === "") return target;
  if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return target;
}

export function resolveStorePath(rootDir: string, store: string): string {
  return path.resolve(rootDir, store);
}
