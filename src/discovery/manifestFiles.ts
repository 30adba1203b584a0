import { promises as fs } from "fs";
import path from "path";
import { listFilesRecursive, WalkErrorHandler } from "../utils/fs";
import { MANIFEST_FILE_NAME } from "../io/paths";

function isManifestName(fileName: string): boolean {
  return fileName.toLowerCase() === MANIFEST_FILE_NAME;
}

export interface FindManifestOptions {
  /** Only look one level down, at `<root>/<child>/manifest.json`. */
  shallow?: boolean;
  /** Called for each directory the recursive walk cannot read. */
  onUnreadableDirectory?: WalkErrorHandler;
}

export async function findManifestFiles(
  rootDir: string,
  options: FindManifestOptions = {}
): Promise<string[]> {
  if (!options.shallow) {
    return listFilesRecursive(
      rootDir,
      (filePath) => isManifestName(path.basename(filePath)),
      options.onUnreadableDirectory
    );
  }

  const results: string[] = [];
  const entries = await fs.readdir(rootDir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const manifestPath = await findManifestInDirectory(path.join(rootDir, entry.name));
    if (manifestPath) results.push(manifestPath);
  }
  return results;
}

/** The directory's manifest, matched case-insensitively, preferring the exact name. */
export async function findManifestInDirectory(dirPath: string): Promise<string | null> {
  let entries: string[];
  try {
    entries = await fs.readdir(dirPath);
  } catch {
    return null;
  }
  if (entries.includes(MANIFEST_FILE_NAME)) return path.join(dirPath, MANIFEST_FILE_NAME);
  const match = entries.sort().find(isManifestName);
  return match ? path.join(dirPath, match) : null;
}
