import path from "path";
import { findManifestFiles } from "../discovery/manifestFiles";
import { storeKeyFor, toStoreKey } from "../io/paths";
import { extractRecord } from "../manifest/extract";
import { Reporter, silentReporter } from "../report/reporter";
import { RecordStore, RecordStoreError, saveRecordStore } from "../store/recordStore";
import { readTextFile } from "../text/encoding";
import { ItemOutcome, ScanSummary } from "../types/operationSummary";
import { errorMessage } from "../utils/error";
import { isDirectory } from "../utils/fs";

export interface ScanOptions {
  rootDir: string;
  storePath: string;
  shallow?: boolean;
  reporter?: Reporter;
}

async function scanManifest(
  rootDir: string,
  manifestPath: string,
  store: RecordStore,
  reporter: Reporter
): Promise<ItemOutcome> {
  const key = storeKeyFor(rootDir, manifestPath);
  const directory = path.dirname(manifestPath);
  const folder = path.basename(directory);
  reporter.info(`Processing: ${folder}`, { path: key });

  try {
    const { text, encoding } = await readTextFile(manifestPath);
    const record = extractRecord(text, { relativePath: key, directory });
    if (!record) {
      reporter.warn(`  No Name or Description found: ${folder}`);
      return { path: key, status: "skipped", reason: "no_content", message: null };
    }

    store.add(record, key);
    reporter.success(`  Extracted: ${folder} - ${record.name ?? ""}`, {
      encoding,
      localized: record.isLocalized
    });
    return { path: key, status: "success", reason: null, message: null };
  } catch (error) {
    const duplicate = error instanceof RecordStoreError && error.kind === "duplicate";
    reporter.error(`Failed to process ${manifestPath}`, { error: errorMessage(error) });
    return {
      path: key,
      status: "failed",
      reason: duplicate ? "duplicate_path" : "read_error",
      message: errorMessage(error)
    };
  }
}

export async function runScan(options: ScanOptions): Promise<ScanSummary> {
  const reporter = options.reporter ?? silentReporter;
  const rootDir = path.resolve(options.rootDir);
  if (!(await isDirectory(rootDir))) {
    throw new Error(`Mods directory not found: ${rootDir}`);
  }

  reporter.heading("Scanning mod manifests...");
  const outcomes: ItemOutcome[] = [];
  const manifests = await findManifestFiles(rootDir, {
    shallow: options.shallow,
    onUnreadableDirectory: (dirPath, error) => {
      reporter.error(`Failed to read directory ${dirPath}`, { error: errorMessage(error) });
      outcomes.push({
        path: toStoreKey(path.relative(rootDir, dirPath)),
        status: "failed",
        reason: "read_error",
        message: errorMessage(error)
      });
    }
  });
  reporter.success(`Found ${manifests.length} manifest.json files`);

  const store = new RecordStore();
  for (const manifestPath of manifests) {
    outcomes.push(await scanManifest(rootDir, manifestPath, store, reporter));
  }

  let storePath: string | null = null;
  if (store.size > 0) {
    storePath = path.resolve(options.storePath);
    await saveRecordStore(storePath, store);
    reporter.heading(`Saved translation backup to ${storePath}`);
  } else {
    reporter.warn("No translation data was extracted; nothing written.");
  }

  const summary: ScanSummary = {
    rootDir,
    storePath,
    manifestsFound: manifests.length,
    extracted: outcomes.filter((o) => o.status === "success").length,
    noContent: outcomes.filter((o) => o.reason === "no_content").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    outcomes
  };
  reporter.success(
    `Extracted ${summary.extracted} mods, ${summary.noContent} without content, ${summary.failed} failed`
  );
  return summary;
}
