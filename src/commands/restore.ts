import path from "path";
import { findManifestInDirectory } from "../discovery/manifestFiles";
import { resolveStoreKey } from "../io/paths";
import { containsCjk } from "../manifest/locale";
import { applyTranslations } from "../manifest/patch";
import { Reporter, silentReporter } from "../report/reporter";
import { loadRecordStore } from "../store/recordStore";
import { readTextFile, writeTextFile } from "../text/encoding";
import { ManifestRecord } from "../types/manifestRecord";
import { ItemOutcome, OutcomeReason, RestoreSummary } from "../types/operationSummary";
import { errorMessage } from "../utils/error";

export interface RestoreOptions {
  rootDir: string;
  storePath: string;
  /** Report what would change without writing any manifest. */
  dryRun?: boolean;
  reporter?: Reporter;
}

function skipped(key: string, reason: OutcomeReason, message: string | null = null): ItemOutcome {
  return { path: key, status: "skipped", reason, message };
}

function failed(key: string, reason: OutcomeReason, message: string | null = null): ItemOutcome {
  return { path: key, status: "failed", reason, message };
}

/** Stored flag wins; records from older backups without it are rechecked. */
export function shouldRestore(record: ManifestRecord): boolean {
  if (record.isLocalized !== null) return record.isLocalized;
  return containsCjk(record.name, record.description);
}

async function restoreRecord(
  rootDir: string,
  key: string,
  record: ManifestRecord,
  dryRun: boolean,
  reporter: Reporter
): Promise<ItemOutcome> {
  const directory = resolveStoreKey(rootDir, key);
  if (!directory) {
    reporter.error(`Refusing path outside the mods directory: ${key}`);
    return failed(key, "unsafe_path");
  }

  const manifestPath = await findManifestInDirectory(directory);
  if (!manifestPath) {
    reporter.warn(`Skipped: ${path.join(directory, "manifest.json")} not found`);
    return skipped(key, "missing_manifest");
  }

  reporter.info(`Processing: ${key}`);
  let text: string;
  try {
    text = (await readTextFile(manifestPath)).text;
  } catch (error) {
    reporter.error(`Failed to read ${manifestPath}`, { error: errorMessage(error) });
    return failed(key, "read_error", errorMessage(error));
  }

  if (!text.trim()) {
    reporter.warn("  Skipped empty file");
    return skipped(key, "empty_manifest");
  }
  if (!shouldRestore(record)) {
    reporter.detail("  Skipped untranslated mod");
    return skipped(key, "not_localized");
  }

  const result = applyTranslations(text, record);
  if (result.changedFields.length === 0) {
    reporter.warn("  No updatable field found");
    return failed(key, "no_updatable_field");
  }

  if (!dryRun) {
    try {
      await writeTextFile(manifestPath, result.text);
    } catch (error) {
      reporter.error(`Failed to write ${manifestPath}`, { error: errorMessage(error) });
      return failed(key, "write_error", errorMessage(error));
    }
  }
  for (const field of result.changedFields) {
    reporter.success(`  Updated ${field}`, field === "Name" ? { value: record.name } : undefined);
  }
  return { path: key, status: "success", reason: null, message: dryRun ? "dry run" : null };
}

export async function runRestore(options: RestoreOptions): Promise<RestoreSummary> {
  const reporter = options.reporter ?? silentReporter;
  const rootDir = path.resolve(options.rootDir);
  const storePath = path.resolve(options.storePath);
  const dryRun = options.dryRun ?? false;

  const store = await loadRecordStore(storePath, reporter);
  reporter.heading(`Loaded translation backup with ${store.size} mods`);

  const outcomes: ItemOutcome[] = [];
  for (const [key, record] of store.entries()) {
    outcomes.push(await restoreRecord(rootDir, key, record, dryRun, reporter));
  }

  const summary: RestoreSummary = {
    rootDir,
    storePath,
    dryRun,
    total: store.size,
    restored: outcomes.filter((o) => o.status === "success").length,
    skipped: outcomes.filter((o) => o.status === "skipped").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    outcomes
  };

  reporter.heading(dryRun ? "Restore dry run complete" : "Restore complete");
  reporter.success(`Restored translations for ${summary.restored} mods`);
  reporter.detail(`Skipped ${summary.skipped} mods`);
  if (summary.failed > 0) {
    reporter.warn(`${summary.failed} mods could not be updated; edit their manifest.json by hand`);
  }
  return summary;
}
