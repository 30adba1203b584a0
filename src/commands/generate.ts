import path from "path";
import { MANIFEST_FILE_NAME, resolveStoreKey } from "../io/paths";
import { buildSyntheticManifest } from "../manifest/template";
import { Reporter, silentReporter } from "../report/reporter";
import { loadRecordStore } from "../store/recordStore";
import { GenerateSummary, ItemOutcome } from "../types/operationSummary";
import { errorMessage } from "../utils/error";
import { ensureDir, writeJson } from "../utils/fs";

export interface GenerateOptions {
  storePath: string;
  outDir: string;
  reporter?: Reporter;
}

/** Writes one minimal manifest per backup record, for exercising scan and restore. */
export async function runGenerate(options: GenerateOptions): Promise<GenerateSummary> {
  const reporter = options.reporter ?? silentReporter;
  const storePath = path.resolve(options.storePath);
  const outDir = path.resolve(options.outDir);

  const store = await loadRecordStore(storePath, reporter);
  await ensureDir(outDir);
  reporter.heading(`Generating ${store.size} mods in ${outDir}`);

  const outcomes: ItemOutcome[] = [];
  for (const [key, record] of store.entries()) {
    const modDir = resolveStoreKey(outDir, record.path);
    if (!modDir) {
      reporter.error(`Refusing path outside the output directory: ${record.path}`);
      outcomes.push({ path: key, status: "failed", reason: "unsafe_path", message: null });
      continue;
    }

    try {
      await writeJson(path.join(modDir, MANIFEST_FILE_NAME), buildSyntheticManifest(record));
      reporter.success(`Created: ${record.path}`);
      outcomes.push({ path: key, status: "success", reason: null, message: null });
    } catch (error) {
      reporter.error(`Failed to create ${key}`, { error: errorMessage(error) });
      outcomes.push({ path: key, status: "failed", reason: "write_error", message: errorMessage(error) });
    }
  }

  const summary: GenerateSummary = {
    storePath,
    outDir,
    created: outcomes.filter((o) => o.status === "success").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    outcomes
  };
  reporter.heading(`Created ${summary.created} mods, ${summary.failed} failed`);
  return summary;
}
