#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { loadSettings, Settings } from "../config/settings";
import { resolveStorePath } from "../io/paths";
import { createConsoleReporter } from "../report/reporter";
import { runScan } from "../commands/scan";
import { runRestore } from "../commands/restore";
import { runGenerate } from "../commands/generate";
import { errorMessage } from "../utils/error";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.MANIFEST_TRANSLATIONS_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

let settings: Settings;
try {
  settings = loadSettings();
} catch (error) {
  console.error(`Invalid configuration in ${envPath} or the environment: ${errorMessage(error)}`);
  process.exit(1);
}

interface RootOptions {
  root?: string;
  store?: string;
  quiet?: boolean;
}

interface ScanCliOptions extends RootOptions {
  shallow?: boolean;
}

interface RestoreCliOptions extends RootOptions {
  dryRun?: boolean;
}

interface GenerateCliOptions {
  store: string;
  out: string;
  quiet?: boolean;
}

function resolveRoot(opts: RootOptions): string {
  return path.resolve(opts.root ?? settings.rootDir ?? process.cwd());
}

function reporterFor(opts: { quiet?: boolean }) {
  return createConsoleReporter({ quiet: opts.quiet ?? settings.quiet });
}

const program = new Command();

program
  .name("manifest-translations")
  .description("Back up and restore translated Name/Description fields of mod manifests")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides MANIFEST_TRANSLATIONS_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("scan")
  .description("Extract Name/Description from every manifest.json into the backup file")
  .option("--root <dir>", "Mods directory to scan (default: MANIFEST_TRANSLATIONS_ROOT or cwd)")
  .option("--store <path>", "Backup file, relative to the mods directory", settings.storeFile)
  .option("--shallow", "Only scan manifests one level below the mods directory")
  .option("-q, --quiet", "Only print warnings, errors and totals")
  .action(async (opts: ScanCliOptions) => {
    const rootDir = resolveRoot(opts);
    await runScan({
      rootDir,
      storePath: resolveStorePath(rootDir, opts.store ?? settings.storeFile),
      shallow: opts.shallow,
      reporter: reporterFor(opts)
    });
  });

program
  .command("restore")
  .description("Write backed-up translations back into the mods' manifest.json files")
  .option("--root <dir>", "Mods directory to restore (default: MANIFEST_TRANSLATIONS_ROOT or cwd)")
  .option("--store <path>", "Backup file, relative to the mods directory", settings.storeFile)
  .option("--dry-run", "Report what would change without writing")
  .option("-q, --quiet", "Only print warnings, errors and totals")
  .action(async (opts: RestoreCliOptions) => {
    const rootDir = resolveRoot(opts);
    await runRestore({
      rootDir,
      storePath: resolveStorePath(rootDir, opts.store ?? settings.storeFile),
      dryRun: opts.dryRun,
      reporter: reporterFor(opts)
    });
  });

program
  .command("generate")
  .description("Create a test mods tree with one minimal manifest per backup record")
  .requiredOption("--store <path>", "Backup file to generate from")
  .option("--out <dir>", "Output mods directory", "./mods")
  .option("-q, --quiet", "Only print warnings, errors and totals")
  .action(async (opts: GenerateCliOptions) => {
    await runGenerate({
      storePath: opts.store,
      outDir: opts.out,
      reporter: reporterFor(opts)
    });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
