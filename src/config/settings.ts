import { z } from "zod";

const BooleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

export const SettingsSchema = z.object({
  MANIFEST_TRANSLATIONS_ROOT: z.string().min(1).optional(),
  MANIFEST_TRANSLATIONS_STORE: z.string().min(1).default("translation-backup.json"),
  MANIFEST_TRANSLATIONS_QUIET: BooleanFlag
});

export interface Settings {
  /** Default mods root; the CLI falls back to the working directory. */
  rootDir: string | null;
  /** Backup file, relative to the root unless absolute. */
  storeFile: string;
  quiet: boolean;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.parse({
    MANIFEST_TRANSLATIONS_ROOT: env.MANIFEST_TRANSLATIONS_ROOT || undefined,
    MANIFEST_TRANSLATIONS_STORE: env.MANIFEST_TRANSLATIONS_STORE || undefined,
    MANIFEST_TRANSLATIONS_QUIET: env.MANIFEST_TRANSLATIONS_QUIET || undefined
  });
  return {
    rootDir: parsed.MANIFEST_TRANSLATIONS_ROOT ?? null,
    storeFile: parsed.MANIFEST_TRANSLATIONS_STORE,
    quiet: parsed.MANIFEST_TRANSLATIONS_QUIET
  };
}
