import { afterEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { runRestore, shouldRestore } from "../src/commands/restore";
import { runScan } from "../src/commands/scan";
import { RecordStoreError } from "../src/store/recordStore";
import { StoredRecord } from "../src/types/recordStoreFile";
import { writeJson } from "../src/utils/fs";
import { createMemoryReporter } from "./helpers/memoryReporter";
import { makeTempDir, removeTempDirs, writeFileIn } from "./helpers/tempDir";

afterEach(removeTempDirs);

const LIVE_MANIFEST = `{
  // Display name
  "Name": "Better Crafting",
  "Author": "Test Author", /* keep me */
  "Description": "Adds crafting menus.",
  "UniqueID": "test.BetterCrafting",
  "UpdateKeys": [ "Nexus:1234" ]
}`;

const TRANSLATED: StoredRecord = {
  UniqueID: "test.BetterCrafting",
  Name: "更好的制作",
  Description: "添加制作菜单。",
  Path: "BetterCrafting",
  IsChinese: true,
  Nurl: "https://www.nexusmods.com/stardewvalley/mods/1234"
};

async function setup(records: Record<string, StoredRecord>): Promise<{ root: string; storePath: string }> {
  const root = await makeTempDir();
  const storePath = path.join(root, "translation-backup.json");
  await writeJson(storePath, records);
  return { root, storePath };
}

function read(root: string, relative: string): Promise<string> {
  return fs.readFile(path.join(root, relative), "utf8");
}

describe("restore", () => {
  it("restores translations after an update overwrote them", async () => {
    const root = await makeTempDir();
    const storePath = path.join(root, "translation-backup.json");
    await writeFileIn(
      root,
      "A/manifest.json",
      '{"Name":"原版名称","Description":"描述文本","UniqueID":"test.a"}'
    );
    await runScan({ rootDir: root, storePath });

    await writeFileIn(
      root,
      "A/manifest.json",
      '{"Name":"Placeholder","Description":"描述文本","UniqueID":"test.a"}'
    );
    const summary = await runRestore({ rootDir: root, storePath });

    expect(summary).toMatchObject({ total: 1, restored: 1, skipped: 0, failed: 0 });
    expect(await read(root, "A/manifest.json")).toBe(
      '{"Name":"原版名称","Description":"描述文本","UniqueID":"test.a"}'
    );
  });

  it("keeps comments, formatting and other fields", async () => {
    const { root, storePath } = await setup({ BetterCrafting: TRANSLATED });
    await writeFileIn(root, "BetterCrafting/manifest.json", LIVE_MANIFEST);

    await runRestore({ rootDir: root, storePath });

    expect(await read(root, "BetterCrafting/manifest.json")).toBe(
      LIVE_MANIFEST.replace('"Better Crafting"', '"更好的制作"').replace(
        '"Adds crafting menus."',
        '"添加制作菜单。"'
      )
    );
  });

  it("is safe to run twice", async () => {
    const { root, storePath } = await setup({ BetterCrafting: TRANSLATED });
    await writeFileIn(root, "BetterCrafting/manifest.json", LIVE_MANIFEST);

    await runRestore({ rootDir: root, storePath });
    const first = await read(root, "BetterCrafting/manifest.json");
    await runRestore({ rootDir: root, storePath });

    expect(await read(root, "BetterCrafting/manifest.json")).toBe(first);
  });

  it("skips records whose manifest is gone", async () => {
    const { root, storePath } = await setup({ Gone: TRANSLATED });

    const summary = await runRestore({ rootDir: root, storePath });

    expect(summary).toMatchObject({ restored: 0, skipped: 1, failed: 0 });
    expect(summary.outcomes).toEqual([
      { path: "Gone", status: "skipped", reason: "missing_manifest", message: null }
    ]);
  });

  it("skips untranslated and empty manifests", async () => {
    const { root, storePath } = await setup({
      English: { ...TRANSLATED, Name: "Better Crafting", IsChinese: false },
      Blank: TRANSLATED
    });
    await writeFileIn(root, "English/manifest.json", LIVE_MANIFEST);
    await writeFileIn(root, "Blank/manifest.json", "  \n");

    const summary = await runRestore({ rootDir: root, storePath });

    expect(summary.outcomes.map((o) => [o.path, o.reason])).toEqual([
      ["English", "not_localized"],
      ["Blank", "empty_manifest"]
    ]);
    expect(await read(root, "English/manifest.json")).toBe(LIVE_MANIFEST);
  });

  it("rechecks records from backups without the IsChinese flag", async () => {
    const { root, storePath } = await setup({
      Translated: { Name: "更好的制作" },
      English: { Name: "Better Crafting" }
    });
    await writeFileIn(root, "Translated/manifest.json", LIVE_MANIFEST);
    await writeFileIn(root, "English/manifest.json", LIVE_MANIFEST);

    const summary = await runRestore({ rootDir: root, storePath });

    expect(summary.outcomes.map((o) => [o.path, o.status])).toEqual([
      ["Translated", "success"],
      ["English", "skipped"]
    ]);
    expect(await read(root, "Translated/manifest.json")).toBe(
      LIVE_MANIFEST.replace('"Better Crafting"', '"更好的制作"')
    );
  });

  it("counts a manifest without Name or Description as failed", async () => {
    const { root, storePath } = await setup({ NoFields: TRANSLATED });
    await writeFileIn(root, "NoFields/manifest.json", '{"UniqueID": "test.nofields"}');

    const summary = await runRestore({ rootDir: root, storePath });

    expect(summary).toMatchObject({ restored: 0, skipped: 0, failed: 1 });
    expect(summary.outcomes[0].reason).toBe("no_updatable_field");
  });

  it("writes nothing on a dry run", async () => {
    const { root, storePath } = await setup({ BetterCrafting: TRANSLATED });
    await writeFileIn(root, "BetterCrafting/manifest.json", LIVE_MANIFEST);

    const summary = await runRestore({ rootDir: root, storePath, dryRun: true });

    expect(summary).toMatchObject({ dryRun: true, restored: 1 });
    expect(await read(root, "BetterCrafting/manifest.json")).toBe(LIVE_MANIFEST);
  });

  it("drops the byte-order mark when rewriting", async () => {
    const { root, storePath } = await setup({ Bom: TRANSLATED });
    const filePath = await writeFileIn(
      root,
      "Bom/manifest.json",
      Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('{"Name": "X"}', "utf8")])
    );

    await runRestore({ rootDir: root, storePath });

    const bytes = await fs.readFile(filePath);
    expect(bytes.equals(Buffer.from('{"Name": "更好的制作"}', "utf8"))).toBe(true);
  });

  it("finds the manifest whatever its case", async () => {
    const { root, storePath } = await setup({ Upper: TRANSLATED });
    await writeFileIn(root, "Upper/Manifest.json", '{"Name": "X"}');

    await runRestore({ rootDir: root, storePath });

    expect(await read(root, "Upper/Manifest.json")).toBe('{"Name": "更好的制作"}');
  });

  it("refuses keys that point outside the mods directory", async () => {
    const { root, storePath } = await setup({ "../outside": TRANSLATED });

    const summary = await runRestore({ rootDir: path.join(root, "mods"), storePath });

    expect(summary.outcomes).toEqual([
      { path: "../outside", status: "failed", reason: "unsafe_path", message: null }
    ]);
  });

  it("restores records whose update URL is not a URL", async () => {
    const { root, storePath } = await setup({ A: { Name: "名称", IsChinese: true, Nurl: "" } });
    await writeFileIn(root, "A/manifest.json", '{"Name": "Name"}');

    const summary = await runRestore({ rootDir: root, storePath });

    expect(summary).toMatchObject({ total: 1, restored: 1 });
    expect(await read(root, "A/manifest.json")).toBe('{"Name": "名称"}');
  });

  it("treats an explicit null IsChinese flag as untranslated", async () => {
    const { root, storePath } = await setup({ A: { Name: "更好的制作", IsChinese: null } });
    await writeFileIn(root, "A/manifest.json", '{"Name": "Name"}');

    const summary = await runRestore({ rootDir: root, storePath });

    expect(summary.outcomes).toEqual([
      { path: "A", status: "skipped", reason: "not_localized", message: null }
    ]);
    expect(await read(root, "A/manifest.json")).toBe('{"Name": "Name"}');
  });

  it("keeps the first of two keys for the same directory", async () => {
    const { root, storePath } = await setup({
      "Group/A": TRANSLATED,
      "Group\\A": { ...TRANSLATED, Name: "第二个名称" }
    });
    await writeFileIn(root, "Group/A/manifest.json", '{"Name": "Name"}');
    const { reporter, entries } = createMemoryReporter();

    const summary = await runRestore({ rootDir: root, storePath, reporter });

    expect(summary).toMatchObject({ total: 1, restored: 1 });
    expect(await read(root, "Group/A/manifest.json")).toBe('{"Name": "更好的制作"}');
    expect(entries).toContainEqual({
      level: "warn",
      message: "Ignoring duplicate backup entry: Group\\A",
      fields: { path: "Group/A" }
    });
  });

  it("aborts when the backup file is missing", async () => {
    const root = await makeTempDir();
    await expect(
      runRestore({ rootDir: root, storePath: path.join(root, "missing.json") })
    ).rejects.toBeInstanceOf(RecordStoreError);
  });
});

describe("restore decision", () => {
  const base = {
    uniqueId: "x",
    description: null,
    path: "x",
    updateUrl: null
  };

  it("trusts the stored flag", () => {
    expect(shouldRestore({ ...base, name: "English", isLocalized: true })).toBe(true);
    expect(shouldRestore({ ...base, name: "中文", isLocalized: false })).toBe(false);
  });

  it("rechecks the script when the flag is unknown", () => {
    expect(shouldRestore({ ...base, name: "中文", isLocalized: null })).toBe(true);
    expect(shouldRestore({ ...base, name: "English", isLocalized: null })).toBe(false);
  });
});
