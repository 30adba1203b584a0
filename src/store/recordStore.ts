import { promises as fs } from "fs";
import path from "path";
import recordStoreSchema from "../../contracts/schemas/record-store.schema.json";
import { ManifestRecord } from "../types/manifestRecord";
import { RecordStoreFile, StoredRecord } from "../types/recordStoreFile";
import { compileSchema, formatSchemaErrors } from "../validation/jsonSchema";
import { errorMessage } from "../utils/error";
import { writeJson } from "../utils/fs";
import { toStoreKey } from "../io/paths";
import { Reporter, silentReporter } from "../report/reporter";

export type RecordStoreErrorKind = "missing" | "unparsable" | "invalid" | "duplicate";

const RUN_SCAN_FIRST = "Run the scan command first to create it.";

export class RecordStoreError extends Error {
  constructor(
    readonly kind: RecordStoreErrorKind,
    message: string
  ) {
    super(message);
    this.name = "RecordStoreError";
  }
}

const validateStoreFile = compileSchema<RecordStoreFile>(recordStoreSchema);

function lastSegment(key: string): string {
  const segments = key.split("/").filter((segment) => segment && segment !== ".");
  return segments[segments.length - 1] ?? key;
}

export function fromStoredRecord(key: string, stored: StoredRecord): ManifestRecord {
  const normalizedKey = toStoreKey(key);
  return {
    uniqueId: stored.UniqueID || lastSegment(normalizedKey),
    name: stored.Name ?? null,
    description: stored.Description ?? null,
    path: stored.Path ? toStoreKey(stored.Path) : normalizedKey,
    // Only a missing flag is unknown; an explicit null reads as untranslated.
    isLocalized: stored.IsChinese === undefined ? null : stored.IsChinese === true,
    updateUrl: stored.Nurl ?? null
  };
}

export function toStoredRecord(record: ManifestRecord): StoredRecord {
  const stored: StoredRecord = {
    UniqueID: record.uniqueId,
    Name: record.name,
    Description: record.description,
    Path: record.path
  };
  // A record loaded without the flag is written back without it, so restore keeps rechecking.
  if (record.isLocalized !== null) stored.IsChinese = record.isLocalized;
  stored.Nurl = record.updateUrl;
  return stored;
}

/** Records keyed by manifest directory relative to the scan root. */
export class RecordStore {
  private readonly records = new Map<string, ManifestRecord>();

  get size(): number {
    return this.records.size;
  }

  add(record: ManifestRecord, key: string = record.path): void {
    const normalized = toStoreKey(key);
    if (this.records.has(normalized)) {
      throw new RecordStoreError("duplicate", `A record for ${normalized} already exists`);
    }
    this.records.set(normalized, record);
  }

  get(key: string): ManifestRecord | undefined {
    return this.records.get(toStoreKey(key));
  }

  has(key: string): boolean {
    return this.records.has(toStoreKey(key));
  }

  entries(): IterableIterator<[string, ManifestRecord]> {
    return this.records.entries();
  }

  toJSON(): RecordStoreFile {
    const data: RecordStoreFile = {};
    for (const [key, record] of this.records) {
      data[key] = toStoredRecord(record);
    }
    return data;
  }

  /** Keys that normalize to an already loaded path are passed to `onDuplicate` and dropped. */
  static fromJSON(
    data: unknown,
    label = "record store",
    onDuplicate: (key: string) => void = () => undefined
  ): RecordStore {
    if (!validateStoreFile(data)) {
      throw new RecordStoreError(
        "invalid",
        `${label} failed schema validation: ${formatSchemaErrors(validateStoreFile)}`
      );
    }
    const store = new RecordStore();
    for (const [key, stored] of Object.entries(data)) {
      if (store.has(key)) {
        onDuplicate(key);
        continue;
      }
      store.add(fromStoredRecord(key, stored), key);
    }
    return store;
  }
}

export async function loadRecordStore(
  filePath: string,
  reporter: Reporter = silentReporter
): Promise<RecordStore> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new RecordStoreError(
      "missing",
      `Translation backup not found at ${filePath} (${errorMessage(error)}). ${RUN_SCAN_FIRST}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new RecordStoreError(
      "unparsable",
      `Translation backup ${filePath} is not valid JSON: ${errorMessage(error)}. ${RUN_SCAN_FIRST}`
    );
  }

  try {
    return RecordStore.fromJSON(data, path.basename(filePath), (key) =>
      reporter.warn(`Ignoring duplicate backup entry: ${key}`, { path: toStoreKey(key) })
    );
  } catch (error) {
    if (error instanceof RecordStoreError && error.kind === "invalid") {
      throw new RecordStoreError("invalid", `${error.message}. ${RUN_SCAN_FIRST}`);
    }
    throw error;
  }
}

export async function saveRecordStore(filePath: string, store: RecordStore): Promise<void> {
  await writeJson(filePath, store.toJSON());
}
