export type ManifestField = "Name" | "Description" | "UniqueID";

/** Fields that restore may rewrite. UniqueID is identity and is never patched. */
export type PatchableField = Exclude<ManifestField, "UniqueID">;

export interface ExtractedFields {
  name: string | null;
  description: string | null;
  uniqueId: string | null;
  updateUrl: string | null;
}

export interface ManifestRecord {
  uniqueId: string;
  name: string | null;
  description: string | null;
  /** Directory relative to the scan root, forward slashes; also the store key. */
  path: string;
  /** null only for records loaded from an older store file without the flag. */
  isLocalized: boolean | null;
  updateUrl: string | null;
}
