/** One entry of the aggregate file as written to disk. */
export interface StoredRecord {
  UniqueID?: string | null;
  Name?: string | null;
  Description?: string | null;
  Path?: string | null;
  IsChinese?: boolean | null;
  Nurl?: string | null;
}

export type RecordStoreFile = Record<string, StoredRecord>;
