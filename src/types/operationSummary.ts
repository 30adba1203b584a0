export type OutcomeStatus = "success" | "skipped" | "failed";

export type OutcomeReason =
  | "no_content"
  | "read_error"
  | "duplicate_path"
  | "missing_manifest"
  | "empty_manifest"
  | "not_localized"
  | "no_updatable_field"
  | "unsafe_path"
  | "write_error";

export interface ItemOutcome {
  path: string;
  status: OutcomeStatus;
  reason: OutcomeReason | null;
  message: string | null;
}

export interface ScanSummary {
  rootDir: string;
  /** null when nothing was extracted and no file was written. */
  storePath: string | null;
  manifestsFound: number;
  extracted: number;
  noContent: number;
  failed: number;
  outcomes: ItemOutcome[];
}

export interface RestoreSummary {
  rootDir: string;
  storePath: string;
  dryRun: boolean;
  total: number;
  restored: number;
  skipped: number;
  failed: number;
  outcomes: ItemOutcome[];
}

export interface GenerateSummary {
  storePath: string;
  outDir: string;
  created: number;
  failed: number;
  outcomes: ItemOutcome[];
}
