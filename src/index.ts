export { decodeText, readTextFile, writeTextFile, DecodeError, ENCODING_PRIORITY } from "./text/encoding";
export type { DecodedText, TextEncodingName } from "./text/encoding";
export { extractFields, extractField, extractRecord } from "./manifest/extract";
export { patchField, applyTranslations, hasField } from "./manifest/patch";
export type { PatchResult, ApplyResult, TranslationValues } from "./manifest/patch";
export { containsCjk, containsScript, CJK_IDEOGRAPHS } from "./manifest/locale";
export { stripComments } from "./manifest/comments";
export { buildSyntheticManifest } from "./manifest/template";
export {
  RecordStore,
  RecordStoreError,
  loadRecordStore,
  saveRecordStore
} from "./store/recordStore";
export { runScan } from "./commands/scan";
export { runRestore, shouldRestore } from "./commands/restore";
export { runGenerate } from "./commands/generate";
export { createConsoleReporter, silentReporter } from "./report/reporter";
export type { Reporter, ReportFields } from "./report/reporter";
export type { ManifestRecord, ExtractedFields, PatchableField } from "./types/manifestRecord";
export type * from "./types/operationSummary";
