import path from "path";
import { ExtractedFields, ManifestField, ManifestRecord } from "../types/manifestRecord";
import { unescapeJsonString } from "../utils/text";
import { stripComments } from "./comments";
import { fieldValuePattern } from "./fieldPattern";
import { containsCjk } from "./locale";
import { findUpdateUrl } from "./updateUrl";

const NAME = fieldValuePattern("Name");
const DESCRIPTION = fieldValuePattern("Description");
const UNIQUE_ID = fieldValuePattern("UniqueID", true);

function firstValue(pattern: RegExp, text: string): string | null {
  const match = pattern.exec(text);
  return match ? unescapeJsonString(match[2]) : null;
}

export function extractFields(text: string): ExtractedFields {
  const content = stripComments(text);
  return {
    name: firstValue(NAME, content),
    description: firstValue(DESCRIPTION, content),
    uniqueId: firstValue(UNIQUE_ID, content),
    updateUrl: findUpdateUrl(content)
  };
}

export function extractField(text: string, field: ManifestField): string | null {
  const pattern = field === "UniqueID" ? UNIQUE_ID : field === "Name" ? NAME : DESCRIPTION;
  return firstValue(pattern, stripComments(text));
}

export interface RecordLocation {
  /** Manifest directory relative to the scan root, as stored. */
  relativePath: string;
  /** Absolute manifest directory; its name is the UniqueID fallback. */
  directory: string;
}

/**
 * Builds the stored record for one manifest, or null when neither Name nor
 * Description is present.
 */
export function extractRecord(text: string, location: RecordLocation): ManifestRecord | null {
  const fields = extractFields(text);
  if (!fields.name && !fields.description) return null;

  return {
    uniqueId: fields.uniqueId || path.basename(location.directory),
    name: fields.name,
    description: fields.description,
    path: location.relativePath,
    isLocalized: containsCjk(fields.name, fields.description),
    updateUrl: fields.updateUrl
  };
}
