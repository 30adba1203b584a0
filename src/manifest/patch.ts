import { PatchableField } from "../types/manifestRecord";
import { escapeJsonString } from "../utils/text";
import { fieldValuePattern } from "./fieldPattern";

export interface PatchResult {
  text: string;
  changed: boolean;
}

export interface TranslationValues {
  name?: string | null;
  description?: string | null;
}

export interface ApplyResult {
  text: string;
  changedFields: PatchableField[];
}

const PATTERNS: Record<PatchableField, RegExp> = {
  Name: fieldValuePattern("Name"),
  Description: fieldValuePattern("Description")
};

export function hasField(text: string, field: PatchableField): boolean {
  return PATTERNS[field].test(text);
}

/**
 * Replaces the value of the first `"<field>": "..."` occurrence with `value`, leaving the
 * key, the colon and every other byte as they were. An empty or missing value never
 * blanks an existing field; the text is returned unchanged with `changed: false`.
 */
export function patchField(
  text: string,
  field: PatchableField,
  value: string | null | undefined
): PatchResult {
  if (!text || !value) return { text, changed: false };

  const match = PATTERNS[field].exec(text);
  if (!match) return { text, changed: false };

  const start = match.index + match[1].length;
  const end = start + match[2].length;
  return {
    text: text.slice(0, start) + escapeJsonString(value) + text.slice(end),
    changed: true
  };
}

/** Name first, then Description, each independently. */
export function applyTranslations(text: string, values: TranslationValues): ApplyResult {
  const changedFields: PatchableField[] = [];
  let current = text;

  const name = patchField(current, "Name", values.name);
  if (name.changed) changedFields.push("Name");
  current = name.text;

  const description = patchField(current, "Description", values.description);
  if (description.changed) changedFields.push("Description");
  current = description.text;

  return { text: current, changedFields };
}
