import { escapeRegExp } from "../utils/text";

/** Body of a double-quoted value; a backslash always consumes the next character. */
const QUOTED_VALUE_BODY = String.raw`(?:[^"\\]|\\[\s\S])*`;

/**
 * `"<field>" : "<value>"`. Group 1 is everything up to and including the opening quote,
 * group 2 the raw (still escaped) value.
 */
export function fieldValuePattern(field: string, caseInsensitive = false): RegExp {
  const key = escapeRegExp(field);
  return new RegExp(String.raw`("${key}"\s*:\s*")(${QUOTED_VALUE_BODY})"`, caseInsensitive ? "i" : "");
}
