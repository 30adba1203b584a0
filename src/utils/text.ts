const SIMPLE_ESCAPES: Record<string, string> = {
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
};

const SIMPLE_UNESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
};

/**
 * Escapes a value for placement between double quotes in a JSON-like document.
 * Backslashes are escaped before quotes so the inserted backslashes are not doubled.
 */
export function escapeJsonString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/[\u0000-\u001f]/g, (ch) => {
      const simple = SIMPLE_ESCAPES[ch];
      if (simple) return simple;
      return `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`;
    });
}

/**
 * Decodes JSON string escapes. Unknown or truncated escapes are kept verbatim,
 * since manifests are not guaranteed to be valid JSON.
 */
export function unescapeJsonString(raw: string): string {
  return raw.replace(/\\(u[0-9a-fA-F]{4}|[\s\S])/g, (match, escape: string) => {
    if (escape.length === 5) {
      return String.fromCharCode(parseInt(escape.slice(1), 16));
    }
    return SIMPLE_UNESCAPES[escape] ?? match;
  });
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
