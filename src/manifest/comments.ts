const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const LINE_COMMENT = /\/\/.*$/gm;

/**
 * Removes block and line comments as a plain text transform. Quoted strings are not
 * tokenized, so a `//` inside a value (a URL, say) also cuts the rest of that line.
 */
export function stripComments(text: string): string {
  return text.replace(BLOCK_COMMENT, "").replace(LINE_COMMENT, "");
}
