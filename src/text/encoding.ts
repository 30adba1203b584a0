import { promises as fs } from "fs";
import path from "path";
import * as iconv from "iconv-lite";
import { ensureDir } from "../utils/fs";

export type TextEncodingName = "utf8" | "utf8-bom" | "latin1";

export const ENCODING_PRIORITY: readonly TextEncodingName[] = ["utf8", "utf8-bom", "latin1"];

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

export interface DecodedText {
  text: string;
  encoding: TextEncodingName;
}

export class DecodeError extends Error {
  constructor(
    readonly filePath: string | null,
    readonly attempted: readonly TextEncodingName[]
  ) {
    super(
      `Unable to decode ${filePath ?? "buffer"} with any of: ${attempted.join(", ")}`
    );
    this.name = "DecodeError";
  }
}

function hasBom(buffer: Buffer): boolean {
  return buffer.length >= UTF8_BOM.length && buffer.subarray(0, UTF8_BOM.length).equals(UTF8_BOM);
}

// Invalid sequences decode to U+FFFD, so a lossless re-encode means the bytes were valid.
function decodeUtf8Strict(bytes: Buffer): string | null {
  const text = iconv.decode(bytes, "utf8", { stripBOM: false });
  return iconv.encode(text, "utf8").equals(bytes) ? text : null;
}

function tryDecode(buffer: Buffer, encoding: TextEncodingName): string | null {
  switch (encoding) {
    case "utf8":
      return hasBom(buffer) ? null : decodeUtf8Strict(buffer);
    case "utf8-bom":
      return hasBom(buffer) ? decodeUtf8Strict(buffer.subarray(UTF8_BOM.length)) : null;
    case "latin1":
      return iconv.decode(buffer, "latin1");
  }
}

export function decodeText(
  buffer: Buffer,
  encodings: readonly TextEncodingName[] = ENCODING_PRIORITY,
  filePath: string | null = null
): DecodedText {
  for (const encoding of encodings) {
    const text = tryDecode(buffer, encoding);
    if (text !== null) return { text, encoding };
  }
  throw new DecodeError(filePath, encodings);
}

export async function readTextFile(
  filePath: string,
  encodings: readonly TextEncodingName[] = ENCODING_PRIORITY
): Promise<DecodedText> {
  const buffer = await fs.readFile(filePath);
  return decodeText(buffer, encodings, filePath);
}

/** Always UTF-8 without a byte-order mark, whatever the file was read as. */
export async function writeTextFile(filePath: string, text: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, iconv.encode(text, "utf8"));
}
