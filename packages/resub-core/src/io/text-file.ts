import { readFile, writeFile } from "node:fs/promises";
import iconv from "iconv-lite";

export type TextEncodingName = "utf-8" | "latin1";

export type TextFileDecoder = {
  encoding: TextEncodingName;
  /** Throws when `bytes` is not valid in this encoding. */
  decode: (bytes: Buffer) => string;
};

export type TextFileFs = {
  readFile: (path: string) => Promise<Buffer>;
  writeFile: (path: string, data: Buffer) => Promise<void>;
};

export type ReadTextFileOptions = {
  decoders?: readonly TextFileDecoder[];
  fs?: TextFileFs;
};

export type WriteTextFileOptions = {
  fs?: TextFileFs;
};

export type DecodedTextFile = {
  text: string;
  encoding: TextEncodingName;
};

export const UTF8_DECODER: TextFileDecoder = {
  encoding: "utf-8",
  // ignoreBOM keeps a leading U+FEFF in the text instead of dropping it.
  decode: (bytes) => new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes),
};

export const LATIN1_DECODER: TextFileDecoder = {
  encoding: "latin1",
  decode: (bytes) => iconv.decode(bytes, "latin1"),
};

/** Tried in order; latin1 maps every byte, so reads never fail on encoding. */
export const DEFAULT_DECODERS: readonly TextFileDecoder[] = [UTF8_DECODER, LATIN1_DECODER];

/** The single-byte encoding every write uses, whatever the read used. */
export const WRITE_ENCODING: TextEncodingName = "latin1";

const defaultFs: TextFileFs = {
  readFile: (path) => readFile(path),
  writeFile: (path, data) => writeFile(path, data),
};

/**
 * Reads and decodes `filePath`. `\r\n` and lone `\r` come back as `\n`, so
 * patterns never see carriage returns and rewritten files end lines with `\n`.
 */
export async function readTextFile(
  filePath: string,
  options: ReadTextFileOptions = {},
): Promise<DecodedTextFile> {
  const fs = options.fs ?? defaultFs;
  const decoders = options.decoders ?? DEFAULT_DECODERS;
  const bytes = await fs.readFile(filePath);

  const failures: string[] = [];
  for (const decoder of decoders) {
    try {
      return { text: normalizeNewlines(decoder.decode(bytes)), encoding: decoder.encoding };
    } catch (error) {
      failures.push(`${decoder.encoding} (${error instanceof Error ? error.message : String(error)})`);
    }
  }

  throw new Error(`Unable to decode ${filePath}: tried ${failures.join(", ") || "no decoders"}.`);
}

export async function writeTextFile(
  filePath: string,
  text: string,
  options: WriteTextFileOptions = {},
): Promise<void> {
  const fs = options.fs ?? defaultFs;
  const unencodable = findUnencodableCharacter(text);
  if (unencodable) {
    throw new Error(
      `Unable to encode ${filePath} as ${WRITE_ENCODING}: character U+${unencodable.codePoint
        .toString(16)
        .toUpperCase()
        .padStart(4, "0")} at offset ${unencodable.offset} is outside the single-byte range.`,
    );
  }

  await fs.writeFile(filePath, iconv.encode(text, WRITE_ENCODING));
}

function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

function findUnencodableCharacter(text: string): { codePoint: number; offset: number } | null {
  for (let offset = 0; offset < text.length; offset += 1) {
    const codePoint = text.codePointAt(offset) ?? 0;
    if (codePoint > 0xff) {
      return { codePoint, offset };
    }
  }
  return null;
}
