import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { createInterface } from "node:readline";

import type { DocumentLengthTable } from "../documentLengths.js";
import { ConversionError, isConversionError } from "../errors.js";
import { U32_MAX } from "../types.js";

export interface DocLengthEntry {
  docId: number;
  length: number;
}

const UINT = /^\d+$/;

/**
 * Parse one `<docid> <length>` line (any whitespace between the fields).
 * Returns undefined for blank lines.
 */
export function parseDocLengthLine(line: string, lineNumber: number): DocLengthEntry | undefined {
  const fields = line.trim().split(/\s+/).filter(Boolean);
  if (fields.length === 0) return undefined;

  const [rawId, rawLength] = fields;
  if (fields.length !== 2 || !rawId || !rawLength) {
    throw invalidLine(lineNumber, `expected "<docid> <length>", got ${fields.length} field(s)`);
  }
  const docId = parseU32(rawId, lineNumber, "doc id");
  const length = parseU32(rawLength, lineNumber, "length");
  return { docId, length };
}

/** Feed every line of `lines` into `table`. Returns the number of entries read. */
export async function ingestDocumentLengths(
  lines: Iterable<string> | AsyncIterable<string>,
  table: DocumentLengthTable,
): Promise<number> {
  let lineNumber = 0;
  let entries = 0;
  for await (const line of lines) {
    lineNumber++;
    const entry = parseDocLengthLine(line, lineNumber);
    if (!entry) continue;
    table.set(entry.docId, entry.length);
    entries++;
  }
  return entries;
}

export async function readDocumentLengthsFile(path: string, table: DocumentLengthTable): Promise<number> {
  // readline does not surface open errors of its input stream
  await access(path).catch((e: unknown) => {
    throw new ConversionError({ code: "IO_ERROR", detail: `cannot read document lengths ${path}`, cause: e });
  });
  const input = createReadStream(path, { encoding: "utf8" });
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    return await ingestDocumentLengths(lines, table);
  } catch (e) {
    if (isConversionError(e)) throw e;
    throw new ConversionError({ code: "IO_ERROR", detail: `cannot read document lengths ${path}`, cause: e });
  } finally {
    lines.close();
    input.destroy();
  }
}

function parseU32(raw: string, lineNumber: number, what: string): number {
  const value = UINT.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value) || value > U32_MAX) {
    throw invalidLine(lineNumber, `${what} "${raw}" is not an unsigned 32-bit integer`);
  }
  return value;
}

function invalidLine(lineNumber: number, detail: string): ConversionError {
  return new ConversionError({
    code: "INVALID_DOCUMENT_LENGTHS",
    detail: `line ${lineNumber}: ${detail}`,
    position: lineNumber,
  });
}
