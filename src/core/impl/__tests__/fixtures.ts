import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { PostingsRecord } from "../../types.js";
import { ConversionError } from "../../errors.js";
import { encodePostingsRecord, frameMessages } from "../ciffMessages.js";

/** Two-term collection: "a" at docs 3 and 5, "b" at doc 1. */
export const exampleRecords: PostingsRecord[] = [
  {
    term: "a",
    df: 2,
    cf: 5,
    postings: [
      { docIdDelta: 3, tf: 1 },
      { docIdDelta: 2, tf: 4 },
    ],
  },
  { term: "b", df: 1, cf: 2, postings: [{ docIdDelta: 1, tf: 2 }] },
];

export const exampleDocLengths = ["1 5", "3 9", "5 2"];

export function postingsStream(records: PostingsRecord[]): Uint8Array {
  return frameMessages(records.map(encodePostingsRecord));
}

/** Little-endian u32 words, the layout of every binary artifact. */
export function words(...values: number[]): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const dv = new DataView(out.buffer);
  values.forEach((v, i) => dv.setUint32(i * 4, v, true));
  return out;
}

export function catchConversionError(fn: () => unknown): ConversionError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConversionError) return e;
    throw e;
  }
  throw new Error("expected a ConversionError");
}

export async function rejectsWithConversionError(p: Promise<unknown>): Promise<ConversionError> {
  try {
    await p;
  } catch (e) {
    if (e instanceof ConversionError) return e;
    throw e;
  }
  throw new Error("expected a ConversionError");
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "ciff-canonical-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
