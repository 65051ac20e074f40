import { ConversionError } from "../errors.js";

/**
 * Iterates the u32 sequences of a binary collection (`.docs`, `.freqs`, `.sizes`).
 *
 * The returned arrays are copies, so they stay valid regardless of the source buffer's
 * alignment.
 */
export function* readBinaryCollection(bytes: Uint8Array, name = "collection"): Generator<Uint32Array> {
  if (bytes.length % 4 !== 0) {
    throw invalid(`${name} byte length ${bytes.length} is not divisible by 4`);
  }
  const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const words = bytes.length / 4;
  let word = 0;
  let index = 0;
  while (word < words) {
    const length = dv.getUint32(word * 4, true);
    if (word + 1 + length > words) {
      throw invalid(`${name} sequence ${index} declares ${length} element(s) but only ${words - word - 1} remain`);
    }
    const seq = new Uint32Array(length);
    for (let i = 0; i < length; i++) seq[i] = dv.getUint32((word + 1 + i) * 4, true);
    yield seq;
    word += 1 + length;
    index++;
  }
}

/** Materialize every sequence of a collection. */
export function readAllSequences(bytes: Uint8Array, name?: string): Uint32Array[] {
  return Array.from(readBinaryCollection(bytes, name));
}

function invalid(detail: string): ConversionError {
  return new ConversionError({ code: "INVALID_COLLECTION", detail });
}
