import { describe, expect, it } from "vitest";
import { readAllSequences, readBinaryCollection } from "../binaryCollection.js";
import { BinaryCollectionEncoder, SequenceWriter, encodeU32Sequence } from "../canonicalEncoder.js";
import { MemoryDocumentLengths } from "../memoryDocumentLengths.js";
import { MemoryInvertedIndex } from "../memoryInvertedIndex.js";
import { catchConversionError, exampleRecords, words } from "./fixtures.js";

function exampleIndex(): { index: MemoryInvertedIndex; lengths: MemoryDocumentLengths } {
  const index = new MemoryInvertedIndex();
  for (const r of exampleRecords) index.add(r);
  const lengths = new MemoryDocumentLengths();
  lengths.set(1, 5);
  lengths.set(3, 9);
  lengths.set(5, 2);
  return { index, lengths };
}

describe("encodeU32Sequence", () => {
  it("writes a little-endian count followed by the values", () => {
    expect(Array.from(encodeU32Sequence([4, 98765]))).toEqual([2, 0, 0, 0, 4, 0, 0, 0, 205, 129, 1, 0]);
    expect(Array.from(encodeU32Sequence([]))).toEqual([0, 0, 0, 0]);
  });

  it("refuses to finish a partially filled writer", () => {
    expect(() => new SequenceWriter(3).sequence([1]).finish()).toThrow("sequence writer filled 8 of 12 bytes");
  });
});

describe("BinaryCollectionEncoder", () => {
  it("encodes the two-term example", () => {
    const { index, lengths } = exampleIndex();
    const out = new BinaryCollectionEncoder().encode(index, lengths);

    expect(out.docs).toEqual(words(1, 3, 2, 3, 5, 1, 1));
    expect(out.freqs).toEqual(words(2, 1, 4, 1, 2));
    expect(out.sizes).toEqual(words(3, 5, 9, 2));
    expect(out.lexicon).toBe("a\nb\n");
    expect(out.documents).toBeUndefined();
  });

  it("keeps empty sequences for terms without postings", () => {
    const index = new MemoryInvertedIndex();
    index.add({ term: "x", df: 0, cf: 0, postings: [] });
    index.add({ term: "y", df: 1, cf: 7, postings: [{ docIdDelta: 0, tf: 7 }] });
    const lengths = new MemoryDocumentLengths();
    lengths.set(0, 4);

    const out = new BinaryCollectionEncoder().encode(index, lengths);
    expect(out.docs).toEqual(words(1, 1, 0, 1, 0));
    expect(out.freqs).toEqual(words(0, 1, 7));
    expect(out.lexicon).toBe("x\ny\n");
  });

  it("emits collection doc ids in doc id order when present", () => {
    const { index, lengths } = exampleIndex();
    lengths.setCollectionDocId(5, "doc-e");
    lengths.setCollectionDocId(1, "doc-a");

    const out = new BinaryCollectionEncoder().encode(index, lengths);
    expect(out.documents).toBe("doc-a\n3\ndoc-e\n");
  });
});

describe("readBinaryCollection", () => {
  it("reads back every sequence", () => {
    const { index, lengths } = exampleIndex();
    const out = new BinaryCollectionEncoder().encode(index, lengths);

    const docs = readAllSequences(out.docs, "docs").map((s) => Array.from(s));
    expect(docs).toEqual([[3], [3, 5], [1]]);
    const sizes = Array.from(readBinaryCollection(out.sizes), (s) => Array.from(s));
    expect(sizes).toEqual([[5, 9, 2]]);
  });

  it("accepts views that start at an odd offset", () => {
    const backing = new Uint8Array(9);
    backing.set(words(1, 42), 1);
    const seqs = readAllSequences(backing.subarray(1), "docs");
    expect(seqs.map((s) => Array.from(s))).toEqual([[42]]);
  });

  it("rejects a length that is not a whole number of words", () => {
    const err = catchConversionError(() => readAllSequences(new Uint8Array(6), "freqs"));
    expect(err.code).toBe("INVALID_COLLECTION");
    expect(err.detail).toBe("freqs byte length 6 is not divisible by 4");
  });

  it("rejects a sequence that runs past the end", () => {
    const err = catchConversionError(() => readAllSequences(words(1, 7, 3, 1), "docs"));
    expect(err.code).toBe("INVALID_COLLECTION");
    expect(err.detail).toBe("docs sequence 1 declares 3 element(s) but only 1 remain");
  });
});
