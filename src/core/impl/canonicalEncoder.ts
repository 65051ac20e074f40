import type { CanonicalArtifacts, CanonicalEncoder } from "../canonicalEncoder.js";
import type { DocumentLengthTable } from "../documentLengths.js";
import type { InvertedIndex } from "../invertedIndex.js";

const U32_BYTES = 4;

/**
 * Fixed-size u32 sequence writer. The output is allocated once, so the caller must know the
 * total element count (headers included) up front.
 */
export class SequenceWriter {
  private readonly out: Uint8Array;
  private readonly dv: DataView;
  private offset = 0;

  constructor(totalWords: number) {
    this.out = new Uint8Array(totalWords * U32_BYTES);
    this.dv = new DataView(this.out.buffer);
  }

  /** Write `[values.length][values...]`. */
  sequence(values: ArrayLike<number>): this {
    this.word(values.length);
    for (let i = 0; i < values.length; i++) this.word(values[i] ?? 0);
    return this;
  }

  finish(): Uint8Array {
    if (this.offset !== this.out.length) {
      throw new Error(`sequence writer filled ${this.offset} of ${this.out.length} bytes`);
    }
    return this.out;
  }

  private word(value: number): void {
    this.dv.setUint32(this.offset, value, true);
    this.offset += U32_BYTES;
  }
}

/** Encode a single sequence on its own. */
export function encodeU32Sequence(values: ArrayLike<number>): Uint8Array {
  return new SequenceWriter(values.length + 1).sequence(values).finish();
}

/**
 * Single pass over term ids `0..termCount-1`. Terms without postings still get an empty
 * sequence in docs and freqs, keeping all artifacts aligned by term id.
 */
export class BinaryCollectionEncoder implements CanonicalEncoder {
  encode(index: InvertedIndex, lengths: DocumentLengthTable): CanonicalArtifacts {
    const { termCount, postingCount } = index.getStats();

    // one count word per term, plus the [1, docCount] header for docs
    const docs = new SequenceWriter(2 + termCount + postingCount);
    const freqs = new SequenceWriter(termCount + postingCount);
    docs.sequence([lengths.docCount]);

    const lexicon: string[] = [];
    for (let termId = 0; termId < termCount; termId++) {
      const p = index.postingsOf(termId);
      docs.sequence(p.docIds);
      freqs.sequence(p.freqs);
      lexicon.push(`${index.lexicon[termId] ?? ""}\n`);
    }

    const artifacts: CanonicalArtifacts = {
      docs: docs.finish(),
      freqs: freqs.finish(),
      sizes: encodeU32Sequence(lengths.sortedLengths()),
      lexicon: lexicon.join(""),
    };

    const collectionIds = lengths.sortedCollectionDocIds();
    if (collectionIds) {
      artifacts.documents = collectionIds.map((id) => `${id}\n`).join("");
    }
    return artifacts;
  }
}
