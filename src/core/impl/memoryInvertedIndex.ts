import type { PostingsRecord, Term, TermId, TermPostings } from "../types.js";
import { U32_MAX } from "../types.js";
import type { IndexStats, InvertedIndexBuilder } from "../invertedIndex.js";
import { ConversionError } from "../errors.js";

const MAX_PRESIZED_TERMS = 1 << 24;

/**
 * Simple in-memory inverted index.
 *
 * Data structure:
 * - dense table termId -> {docIds, freqs}, each a Uint32Array sized to the term's df
 * - lexicon termId -> term
 *
 * Every assigned term id has a slot, so a term with no postings still owns an (empty) entry.
 */
export class MemoryInvertedIndex implements InvertedIndexBuilder {
  private table: TermPostings[] = [];
  private readonly terms: Term[] = [];
  private postings = 0;

  get termCount(): number {
    return this.terms.length;
  }

  get lexicon(): readonly Term[] {
    return this.terms;
  }

  expectTerms(count: number): void {
    // the count comes from an untrusted header
    if (this.terms.length === 0 && count > 0) {
      this.table = new Array<TermPostings>(Math.min(count, MAX_PRESIZED_TERMS));
    }
  }

  add(record: PostingsRecord): TermId {
    const termId = this.terms.length;
    const { term, df, postings } = record;

    if (postings.length !== df) {
      throw new ConversionError({
        code: "COUNT_MISMATCH",
        detail: `term "${term}" (term id ${termId}) declares df=${df} but has ${postings.length} posting(s)`,
        term,
        position: termId,
      });
    }

    if (term.includes("\n")) {
      // the lexicon is line oriented
      throw new ConversionError({
        code: "INVALID_TERM",
        detail: `term id ${termId} contains a line break: ${JSON.stringify(term)}`,
        term,
        position: termId,
      });
    }

    const docIds = new Uint32Array(df);
    const freqs = new Uint32Array(df);
    let current = 0;
    for (let i = 0; i < df; i++) {
      const p = postings[i];
      if (!p) break;
      current += p.docIdDelta;
      if (current > U32_MAX || p.tf > U32_MAX) {
        throw new ConversionError({
          code: "VALUE_OUT_OF_RANGE",
          detail: `term "${term}" (term id ${termId}) posting ${i}: doc id ${current} / tf ${p.tf} exceeds 32 bits`,
          term,
          position: termId,
        });
      }
      docIds[i] = current;
      freqs[i] = p.tf;
    }

    this.table[termId] = { docIds, freqs };
    this.terms.push(term);
    this.postings += df;
    return termId;
  }

  postingsOf(termId: TermId): TermPostings {
    const entry = termId < this.terms.length ? this.table[termId] : undefined;
    if (!entry) {
      throw new ConversionError({
        code: "INVALID_STATE",
        detail: `term id ${termId} is outside 0..${this.terms.length - 1}`,
        position: termId,
      });
    }
    return entry;
  }

  getStats(): IndexStats {
    return { termCount: this.terms.length, postingCount: this.postings };
  }
}
