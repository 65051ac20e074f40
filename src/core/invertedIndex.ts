import type { PostingsRecord, Term, TermId, TermPostings } from "./types.js";

export interface IndexStats {
  termCount: number;
  /** total postings across all terms */
  postingCount: number;
}

/** Read side of a fully accumulated index, consumed once by the encoder. */
export interface InvertedIndex {
  readonly termCount: number;
  /** term strings, index-aligned with term ids */
  readonly lexicon: readonly Term[];

  /** Postings of an assigned term id; throws for ids outside `0..termCount-1`. */
  postingsOf(termId: TermId): TermPostings;
  getStats(): IndexStats;
}

/**
 * Accumulates decoded postings records into a dense, term-id keyed index.
 *
 * Contract notes:
 * - term ids are assigned in arrival order, starting at 0, with no gaps
 * - `add` rejects a record whose posting count differs from its declared `df`
 * - doc ids are reconstructed from per-list deltas (running sum starting at 0)
 */
export interface InvertedIndexBuilder extends InvertedIndex {
  /** Hint the number of terms to come, so the table can be sized once. */
  expectTerms(count: number): void;
  add(record: PostingsRecord): TermId;
}
