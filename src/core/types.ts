/** Shared core types used by module contracts. */

export type DocId = number;
export type TermId = number;
export type Term = string;

/** One entry of a postings list as it travels on the wire. */
export interface Posting {
  /** offset from the previous absolute doc id in the same list (the first is relative to 0) */
  docIdDelta: number;
  tf: number;
}

/** A single term's postings, as decoded from one frame. */
export interface PostingsRecord {
  term: Term;
  /** declared document frequency; must equal `postings.length` */
  df: number;
  /** declared collection frequency */
  cf: number;
  postings: Posting[];
}

/** Leading message of a full CIFF file. */
export interface CiffHeader {
  version: number;
  numPostingsLists: number;
  numDocs: number;
  totalPostingsLists: number;
  totalDocs: number;
  totalTermsInCollection: number;
  averageDocLength: number;
  description: string;
}

/** Trailing per-document message of a full CIFF file. */
export interface DocRecord {
  docId: DocId;
  /** external (collection) identifier of the document */
  collectionDocId: string;
  docLength: number;
}

/** Absolute postings of one term, index-aligned. */
export interface TermPostings {
  docIds: Uint32Array;
  freqs: Uint32Array;
}

/** Minimal logging surface the core reports progress through. */
export interface ProgressLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
}

export const silentLogger: ProgressLogger = {
  debug() {},
  info() {},
  warn() {},
};

export const U32_MAX = 0xffffffff;
