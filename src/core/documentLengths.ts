import type { DocId } from "./types.js";

/**
 * doc id -> length association.
 *
 * Repeated doc ids overwrite earlier ones (last write wins). Readers always see doc ids in
 * ascending order, whatever the insertion order was.
 */
export interface DocumentLengthTable {
  set(docId: DocId, length: number): void;
  /** Optional external identifier of the document (CIFF `collection_docid`). */
  setCollectionDocId(docId: DocId, collectionDocId: string): void;

  readonly docCount: number;
  /** number of `set` calls that overwrote an existing doc id */
  readonly duplicates: number;

  sortedDocIds(): Uint32Array;
  /** Lengths ordered by ascending doc id. */
  sortedLengths(): Uint32Array;
  /** External ids ordered by ascending doc id, or undefined when none were recorded. */
  sortedCollectionDocIds(): string[] | undefined;
}
