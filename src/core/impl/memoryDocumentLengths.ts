import type { DocId } from "../types.js";
import { U32_MAX } from "../types.js";
import type { DocumentLengthTable } from "../documentLengths.js";
import { ConversionError } from "../errors.js";

export class MemoryDocumentLengths implements DocumentLengthTable {
  private readonly lengths = new Map<DocId, number>();
  private readonly collectionIds = new Map<DocId, string>();
  private overwritten = 0;
  private sorted: Uint32Array | undefined;

  get docCount(): number {
    return this.lengths.size;
  }

  get duplicates(): number {
    return this.overwritten;
  }

  set(docId: DocId, length: number): void {
    checkU32("doc id", docId);
    checkU32("document length", length);
    if (this.lengths.has(docId)) this.overwritten++;
    this.lengths.set(docId, length);
    this.sorted = undefined;
  }

  setCollectionDocId(docId: DocId, collectionDocId: string): void {
    checkU32("doc id", docId);
    this.collectionIds.set(docId, collectionDocId);
  }

  sortedDocIds(): Uint32Array {
    return this.sortedIds().slice();
  }

  sortedLengths(): Uint32Array {
    const ids = this.sortedIds();
    const out = new Uint32Array(ids.length);
    for (let i = 0; i < ids.length; i++) {
      out[i] = this.lengths.get(ids[i] ?? 0) ?? 0;
    }
    return out;
  }

  sortedCollectionDocIds(): string[] | undefined {
    if (this.collectionIds.size === 0) return undefined;
    return Array.from(this.sortedIds(), (id) => this.collectionIds.get(id) ?? String(id));
  }

  private sortedIds(): Uint32Array {
    if (!this.sorted) {
      // Uint32Array sorts numerically
      this.sorted = Uint32Array.from(this.lengths.keys()).sort();
    }
    return this.sorted;
  }
}

function checkU32(what: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw new ConversionError({
      code: "VALUE_OUT_OF_RANGE",
      detail: `${what} ${value} is not an unsigned 32-bit integer`,
    });
  }
}
