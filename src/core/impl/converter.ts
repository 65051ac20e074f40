import type { CanonicalEncoder } from "../canonicalEncoder.js";
import type { DocumentLengthTable } from "../documentLengths.js";
import type { InvertedIndexBuilder } from "../invertedIndex.js";
import type { CiffHeader, PostingsRecord, ProgressLogger } from "../types.js";
import { silentLogger } from "../types.js";
import { ConversionError } from "../errors.js";
import { writeArtifacts } from "./artifactFiles.js";
import { BinaryCollectionEncoder } from "./canonicalEncoder.js";
import { ingestDocumentLengths, readDocumentLengthsFile } from "./docLengthParser.js";
import type { ByteSource } from "../byteSource.js";
import { BufferByteSource } from "./bufferByteSource.js";
import { FileByteSource } from "./fileByteSource.js";
import { CiffReader, FramedPostingsDecoder } from "./framedPostingsDecoder.js";
import { MemoryDocumentLengths } from "./memoryDocumentLengths.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";

export type ConverterState = "idle" | "decoding" | "encoding" | "done" | "failed";

export type DocLengthSource = Iterable<string> | AsyncIterable<string> | { path: string };

/** In-memory bytes, or a file read in chunks. */
export type ByteInput = Uint8Array | { path: string };

export type ConversionInput =
  /** headerless postings stream plus an external `docid length` listing */
  | { format: "postings"; postings: ByteInput; docLengths: DocLengthSource }
  /** full CIFF file; document lengths come from its doc records */
  | { format: "ciff"; ciff: ByteInput };

export interface ConverterDeps {
  index?: InvertedIndexBuilder;
  lengths?: DocumentLengthTable;
  encoder?: CanonicalEncoder;
}

export interface ConverterOptions {
  logger?: ProgressLogger;
  /** log progress every N postings lists */
  progressInterval?: number;
}

export interface ConversionSummary {
  termCount: number;
  postingCount: number;
  docCount: number;
  duplicateDocIds: number;
  header?: CiffHeader;
  outputs: string[];
}

export const DEFAULT_PROGRESS_INTERVAL = 100_000;

/**
 * Two-phase batch conversion: decode and accumulate everything, then encode and write.
 *
 * idle -> decoding -> encoding -> done (or failed from either phase). A converter runs once;
 * no artifact file appears unless every phase succeeded.
 */
export class CanonicalConverter {
  private current: ConverterState = "idle";
  private readonly index: InvertedIndexBuilder;
  private readonly lengths: DocumentLengthTable;
  private readonly encoder: CanonicalEncoder;
  private readonly logger: ProgressLogger;
  private readonly progressInterval: number;

  constructor(deps: ConverterDeps = {}, options: ConverterOptions = {}) {
    this.index = deps.index ?? new MemoryInvertedIndex();
    this.lengths = deps.lengths ?? new MemoryDocumentLengths();
    this.encoder = deps.encoder ?? new BinaryCollectionEncoder();
    this.logger = options.logger ?? silentLogger;
    this.progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    if (!Number.isSafeInteger(this.progressInterval) || this.progressInterval <= 0) {
      throw new ConversionError({
        code: "INVALID_ARGUMENT",
        detail: `progress interval must be a positive integer, got ${this.progressInterval}`,
      });
    }
  }

  get state(): ConverterState {
    return this.current;
  }

  async convert(input: ConversionInput, outputBasename: string): Promise<ConversionSummary> {
    if (this.current !== "idle") {
      throw new ConversionError({ code: "INVALID_STATE", detail: `converter already ${this.current}` });
    }
    this.current = "decoding";
    try {
      const header = input.format === "ciff" ? this.decodeCiff(input.ciff) : await this.decodePostings(input);

      this.current = "encoding";
      const stats = this.index.getStats();
      this.logger.info("Encoding canonical index...", { terms: stats.termCount, docs: this.lengths.docCount });
      const artifacts = this.encoder.encode(this.index, this.lengths);
      const outputs = await writeArtifacts(outputBasename, artifacts);

      this.current = "done";
      return {
        termCount: stats.termCount,
        postingCount: stats.postingCount,
        docCount: this.lengths.docCount,
        duplicateDocIds: this.lengths.duplicates,
        header,
        outputs,
      };
    } catch (e) {
      this.current = "failed";
      throw e;
    }
  }

  private async decodePostings(input: Extract<ConversionInput, { format: "postings" }>): Promise<undefined> {
    this.logger.info("Processing document lengths...");
    const entries =
      hasPath(input.docLengths)
        ? await readDocumentLengthsFile(input.docLengths.path, this.lengths)
        : await ingestDocumentLengths(input.docLengths, this.lengths);
    this.warnDuplicates(entries);

    this.logger.info("Processing postings...");
    const source = openInput(input.postings, "postings stream");
    try {
      const decoder = new FramedPostingsDecoder(source);
      this.accumulate(decoder, () => decoder.framesRead);
      this.warnTrailing(decoder.trailingBytes);
    } finally {
      closeInput(source);
    }
    return undefined;
  }

  private decodeCiff(input: ByteInput): CiffHeader {
    const source = openInput(input, "CIFF file");
    try {
      return this.decodeCiffSource(source);
    } finally {
      closeInput(source);
    }
  }

  private decodeCiffSource(source: ByteSource): CiffHeader {
    const reader = new CiffReader(source);
    const { header } = reader;
    this.logger.info("CIFF header", { ...header });

    this.logger.info("Processing postings...");
    // every postings list takes at least its one-byte length prefix
    if (header.numPostingsLists <= source.remaining) {
      this.index.expectTerms(header.numPostingsLists);
    }
    this.accumulate(reader.postings(), () => reader.framesRead);

    this.logger.info("Processing document records...");
    for (const doc of reader.docRecords()) {
      this.lengths.set(doc.docId, doc.docLength);
      this.lengths.setCollectionDocId(doc.docId, doc.collectionDocId);
    }
    this.warnDuplicates(header.numDocs);
    this.warnTrailing(reader.trailingBytes);
    return header;
  }

  private accumulate(records: Iterable<PostingsRecord>, framesRead: () => number): void {
    let n = 0;
    for (const record of records) {
      this.index.add(record);
      if (++n % this.progressInterval === 0) {
        this.logger.debug(`processed ${n} postings lists`);
      }
    }
    this.logger.debug(`processed ${n} postings lists`, {
      postings: this.index.getStats().postingCount,
      frames: framesRead(),
    });
  }

  private warnDuplicates(entries: number): void {
    const dups = this.lengths.duplicates;
    if (dups > 0) {
      this.logger.warn(`${dups} repeated doc id(s) in document lengths; later entries win`, {
        entries,
        distinct: this.lengths.docCount,
      });
    }
  }

  private warnTrailing(bytes: number): void {
    if (bytes > 0) {
      this.logger.warn(`ignored ${bytes} trailing byte(s) that do not form a length prefix`);
    }
  }
}

function hasPath(source: DocLengthSource | ByteInput): source is { path: string } {
  return typeof source === "object" && source !== null && "path" in source && typeof source.path === "string";
}

function openInput(input: ByteInput, what: string): ByteSource {
  return hasPath(input) ? FileByteSource.open(input.path, { what }) : new BufferByteSource(input);
}

function closeInput(source: ByteSource): void {
  if (source instanceof FileByteSource) source.close();
}
