import type { CiffHeader, PostingsRecord, ProgressLogger } from "../types.js";
import { silentLogger } from "../types.js";
import { ConversionError } from "../errors.js";
import { artifactPaths, readInputFile, readOptionalTextFile, writeFilesAtomically, type FileContents } from "./artifactFiles.js";
import { readAllSequences } from "./binaryCollection.js";
import { encodeDocRecord, encodeHeader, encodePostingsRecord, frameMessages } from "./ciffMessages.js";

/** A canonical index read back into memory. */
export interface LoadedCanonicalIndex {
  docCount: number;
  terms: string[];
  docIds: Uint32Array[];
  freqs: Uint32Array[];
  sizes: Uint32Array;
  /** collection doc ids, when a `.documents` file sits next to the index */
  documents?: string[];
}

export interface ExportOptions {
  /** basename of the canonical index to read */
  input: string;
  format: "postings" | "ciff";
  /** postings stream (or CIFF file) to write */
  postingsPath: string;
  /** `docid length` listing; required for the postings format */
  docLengthsPath?: string;
  description?: string;
  logger?: ProgressLogger;
}

export interface ExportSummary {
  termCount: number;
  docCount: number;
  outputs: string[];
}

export async function loadCanonicalIndex(basename: string): Promise<LoadedCanonicalIndex> {
  const paths = artifactPaths(basename);
  const [docsBytes, freqsBytes, sizesBytes, lexiconText] = await Promise.all([
    readInputFile(paths.docs, "docs"),
    readInputFile(paths.freqs, "freqs"),
    readInputFile(paths.sizes, "sizes"),
    readInputFile(paths.lexicon, "lexicon").then((b) => Buffer.from(b).toString("utf8")),
  ]);
  const documentsText = await readOptionalTextFile(paths.documents);

  const [docHeader, ...docIds] = readAllSequences(docsBytes, "docs");
  const freqs = readAllSequences(freqsBytes, "freqs");
  const sizeSeqs = readAllSequences(sizesBytes, "sizes");
  const terms = splitLines(lexiconText);

  if (!docHeader || docHeader.length !== 1) {
    throw invalid("docs must start with a one-element [doc_count] sequence");
  }
  const docCount = docHeader[0] ?? 0;
  const [sizes] = sizeSeqs;
  if (sizeSeqs.length !== 1 || !sizes) {
    throw invalid(`sizes must hold exactly one sequence, found ${sizeSeqs.length}`);
  }
  if (sizes.length !== docCount) {
    throw invalid(`docs header says ${docCount} documents but sizes holds ${sizes.length}`);
  }
  if (docIds.length !== freqs.length || docIds.length !== terms.length) {
    throw invalid(
      `term counts disagree: ${docIds.length} doc sequences, ${freqs.length} freq sequences, ${terms.length} lexicon lines`,
    );
  }
  for (let t = 0; t < docIds.length; t++) {
    if (docIds[t]?.length !== freqs[t]?.length) {
      throw invalid(`term id ${t}: ${docIds[t]?.length} doc ids but ${freqs[t]?.length} frequencies`);
    }
  }

  const documents = documentsText === undefined ? undefined : splitLines(documentsText);
  if (documents && documents.length !== docCount) {
    throw invalid(`documents lists ${documents.length} ids but the index has ${docCount} documents`);
  }
  return { docCount, terms, docIds, freqs, sizes, documents };
}

/** Delta-encode one term's absolute postings back into a wire record. */
export function toPostingsRecord(term: string, docIds: Uint32Array, freqs: Uint32Array): PostingsRecord {
  const postings = new Array<PostingsRecord["postings"][number]>(docIds.length);
  let prev = 0;
  let cf = 0;
  for (let i = 0; i < docIds.length; i++) {
    const id = docIds[i] ?? 0;
    const tf = freqs[i] ?? 0;
    if (id < prev) {
      throw invalid(`term "${term}": doc ids decrease at position ${i} (${prev} -> ${id})`);
    }
    postings[i] = { docIdDelta: id - prev, tf };
    prev = id;
    cf += tf;
  }
  return { term, df: docIds.length, cf, postings };
}

export function* postingsRecords(index: LoadedCanonicalIndex): Generator<PostingsRecord> {
  for (let t = 0; t < index.terms.length; t++) {
    yield toPostingsRecord(index.terms[t] ?? "", index.docIds[t] ?? new Uint32Array(0), index.freqs[t] ?? new Uint32Array(0));
  }
}

export function buildCiffHeader(index: LoadedCanonicalIndex, description = ""): CiffHeader {
  let total = 0;
  for (const len of index.sizes) total += len;
  return {
    version: 1,
    numPostingsLists: index.terms.length,
    numDocs: index.docCount,
    totalPostingsLists: index.terms.length,
    totalDocs: index.docCount,
    totalTermsInCollection: total,
    averageDocLength: index.docCount > 0 ? total / index.docCount : 0,
    description,
  };
}

/** Encode a loaded index as a headerless postings stream, or as a complete CIFF file. */
export function encodeExport(index: LoadedCanonicalIndex, format: "postings" | "ciff", description?: string): Uint8Array {
  const records = Array.from(postingsRecords(index), encodePostingsRecord);
  if (format === "postings") return frameMessages(records);

  const docs = Array.from(index.sizes, (docLength, docId) =>
    encodeDocRecord({ docId, collectionDocId: index.documents?.[docId] ?? String(docId), docLength }),
  );
  return frameMessages([encodeHeader(buildCiffHeader(index, description)), ...records, ...docs]);
}

export function formatDocLengths(sizes: Uint32Array): string {
  return Array.from(sizes, (len, docId) => `${docId} ${len}\n`).join("");
}

export async function exportCanonicalIndex(options: ExportOptions): Promise<ExportSummary> {
  const logger = options.logger ?? silentLogger;
  if (options.format === "postings" && !options.docLengthsPath) {
    throw new ConversionError({
      code: "INVALID_ARGUMENT",
      detail: "exporting a postings stream needs a document lengths path",
      errors: [{ path: "$.doclens", message: "required for the postings format" }],
    });
  }

  logger.info("Reading canonical index...", { input: options.input });
  const index = await loadCanonicalIndex(options.input);

  logger.info("Encoding postings...", { terms: index.terms.length, docs: index.docCount });
  const files: Array<readonly [string, FileContents]> = [
    [options.postingsPath, encodeExport(index, options.format, options.description)],
  ];
  if (options.format === "postings" && options.docLengthsPath) {
    files.push([options.docLengthsPath, formatDocLengths(index.sizes)]);
  }
  const outputs = await writeFilesAtomically(files);
  return { termCount: index.terms.length, docCount: index.docCount, outputs };
}

function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function invalid(detail: string): ConversionError {
  return new ConversionError({ code: "INVALID_COLLECTION", detail });
}
