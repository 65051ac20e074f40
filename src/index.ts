export type {
  CiffHeader,
  DocId,
  DocRecord,
  Posting,
  PostingsRecord,
  ProgressLogger,
  Term,
  TermId,
  TermPostings,
} from "./core/types.js";
export { U32_MAX, silentLogger } from "./core/types.js";
export { ConversionError, isConversionError, type ErrorCode, type FieldError } from "./core/errors.js";
export type { BoundedByteSource, ByteSource } from "./core/byteSource.js";
export type { CiffFileReader, FrameReader, PostingsDecoder } from "./core/postingsDecoder.js";
export type { IndexStats, InvertedIndex, InvertedIndexBuilder } from "./core/invertedIndex.js";
export type { DocumentLengthTable } from "./core/documentLengths.js";
export { ARTIFACT_SUFFIXES, type CanonicalArtifacts, type CanonicalEncoder } from "./core/canonicalEncoder.js";
export * from "./core/impl/index.js";
