export { BufferByteSource, MAX_VARINT_BYTES, readVarintFrom } from "./bufferByteSource.js";
export { DEFAULT_CHUNK_SIZE, FileByteSource, type FileByteSourceOptions } from "./fileByteSource.js";
export {
  ProtobufWriter,
  WIRE_FIXED32,
  WIRE_FIXED64,
  WIRE_LENGTH_DELIMITED,
  WIRE_VARINT,
  readString,
  readTag,
  skipField,
  type Tag,
} from "./protobufWire.js";
export {
  decodeDocRecord,
  decodeHeader,
  decodePosting,
  decodePostingsRecord,
  encodeDocRecord,
  encodeHeader,
  encodePosting,
  encodePostingsRecord,
  frameMessages,
} from "./ciffMessages.js";
export { CiffReader, FramedMessageReader, FramedPostingsDecoder, decodeFrame } from "./framedPostingsDecoder.js";
export { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
export { MemoryDocumentLengths } from "./memoryDocumentLengths.js";
export {
  ingestDocumentLengths,
  parseDocLengthLine,
  readDocumentLengthsFile,
  type DocLengthEntry,
} from "./docLengthParser.js";
export { BinaryCollectionEncoder, SequenceWriter, encodeU32Sequence } from "./canonicalEncoder.js";
export { readAllSequences, readBinaryCollection } from "./binaryCollection.js";
export {
  artifactPaths,
  readInputFile,
  writeArtifacts,
  writeFilesAtomically,
  type FileContents,
} from "./artifactFiles.js";
export {
  CanonicalConverter,
  DEFAULT_PROGRESS_INTERVAL,
  type ByteInput,
  type ConversionInput,
  type ConversionSummary,
  type ConverterDeps,
  type ConverterOptions,
  type ConverterState,
  type DocLengthSource,
} from "./converter.js";
export {
  buildCiffHeader,
  encodeExport,
  exportCanonicalIndex,
  formatDocLengths,
  loadCanonicalIndex,
  postingsRecords,
  toPostingsRecord,
  type ExportOptions,
  type ExportSummary,
  type LoadedCanonicalIndex,
} from "./exporter.js";
