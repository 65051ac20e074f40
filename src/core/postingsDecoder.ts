import type { BoundedByteSource } from "./byteSource.js";
import type { CiffHeader, DocRecord, PostingsRecord } from "./types.js";

/**
 * Splits a byte stream into `[varint length][payload]` frames.
 *
 * `nextFrame()` returns `undefined` at the end of the stream (no bytes left, or a length
 * prefix that cannot be read at a frame boundary). A declared length that runs past the
 * available bytes is malformed.
 */
export interface FrameReader {
  nextFrame(): BoundedByteSource | undefined;
  /** frames handed out so far */
  readonly framesRead: number;
  /** bytes left unread after the stream ended on an unreadable length prefix */
  readonly trailingBytes: number;
}

/** Lazily decodes one postings record per frame, in stream order. */
export interface PostingsDecoder extends Iterable<PostingsRecord> {
  readonly framesRead: number;
  readonly trailingBytes: number;
}

/** Reader for a full CIFF file: header, then postings lists, then document records. */
export interface CiffFileReader {
  readonly header: CiffHeader;
  /** frames read so far, the header included */
  readonly framesRead: number;
  readonly trailingBytes: number;
  postings(): Iterable<PostingsRecord>;
  /** Only valid once `postings()` has been fully drained. */
  docRecords(): Iterable<DocRecord>;
}
