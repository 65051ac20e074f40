/**
 * Sequential reader over a byte buffer.
 *
 * Contract notes:
 * - every read advances `position`; a read past the end (or past the limit of a bounded
 *   reader) throws a MESSAGE_MALFORMED `ConversionError`
 * - `bounded(n)` hands out a reader for the next `n` bytes and moves this reader past them,
 *   so a frame can never consume bytes that belong to its neighbour
 */
export interface ByteSource {
  /** offset of the next byte within the whole input */
  readonly position: number;
  readonly remaining: number;

  readByte(): number;
  readBytes(length: number): Uint8Array;
  /** Unsigned base-128 varint, at most 10 bytes, limited to safe integers. */
  readVarint(): number;
  /** True when a whole varint can be read without running out of bytes. */
  hasCompleteVarint(): boolean;
  /** Little-endian IEEE 754 double. */
  readDouble(): number;
  skip(length: number): void;

  bounded(length: number): BoundedByteSource;
}

export interface BoundedByteSource extends ByteSource {
  /** Throws unless every byte of the bound has been read. */
  assertConsumed(what: string): void;
}
