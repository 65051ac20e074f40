import type { BoundedByteSource, ByteSource } from "../byteSource.js";
import { malformed } from "../errors.js";

export const MAX_VARINT_BYTES = 10;

/** Unsigned base-128 varint read byte by byte from `source`. */
export function readVarintFrom(source: Pick<ByteSource, "position" | "readByte">): number {
  const start = source.position;
  let result = 0;
  let multiplier = 1;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const byte = source.readByte();
    result += (byte & 0x7f) * multiplier;
    if ((byte & 0x80) === 0) {
      if (result > Number.MAX_SAFE_INTEGER) {
        throw malformed(`varint at byte ${start} is negative or exceeds 2^53`);
      }
      return result;
    }
    multiplier *= 128;
  }
  throw malformed(`varint at byte ${start} is longer than ${MAX_VARINT_BYTES} bytes`);
}

/**
 * In-memory byte source.
 *
 * A root source spans the whole buffer; `bounded(n)` returns a child sharing the same
 * bytes but limited to `[position, position + n)`. Children never copy.
 *
 * `base` is added to every reported position, so a frame copied out of a larger input
 * still reports offsets within that input.
 */
export class BufferByteSource implements BoundedByteSource {
  private offset: number;
  private readonly view: DataView;

  constructor(
    private readonly bytes: Uint8Array,
    start = 0,
    private readonly end = bytes.length,
    private readonly base = 0,
  ) {
    this.offset = start;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.base + this.offset;
  }

  get remaining(): number {
    return this.end - this.offset;
  }

  readByte(): number {
    if (this.offset >= this.end) {
      throw malformed(`unexpected end of data at byte ${this.position}`);
    }
    const byte = this.bytes[this.offset] ?? 0;
    this.offset++;
    return byte;
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length);
    const out = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  readVarint(): number {
    return readVarintFrom(this);
  }

  hasCompleteVarint(): boolean {
    const limit = Math.min(this.end, this.offset + MAX_VARINT_BYTES);
    for (let i = this.offset; i < limit; i++) {
      if (((this.bytes[i] ?? 0) & 0x80) === 0) return true;
    }
    return false;
  }

  readDouble(): number {
    this.ensure(8);
    const value = this.view.getFloat64(this.offset, true);
    this.offset += 8;
    return value;
  }

  skip(length: number): void {
    this.ensure(length);
    this.offset += length;
  }

  bounded(length: number): BoundedByteSource {
    this.ensure(length);
    const child = new BufferByteSource(this.bytes, this.offset, this.offset + length, this.base);
    this.offset += length;
    return child;
  }

  assertConsumed(what: string): void {
    if (this.offset !== this.end) {
      throw malformed(`${what} left ${this.end - this.offset} unread byte(s) at byte ${this.position}`);
    }
  }

  private ensure(length: number): void {
    if (length < 0 || this.offset + length > this.end) {
      throw malformed(
        `need ${length} byte(s) at byte ${this.position} but only ${this.end - this.offset} remain`,
      );
    }
  }
}
