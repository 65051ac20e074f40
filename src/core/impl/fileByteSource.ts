import { closeSync, fstatSync, openSync, readSync } from "node:fs";

import type { BoundedByteSource, ByteSource } from "../byteSource.js";
import { ConversionError, isConversionError, malformed } from "../errors.js";
import { BufferByteSource, MAX_VARINT_BYTES, readVarintFrom } from "./bufferByteSource.js";

export const DEFAULT_CHUNK_SIZE = 1 << 20;

export interface FileByteSourceOptions {
  /** bytes read from the file at a time */
  chunkSize?: number;
  /** names the file in I/O errors, e.g. "postings stream" */
  what?: string;
}

/**
 * Byte source over a file, read through a sliding window of `chunkSize` bytes, so inputs
 * of any size can be decoded frame by frame.
 *
 * `bounded(n)` copies just that frame out of the file; frames larger than the window are
 * read straight into their own buffer. Reads are synchronous so decoders stay plain
 * iterators. Call `close()` when done.
 */
export class FileByteSource implements ByteSource {
  private readonly window: Uint8Array;
  private readonly view: DataView;
  /** file offsets covered by `window[0..windowEnd - windowStart)` */
  private windowStart = 0;
  private windowEnd = 0;
  private offset = 0;
  private closed = false;

  private constructor(
    private readonly fd: number,
    private readonly size: number,
    private readonly path: string,
    chunkSize: number,
  ) {
    // a varint or a double must always fit
    this.window = new Uint8Array(Math.max(chunkSize, 16));
    this.view = new DataView(this.window.buffer);
  }

  static open(path: string, options: FileByteSourceOptions = {}): FileByteSource {
    const what = options.what ?? "input";
    let fd: number | undefined;
    try {
      fd = openSync(path, "r");
      const stats = fstatSync(fd);
      if (!stats.isFile()) {
        throw new ConversionError({ code: "IO_ERROR", detail: `cannot read ${what} ${path}: not a regular file` });
      }
      return new FileByteSource(fd, stats.size, path, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    } catch (e) {
      if (fd !== undefined) closeSync(fd);
      if (isConversionError(e)) throw e;
      throw new ConversionError({ code: "IO_ERROR", detail: `cannot read ${what} ${path}`, cause: e });
    }
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.size - this.offset;
  }

  readByte(): number {
    if (this.offset >= this.size) {
      throw malformed(`unexpected end of data at byte ${this.offset}`);
    }
    this.fill(1);
    const byte = this.window[this.offset - this.windowStart] ?? 0;
    this.offset++;
    return byte;
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length);
    return this.take(length);
  }

  readVarint(): number {
    return readVarintFrom(this);
  }

  hasCompleteVarint(): boolean {
    const n = Math.min(MAX_VARINT_BYTES, this.remaining);
    if (n === 0) return false;
    this.fill(n);
    const from = this.offset - this.windowStart;
    for (let i = from; i < from + n; i++) {
      if (((this.window[i] ?? 0) & 0x80) === 0) return true;
    }
    return false;
  }

  readDouble(): number {
    this.ensure(8);
    this.fill(8);
    const value = this.view.getFloat64(this.offset - this.windowStart, true);
    this.offset += 8;
    return value;
  }

  skip(length: number): void {
    this.ensure(length);
    this.offset += length;
  }

  bounded(length: number): BoundedByteSource {
    this.ensure(length);
    const at = this.offset;
    return new BufferByteSource(this.take(length), 0, length, at);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    closeSync(this.fd);
  }

  private ensure(length: number): void {
    if (length < 0 || length > this.remaining) {
      throw malformed(`need ${length} byte(s) at byte ${this.offset} but only ${this.remaining} remain`);
    }
  }

  /** Copy the next `length` bytes out and advance past them. */
  private take(length: number): Uint8Array {
    let out: Uint8Array;
    if (length <= this.window.length) {
      this.fill(length);
      const from = this.offset - this.windowStart;
      out = this.window.slice(from, from + length);
    } else {
      out = new Uint8Array(length);
      let copied = 0;
      if (this.offset < this.windowEnd) {
        const buffered = this.window.subarray(this.offset - this.windowStart, this.windowEnd - this.windowStart);
        out.set(buffered);
        copied = buffered.length;
      }
      this.readFully(out, copied, length - copied, this.offset + copied);
    }
    this.offset += length;
    return out;
  }

  /** Make `[offset, offset + length)` available in the window; `length` fits the window. */
  private fill(length: number): void {
    if (this.offset >= this.windowStart && this.offset + length <= this.windowEnd) return;

    let kept = 0;
    if (this.offset >= this.windowStart && this.offset < this.windowEnd) {
      kept = this.windowEnd - this.offset;
      this.window.copyWithin(0, this.offset - this.windowStart, this.windowEnd - this.windowStart);
    }
    const want = Math.min(this.window.length, this.size - this.offset);
    this.readFully(this.window, kept, want - kept, this.offset + kept);
    this.windowStart = this.offset;
    this.windowEnd = this.offset + want;
  }

  private readFully(target: Uint8Array, at: number, length: number, position: number): void {
    let done = 0;
    while (done < length) {
      let n: number;
      try {
        n = readSync(this.fd, target, at + done, length - done, position + done);
      } catch (e) {
        throw new ConversionError({ code: "IO_ERROR", detail: `cannot read ${this.path}`, cause: e });
      }
      if (n === 0) {
        throw new ConversionError({
          code: "IO_ERROR",
          detail: `${this.path} ended at byte ${position + done}; expected ${this.size} bytes`,
        });
      }
      done += n;
    }
  }
}
