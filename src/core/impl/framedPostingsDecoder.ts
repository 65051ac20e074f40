import type { BoundedByteSource, ByteSource } from "../byteSource.js";
import type { CiffFileReader, FrameReader, PostingsDecoder } from "../postingsDecoder.js";
import type { CiffHeader, DocRecord, PostingsRecord } from "../types.js";
import { ConversionError, isConversionError, malformed } from "../errors.js";
import { BufferByteSource } from "./bufferByteSource.js";
import { decodeDocRecord, decodeHeader, decodePostingsRecord } from "./ciffMessages.js";

export class FramedMessageReader implements FrameReader {
  private frames = 0;
  private trailing = 0;

  constructor(private readonly source: ByteSource) {}

  get framesRead(): number {
    return this.frames;
  }

  get trailingBytes(): number {
    return this.trailing;
  }

  nextFrame(): BoundedByteSource | undefined {
    if (this.source.remaining === 0) return undefined;
    if (!this.source.hasCompleteVarint()) {
      this.trailing = this.source.remaining;
      this.source.skip(this.trailing);
      return undefined;
    }
    const at = this.source.position;
    const length = this.source.readVarint();
    if (length > this.source.remaining) {
      throw malformed(
        `frame ${this.frames} at byte ${at} declares ${length} byte(s) but only ${this.source.remaining} remain`,
      );
    }
    this.frames++;
    return this.source.bounded(length);
  }
}

/**
 * Decode the payload of one frame, attaching the frame's position to any failure.
 * Every byte of the frame must be consumed.
 */
export function decodeFrame<T>(
  frame: BoundedByteSource,
  index: number,
  what: string,
  decode: (reader: BoundedByteSource) => T,
): T {
  const at = frame.position;
  try {
    const value = decode(frame);
    frame.assertConsumed(what);
    return value;
  } catch (e) {
    if (!isConversionError(e) || e.code !== "MESSAGE_MALFORMED") throw e;
    throw new ConversionError({
      code: "MESSAGE_MALFORMED",
      detail: `${what} #${index} (payload at byte ${at}): ${e.detail ?? e.message}`,
      position: index,
      cause: e,
    });
  }
}

/**
 * Headerless postings stream: a raw concatenation of framed `PostingsList` messages.
 *
 * Iteration is lazy and single-pass; records are produced in stream order.
 */
export class FramedPostingsDecoder implements PostingsDecoder {
  private readonly frames: FramedMessageReader;
  private started = false;

  constructor(source: ByteSource | Uint8Array) {
    this.frames = new FramedMessageReader(source instanceof Uint8Array ? new BufferByteSource(source) : source);
  }

  get framesRead(): number {
    return this.frames.framesRead;
  }

  get trailingBytes(): number {
    return this.frames.trailingBytes;
  }

  *[Symbol.iterator](): Iterator<PostingsRecord> {
    if (this.started) {
      throw new ConversionError({ code: "INVALID_STATE", detail: "postings stream can only be iterated once" });
    }
    this.started = true;
    let index = 0;
    for (let frame = this.frames.nextFrame(); frame; frame = this.frames.nextFrame()) {
      yield decodeFrame(frame, index++, "PostingsList", decodePostingsRecord);
    }
  }
}

/**
 * Full CIFF file: `Header`, `header.numPostingsLists` postings lists, then `header.numDocs`
 * document records. Running out of frames before the declared counts is malformed.
 */
export class CiffReader implements CiffFileReader {
  readonly header: CiffHeader;
  private readonly frames: FramedMessageReader;
  private phase: "postings" | "reading" | "docs" | "done" = "postings";

  constructor(source: ByteSource | Uint8Array) {
    this.frames = new FramedMessageReader(source instanceof Uint8Array ? new BufferByteSource(source) : source);
    const first = this.frames.nextFrame();
    if (!first) throw malformed("CIFF file is empty; expected a header");
    this.header = decodeFrame(first, 0, "Header", decodeHeader);
  }

  *postings(): Iterable<PostingsRecord> {
    this.enter("postings");
    for (let i = 0; i < this.header.numPostingsLists; i++) {
      const frame = this.frames.nextFrame();
      if (!frame) {
        throw malformed(`header declares ${this.header.numPostingsLists} postings lists but the file ends after ${i}`, i);
      }
      yield decodeFrame(frame, i, "PostingsList", decodePostingsRecord);
    }
    this.phase = "docs";
  }

  *docRecords(): Iterable<DocRecord> {
    this.enter("docs");
    for (let i = 0; i < this.header.numDocs; i++) {
      const frame = this.frames.nextFrame();
      if (!frame) {
        throw malformed(`header declares ${this.header.numDocs} document records but the file ends after ${i}`, i);
      }
      yield decodeFrame(frame, i, "DocRecord", decodeDocRecord);
    }
    this.phase = "done";
  }

  get framesRead(): number {
    return this.frames.framesRead;
  }

  get trailingBytes(): number {
    return this.frames.trailingBytes;
  }

  private enter(section: "postings" | "docs"): void {
    if (this.phase !== section) {
      throw new ConversionError({
        code: "INVALID_STATE",
        detail: `CIFF sections must be read once, in order; cannot read ${section} (state: ${this.phase})`,
      });
    }
    this.phase = "reading";
  }
}
