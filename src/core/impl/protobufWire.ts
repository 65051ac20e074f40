import type { ByteSource } from "../byteSource.js";
import { malformed } from "../errors.js";

// ==========================================
// Wire Types
// ==========================================

export const WIRE_VARINT = 0;
export const WIRE_FIXED64 = 1;
export const WIRE_LENGTH_DELIMITED = 2;
export const WIRE_FIXED32 = 5;

export interface Tag {
  field: number;
  wireType: number;
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });
const utf8Encoder = new TextEncoder();

export function readTag(reader: ByteSource): Tag {
  const at = reader.position;
  const tag = reader.readVarint();
  const field = Math.floor(tag / 8);
  if (field === 0) {
    throw malformed(`field number 0 at byte ${at}`);
  }
  return { field, wireType: tag % 8 };
}

export function expectWireType(tag: Tag, expected: number, message: string): void {
  if (tag.wireType !== expected) {
    throw malformed(`${message} field ${tag.field} has wire type ${tag.wireType}, expected ${expected}`);
  }
}

/** Skip a field based on wire type. Groups are not part of the schema and are rejected. */
export function skipField(reader: ByteSource, wireType: number): void {
  switch (wireType) {
    case WIRE_VARINT:
      reader.readVarint();
      break;
    case WIRE_FIXED64:
      reader.skip(8);
      break;
    case WIRE_LENGTH_DELIMITED:
      reader.skip(reader.readVarint());
      break;
    case WIRE_FIXED32:
      reader.skip(4);
      break;
    default:
      throw malformed(`unsupported wire type ${wireType} at byte ${reader.position}`);
  }
}

export function readString(reader: ByteSource): string {
  const bytes = reader.readBytes(reader.readVarint());
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw malformed(`invalid UTF-8 in string ending at byte ${reader.position}`);
  }
}

/**
 * Growable protobuf encoder.
 *
 * Scalars equal to their default (0, "") are omitted, as proto3 serializers do.
 */
export class ProtobufWriter {
  private buf = new Uint8Array(64);
  private length = 0;

  writeVarint(value: number): this {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`cannot encode ${value} as an unsigned varint`);
    }
    this.reserve(10);
    let v = value;
    while (v >= 0x80) {
      this.buf[this.length++] = (v % 0x80) | 0x80;
      v = Math.floor(v / 0x80);
    }
    this.buf[this.length++] = v;
    return this;
  }

  writeTag(field: number, wireType: number): this {
    return this.writeVarint(field * 8 + wireType);
  }

  uint(field: number, value: number): this {
    if (value === 0) return this;
    return this.writeTag(field, WIRE_VARINT).writeVarint(value);
  }

  string(field: number, value: string): this {
    if (value.length === 0) return this;
    return this.bytes(field, utf8Encoder.encode(value));
  }

  double(field: number, value: number): this {
    if (value === 0) return this;
    this.writeTag(field, WIRE_FIXED64);
    this.reserve(8);
    new DataView(this.buf.buffer).setFloat64(this.length, value, true);
    this.length += 8;
    return this;
  }

  bytes(field: number, value: Uint8Array): this {
    this.writeTag(field, WIRE_LENGTH_DELIMITED);
    return this.raw(value, true);
  }

  /** Append `value`, optionally preceded by its varint length (a frame). */
  raw(value: Uint8Array, lengthPrefixed = false): this {
    if (lengthPrefixed) this.writeVarint(value.length);
    this.reserve(value.length);
    this.buf.set(value, this.length);
    this.length += value.length;
    return this;
  }

  finish(): Uint8Array {
    return this.buf.slice(0, this.length);
  }

  private reserve(extra: number): void {
    if (this.length + extra <= this.buf.length) return;
    let size = this.buf.length * 2;
    while (size < this.length + extra) size *= 2;
    const next = new Uint8Array(size);
    next.set(this.buf.subarray(0, this.length));
    this.buf = next;
  }
}
