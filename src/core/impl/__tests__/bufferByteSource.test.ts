import { describe, expect, it } from "vitest";
import { BufferByteSource } from "../bufferByteSource.js";
import { catchConversionError } from "./fixtures.js";

function source(...bytes: number[]): BufferByteSource {
  return new BufferByteSource(Uint8Array.from(bytes));
}

describe("BufferByteSource", () => {
  it("reads multi-byte varints", () => {
    expect(source(0x96, 0x01).readVarint()).toBe(150);
    expect(source(0xac, 0x02).readVarint()).toBe(300);
    expect(source(0x00).readVarint()).toBe(0);
  });

  it("rejects varints that are negative or too long", () => {
    // int32 -1 as protobuf writes it: ten bytes, sign-extended to 64 bits
    const negative = catchConversionError(() =>
      source(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01).readVarint(),
    );
    expect(negative.code).toBe("MESSAGE_MALFORMED");
    expect(negative.message).toMatch(/negative or exceeds 2\^53/);

    const tooLong = catchConversionError(() =>
      source(0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x01).readVarint(),
    );
    expect(tooLong.message).toMatch(/longer than 10 bytes/);
  });

  it("fails on a truncated varint", () => {
    expect(catchConversionError(() => source(0x80).readVarint()).code).toBe("MESSAGE_MALFORMED");
  });

  it("reports whether a complete varint is available", () => {
    expect(source(0x80).hasCompleteVarint()).toBe(false);
    expect(source(0x80, 0x01).hasCompleteVarint()).toBe(true);
    expect(source().hasCompleteVarint()).toBe(false);
    expect(source(0x80, 0x01).bounded(1).hasCompleteVarint()).toBe(false);
  });

  it("keeps bounded readers inside their frame", () => {
    const src = source(1, 2, 3, 4, 5);
    const frame = src.bounded(2);
    expect(src.position).toBe(2);
    expect(frame.remaining).toBe(2);
    expect(frame.readByte()).toBe(1);
    expect(frame.readByte()).toBe(2);
    expect(catchConversionError(() => frame.readByte()).code).toBe("MESSAGE_MALFORMED");
    expect(src.readByte()).toBe(3);
  });

  it("asserts a bounded reader was fully consumed", () => {
    const frame = source(9, 8, 7, 6).bounded(3);
    frame.readByte();
    expect(() => frame.assertConsumed("frame")).toThrow("frame left 2 unread byte(s) at byte 1");
    frame.skip(2);
    expect(() => frame.assertConsumed("frame")).not.toThrow();
  });

  it("refuses bounds past the end of the data", () => {
    const err = catchConversionError(() => source(1, 2).bounded(3));
    expect(err.message).toBe("Malformed message: need 3 byte(s) at byte 0 but only 2 remain");
  });

  it("reads little-endian doubles and raw bytes", () => {
    const bytes = new Uint8Array(10);
    new DataView(bytes.buffer).setFloat64(0, 2.5, true);
    bytes[8] = 7;
    bytes[9] = 8;
    const src = new BufferByteSource(bytes);
    expect(src.readDouble()).toBe(2.5);
    expect(Array.from(src.readBytes(2))).toEqual([7, 8]);
    expect(src.remaining).toBe(0);
  });
});
