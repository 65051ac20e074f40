import { describe, expect, it } from "vitest";
import { encodeDocRecord, encodeHeader, encodePostingsRecord, frameMessages } from "../ciffMessages.js";
import { CiffReader, FramedPostingsDecoder } from "../framedPostingsDecoder.js";
import { catchConversionError, exampleRecords, postingsStream } from "./fixtures.js";

const header = {
  version: 1,
  numPostingsLists: 2,
  numDocs: 3,
  totalPostingsLists: 2,
  totalDocs: 3,
  totalTermsInCollection: 16,
  averageDocLength: 16 / 3,
  description: "",
};

const docs = [
  { docId: 1, collectionDocId: "d1", docLength: 5 },
  { docId: 3, collectionDocId: "d3", docLength: 9 },
  { docId: 5, collectionDocId: "d5", docLength: 2 },
];

describe("FramedPostingsDecoder", () => {
  it("yields one record per frame, in order", () => {
    const decoder = new FramedPostingsDecoder(postingsStream(exampleRecords));
    expect([...decoder]).toEqual(exampleRecords);
    expect(decoder.trailingBytes).toBe(0);
  });

  it("treats an empty stream as immediately ended", () => {
    expect([...new FramedPostingsDecoder(new Uint8Array(0))]).toEqual([]);
  });

  it("ends the stream on an unreadable length prefix", () => {
    const stream = postingsStream(exampleRecords);
    const decoder = new FramedPostingsDecoder(Uint8Array.from([...stream, 0x80]));
    expect([...decoder].map((r) => r.term)).toEqual(["a", "b"]);
    expect(decoder.trailingBytes).toBe(1);
  });

  it("fails when a frame declares more bytes than remain", () => {
    const err = catchConversionError(() => [...new FramedPostingsDecoder(Uint8Array.from([0x05, 0x01, 0x02]))]);
    expect(err.code).toBe("MESSAGE_MALFORMED");
    expect(err.message).toBe("Malformed message: frame 0 at byte 0 declares 5 byte(s) but only 2 remain");
  });

  it("decodes lazily and stops at the first malformed payload", () => {
    const good = encodePostingsRecord(exampleRecords[0]!);
    // term declares 5 bytes inside a 3 byte frame
    const bad = Uint8Array.from([0x0a, 0x05, 0x61]);
    const it = new FramedPostingsDecoder(frameMessages([good, bad]))[Symbol.iterator]();

    expect(it.next().value).toEqual(exampleRecords[0]);
    const err = catchConversionError(() => it.next());
    expect(err.code).toBe("MESSAGE_MALFORMED");
    expect(err.position).toBe(1);
    expect(err.message).toMatch(/^Malformed message: PostingsList #1 \(payload at byte 21\): need 5 byte\(s\)/);
  });

  it("can only be iterated once", () => {
    const decoder = new FramedPostingsDecoder(postingsStream(exampleRecords));
    expect([...decoder]).toHaveLength(2);
    expect(catchConversionError(() => [...decoder]).code).toBe("INVALID_STATE");
  });
});

describe("CiffReader", () => {
  function ciffFile(postingsLists = exampleRecords): Uint8Array {
    return frameMessages([
      encodeHeader(header),
      ...postingsLists.map(encodePostingsRecord),
      ...docs.map(encodeDocRecord),
    ]);
  }

  it("reads header, postings lists and doc records in order", () => {
    const reader = new CiffReader(ciffFile());
    expect(reader.header).toEqual(header);
    expect([...reader.postings()]).toEqual(exampleRecords);
    expect([...reader.docRecords()]).toEqual(docs);
  });

  it("requires the postings section to be drained first", () => {
    const reader = new CiffReader(ciffFile());
    expect(catchConversionError(() => [...reader.docRecords()]).code).toBe("INVALID_STATE");
  });

  it("fails when the file holds fewer messages than the header declares", () => {
    const truncated = frameMessages([encodeHeader({ ...header, numPostingsLists: 3 }), ...exampleRecords.map(encodePostingsRecord)]);
    const reader = new CiffReader(truncated);
    const err = catchConversionError(() => [...reader.postings()]);
    expect(err.code).toBe("MESSAGE_MALFORMED");
    expect(err.message).toBe("Malformed message: header declares 3 postings lists but the file ends after 2");
  });

  it("rejects an empty file", () => {
    expect(catchConversionError(() => new CiffReader(new Uint8Array(0))).message).toMatch(/expected a header/);
  });
});
