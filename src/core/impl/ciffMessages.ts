import type { BoundedByteSource } from "../byteSource.js";
import type { CiffHeader, DocRecord, Posting, PostingsRecord } from "../types.js";
import {
  ProtobufWriter,
  WIRE_FIXED64,
  WIRE_LENGTH_DELIMITED,
  WIRE_VARINT,
  expectWireType,
  readString,
  readTag,
  skipField,
} from "./protobufWire.js";

/*
 * CIFF v1 messages:
 *
 *   Posting      { int32 docid = 1; int32 tf = 2; }
 *   PostingsList { string term = 1; int64 df = 2; int64 cf = 3; repeated Posting postings = 4; }
 *   Header       { int32 version = 1; int32 num_postings_lists = 2; int32 num_docs = 3;
 *                  int32 total_postings_lists = 4; int32 total_docs = 5;
 *                  int64 total_terms_in_collection = 6; double average_doclength = 7;
 *                  string description = 8; }
 *   DocRecord    { int32 docid = 1; string collection_docid = 2; int32 doclength = 3; }
 *
 * Decoders read until their bounded reader is exhausted. Negative integers cannot occur in a
 * valid index and are rejected by the varint reader.
 */

export function decodePosting(reader: BoundedByteSource): Posting {
  const posting: Posting = { docIdDelta: 0, tf: 0 };
  while (reader.remaining > 0) {
    const tag = readTag(reader);
    switch (tag.field) {
      case 1:
        expectWireType(tag, WIRE_VARINT, "Posting");
        posting.docIdDelta = reader.readVarint();
        break;
      case 2:
        expectWireType(tag, WIRE_VARINT, "Posting");
        posting.tf = reader.readVarint();
        break;
      default:
        skipField(reader, tag.wireType);
    }
  }
  reader.assertConsumed("Posting");
  return posting;
}

export function decodePostingsRecord(reader: BoundedByteSource): PostingsRecord {
  const record: PostingsRecord = { term: "", df: 0, cf: 0, postings: [] };
  while (reader.remaining > 0) {
    const tag = readTag(reader);
    switch (tag.field) {
      case 1:
        expectWireType(tag, WIRE_LENGTH_DELIMITED, "PostingsList");
        record.term = readString(reader);
        break;
      case 2:
        expectWireType(tag, WIRE_VARINT, "PostingsList");
        record.df = reader.readVarint();
        break;
      case 3:
        expectWireType(tag, WIRE_VARINT, "PostingsList");
        record.cf = reader.readVarint();
        break;
      case 4: {
        expectWireType(tag, WIRE_LENGTH_DELIMITED, "PostingsList");
        const sub = reader.bounded(reader.readVarint());
        record.postings.push(decodePosting(sub));
        break;
      }
      default:
        skipField(reader, tag.wireType);
    }
  }
  reader.assertConsumed("PostingsList");
  return record;
}

export function decodeHeader(reader: BoundedByteSource): CiffHeader {
  const header: CiffHeader = {
    version: 0,
    numPostingsLists: 0,
    numDocs: 0,
    totalPostingsLists: 0,
    totalDocs: 0,
    totalTermsInCollection: 0,
    averageDocLength: 0,
    description: "",
  };
  while (reader.remaining > 0) {
    const tag = readTag(reader);
    switch (tag.field) {
      case 1:
        expectWireType(tag, WIRE_VARINT, "Header");
        header.version = reader.readVarint();
        break;
      case 2:
        expectWireType(tag, WIRE_VARINT, "Header");
        header.numPostingsLists = reader.readVarint();
        break;
      case 3:
        expectWireType(tag, WIRE_VARINT, "Header");
        header.numDocs = reader.readVarint();
        break;
      case 4:
        expectWireType(tag, WIRE_VARINT, "Header");
        header.totalPostingsLists = reader.readVarint();
        break;
      case 5:
        expectWireType(tag, WIRE_VARINT, "Header");
        header.totalDocs = reader.readVarint();
        break;
      case 6:
        expectWireType(tag, WIRE_VARINT, "Header");
        header.totalTermsInCollection = reader.readVarint();
        break;
      case 7:
        expectWireType(tag, WIRE_FIXED64, "Header");
        header.averageDocLength = reader.readDouble();
        break;
      case 8:
        expectWireType(tag, WIRE_LENGTH_DELIMITED, "Header");
        header.description = readString(reader);
        break;
      default:
        skipField(reader, tag.wireType);
    }
  }
  reader.assertConsumed("Header");
  return header;
}

export function decodeDocRecord(reader: BoundedByteSource): DocRecord {
  const record: DocRecord = { docId: 0, collectionDocId: "", docLength: 0 };
  while (reader.remaining > 0) {
    const tag = readTag(reader);
    switch (tag.field) {
      case 1:
        expectWireType(tag, WIRE_VARINT, "DocRecord");
        record.docId = reader.readVarint();
        break;
      case 2:
        expectWireType(tag, WIRE_LENGTH_DELIMITED, "DocRecord");
        record.collectionDocId = readString(reader);
        break;
      case 3:
        expectWireType(tag, WIRE_VARINT, "DocRecord");
        record.docLength = reader.readVarint();
        break;
      default:
        skipField(reader, tag.wireType);
    }
  }
  reader.assertConsumed("DocRecord");
  return record;
}

// ==========================================
// Encoding
// ==========================================

export function encodePosting(posting: Posting): Uint8Array {
  return new ProtobufWriter().uint(1, posting.docIdDelta).uint(2, posting.tf).finish();
}

export function encodePostingsRecord(record: PostingsRecord): Uint8Array {
  const w = new ProtobufWriter().string(1, record.term).uint(2, record.df).uint(3, record.cf);
  for (const p of record.postings) w.bytes(4, encodePosting(p));
  return w.finish();
}

export function encodeHeader(header: CiffHeader): Uint8Array {
  return new ProtobufWriter()
    .uint(1, header.version)
    .uint(2, header.numPostingsLists)
    .uint(3, header.numDocs)
    .uint(4, header.totalPostingsLists)
    .uint(5, header.totalDocs)
    .uint(6, header.totalTermsInCollection)
    .double(7, header.averageDocLength)
    .string(8, header.description)
    .finish();
}

export function encodeDocRecord(record: DocRecord): Uint8Array {
  return new ProtobufWriter()
    .uint(1, record.docId)
    .string(2, record.collectionDocId)
    .uint(3, record.docLength)
    .finish();
}

/** Concatenate messages as `[varint length][payload]` frames. */
export function frameMessages(messages: Iterable<Uint8Array>): Uint8Array {
  const w = new ProtobufWriter();
  for (const m of messages) w.raw(m, true);
  return w.finish();
}
