import type { DocumentLengthTable } from "./documentLengths.js";
import type { InvertedIndex } from "./invertedIndex.js";

/**
 * Encoded canonical index, one buffer per artifact.
 *
 * Every binary artifact is a run of sequences: a u32 element count `N` followed by `N` u32
 * values, little-endian, no padding.
 * - docs: `[docCount]`, then one doc id sequence per term id
 * - freqs: one frequency sequence per term id
 * - sizes: a single sequence of document lengths, ascending by doc id
 * - lexicon: one term per line, in term id order
 */
export interface CanonicalArtifacts {
  docs: Uint8Array;
  freqs: Uint8Array;
  sizes: Uint8Array;
  lexicon: string;
  /** collection doc ids, one per line in doc id order (only when the input carried them) */
  documents?: string;
}

export interface CanonicalEncoder {
  encode(index: InvertedIndex, lengths: DocumentLengthTable): CanonicalArtifacts;
}

/** Artifact name -> file suffix appended to the output basename. */
export const ARTIFACT_SUFFIXES = {
  docs: ".docs",
  freqs: ".freqs",
  sizes: ".sizes",
  lexicon: ".lexicon.plain",
  documents: ".documents",
} as const satisfies Record<keyof CanonicalArtifacts, string>;
