import { readFile, rename, rm, writeFile } from "node:fs/promises";

import { ARTIFACT_SUFFIXES, type CanonicalArtifacts } from "../canonicalEncoder.js";
import { ConversionError } from "../errors.js";

export type FileContents = Uint8Array | string;

export async function readInputFile(path: string, what: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (e) {
    throw new ConversionError({ code: "IO_ERROR", detail: `cannot read ${what} ${path}`, cause: e });
  }
}

export async function readOptionalTextFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (e) {
    if (isNotFound(e)) return undefined;
    throw new ConversionError({ code: "IO_ERROR", detail: `cannot read ${path}`, cause: e });
  }
}

/**
 * Write every file to a `.tmp` sibling first and rename them into place only once all of
 * them have been written. On failure the temporaries are removed, along with any file this
 * call had already renamed into place.
 */
export async function writeFilesAtomically(files: ReadonlyArray<readonly [string, FileContents]>): Promise<string[]> {
  const written: string[] = [];
  try {
    for (const [path, data] of files) {
      const tmp = `${path}.tmp`;
      written.push(tmp);
      await writeFile(tmp, data);
    }
  } catch (e) {
    await Promise.all(written.map((tmp) => rm(tmp, { force: true })));
    throw new ConversionError({ code: "IO_ERROR", detail: `cannot write ${written.at(-1) ?? "output"}`, cause: e });
  }
  const placed: string[] = [];
  for (const [path] of files) {
    try {
      await rename(`${path}.tmp`, path);
      placed.push(path);
    } catch (e) {
      // files already moved into place would pass for a finished index
      await Promise.all([...written, ...placed].map((p) => rm(p, { force: true })));
      throw new ConversionError({ code: "IO_ERROR", detail: `cannot move ${path}.tmp into place`, cause: e });
    }
  }
  return placed;
}

export function artifactPaths(basename: string): Record<keyof CanonicalArtifacts, string> {
  return {
    docs: basename + ARTIFACT_SUFFIXES.docs,
    freqs: basename + ARTIFACT_SUFFIXES.freqs,
    sizes: basename + ARTIFACT_SUFFIXES.sizes,
    lexicon: basename + ARTIFACT_SUFFIXES.lexicon,
    documents: basename + ARTIFACT_SUFFIXES.documents,
  };
}

export async function writeArtifacts(basename: string, artifacts: CanonicalArtifacts): Promise<string[]> {
  const paths = artifactPaths(basename);
  const files: Array<readonly [string, FileContents]> = [
    [paths.docs, artifacts.docs],
    [paths.freqs, artifacts.freqs],
    [paths.sizes, artifacts.sizes],
    [paths.lexicon, artifacts.lexicon],
  ];
  if (artifacts.documents !== undefined) files.push([paths.documents, artifacts.documents]);
  return writeFilesAtomically(files);
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
