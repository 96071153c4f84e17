import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import type { Document } from "./types";

/** Raised when the corpus cannot be loaded or is unusable. */
export class CorpusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorpusError";
  }
}

/** File extensions picked up when CORPUS_PATH names a directory. */
export const CORPUS_EXTENSIONS = ["txt", "md"];

const CorpusFile = z.array(z.string());

/**
 * Turn an ordered list of texts into Documents. Entries are trimmed; blank
 * entries are rejected since they would embed to a meaningless vector.
 *
 * @throws {CorpusError} On an empty list or a blank entry.
 */
export function toDocuments(texts: readonly string[]): Document[] {
  if (texts.length === 0) throw new CorpusError("Corpus is empty");
  return texts.map((raw, id) => {
    const text = raw.trim();
    if (!text) throw new CorpusError(`Corpus entry ${id} is blank`);
    return { id, text };
  });
}

/**
 * Load the corpus once at startup.
 *
 *  - a `.json` file must hold an array of strings, one document each;
 *  - a directory contributes every `.txt` / `.md` file below it as one
 *    document, ordered by relative path.
 */
export async function loadCorpus(corpusPath: string): Promise<Document[]> {
  let st: Stats;
  try {
    st = await fs.stat(corpusPath);
  } catch (e) {
    throw new CorpusError(`Corpus path not found: ${corpusPath}`, { cause: e });
  }

  if (st.isDirectory()) {
    const patterns = CORPUS_EXTENSIONS.map((ext) => `**/*.${ext}`);
    const files = await fg(patterns, { cwd: corpusPath, dot: false, onlyFiles: true });
    files.sort();
    const texts: string[] = [];
    for (const rel of files) {
      texts.push(await fs.readFile(path.join(corpusPath, rel), "utf8"));
    }
    return toDocuments(texts);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(corpusPath, "utf8"));
  } catch (e) {
    throw new CorpusError(`Corpus file is not valid JSON: ${corpusPath}`, { cause: e });
  }
  const result = CorpusFile.safeParse(parsed);
  if (!result.success) {
    throw new CorpusError(`Corpus file must be a JSON array of strings: ${corpusPath}`);
  }
  return toDocuments(result.data);
}
