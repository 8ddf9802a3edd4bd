import { readFile } from "node:fs/promises";

import { InvalidWordListError, parseWordList } from "../core.js";
import type { WordList } from "../core.js";

/**
 * Read a word list stored as `{ "category": ["word", ...] }` JSON.
 */
export async function loadWordListFile(path: string): Promise<WordList> {
  const contents = await readFile(path, "utf8");

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw InvalidWordListError.because([`${path} is not valid JSON: ${reason}`]);
  }

  const parsed = parseWordList(raw);
  if (!parsed.ok) {
    throw parsed.error;
  }
  return parsed.value;
}
