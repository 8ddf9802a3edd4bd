import { InvalidWordListError } from "../errors/InvalidWordListError.js";
import { storeKey } from "./StoreKeys.js";
import { err, ok, type Result, type Word, type WordList } from "../typedefs.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate an untrusted `{ category: words[] }` object. Names are trimmed;
 * words must be unique across all categories, ignoring case.
 */
export function parseWordList(raw: unknown): Result<WordList, InvalidWordListError> {
  if (!isRecord(raw)) {
    return err(InvalidWordListError.because(["Word list must be an object of categories"]));
  }

  const issues: string[] = [];
  const seen = new Set<string>();
  const list: Record<string, Word[]> = {};

  for (const [rawCategory, rawWords] of Object.entries(raw)) {
    const category = rawCategory.trim();
    if (category.length === 0) {
      issues.push("Category names must not be empty");
      continue;
    }

    if (!Array.isArray(rawWords)) {
      issues.push(`Category "${category}" must list its words in an array`);
      continue;
    }

    const words: Word[] = [];
    for (const rawWord of rawWords) {
      if (typeof rawWord !== "string" || rawWord.trim().length === 0) {
        issues.push(`Category "${category}" contains an empty or non-string word`);
        continue;
      }

      const word = rawWord.trim();
      const key = storeKey(word);
      if (seen.has(key)) {
        issues.push(`Word "${word}" appears more than once`);
        continue;
      }

      seen.add(key);
      words.push(word);
    }

    list[category] = [...(list[category] ?? []), ...words];
  }

  return issues.length > 0 ? err(InvalidWordListError.because(issues)) : ok(list);
}

export function countWords(list: WordList): number {
  return Object.values(list).reduce((total, words) => total + words.length, 0);
}
