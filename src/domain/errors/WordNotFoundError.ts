import type { Word } from "../typedefs.js";

export class WordNotFoundError extends Error {
  constructor(public readonly word: Word) {
    super(`Word not found: ${word}`);
    this.name = "WordNotFoundError";
  }
}
