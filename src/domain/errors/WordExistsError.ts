import type { Word } from "../typedefs.js";

export class WordExistsError extends Error {
  constructor(public readonly word: Word) {
    super(`Word already exists: ${word}`);
    this.name = "WordExistsError";
  }
}
