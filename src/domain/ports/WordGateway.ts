import type { WordExistsError } from "../errors/WordExistsError.js";
import type { WordNotFoundError } from "../errors/WordNotFoundError.js";
import type { Category, Result, Word, WordEntry, WordList } from "../typedefs.js";

/**
 * Persistence abstraction for the pool of words that have not been played yet.
 * Words are keyed case-insensitively.
 */
export interface WordGateway {
  /** All currently unassigned words; an empty list is valid. */
  getWords(): Promise<WordEntry[]>;

  /** Delete a word by key and return the removed entry. */
  removeWord(word: Word): Promise<Result<WordEntry, WordNotFoundError>>;

  /** Number of words currently in the pool. */
  remainingWordCount(): Promise<number>;

  addWord(word: Word, category: Category): Promise<Result<WordEntry, WordExistsError>>;

  /**
   * Replace the whole pool. Implementations must leave the previous pool
   * untouched and throw {@link WordExistsError} when `list` repeats a word.
   */
  setWordList(list: WordList): Promise<void>;
}
