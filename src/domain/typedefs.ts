/**
 * Names for the values a word hunt passes around: players, words, their
 * categories and balances, plus the `Result` shape stores answer misses with.
 */

/** Chat display name of a player; compared case-insensitively by stores */
export type Username = string;

/** A hidden word; compared case-insensitively by stores */
export type Word = string;

/** Category shown as the hint for a word */
export type Category = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** A word together with the category it is announced under */
export interface WordEntry {
  readonly word: Word;
  readonly category: Category;
}

/** Persisted per-user balances */
export interface UserAccount {
  readonly username: Username;
  readonly score: number;
  readonly tokens: number;
}

/** One row of the round ranking */
export interface Highscore {
  readonly username: Username;
  readonly score: number;
}

/** Categories mapped to the words announced under them */
export type WordList = Readonly<Record<Category, readonly Word[]>>;

/**
 * Outcome of a store operation that can miss. Expected misses are values,
 * not exceptions; callers decide whether to recover or escalate.
 */
export type Result<T, E extends Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
