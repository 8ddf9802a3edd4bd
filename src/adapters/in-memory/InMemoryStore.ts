/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { storeKey } from "../../domain/entities/StoreKeys.js";
import {
  UserExistsError,
  UserNotFoundError,
  WordExistsError,
  WordNotFoundError,
} from "../../domain/errors/index.js";
import type { StoreGateway } from "../../domain/ports/StoreGateway.js";
import type { NewUserBalances } from "../../domain/ports/UserGateway.js";
import {
  err,
  ok,
  type Category,
  type Highscore,
  type Result,
  type UserAccount,
  type Username,
  type Word,
  type WordEntry,
  type WordList,
} from "../../domain/typedefs.js";

const HIGHSCORE_DISTINCT_SCORES = 3;
const HIGHSCORE_LIMIT = 6;

export class InMemoryStore implements StoreGateway {
  #words = new Map<string, WordEntry>();
  #users = new Map<string, UserAccount>();
  #meta = new Map<string, string>();

  async getWords(): Promise<WordEntry[]> {
    return [...this.#words.values()].map((entry) => ({ ...entry }));
  }

  async removeWord(word: Word): Promise<Result<WordEntry, WordNotFoundError>> {
    const key = storeKey(word);
    const entry = this.#words.get(key);
    if (!entry) return err(new WordNotFoundError(word));
    this.#words.delete(key);
    return ok({ ...entry });
  }

  async remainingWordCount(): Promise<number> {
    return this.#words.size;
  }

  async addWord(word: Word, category: Category): Promise<Result<WordEntry, WordExistsError>> {
    const key = storeKey(word);
    if (this.#words.has(key)) return err(new WordExistsError(word));
    const entry: WordEntry = { word, category };
    this.#words.set(key, entry);
    return ok({ ...entry });
  }

  async setWordList(list: WordList): Promise<void> {
    const next = new Map<string, WordEntry>();
    for (const [category, words] of Object.entries(list)) {
      for (const word of words) {
        const key = storeKey(word);
        if (next.has(key)) throw new WordExistsError(word);
        next.set(key, { word, category });
      }
    }
    this.#words = next;
  }

  async getUser(username: Username): Promise<UserAccount | undefined> {
    const account = this.#users.get(storeKey(username));
    return account ? { ...account } : undefined;
  }

  async addUser(
    username: Username,
    balances: NewUserBalances = {},
  ): Promise<Result<UserAccount, UserExistsError>> {
    const key = storeKey(username);
    if (this.#users.has(key)) return err(new UserExistsError(username));
    const account: UserAccount = {
      username,
      score: balances.score ?? 0,
      tokens: balances.tokens ?? 0,
    };
    this.#users.set(key, account);
    return ok({ ...account });
  }

  async addScore(username: Username, delta: number): Promise<Result<number, UserNotFoundError>> {
    const key = storeKey(username);
    const account = this.#users.get(key);
    if (!account) return err(new UserNotFoundError(username));
    const score = account.score + delta;
    this.#users.set(key, { ...account, score });
    return ok(score);
  }

  async addTokens(username: Username, delta: number): Promise<Result<number, UserNotFoundError>> {
    const key = storeKey(username);
    const account = this.#users.get(key);
    if (!account) return err(new UserNotFoundError(username));
    const tokens = Math.max(0, account.tokens + delta);
    this.#users.set(key, { ...account, tokens });
    return ok(tokens);
  }

  async getHighscores(): Promise<Highscore[]> {
    const accounts = [...this.#users.values()].filter((account) => account.score > 0);
    const leading = new Set(
      [...new Set(accounts.map((account) => account.score))]
        .sort((a, b) => b - a)
        .slice(0, HIGHSCORE_DISTINCT_SCORES),
    );

    return accounts
      .filter((account) => leading.has(account.score))
      .sort((a, b) => b.score - a.score)
      .slice(0, HIGHSCORE_LIMIT)
      .map(({ username, score }) => ({ username, score }));
  }

  async resetScores(): Promise<void> {
    for (const [key, account] of this.#users) {
      this.#users.set(key, { ...account, score: 0 });
    }
  }

  async getMeta(key: string): Promise<string | undefined> {
    return this.#meta.get(key);
  }

  async setMeta(key: string, value: string): Promise<void> {
    this.#meta.set(key, value);
  }
}
