import { readFile, rename, writeFile } from "node:fs/promises";
import sqlJs from "sql.js";
import type { Database, ParamsObject, SqlValue } from "sql.js";

import {
  UserExistsError,
  UserNotFoundError,
  WordExistsError,
  WordNotFoundError,
  err,
  ok,
  storeKey,
} from "../core.js";
import type {
  Category,
  Highscore,
  Logger,
  NewUserBalances,
  Result,
  StoreGateway,
  UserAccount,
  Username,
  Word,
  WordEntry,
  WordList,
} from "../core.js";

type Row = ParamsObject;

export interface SqliteStoreOptions {
  /** Path of the database file, or ":memory:" */
  readonly filename: string;
  readonly logger?: Logger;
}

export const IN_MEMORY_DATABASE = ":memory:";

// Lookup columns hold storeKey() of the name so every adapter folds case alike.
const SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
  key TEXT PRIMARY KEY NOT NULL,
  username TEXT NOT NULL,
  score INTEGER NOT NULL DEFAULT 0,
  tokens INTEGER NOT NULL DEFAULT 0
);
CREATE TABLE IF NOT EXISTS wordlist (
  key TEXT PRIMARY KEY NOT NULL,
  word TEXT NOT NULL,
  category TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS meta (
  name TEXT PRIMARY KEY NOT NULL,
  data TEXT NOT NULL
);
`;

const HIGHSCORES = `
SELECT username, score FROM users
WHERE score > 0 AND score IN (
  SELECT DISTINCT score FROM users WHERE score > 0 ORDER BY score DESC LIMIT 3
)
ORDER BY score DESC, rowid ASC
LIMIT 6`;

function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new Error(`Corrupt store row: ${column} is not text`);
  }
  return value;
}

function integer(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== "number") {
    throw new Error(`Corrupt store row: ${column} is not a number`);
  }
  return value;
}

const toWordEntry = (row: Row): WordEntry => ({
  word: text(row, "word"),
  category: text(row, "category"),
});

const toAccount = (row: Row): UserAccount => ({
  username: text(row, "username"),
  score: integer(row, "score"),
  tokens: integer(row, "tokens"),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * SQLite store running on the WebAssembly build of SQLite. The database lives
 * in memory and every change is written back to `filename`; a write goes to a
 * sibling file first and is renamed over the old one.
 */
export class SqliteStore implements StoreGateway {
  readonly #db: Database;
  readonly #filename: string;
  readonly #logger: Logger | undefined;

  private constructor(db: Database, { filename, logger }: SqliteStoreOptions) {
    this.#db = db;
    this.#filename = filename;
    this.#logger = logger;
    this.#db.exec(SCHEMA);
  }

  /** Open (or create) the database stored at `options.filename`. */
  static async open(options: SqliteStoreOptions): Promise<SqliteStore> {
    // sql.js is CommonJS; `default` is its init function under either loader.
    const SQL = await sqlJs.default();

    let contents: Buffer | undefined;
    if (options.filename !== IN_MEMORY_DATABASE) {
      try {
        contents = await readFile(options.filename);
      } catch (error) {
        if (!isMissingFile(error)) throw error;
        options.logger?.info("Creating new database", { filename: options.filename });
      }
    }

    const store = new SqliteStore(new SQL.Database(contents), options);
    await store.#persist();
    options.logger?.info("SQLite store opened", { filename: options.filename });
    return store;
  }

  async getWords(): Promise<WordEntry[]> {
    return this.#all("SELECT word, category FROM wordlist ORDER BY rowid").map(toWordEntry);
  }

  async removeWord(word: Word): Promise<Result<WordEntry, WordNotFoundError>> {
    const key = storeKey(word);
    const removed = this.#transaction(() => {
      const row = this.#get("SELECT word, category FROM wordlist WHERE key = ?", [key]);
      if (!row) return err(new WordNotFoundError(word));
      this.#run("DELETE FROM wordlist WHERE key = ?", [key]);
      return ok(toWordEntry(row));
    });
    if (removed.ok) await this.#persist();
    return removed;
  }

  async remainingWordCount(): Promise<number> {
    const row = this.#get("SELECT COUNT(*) AS count FROM wordlist");
    return row ? integer(row, "count") : 0;
  }

  async addWord(word: Word, category: Category): Promise<Result<WordEntry, WordExistsError>> {
    if (!this.#insertWord(word, category)) {
      return err(new WordExistsError(word));
    }
    await this.#persist();
    return ok({ word, category });
  }

  async setWordList(list: WordList): Promise<void> {
    this.#transaction(() => {
      this.#run("DELETE FROM wordlist");
      for (const [category, words] of Object.entries(list)) {
        for (const word of words) {
          if (!this.#insertWord(word, category)) {
            throw new WordExistsError(word);
          }
        }
      }
    });
    await this.#persist();
    this.#logger?.info("Word list replaced", {
      categories: Object.keys(list).length,
    });
  }

  async getUser(username: Username): Promise<UserAccount | undefined> {
    const row = this.#get("SELECT username, score, tokens FROM users WHERE key = ?", [
      storeKey(username),
    ]);
    return row ? toAccount(row) : undefined;
  }

  async addUser(
    username: Username,
    balances: NewUserBalances = {},
  ): Promise<Result<UserAccount, UserExistsError>> {
    const score = balances.score ?? 0;
    const tokens = balances.tokens ?? 0;
    const inserted = this.#run(
      "INSERT INTO users (key, username, score, tokens) VALUES (?, ?, ?, ?) " +
        "ON CONFLICT(key) DO NOTHING",
      [storeKey(username), username, score, tokens],
    );
    if (inserted === 0) {
      return err(new UserExistsError(username));
    }
    await this.#persist();
    return ok({ username, score, tokens });
  }

  async addScore(username: Username, delta: number): Promise<Result<number, UserNotFoundError>> {
    return this.#updateBalance(
      username,
      "UPDATE users SET score = score + ? WHERE key = ?",
      delta,
      "score",
    );
  }

  async addTokens(username: Username, delta: number): Promise<Result<number, UserNotFoundError>> {
    return this.#updateBalance(
      username,
      "UPDATE users SET tokens = MAX(0, tokens + ?) WHERE key = ?",
      delta,
      "tokens",
    );
  }

  async getHighscores(): Promise<Highscore[]> {
    return this.#all(HIGHSCORES).map((row) => ({
      username: text(row, "username"),
      score: integer(row, "score"),
    }));
  }

  async resetScores(): Promise<void> {
    this.#run("UPDATE users SET score = 0");
    await this.#persist();
  }

  async getMeta(key: string): Promise<string | undefined> {
    const row = this.#get("SELECT data FROM meta WHERE name = ?", [key]);
    return row ? text(row, "data") : undefined;
  }

  async setMeta(key: string, value: string): Promise<void> {
    this.#run(
      "INSERT INTO meta (name, data) VALUES (?, ?) " +
        "ON CONFLICT(name) DO UPDATE SET data = excluded.data",
      [key, value],
    );
    await this.#persist();
  }

  close(): void {
    this.#db.close();
    this.#logger?.info("SQLite store closed");
  }

  async #updateBalance(
    username: Username,
    statement: string,
    delta: number,
    column: "score" | "tokens",
  ): Promise<Result<number, UserNotFoundError>> {
    const key = storeKey(username);
    const updated = this.#transaction(() => {
      if (this.#run(statement, [delta, key]) === 0) {
        return err(new UserNotFoundError(username));
      }
      const row = this.#get(`SELECT ${column} FROM users WHERE key = ?`, [key]);
      return row ? ok(integer(row, column)) : err(new UserNotFoundError(username));
    });
    if (updated.ok) await this.#persist();
    return updated;
  }

  #insertWord(word: Word, category: Category): boolean {
    const inserted = this.#run(
      "INSERT INTO wordlist (key, word, category) VALUES (?, ?, ?) " +
        "ON CONFLICT(key) DO NOTHING",
      [storeKey(word), word, category],
    );
    return inserted > 0;
  }

  #transaction<T>(body: () => T): T {
    this.#db.run("BEGIN");
    try {
      const result = body();
      this.#db.run("COMMIT");
      return result;
    } catch (error) {
      this.#db.run("ROLLBACK");
      throw error;
    }
  }

  /** Run a write statement and return the number of rows it changed. */
  #run(sql: string, params: SqlValue[] = []): number {
    this.#db.run(sql, params);
    return this.#db.getRowsModified();
  }

  #all(sql: string, params: SqlValue[] = []): Row[] {
    const statement = this.#db.prepare(sql);
    try {
      statement.bind(params);
      const rows: Row[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  #get(sql: string, params: SqlValue[] = []): Row | undefined {
    return this.#all(sql, params)[0];
  }

  async #persist(): Promise<void> {
    if (this.#filename === IN_MEMORY_DATABASE) return;

    const pending = `${this.#filename}.tmp`;
    await writeFile(pending, this.#db.export());
    await rename(pending, this.#filename);
  }
}
