import type { UserExistsError } from "../errors/UserExistsError.js";
import type { UserNotFoundError } from "../errors/UserNotFoundError.js";
import type { Highscore, Result, UserAccount, Username } from "../typedefs.js";

export interface NewUserBalances {
  readonly score?: number;
  readonly tokens?: number;
}

/**
 * Persistence abstraction for per-user score and token balances.
 * Usernames are keyed case-insensitively.
 */
export interface UserGateway {
  getUser(username: Username): Promise<UserAccount | undefined>;

  addUser(
    username: Username,
    balances?: NewUserBalances,
  ): Promise<Result<UserAccount, UserExistsError>>;

  /** Add `delta` to the user's score and return the new score. */
  addScore(username: Username, delta: number): Promise<Result<number, UserNotFoundError>>;

  /**
   * Add `delta` (possibly negative) to the user's tokens, clamping the balance
   * at zero, and return the new balance.
   */
  addTokens(username: Username, delta: number): Promise<Result<number, UserNotFoundError>>;

  /**
   * Users whose score is one of the three highest distinct positive scores,
   * ordered by descending score and capped at six entries.
   */
  getHighscores(): Promise<Highscore[]>;

  resetScores(): Promise<void>;
}
