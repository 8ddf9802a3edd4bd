import {
  META_KEYS,
  formatFlag,
  parseFlag,
  parseSnapshot,
  payoutTiers,
  pickRandom,
  pointValueFor,
  resolveStartupState,
  type StartupState,
} from "./RoundRules.js";
import { RoundAlreadyRunningError } from "../errors/RoundAlreadyRunningError.js";
import { RoundNotRunningError } from "../errors/RoundNotRunningError.js";
import { createGameConfig, type GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { MetaGateway } from "../ports/MetaGateway.js";
import type { StoreGateway } from "../ports/StoreGateway.js";
import type { Category, Highscore, Username, Word } from "../typedefs.js";

/** The mutable state of the round currently in play. */
export interface Round {
  currentWord: Word;
  currentCategory: Category;
  pointValue: number;
  running: boolean;
}

export type ProcessResult =
  | {
      readonly success: true;
      readonly word: Word;
      readonly score: number;
      /** Words left to guess now that this one is consumed */
      readonly wordsRemaining: number;
    }
  | {
      readonly success: false;
      readonly word: undefined;
      readonly score: undefined;
      /** Words left to guess, the one in play included */
      readonly wordsRemaining: number;
    };

export interface RoundEngineOptions {
  readonly config?: GameConfig;
  /** Uniform source in [0, 1) used for word selection */
  readonly random?: () => number;
  readonly logger?: Logger;
}

/**
 * Owns the single round of a process: word selection, scoring, round-end
 * payout, and the save/restore cycle against the store.
 *
 * Calls must be serialized by the caller; none of the operations may overlap.
 */
export class RoundEngine {
  readonly #store: StoreGateway;
  readonly #config: GameConfig;
  readonly #random: () => number;
  readonly #logger: Logger | undefined;
  readonly #round: Round = {
    currentWord: "",
    currentCategory: "",
    pointValue: 0,
    running: false,
  };

  constructor(store: StoreGateway, options: RoundEngineOptions = {}) {
    this.#store = store;
    this.#config = options.config ?? createGameConfig();
    this.#random = options.random ?? Math.random;
    this.#logger = options.logger;
  }

  /** Construct an engine and restore or start its round. */
  static async start(
    store: StoreGateway,
    options: RoundEngineOptions = {},
  ): Promise<RoundEngine> {
    const engine = new RoundEngine(store, options);
    await engine.initialize();
    return engine;
  }

  /**
   * Flag that the word pool changed since the round was saved, so the next
   * initialization reprices a resumed word or starts a new round.
   */
  static async resetRound(meta: MetaGateway): Promise<void> {
    await meta.setMeta(META_KEYS.updateRound, formatFlag(true));
    await meta.setMeta(META_KEYS.roundEnd, formatFlag(false));
  }

  get word(): Word {
    return this.#round.currentWord;
  }

  get category(): Category {
    return this.#round.currentCategory;
  }

  get pointValue(): number {
    return this.#round.pointValue;
  }

  get running(): boolean {
    return this.#round.running;
  }

  /**
   * Rebuild the round from persisted meta data. Runs once at startup, and again
   * whenever a stopped engine should pick up a new word pool.
   */
  async initialize(): Promise<StartupState> {
    if (this.#round.running) {
      throw new RoundAlreadyRunningError("initialize the round");
    }

    const store = this.#store;
    const flags = {
      updateRound: parseFlag(await store.getMeta(META_KEYS.updateRound)),
      roundEnd: parseFlag(await store.getMeta(META_KEYS.roundEnd)),
      distributePoints: parseFlag(await store.getMeta(META_KEYS.distributePoints)),
    };
    const snapshot = parseSnapshot(
      await store.getMeta(META_KEYS.word),
      await store.getMeta(META_KEYS.category),
      await store.getMeta(META_KEYS.points),
    );

    const state = resolveStartupState(flags, snapshot);
    this.#logger?.info("Initializing round", { state: state.kind });

    switch (state.kind) {
      case "ended-pending-payout":
        this.#logger?.warn("Previous payout was interrupted; distributing tokens");
        await this.endRound();
        break;

      case "ended":
        this.#clear();
        break;

      case "resuming":
        this.#round.currentWord = state.snapshot.word;
        this.#round.currentCategory = state.snapshot.category;
        this.#round.pointValue = state.snapshot.pointValue;
        if (state.reprice) {
          await this.updatePointValue();
        }
        this.#round.running = true;
        break;

      case "fresh": {
        const chosen = await this.chooseNewWord();
        if (chosen) {
          await this.updatePointValue();
        } else {
          this.#logger?.warn("Word list is empty; round cannot start");
        }
        this.#round.running = chosen;
        break;
      }
    }

    this.#logger?.info("Round initialized", {
      running: this.#round.running,
      category: this.#round.currentCategory,
      pointValue: this.#round.pointValue,
    });

    return state;
  }

  /**
   * Pick a remaining word uniformly at random and remove it from the pool.
   * Returns false, leaving the round untouched, when the pool is empty.
   */
  async chooseNewWord(): Promise<boolean> {
    const words = await this.#store.getWords();
    const entry = pickRandom(words, this.#random);
    if (!entry) {
      return false;
    }

    this.#round.currentWord = entry.word;
    this.#round.currentCategory = entry.category;

    const removed = await this.#store.removeWord(entry.word);
    if (!removed.ok) {
      // The word was listed a moment ago: the pool is shared or corrupt.
      throw removed.error;
    }

    this.#logger?.debug("Chose new word", { category: entry.category });
    return true;
  }

  async updatePointValue(): Promise<void> {
    const remaining = await this.#store.remainingWordCount();
    this.#round.pointValue = pointValueFor(remaining, this.#config.pointTiers);
    this.#logger?.debug("Point value updated", {
      remaining,
      pointValue: this.#round.pointValue,
    });
  }

  /**
   * Check a chat message for the current word. Matching is a plain
   * case-sensitive substring test, so "cat" inside "category" wins.
   *
   * When the returned `wordsRemaining` reaches zero no new word is chosen;
   * ending the round is left to the caller.
   */
  async process(username: Username, message: string): Promise<ProcessResult> {
    if (!this.#round.running) {
      throw new RoundNotRunningError("process a message");
    }

    // The word in play left the store when it was chosen.
    const wordsRemaining = (await this.#store.remainingWordCount()) + 1;

    if (!message.includes(this.#round.currentWord)) {
      return { success: false, word: undefined, score: undefined, wordsRemaining };
    }

    const word = this.#round.currentWord;
    const score = this.#round.pointValue;
    await this.#creditScore(username, score);

    const result: ProcessResult = {
      success: true,
      word,
      score,
      wordsRemaining: wordsRemaining - 1,
    };

    this.#logger?.info("Word guessed", {
      username,
      score,
      wordsRemaining: result.wordsRemaining,
    });

    if (result.wordsRemaining === 0) {
      return result;
    }

    await this.chooseNewWord();
    await this.updatePointValue();

    return result;
  }

  /**
   * Pay tokens to the ranked players, reset every score, and stop the round.
   * Returns the ranking as it stood before the payout.
   */
  async endRound(): Promise<Highscore[]> {
    this.#logger?.info("Ending round");

    await this.#writeMeta({
      [META_KEYS.roundEnd]: formatFlag(true),
      [META_KEYS.distributePoints]: formatFlag(true),
    });

    const ranking = await this.#store.getHighscores();
    await this.#distributeTokens(ranking);
    await this.#store.resetScores();

    this.#clear();

    await this.#writeMeta({
      [META_KEYS.roundEnd]: formatFlag(true),
      [META_KEYS.distributePoints]: formatFlag(false),
      [META_KEYS.word]: "",
      [META_KEYS.category]: "",
      [META_KEYS.points]: "0",
    });

    this.#logger?.info("Round ended", { ranked: ranking.length });
    return ranking;
  }

  /** Persist enough state for the next process to resume exactly. */
  async teardown(): Promise<void> {
    if (!this.#round.running) {
      this.#logger?.info("Round not running; recording round end");
      await this.#writeMeta({
        [META_KEYS.roundEnd]: formatFlag(true),
        [META_KEYS.distributePoints]: formatFlag(false),
        [META_KEYS.updateRound]: formatFlag(false),
      });
      return;
    }

    this.#logger?.info("Saving running round");
    await this.#writeMeta({
      [META_KEYS.word]: this.#round.currentWord,
      [META_KEYS.category]: this.#round.currentCategory,
      [META_KEYS.points]: String(this.#round.pointValue),
      [META_KEYS.roundEnd]: formatFlag(false),
      [META_KEYS.distributePoints]: formatFlag(false),
      [META_KEYS.updateRound]: formatFlag(false),
    });
  }

  async #creditScore(username: Username, points: number): Promise<void> {
    const updated = await this.#store.addScore(username, points);
    if (updated.ok) return;

    this.#logger?.info("Creating account for first score", {
      username,
      reason: updated.error.name,
    });
    const created = await this.#store.addUser(username, { score: points });
    if (!created.ok) {
      throw created.error;
    }
  }

  async #distributeTokens(ranking: readonly Highscore[]): Promise<void> {
    if (ranking.length === 0) {
      this.#logger?.info("No one scored this round");
      return;
    }

    const tiers = payoutTiers(ranking);
    const { payouts } = this.#config;
    const grants: ReadonlyArray<readonly [readonly Highscore[], number]> = [
      [tiers.top, payouts.top],
      [tiers.middle, payouts.middle],
      [tiers.bottom, payouts.bottom],
    ];

    for (const [entries, amount] of grants) {
      for (const { username } of entries) {
        const granted = await this.#store.addTokens(username, amount);
        if (!granted.ok) {
          throw granted.error;
        }
      }
    }
  }

  async #writeMeta(entries: Readonly<Record<string, string>>): Promise<void> {
    for (const [key, value] of Object.entries(entries)) {
      await this.#store.setMeta(key, value);
    }
  }

  #clear(): void {
    this.#round.currentWord = "";
    this.#round.currentCategory = "";
    this.#round.pointValue = 0;
    this.#round.running = false;
  }
}
