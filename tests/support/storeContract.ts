import { describe, expect, it } from "vitest";

import { UserExistsError } from "../../src/domain/errors/UserExistsError.js";
import { UserNotFoundError } from "../../src/domain/errors/UserNotFoundError.js";
import { WordExistsError } from "../../src/domain/errors/WordExistsError.js";
import { WordNotFoundError } from "../../src/domain/errors/WordNotFoundError.js";
import type { StoreGateway } from "../../src/domain/ports/StoreGateway.js";

/**
 * Behaviour every store adapter must share. Call from a test file with a
 * factory that returns a fresh, empty store.
 */
export function describeStoreContract(
  name: string,
  createStore: () => Promise<StoreGateway> | StoreGateway,
): void {
  describe(`${name} word pool`, () => {
    it("starts empty", async () => {
      const store = await createStore();

      expect(await store.getWords()).toEqual([]);
      expect(await store.remainingWordCount()).toBe(0);
    });

    it("replaces the pool and lists every word with its category", async () => {
      const store = await createStore();
      await store.setWordList({ animals: ["cat", "dog"], fruit: ["kiwi"] });

      expect(await store.getWords()).toEqual([
        { word: "cat", category: "animals" },
        { word: "dog", category: "animals" },
        { word: "kiwi", category: "fruit" },
      ]);
      expect(await store.remainingWordCount()).toBe(3);

      await store.setWordList({ colours: ["red"] });
      expect(await store.getWords()).toEqual([{ word: "red", category: "colours" }]);
    });

    it("rejects a list with a repeated word and keeps the old pool", async () => {
      const store = await createStore();
      await store.setWordList({ animals: ["cat"] });

      await expect(
        store.setWordList({ animals: ["dog"], pets: ["DOG"] }),
      ).rejects.toBeInstanceOf(WordExistsError);
      expect(await store.getWords()).toEqual([{ word: "cat", category: "animals" }]);
    });

    it("removes words by case-insensitive key", async () => {
      const store = await createStore();
      await store.setWordList({ animals: ["cat", "dog"] });

      expect(await store.removeWord("CAT")).toEqual({
        ok: true,
        value: { word: "cat", category: "animals" },
      });
      expect(await store.remainingWordCount()).toBe(1);
    });

    it("reports a missing word as a typed error", async () => {
      const store = await createStore();

      const removed = await store.removeWord("ghost");
      expect(removed.ok).toBe(false);
      if (!removed.ok) {
        expect(removed.error).toBeInstanceOf(WordNotFoundError);
        expect(removed.error.word).toBe("ghost");
      }
    });

    it("adds single words and refuses duplicates", async () => {
      const store = await createStore();

      expect(await store.addWord("owl", "birds")).toEqual({
        ok: true,
        value: { word: "owl", category: "birds" },
      });

      const duplicate = await store.addWord("Owl", "birds");
      expect(duplicate.ok).toBe(false);
      if (!duplicate.ok) {
        expect(duplicate.error).toBeInstanceOf(WordExistsError);
      }
      expect(await store.remainingWordCount()).toBe(1);
    });

    it("folds accented words to one key", async () => {
      const store = await createStore();
      await store.addWord("Éclair", "desserts");

      const duplicate = await store.addWord("éclair", "desserts");
      expect(duplicate.ok).toBe(false);
      expect(await store.removeWord("ÉCLAIR")).toEqual({
        ok: true,
        value: { word: "Éclair", category: "desserts" },
      });
      expect(await store.remainingWordCount()).toBe(0);
    });
  });

  describe(`${name} users`, () => {
    it("creates users with default balances", async () => {
      const store = await createStore();

      expect(await store.addUser("alice")).toEqual({
        ok: true,
        value: { username: "alice", score: 0, tokens: 0 },
      });
      expect(await store.getUser("ALICE")).toEqual({ username: "alice", score: 0, tokens: 0 });
    });

    it("refuses a second account under the same name in any case", async () => {
      const store = await createStore();
      await store.addUser("alice", { score: 2 });

      const duplicate = await store.addUser("Alice");
      expect(duplicate.ok).toBe(false);
      if (!duplicate.ok) {
        expect(duplicate.error).toBeInstanceOf(UserExistsError);
      }
      expect(await store.getUser("alice")).toEqual({ username: "alice", score: 2, tokens: 0 });
    });

    it("treats names that differ only in the case of a non-ASCII letter as one user", async () => {
      const store = await createStore();
      await store.addUser("Ärger", { tokens: 1 });

      const duplicate = await store.addUser("ärger");
      expect(duplicate.ok).toBe(false);
      if (!duplicate.ok) {
        expect(duplicate.error).toBeInstanceOf(UserExistsError);
      }
      expect(await store.addTokens("ÄRGER", 2)).toEqual({ ok: true, value: 3 });
      expect(await store.getUser("ärger")).toEqual({ username: "Ärger", score: 0, tokens: 3 });
    });

    it("returns undefined for unknown users", async () => {
      const store = await createStore();

      expect(await store.getUser("nobody")).toBeUndefined();
    });

    it("adds score and returns the new total", async () => {
      const store = await createStore();
      await store.addUser("alice", { score: 1 });

      expect(await store.addScore("alice", 3)).toEqual({ ok: true, value: 4 });
      expect((await store.getUser("alice"))?.score).toBe(4);
    });

    it("fails to add score to an unknown user", async () => {
      const store = await createStore();

      const result = await store.addScore("nobody", 1);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(UserNotFoundError);
        expect(result.error.username).toBe("nobody");
      }
    });

    it("adds tokens and clamps the balance at zero", async () => {
      const store = await createStore();
      await store.addUser("alice", { tokens: 2 });

      expect(await store.addTokens("alice", 3)).toEqual({ ok: true, value: 5 });
      expect(await store.addTokens("alice", -10)).toEqual({ ok: true, value: 0 });
      expect((await store.getUser("alice"))?.tokens).toBe(0);
    });

    it("fails to add tokens to an unknown user", async () => {
      const store = await createStore();

      const result = await store.addTokens("nobody", 1);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(UserNotFoundError);
      }
    });

    it("resets every score and keeps tokens", async () => {
      const store = await createStore();
      await store.addUser("alice", { score: 3, tokens: 4 });
      await store.addUser("bob", { score: 1 });

      await store.resetScores();

      expect(await store.getUser("alice")).toEqual({ username: "alice", score: 0, tokens: 4 });
      expect(await store.getUser("bob")).toEqual({ username: "bob", score: 0, tokens: 0 });
    });
  });

  describe(`${name} highscores`, () => {
    it("ranks users on the three highest distinct scores", async () => {
      const store = await createStore();
      await store.addUser("A", { score: 5 });
      await store.addUser("B", { score: 5 });
      await store.addUser("C", { score: 4 });
      await store.addUser("D", { score: 3 });
      await store.addUser("E", { score: 2 });
      await store.addUser("F", { score: 0 });

      expect(await store.getHighscores()).toEqual([
        { username: "A", score: 5 },
        { username: "B", score: 5 },
        { username: "C", score: 4 },
        { username: "D", score: 3 },
      ]);
    });

    it("leaves out users without points", async () => {
      const store = await createStore();
      await store.addUser("A", { score: 0 });

      expect(await store.getHighscores()).toEqual([]);
    });

    it("caps the ranking at six entries", async () => {
      const store = await createStore();
      for (const name of ["u1", "u2", "u3", "u4", "u5", "u6", "u7"]) {
        await store.addUser(name, { score: 1 });
      }

      const ranking = await store.getHighscores();
      expect(ranking.map(({ username }) => username)).toEqual([
        "u1",
        "u2",
        "u3",
        "u4",
        "u5",
        "u6",
      ]);
    });
  });

  describe(`${name} meta`, () => {
    it("returns undefined for a missing key", async () => {
      const store = await createStore();

      expect(await store.getMeta("round_end")).toBeUndefined();
    });

    it("upserts values", async () => {
      const store = await createStore();

      await store.setMeta("round_end", "false");
      await store.setMeta("round_end", "true");

      expect(await store.getMeta("round_end")).toBe("true");
    });
  });
}
