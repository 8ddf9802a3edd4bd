import { describe, expect, it } from "vitest";

import { createLoggerMock, createStore, pickFirst } from "./support/mocks.js";
import type { InMemoryStore } from "../src/adapters/in-memory/InMemoryStore.js";
import { RoundEngine } from "../src/domain/entities/RoundEngine.js";
import { RoundAlreadyRunningError } from "../src/domain/errors/RoundAlreadyRunningError.js";

const POOL = { animals: ["cat", "dog", "owl", "emu", "yak"] };

async function saveRound(
  store: InMemoryStore,
  meta: Readonly<Record<string, string>>,
): Promise<void> {
  for (const [key, value] of Object.entries(meta)) {
    await store.setMeta(key, value);
  }
}

describe("RoundEngine startup recovery", () => {
  it("finishes a payout that was interrupted", async () => {
    const store = await createStore(POOL);
    await store.addUser("A", { score: 2 });
    await store.addUser("B", { score: 1 });
    await saveRound(store, { round_end: "true", distribute_points: "true" });
    const logger = createLoggerMock();
    const engine = new RoundEngine(store, { random: pickFirst, logger });

    const state = await engine.initialize();

    expect(state).toEqual({ kind: "ended-pending-payout" });
    expect(engine.running).toBe(false);
    expect(await store.getUser("A")).toEqual({ username: "A", score: 0, tokens: 3 });
    expect(await store.getUser("B")).toEqual({ username: "B", score: 0, tokens: 1 });
    expect(await store.getMeta("distribute_points")).toBe("false");
    expect(logger.warn).toHaveBeenCalledWith(
      "Previous payout was interrupted; distributing tokens",
    );
  });

  it("stays stopped after an ended round, whatever the flag casing", async () => {
    const store = await createStore(POOL);
    await saveRound(store, { round_end: "True", cur_word: "cat", cur_cat: "animals", cur_points: "2" });
    const engine = new RoundEngine(store, { random: pickFirst });

    expect(await engine.initialize()).toEqual({ kind: "ended" });
    expect(engine.running).toBe(false);
    expect(engine.word).toBe("");
    expect(await store.remainingWordCount()).toBe(5);
  });

  it("resumes a saved word and reprices it after the pool changed", async () => {
    const store = await createStore(POOL);
    await saveRound(store, {
      cur_word: "zebra",
      cur_cat: "stripes",
      cur_points: "1",
      update_round: "true",
    });
    const engine = new RoundEngine(store, { random: pickFirst });

    const state = await engine.initialize();

    expect(state).toEqual({
      kind: "resuming",
      snapshot: { word: "zebra", category: "stripes", pointValue: 1 },
      reprice: true,
    });
    expect(engine.running).toBe(true);
    expect(engine.word).toBe("zebra");
    expect(engine.category).toBe("stripes");
    expect(engine.pointValue).toBe(3);
    expect(await store.remainingWordCount()).toBe(5);
  });

  it("keeps the saved point value when the pool did not change", async () => {
    const store = await createStore(POOL);
    await saveRound(store, {
      cur_word: "zebra",
      cur_cat: "stripes",
      cur_points: "1",
      update_round: "false",
    });
    const engine = new RoundEngine(store, { random: pickFirst });

    await engine.initialize();

    expect(engine.pointValue).toBe(1);
  });

  it("starts fresh when the saved round is malformed", async () => {
    const store = await createStore(POOL);
    await saveRound(store, { cur_word: "zebra", cur_cat: "stripes", cur_points: "many" });
    const engine = new RoundEngine(store, { random: pickFirst });

    expect(await engine.initialize()).toEqual({ kind: "fresh" });
    expect(engine.word).toBe("cat");
    expect(engine.pointValue).toBe(3);
    expect(await store.remainingWordCount()).toBe(4);
  });

  it("refuses to initialize over a running round", async () => {
    const store = await createStore(POOL);
    const engine = await RoundEngine.start(store, { random: pickFirst });

    await expect(engine.initialize()).rejects.toBeInstanceOf(RoundAlreadyRunningError);
    expect(engine.word).toBe("cat");
  });

  it("flags a changed pool for the next start", async () => {
    const store = await createStore(POOL);
    await saveRound(store, { round_end: "true", update_round: "false" });

    await RoundEngine.resetRound(store);

    expect(await store.getMeta("update_round")).toBe("true");
    expect(await store.getMeta("round_end")).toBe("false");
    const engine = await RoundEngine.start(store, { random: pickFirst });
    expect(engine.running).toBe(true);
  });
});
