import { loadWordListFile } from "./adapters/WordListFile.js";
import { RoundEngine } from "./core.js";
import type { GameConfig, Logger, StoreGateway } from "./core.js";

export interface BootstrapOptions {
  readonly store: StoreGateway;
  readonly config: GameConfig;
  readonly logger?: Logger;
  /** JSON word list used to seed an empty pool */
  readonly wordListPath?: string;
  readonly random?: () => number;
}

/**
 * Recover the saved round, then seed the pool from `wordListPath` if nothing
 * is left to play. Recovery runs first so a pending payout is settled before
 * the round flags are touched.
 */
export async function bootstrap({
  store,
  config,
  logger,
  wordListPath,
  random,
}: BootstrapOptions): Promise<RoundEngine> {
  const engine = await RoundEngine.start(store, { config, logger, random });

  if (!wordListPath) {
    return engine;
  }

  const remaining = await store.remainingWordCount();
  if (engine.running || remaining > 0) {
    logger?.info("Word list import skipped; store already has a round", {
      path: wordListPath,
      running: engine.running,
      remaining,
    });
    return engine;
  }

  const list = await loadWordListFile(wordListPath);
  await store.setWordList(list);
  await RoundEngine.resetRound(store);
  await engine.initialize();
  logger?.info("Imported word list", { path: wordListPath, running: engine.running });

  return engine;
}
