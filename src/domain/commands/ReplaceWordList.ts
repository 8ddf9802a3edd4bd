import { Command, ROUND_CHANNEL, type CommandContext } from "./Command.js";
import { RoundEngine } from "../entities/RoundEngine.js";
import { countWords, parseWordList } from "../entities/WordListRules.js";
import { CommandInputError } from "../errors/CommandInputError.js";
import { RoundAlreadyRunningError } from "../errors/RoundAlreadyRunningError.js";
import type { TimePoint, WordList } from "../typedefs.js";

export interface WordListReplaced {
  readonly wordCount: number;
  readonly running: boolean;
}

/**
 * Swap in a new word pool between rounds and start a round from it.
 */
export class ReplaceWordList extends Command<WordListReplaced> {
  readonly type = "ReplaceWordList" as const;
  readonly list: WordList;

  constructor(
    list: WordList,
    public readonly at: TimePoint,
  ) {
    super();

    const parsed = parseWordList(list);
    if (!parsed.ok) {
      throw new CommandInputError(this.type, parsed.error.issues);
    }
    this.list = parsed.value;
  }

  async execute({ engine, store, bus, logger }: CommandContext): Promise<WordListReplaced> {
    if (engine.running) {
      throw new RoundAlreadyRunningError("replace the word list");
    }

    await store.setWordList(this.list);
    await RoundEngine.resetRound(store);
    await engine.initialize();

    const outcome: WordListReplaced = {
      wordCount: countWords(this.list),
      running: engine.running,
    };

    logger?.info("Word list replaced", { type: this.type, at: this.at, ...outcome });

    await bus.publish(ROUND_CHANNEL, {
      type: "WordListReplaced",
      ...outcome,
      category: engine.running ? engine.category : undefined,
      at: this.at,
    });

    return outcome;
  }
}
