import { Command, ROUND_CHANNEL, type CommandContext } from "./Command.js";
import { isValidUsername } from "./CommandValidation.js";
import { dispatchCommand } from "./dispatchCommand.js";
import { EndRound } from "./EndRound.js";
import type { ProcessResult } from "../entities/RoundEngine.js";
import { CommandInputError } from "../errors/CommandInputError.js";
import type { TimePoint, Username } from "../typedefs.js";

/**
 * Feed one chat message to the round. Resolves to `undefined` when no round
 * is running, since chat keeps flowing between rounds.
 */
export class ProcessMessage extends Command<ProcessResult | undefined> {
  readonly type = "ProcessMessage" as const;

  constructor(
    public readonly username: Username,
    public readonly message: string,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!isValidUsername(username)) {
      issues.push("Username must be a non-empty string without whitespace");
    }
    if (typeof message !== "string") {
      issues.push("Message must be a string");
    }
    if (issues.length > 0) {
      throw new CommandInputError(this.type, issues);
    }
  }

  async execute(ctx: CommandContext): Promise<ProcessResult | undefined> {
    const { engine, bus, logger } = ctx;

    if (!engine.running) {
      logger?.debug("Ignoring message; no round is running", {
        type: this.type,
        username: this.username,
      });
      return undefined;
    }

    const result = await engine.process(this.username, this.message);
    if (!result.success) {
      return result;
    }

    await bus.publish(ROUND_CHANNEL, {
      type: "WordGuessed",
      username: this.username,
      word: result.word,
      score: result.score,
      wordsRemaining: result.wordsRemaining,
      at: this.at,
    });

    if (result.wordsRemaining === 0) {
      logger?.info("No words remaining; ending round", {
        type: this.type,
        at: this.at,
      });

      await bus.publish(ROUND_CHANNEL, { type: "WordsExhausted", at: this.at });
      await dispatchCommand(new EndRound(this.at), ctx);
    }

    return result;
  }
}
