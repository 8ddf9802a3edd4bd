import { Command, ROUND_CHANNEL, type CommandContext } from "./Command.js";
import { isValidUsername } from "./CommandValidation.js";
import { CommandInputError } from "../errors/CommandInputError.js";
import type { TimePoint, Username } from "../typedefs.js";

/** Moderator grant (positive delta) or deduction (negative delta) of tokens. */
export class AdjustTokens extends Command<number> {
  readonly type = "AdjustTokens" as const;

  constructor(
    public readonly username: Username,
    public readonly delta: number,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!isValidUsername(username)) {
      issues.push("Username must be a non-empty string without whitespace");
    }
    if (!Number.isSafeInteger(delta) || delta === 0) {
      issues.push("Token delta must be a non-zero integer");
    }
    if (issues.length > 0) {
      throw new CommandInputError(this.type, issues);
    }
  }

  async execute({ store, bus, logger }: CommandContext): Promise<number> {
    const adjusted = await store.addTokens(this.username, this.delta);
    if (!adjusted.ok) {
      throw adjusted.error;
    }

    logger?.info("Tokens adjusted", {
      type: this.type,
      username: this.username,
      delta: this.delta,
      tokens: adjusted.value,
    });

    await bus.publish(ROUND_CHANNEL, {
      type: "TokensAdjusted",
      username: this.username,
      delta: this.delta,
      tokens: adjusted.value,
      at: this.at,
    });

    return adjusted.value;
  }
}
