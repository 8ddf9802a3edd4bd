import { Command, type CommandContext } from "./Command.js";
import type { TimePoint } from "../typedefs.js";

/** Persist the round before the process exits so the next start resumes it. */
export class TeardownRound extends Command {
  readonly type = "TeardownRound" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    await engine.teardown();
    logger?.info("Round saved for restart", {
      type: this.type,
      running: engine.running,
      at: this.at,
    });
  }
}
