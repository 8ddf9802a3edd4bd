import { Command, ROUND_CHANNEL, type CommandContext } from "./Command.js";
import { payoutTiers } from "../entities/RoundRules.js";
import type { Highscore, TimePoint } from "../typedefs.js";

export class EndRound extends Command<Highscore[]> {
  readonly type = "EndRound" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, bus, config, logger }: CommandContext): Promise<Highscore[]> {
    const ranking = await engine.endRound();
    const tiers = payoutTiers(ranking);
    const { payouts } = config;

    logger?.info("Round payout complete", {
      type: this.type,
      at: this.at,
      winners: tiers.top.map(({ username }) => username),
    });

    await bus.publish(ROUND_CHANNEL, {
      type: "RoundEnded",
      ranking,
      tiers: {
        top: { usernames: tiers.top.map(({ username }) => username), tokens: payouts.top },
        middle: {
          usernames: tiers.middle.map(({ username }) => username),
          tokens: payouts.middle,
        },
        bottom: {
          usernames: tiers.bottom.map(({ username }) => username),
          tokens: payouts.bottom,
        },
      },
      at: this.at,
    });

    return ranking;
  }
}
