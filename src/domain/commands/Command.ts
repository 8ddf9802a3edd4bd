import type { RoundEngine } from "../entities/RoundEngine.js";
import type { GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { StoreGateway } from "../ports/StoreGateway.js";
import type { TimePoint } from "../typedefs.js";

/** Channel on which every round event is published */
export const ROUND_CHANNEL = "round";

export interface CommandContext {
  readonly engine: RoundEngine;
  readonly store: StoreGateway;
  readonly bus: MessageBus;
  readonly config: GameConfig;
  readonly logger?: Logger;
}

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
