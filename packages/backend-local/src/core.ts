export type {
  Command,
  CommandContext,
} from "@word-hunt/core/domain/commands/Command.js";
export { ROUND_CHANNEL } from "@word-hunt/core/domain/commands/Command.js";
export { AdjustTokens } from "@word-hunt/core/domain/commands/AdjustTokens.js";
export { EndRound } from "@word-hunt/core/domain/commands/EndRound.js";
export { ProcessMessage } from "@word-hunt/core/domain/commands/ProcessMessage.js";
export { ReplaceWordList } from "@word-hunt/core/domain/commands/ReplaceWordList.js";
export { TeardownRound } from "@word-hunt/core/domain/commands/TeardownRound.js";
export type { WordListReplaced } from "@word-hunt/core/domain/commands/ReplaceWordList.js";
export { dispatchCommand } from "@word-hunt/core/domain/commands/dispatchCommand.js";
export { RoundEngine } from "@word-hunt/core/domain/entities/RoundEngine.js";
export type {
  ProcessResult,
  RoundEngineOptions,
} from "@word-hunt/core/domain/entities/RoundEngine.js";
export { storeKey } from "@word-hunt/core/domain/entities/StoreKeys.js";
export { countWords, parseWordList } from "@word-hunt/core/domain/entities/WordListRules.js";
export {
  CommandInputError,
  InvalidWordListError,
  RoundAlreadyRunningError,
  RoundNotRunningError,
  UserExistsError,
  UserNotFoundError,
  WordExistsError,
  WordNotFoundError,
} from "@word-hunt/core/domain/errors/index.js";
export type { GameConfig } from "@word-hunt/core/domain/GameConfig.js";
export { createGameConfig } from "@word-hunt/core/domain/GameConfig.js";
export type { Logger } from "@word-hunt/core/domain/ports/Logger.js";
export type { MessageBus } from "@word-hunt/core/domain/ports/MessageBus.js";
export type { StoreGateway } from "@word-hunt/core/domain/ports/StoreGateway.js";
export type { NewUserBalances } from "@word-hunt/core/domain/ports/UserGateway.js";
export { err, ok } from "@word-hunt/core/domain/typedefs.js";
export type {
  Category,
  Highscore,
  Result,
  TimePoint,
  UserAccount,
  Username,
  Word,
  WordEntry,
  WordList,
} from "@word-hunt/core/domain/typedefs.js";
export { InMemoryStore } from "@word-hunt/core/adapters/in-memory/InMemoryStore.js";
