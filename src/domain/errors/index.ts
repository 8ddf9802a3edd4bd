export { CommandInputError } from "./CommandInputError.js";
export { InvalidWordListError } from "./InvalidWordListError.js";
export { RoundAlreadyRunningError } from "./RoundAlreadyRunningError.js";
export { RoundNotRunningError } from "./RoundNotRunningError.js";
export { UserExistsError } from "./UserExistsError.js";
export { UserNotFoundError } from "./UserNotFoundError.js";
export { WordExistsError } from "./WordExistsError.js";
export { WordNotFoundError } from "./WordNotFoundError.js";
