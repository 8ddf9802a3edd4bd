import type { Username } from "../typedefs.js";

export class UserNotFoundError extends Error {
  constructor(public readonly username: Username) {
    super(`User not found: ${username}`);
    this.name = "UserNotFoundError";
  }
}
