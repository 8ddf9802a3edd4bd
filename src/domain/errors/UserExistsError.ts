import type { Username } from "../typedefs.js";

export class UserExistsError extends Error {
  constructor(public readonly username: Username) {
    super(`User already exists: ${username}`);
    this.name = "UserExistsError";
  }
}
