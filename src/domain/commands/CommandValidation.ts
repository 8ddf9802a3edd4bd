import type { Username } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidUsername(id: unknown): id is Username {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}
