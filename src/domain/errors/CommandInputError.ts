/**
 * A chat or moderator command was refused before it reached the round. The
 * message lists every issue, so a single problem reads as just that problem.
 */
export class CommandInputError extends Error {
  constructor(
    public readonly command: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(issues.length > 0 ? issues.join("; ") : `${command} was refused`);
    this.name = "CommandInputError";
  }
}
