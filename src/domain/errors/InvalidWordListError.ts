export class InvalidWordListError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "InvalidWordListError";
  }

  static because(issues: readonly string[]): InvalidWordListError {
    const [firstIssue] = issues;
    const message =
      issues.length === 1
        ? (firstIssue ?? "Invalid word list")
        : `Invalid word list: ${issues.join("; ")}`;
    return new InvalidWordListError(message, issues);
  }
}
