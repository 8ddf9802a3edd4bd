export class RoundNotRunningError extends Error {
  constructor(action: string) {
    super(`Cannot ${action}: no round is running`);
    this.name = "RoundNotRunningError";
  }
}
