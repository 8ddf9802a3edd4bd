export class RoundAlreadyRunningError extends Error {
  constructor(action: string) {
    super(`Cannot ${action} while a round is running`);
    this.name = "RoundAlreadyRunningError";
  }
}
