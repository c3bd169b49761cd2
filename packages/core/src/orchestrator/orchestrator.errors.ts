/**
 * Raised for requests the orchestrator cannot map onto configured accounts.
 */
export class OrchestratorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OrchestratorError";
    Object.setPrototypeOf(this, OrchestratorError.prototype);
  }
}

export class UnknownAccountError extends OrchestratorError {
  public readonly accountKey: string;

  constructor(accountKey: string) {
    super(`UnknownAccount: ${accountKey}: no enabled account with this key`);
    this.name = "UnknownAccountError";
    this.accountKey = accountKey;
    Object.setPrototypeOf(this, UnknownAccountError.prototype);
  }
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}
