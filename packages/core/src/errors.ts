/**
 * lawkit Error Types
 *
 * Thrown errors are reserved for contract violations: states a correct
 * caller never reaches. Recoverable conditions are returned as values.
 */

/**
 * Base class for all lawkit errors.
 */
export class LawkitError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = "LawkitError";
  }
}

/**
 * Thrown when a caller breaks a documented precondition.
 */
export class ContractViolationError extends LawkitError {
  constructor(message: string, code = "contract-violation") {
    super(message, code);
    this.name = "ContractViolationError";
  }
}
