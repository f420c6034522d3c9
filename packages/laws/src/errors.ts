/**
 * Contract violations raised by the law machinery.
 *
 * None of these is meant to be caught: each marks a state that upstream
 * filtering (tags, capability checks, explorer bounds) should have excluded.
 */

import { ContractViolationError } from "@lawkit/core";

/**
 * Thrown when a registry is indexed outside `[0, size)`.
 * Indices come from the explorer's own bounds, so this is a programming error.
 */
export class VariantIndexError extends ContractViolationError {
  constructor(
    public readonly registry: string,
    public readonly index: number,
    public readonly size: number
  ) {
    super(
      `Variant index ${index} is out of range for registry "${registry}" (size ${size})`,
      "variant-index"
    );
    this.name = "VariantIndexError";
  }
}

/**
 * Thrown when a variant is registered after the registry was sealed.
 */
export class RegistrySealedError extends ContractViolationError {
  constructor(
    public readonly registry: string,
    public readonly variant: string
  ) {
    super(
      `Cannot register "${variant}": registry "${registry}" is sealed`,
      "registry-sealed"
    );
    this.name = "RegistrySealedError";
  }
}

/**
 * Thrown when a law reads the identity element of a binary operation that
 * declares none. Filter such bundles out with a tag selector instead.
 */
export class MissingIdentityElementError extends ContractViolationError {
  constructor(public readonly operation: string) {
    super(
      `Binary operation "${operation}" declares no identity element; ` +
        `exclude it with a selector such as requiresIdentity`,
      "missing-identity"
    );
    this.name = "MissingIdentityElementError";
  }
}

/**
 * Thrown when a partial function is applied outside its domain.
 */
export class PartialFunctionDomainError extends ContractViolationError {
  constructor(public readonly operation: string) {
    super(`Partial operation "${operation}" is not defined at the given value`, "partial-domain");
    this.name = "PartialFunctionDomainError";
  }
}
