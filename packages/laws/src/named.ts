/**
 * Named Operations
 *
 * Wrappers that pair a function with an explicit name. The name is the
 * operation's identity: two wrappers with the same name are the same
 * operation, whatever their functions do, and two wrappers with different
 * names are distinct even if their functions are identical.
 *
 * A source location may be attached for diagnostics. It never takes part in
 * equality or hashing.
 *
 * @module
 */

import { basename } from "node:path";
import { eqBy, eqString, hashBy, hashString, type Eq, type Hash } from "./hash.js";
import { PartialFunctionDomainError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface SourceLocation {
  readonly file: string;
  readonly line: number;
}

export interface Named {
  /** Unique, programmer-supplied identity */
  readonly name: string;
  readonly location?: SourceLocation;
}

/**
 * A unary function with a name: endo-transforms (`A => A`),
 * hetero-transforms (`A => B`) and predicates (`A => boolean`).
 */
export interface NamedOperation<A, B> extends Named {
  readonly fn: (a: A) => B;
}

export type Associativity = "associative" | "nonassociative";
export type Symmetry = "symmetric" | "asymmetric";

/**
 * A declared identity element.
 */
export interface Identity<A> {
  readonly value: A;
}

/**
 * A binary operation over one type.
 *
 * `associativity` and `symmetry` are declarations made by the author of the
 * variant. Nothing checks them; laws that depend on them should be gated
 * with tags.
 */
export interface BinaryOperation<A> extends Named {
  readonly fn: (a: A, b: A) => A;
  readonly identity: Identity<A> | undefined;
  readonly associativity: Associativity;
  readonly symmetry: Symmetry;
}

/**
 * An operation defined on part of its domain. `fn` returns `undefined`
 * outside the domain.
 */
export interface PartialOperation<A> extends Named {
  readonly fn: (a: A) => A | undefined;
}

/**
 * The view of a partial operation handed to laws.
 */
export interface PartialFunction<A> {
  isDefinedAt(a: A): boolean;
  /** Throws PartialFunctionDomainError outside the domain */
  apply(a: A): A;
  lift(a: A): A | undefined;
}

export interface BinaryHints<A> {
  identity?: A;
  associativity?: Associativity;
  symmetry?: Symmetry;
}

// ============================================================================
// Constructors
// ============================================================================

export function operation<A, B>(
  name: string,
  fn: (a: A) => B,
  location?: SourceLocation
): NamedOperation<A, B> {
  return location ? { name, fn, location } : { name, fn };
}

/**
 * Build a binary operation. Hints default to no identity, nonassociative
 * and asymmetric.
 *
 * @example
 * ```typescript
 * const summation = binaryOperation("summation", (a: number, b: number) => a + b, {
 *   identity: 0,
 *   associativity: "associative",
 *   symmetry: "symmetric",
 * });
 * ```
 */
export function binaryOperation<A>(
  name: string,
  fn: (a: A, b: A) => A,
  hints: BinaryHints<A> = {},
  location?: SourceLocation
): BinaryOperation<A> {
  const identity: Identity<A> | undefined =
    hints.identity !== undefined ? { value: hints.identity } : undefined;
  const op: BinaryOperation<A> = {
    name,
    fn,
    identity,
    associativity: hints.associativity ?? "nonassociative",
    symmetry: hints.symmetry ?? "asymmetric",
  };
  return location ? { ...op, location } : op;
}

export function partialOperation<A>(
  name: string,
  fn: (a: A) => A | undefined,
  location?: SourceLocation
): PartialOperation<A> {
  return location ? { name, fn, location } : { name, fn };
}

export function toPartialFunction<A>(op: PartialOperation<A>): PartialFunction<A> {
  return {
    isDefinedAt: (a) => op.fn(a) !== undefined,
    apply: (a) => {
      const result = op.fn(a);
      if (result === undefined) throw new PartialFunctionDomainError(op.name);
      return result;
    },
    lift: (a) => op.fn(a),
  };
}

// ============================================================================
// Identity and display
// ============================================================================

export function sameOperation(a: Named, b: Named): boolean {
  return a.name === b.name;
}

export const eqNamed: Eq<Named> = eqBy((n: Named) => n.name, eqString);

export const hashNamed: Hash<Named> = hashBy((n: Named) => n.name, hashString);

/**
 * Display form: `name @ file.ts, line 12`, or just the name without a location.
 */
export function describeOperation(op: Named): string {
  if (!op.location) return op.name;
  return `${op.name} @ ${basename(op.location.file)}, line ${op.location.line}`;
}
