/**
 * Operation Bundle
 *
 * One concrete selection of variants, one per role, handed to a single law
 * evaluation. Every accessor read records that the role was used, so after
 * the evaluation the harness can check that the law actually exercised the
 * operations it claims to.
 *
 * Bundles carry mutable usage state: one bundle per evaluation, or
 * `reset()` between sequential evaluations. Never share one across
 * concurrent evaluations.
 *
 * @example
 * ```typescript
 * const ops = explorer.lookup([0, 1, 0, 2, 1]);
 * if (ops) {
 *   const holds = xs.map(ops.endoTransform).every((x) => typeof x === "number");
 *   if (!ops.touched()) throw new Error("law ignored its operations");
 * }
 * ```
 */

import type {
  Associativity,
  BinaryOperation,
  Identity,
  Named,
  NamedOperation,
  PartialFunction,
  PartialOperation,
  Symmetry,
} from "./named.js";
import { describeOperation, toPartialFunction } from "./named.js";
import { eqArray, eqString, hashArray, hashString, type Eq, type Hash } from "./hash.js";
import { MissingIdentityElementError } from "./errors.js";

// ============================================================================
// Roles
// ============================================================================

export const ROLES = [
  "endoTransform",
  "heteroTransform",
  "binaryOp",
  "predicate",
  "partialTransform",
] as const;

export type Role = (typeof ROLES)[number];

/**
 * Usage flag slot for each role. `identityElement` shares the
 * `partialTransform` slot.
 */
export const ROLE_SLOT: Readonly<Record<Role, number>> = {
  endoTransform: 0,
  heteroTransform: 1,
  binaryOp: 2,
  predicate: 3,
  partialTransform: 4,
};

/**
 * The selected operations without instrumentation. Reading these never
 * marks a role as used.
 */
export interface BundleValues<A, B> {
  readonly endoTransform: NamedOperation<A, A>;
  readonly heteroTransform: NamedOperation<A, B>;
  readonly binaryOp: BinaryOperation<A>;
  readonly predicate: NamedOperation<A, boolean>;
  readonly partialTransform: PartialOperation<A>;
}

/**
 * What bundle equality looks at: the five selected names, in role order.
 */
export interface BundleIdentity {
  readonly names: readonly string[];
}

/**
 * The parts of a bundle that can be inspected without knowing its element
 * types. Dynamic selectors receive bundles through this view.
 */
export interface BundleSummary extends BundleIdentity {
  readonly values: Readonly<Record<Exclude<Role, "binaryOp">, Named>> & {
    readonly binaryOp: {
      readonly name: string;
      readonly identity: Identity<unknown> | undefined;
      readonly associativity: Associativity;
      readonly symmetry: Symmetry;
    };
  };
}

const eqNames = eqArray(eqString);
const hashNames = hashArray(hashString);

// ============================================================================
// OperationBundle
// ============================================================================

export class OperationBundle<A, B> implements BundleSummary {
  readonly names: readonly string[];

  private readonly flags: boolean[] = [false, false, false, false, false];
  private readonly partial: PartialFunction<A>;

  constructor(readonly values: BundleValues<A, B>) {
    this.names = ROLES.map((role) => values[role].name);
    this.partial = toPartialFunction(values.partialTransform);
  }

  /** A function that changes an element to another of the same type */
  get endoTransform(): (a: A) => A {
    this.flags[0] = true;
    return this.values.endoTransform.fn;
  }

  /** A function that changes an element to another of a different type */
  get heteroTransform(): (a: A) => B {
    this.flags[1] = true;
    return this.values.heteroTransform.fn;
  }

  /** Combines two elements into one */
  get binaryOp(): (a: A, b: A) => A {
    this.flags[2] = true;
    return this.values.binaryOp.fn;
  }

  /** A true/false answer for an element */
  get predicate(): (a: A) => boolean {
    this.flags[3] = true;
    return this.values.predicate.fn;
  }

  /** Changes some elements to another of the same type */
  get partialTransform(): PartialFunction<A> {
    this.flags[4] = true;
    return this.partial;
  }

  /**
   * The identity of `binaryOp`. Marks the `partialTransform` slot, not a
   * slot of its own.
   *
   * Throws MissingIdentityElementError when `binaryOp` declares no identity;
   * exclude such bundles with a selector rather than catching it.
   */
  get identityElement(): A {
    this.flags[4] = true;
    const identity = this.values.binaryOp.identity;
    if (!identity) {
      throw new MissingIdentityElementError(this.values.binaryOp.name);
    }
    return identity.value;
  }

  /** Snapshot of the five usage flags, in role order */
  get used(): readonly boolean[] {
    return this.flags.slice();
  }

  wasUsed(role: Role): boolean {
    return this.flags[ROLE_SLOT[role]];
  }

  /** Whether anything from this selection was read */
  touched(): boolean {
    return this.flags.some((f) => f);
  }

  /** Clear usage so the bundle can serve another evaluation */
  reset(): this {
    this.flags.fill(false);
    return this;
  }

  /** Unambiguous string form of the identity, for use as a Map key */
  get key(): string {
    return JSON.stringify(this.names);
  }

  equals(that: BundleIdentity): boolean {
    return eqNames.equals(this.names, that.names);
  }

  hashCode(): number {
    return hashNames.hash(this.names);
  }

  toString(): string {
    const parts = ROLES.map((role) => describeOperation(this.values[role]));
    const pad = Math.max(...parts.map((s) => s.indexOf("@")));
    const aligned =
      pad < 0
        ? parts
        : parts.map((s) => {
            const i = s.indexOf("@");
            if (i <= 0 || i >= pad) return s;
            return s.slice(0, i - 1) + " ".repeat(pad - i) + s.slice(i - 1);
          });
    return ["Ops", ...aligned].join("\n  ");
  }
}

// ============================================================================
// Identity instances
// ============================================================================

export const eqOperationBundle: Eq<BundleIdentity> = {
  equals: (a, b) => eqNames.equals(a.names, b.names),
};

export const hashOperationBundle: Hash<BundleIdentity> = {
  hash: (a) => hashNames.hash(a.names),
};

/**
 * Drop bundles whose selection was already seen, keeping first occurrences
 * in order. Usage flags play no part.
 */
export function distinctBundles<T extends BundleIdentity>(bundles: Iterable<T>): T[] {
  const buckets = new Map<number, T[]>();
  const result: T[] = [];

  for (const bundle of bundles) {
    const h = hashOperationBundle.hash(bundle);
    const bucket = buckets.get(h);
    if (!bucket) {
      buckets.set(h, [bundle]);
      result.push(bundle);
      continue;
    }
    if (bucket.some((seen) => eqOperationBundle.equals(seen, bundle))) continue;
    bucket.push(bundle);
    result.push(bundle);
  }

  return result;
}
