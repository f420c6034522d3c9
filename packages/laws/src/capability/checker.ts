/**
 * Capability Checker
 *
 * Decides whether a target type exposes the operations a law needs before the
 * law is generated for it. A checker holds a set of operation names:
 *
 *   introspect(target) − IGNORED_OPERATIONS + ASSUMED_OPERATIONS
 *
 * computed once per target and introspector. Queries never fail; a missing
 * operation is reported as `false`.
 *
 * @example
 * ```typescript
 * const manifest = builtinManifest();
 * const arrays = CapabilityChecker.from("Array", manifest.introspector());
 * arrays.passes(["map", "filter"]);   // → true
 * arrays.passes(["add"]);             // → false
 * ```
 */

import { createLogger } from "@lawkit/core";

const log = createLogger("capabilities");

/**
 * Lists the operation names a target exposes. Supplied by the host: a static
 * manifest, parsed declarations, or anything else.
 */
export type Introspector<T> = (target: T) => Iterable<string>;

/**
 * Names every target inherits from `Object.prototype`, plus members that
 * never make sense to check in a law.
 */
export const IGNORED_OPERATIONS: ReadonlySet<string> = new Set([
  "constructor",
  "hasOwnProperty",
  "isPrototypeOf",
  "propertyIsEnumerable",
  "toLocaleString",
  "toString",
  "valueOf",
  "__defineGetter__",
  "__defineSetter__",
  "__lookupGetter__",
  "__lookupSetter__",
  "__proto__",
  "canEqual",
  "clone",
  "par",
  "seq",
]);

/**
 * Operations every target is presumed to expose through the shared
 * collection contract, whether or not introspection finds them.
 */
export const ASSUMED_OPERATIONS: ReadonlySet<string> = new Set(["filter", "flatMap", "map"]);

const cache = new WeakMap<Introspector<never>, Map<unknown, CapabilityChecker>>();

export class CapabilityChecker {
  readonly names: ReadonlySet<string>;

  private constructor(names: Iterable<string>) {
    this.names = new Set(names);
  }

  static readonly empty = new CapabilityChecker([]);

  /** A checker over exactly these names, with no ignore/assume adjustment */
  static of(names: Iterable<string>): CapabilityChecker {
    return new CapabilityChecker(names);
  }

  /**
   * The capabilities of `target` as seen by `introspect`. Cached per
   * (introspector, target) pair.
   */
  static from<T>(target: T, introspect: Introspector<T>): CapabilityChecker {
    let perTarget = cache.get(introspect);
    if (!perTarget) {
      perTarget = new Map();
      cache.set(introspect, perTarget);
    }
    const cached = perTarget.get(target);
    if (cached) return cached;

    const names = new Set<string>();
    for (const name of introspect(target)) {
      if (!IGNORED_OPERATIONS.has(name)) names.add(name);
    }
    for (const name of ASSUMED_OPERATIONS) names.add(name);

    const checker = new CapabilityChecker(names);
    perTarget.set(target, checker);
    log.debug(`${String(target)}: ${names.size} capabilities`);
    return checker;
  }

  static union(...checkers: CapabilityChecker[]): CapabilityChecker {
    return checkers.reduce((acc, c) => acc.union(c), CapabilityChecker.empty);
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  /**
   * Whether every required name is available here.
   */
  passes(required: Iterable<string> | CapabilityChecker): boolean {
    const names = required instanceof CapabilityChecker ? required.names : required;
    for (const name of names) {
      if (!this.names.has(name)) return false;
    }
    return true;
  }

  /** Required names that are not available, in the order given */
  missing(required: Iterable<string> | CapabilityChecker): string[] {
    const names = required instanceof CapabilityChecker ? required.names : required;
    return [...names].filter((name) => !this.names.has(name));
  }

  union(that: CapabilityChecker): CapabilityChecker {
    if (that.names.size === 0) return this;
    if (this.names.size === 0) return that;
    return new CapabilityChecker([...this.names, ...that.names]);
  }

  toString(): string {
    return `Capabilities(${[...this.names].sort().join(", ")})`;
  }
}
