/**
 * Variant Registry
 *
 * An ordered, append-only collection of interchangeable implementations for
 * one operation role. Registries are filled once at startup, sealed, and then
 * only read, so any number of evaluators may share them.
 *
 * Duplicate names are accepted. The explorer treats every slot as a distinct
 * variant, while bundle identity compares names, so two slots with the same
 * name produce bundles that compare equal. A duplicate is logged at "warn".
 *
 * @example
 * ```typescript
 * const predicates = new VariantRegistry<NamedOperation<number, boolean>>("number predicates");
 * export const mod3 = predicates.register(operation("mod3", (i: number) => i % 3 === 0));
 * export const always = predicates.register(operation("always", (_: number) => true));
 * predicates.seal();
 * ```
 */

import { createLogger } from "@lawkit/core";
import type { Named } from "./named.js";
import { RegistrySealedError, VariantIndexError } from "./errors.js";

const log = createLogger("variants");

export class VariantRegistry<V extends Named> implements Iterable<V> {
  private readonly items: V[] = [];
  private sealed = false;

  constructor(public readonly label: string) {}

  /**
   * Append a variant and return it, so registrations can double as exports.
   */
  register<T extends V>(item: T): T {
    if (this.sealed) {
      throw new RegistrySealedError(this.label, item.name);
    }
    if (this.items.some((existing) => existing.name === item.name)) {
      log.warn(`registry "${this.label}" already holds a variant named "${item.name}"`);
    }
    this.items.push(item);
    return item;
  }

  /**
   * The ith variant. Indices outside `[0, size)` are a programming error.
   */
  index(i: number): V {
    if (!Number.isInteger(i) || i < 0 || i >= this.items.length) {
      throw new VariantIndexError(this.label, i, this.items.length);
    }
    return this.items[i];
  }

  /** First variant with the given name */
  find(name: string): V | undefined {
    return this.items.find((item) => item.name === name);
  }

  get size(): number {
    return this.items.length;
  }

  get all(): readonly V[] {
    return this.items.slice();
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Forbid further registration. Idempotent.
   */
  seal(): this {
    if (!this.sealed) {
      this.sealed = true;
      log.debug(`sealed "${this.label}" with ${this.items.length} variant(s)`);
    }
    return this;
  }

  [Symbol.iterator](): Iterator<V> {
    return this.items[Symbol.iterator]();
  }
}

/**
 * Build and seal a registry in one call.
 */
export function variants<V extends Named>(label: string, ...items: V[]): VariantRegistry<V> {
  const registry = new VariantRegistry<V>(label);
  for (const item of items) registry.register(item);
  return registry.seal();
}
