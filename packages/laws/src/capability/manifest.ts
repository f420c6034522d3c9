/**
 * Capability manifests: a table from type name to the operations that type
 * supports. Every `declare` hands out a fresh introspector, so checkers are
 * rebuilt whenever the table changes.
 */

import { readFileSync } from "node:fs";
import { ContractViolationError, createLogger } from "@lawkit/core";
import type { Introspector } from "./checker.js";

const log = createLogger("capabilities");

export class CapabilityManifest {
  private readonly entries = new Map<string, ReadonlySet<string>>();
  private lookup: Introspector<string> = this.createLookup();

  constructor(declarations: Readonly<Record<string, Iterable<string>>> = {}) {
    for (const [typeName, operations] of Object.entries(declarations)) {
      this.declare(typeName, operations);
    }
  }

  private createLookup(): Introspector<string> {
    return (typeName) => {
      const operations = this.entries.get(typeName);
      if (!operations) {
        log.warn(`no capability manifest entry for "${typeName}"`);
        return [];
      }
      return operations;
    };
  }

  /**
   * Declare the operations of `typeName`, adding to any earlier declaration.
   * Checkers built from an earlier `introspector()` keep the old view; ask
   * for the introspector again to see the change.
   */
  declare(typeName: string, operations: Iterable<string>): this {
    const existing = this.entries.get(typeName) ?? new Set<string>();
    this.entries.set(typeName, new Set([...existing, ...operations]));
    this.lookup = this.createLookup();
    return this;
  }

  operationsOf(typeName: string): ReadonlySet<string> | undefined {
    return this.entries.get(typeName);
  }

  get types(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Introspector over the current declarations. It stays the same function
   * until the next `declare`, so checkers built from it are cached until then.
   */
  introspector(): Introspector<string> {
    return this.lookup;
  }
}

function isManifestData(value: unknown): value is Record<string, string[]> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (ops) => Array.isArray(ops) && ops.every((op) => typeof op === "string")
  );
}

let builtin: CapabilityManifest | undefined;

/**
 * The shipped manifest for `Array`, `Set`, `Map` and `String`. Loaded once.
 */
export function builtinManifest(): CapabilityManifest {
  if (builtin) return builtin;
  const file = new URL("./builtin-manifests.json", import.meta.url);
  const data: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!isManifestData(data)) {
    throw new ContractViolationError(
      `${file.pathname} must map type names to arrays of operation names`,
      "manifest-shape"
    );
  }
  builtin = new CapabilityManifest(data);
  return builtin;
}
