/**
 * Explorer
 *
 * Composes five variant registries into one enumerable space. An index
 * vector picks one variant per role; `lookup` turns a vector into a fresh
 * OperationBundle.
 *
 * Vectors are ordered with the last role varying fastest, and ordinals in
 * `[0, total)` map one-to-one onto in-range vectors, so iterating
 * `indexVectors()` visits every combination exactly once.
 *
 * @module
 */

import { config, createLogger } from "@lawkit/core";
import type { BinaryOperation, NamedOperation, PartialOperation } from "./named.js";
import type { VariantRegistry } from "./variants.js";
import { OperationBundle } from "./bundle.js";

const log = createLogger("explorer");

export type IndexVector = readonly [number, number, number, number, number];

export interface ExplorerRegistries<A, B> {
  readonly endoTransforms: VariantRegistry<NamedOperation<A, A>>;
  readonly heteroTransforms: VariantRegistry<NamedOperation<A, B>>;
  readonly binaryOps: VariantRegistry<BinaryOperation<A>>;
  readonly predicates: VariantRegistry<NamedOperation<A, boolean>>;
  readonly partialTransforms: VariantRegistry<PartialOperation<A>>;
}

/**
 * Anything that enumerates a space of configurations by index vector.
 */
export interface Exploratory<T> {
  readonly sizes: readonly number[];
  lookup(indices: readonly number[]): T | undefined;
}

export class Explorer<A, B> implements Exploratory<OperationBundle<A, B>> {
  readonly sizes: IndexVector;
  readonly total: number;

  constructor(
    readonly name: string,
    private readonly registries: ExplorerRegistries<A, B>
  ) {
    const { endoTransforms, heteroTransforms, binaryOps, predicates, partialTransforms } =
      registries;
    for (const registry of [endoTransforms, heteroTransforms, binaryOps, predicates, partialTransforms]) {
      registry.seal();
    }
    this.sizes = [
      endoTransforms.size,
      heteroTransforms.size,
      binaryOps.size,
      predicates.size,
      partialTransforms.size,
    ];
    this.total = this.sizes.reduce((acc, n) => acc * n, 1);
    log.debug(`${name}: sizes [${this.sizes.join(", ")}], ${this.total} combination(s)`);
  }

  /**
   * Whether every component of `indices` is an integer inside its registry's bounds.
   */
  validate(indices: readonly number[]): boolean {
    if (indices.length !== this.sizes.length) return false;
    return indices.every((ix, role) => Number.isInteger(ix) && ix >= 0 && ix < this.sizes[role]);
  }

  /**
   * A fresh bundle selecting the variants at `indices`, or undefined if any
   * index is out of range.
   */
  lookup(indices: readonly number[]): OperationBundle<A, B> | undefined {
    if (!this.validate(indices)) return undefined;
    const r = this.registries;
    return new OperationBundle({
      endoTransform: r.endoTransforms.index(indices[0]),
      heteroTransform: r.heteroTransforms.index(indices[1]),
      binaryOp: r.binaryOps.index(indices[2]),
      predicate: r.predicates.index(indices[3]),
      partialTransform: r.partialTransforms.index(indices[4]),
    });
  }

  /**
   * The vector with ordinal `n`, or undefined outside `[0, total)`.
   */
  vectorAt(n: number): IndexVector | undefined {
    if (!Number.isInteger(n) || n < 0 || n >= this.total) return undefined;
    const out = [0, 0, 0, 0, 0];
    let rest = n;
    for (let role = this.sizes.length - 1; role >= 0; role--) {
      out[role] = rest % this.sizes[role];
      rest = Math.floor(rest / this.sizes[role]);
    }
    return [out[0], out[1], out[2], out[3], out[4]];
  }

  /**
   * Inverse of `vectorAt`, or undefined for an out-of-range vector.
   */
  ordinalOf(indices: readonly number[]): number | undefined {
    if (!this.validate(indices)) return undefined;
    return indices.reduce((acc, ix, role) => acc * this.sizes[role] + ix, 0);
  }

  /**
   * Every in-range vector, last role varying fastest.
   */
  *indexVectors(): Generator<IndexVector> {
    for (let n = 0; n < this.total; n++) {
      const vector = this.vectorAt(n);
      if (vector) yield vector;
    }
  }

  /**
   * Up to `count` distinct vectors spread evenly across the space, in
   * ascending ordinal order. Deterministic.
   */
  sample(count: number = config.getSampleSize()): IndexVector[] {
    const n = Math.min(Math.max(0, Math.floor(count)), this.total);
    const picked: IndexVector[] = [];
    for (let k = 0; k < n; k++) {
      const vector = this.vectorAt(Math.floor((k * this.total) / n));
      if (vector) picked.push(vector);
    }
    return picked;
  }

  /**
   * A fresh bundle for every vector of `indexVectors()`.
   */
  *bundles(): Generator<OperationBundle<A, B>> {
    for (const vector of this.indexVectors()) {
      const bundle = this.lookup(vector);
      if (bundle) yield bundle;
    }
  }
}
