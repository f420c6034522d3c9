/**
 * Operations over numbers. Elements are assumed to be safe integers;
 * the hetero-transforms widen to bigint.
 */

import { binaryOperation, operation, partialOperation } from "../named.js";
import type { BinaryOperation, NamedOperation, PartialOperation } from "../named.js";
import { VariantRegistry } from "../variants.js";
import { Explorer } from "../explorer.js";

export const numberEndoTransforms = new VariantRegistry<NamedOperation<number, number>>(
  "number endo-transforms"
);
export const plusOne = numberEndoTransforms.register(operation("plusOne", (i: number) => i + 1));
export const quadratic = numberEndoTransforms.register(
  operation("quadratic", (i: number) => i * i - 3 * i + 1)
);

export const numberToBigInts = new VariantRegistry<NamedOperation<number, bigint>>(
  "number to bigint"
);
export const bit33 = numberToBigInts.register(
  operation("bit33", (i: number) => (1n << 33n) | BigInt(i))
);
export const cast = numberToBigInts.register(operation("cast", (i: number) => BigInt(i)));

export const numberBinaryOps = new VariantRegistry<BinaryOperation<number>>("number binary ops");
export const summation = numberBinaryOps.register(
  binaryOperation("summation", (i: number, j: number) => i + j, {
    identity: 0,
    associativity: "associative",
    symmetry: "symmetric",
  })
);
export const multiply = numberBinaryOps.register(
  binaryOperation("multiply", (i: number, j: number) => i * j - 2 * i - 3 * j + 4)
);

export const numberPredicates = new VariantRegistry<NamedOperation<number, boolean>>(
  "number predicates"
);
export const mod3 = numberPredicates.register(operation("mod3", (i: number) => i % 3 === 0));
export const alwaysNumber = numberPredicates.register(operation("always", (_: number) => true));
export const neverNumber = numberPredicates.register(operation("never", (_: number) => false));

export const numberPartials = new VariantRegistry<PartialOperation<number>>("number partials");
export const halfEven = numberPartials.register(
  partialOperation("halfEven", (x: number) => (x % 2 === 0 ? x / 2 : undefined))
);
export const identicalNumber = numberPartials.register(
  partialOperation("identical", (x: number) => x)
);
export const uninhabitedNumber = numberPartials.register(
  partialOperation("uninhabited", (_: number): number | undefined => undefined)
);

/** 2 × 2 × 2 × 3 × 3 = 72 combinations */
export const numberExplorer = new Explorer<number, bigint>("numbers", {
  endoTransforms: numberEndoTransforms,
  heteroTransforms: numberToBigInts,
  binaryOps: numberBinaryOps,
  predicates: numberPredicates,
  partialTransforms: numberPartials,
});
