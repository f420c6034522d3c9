/**
 * Single-variant explorers for map entries.
 *
 * Keep key transforms injective: laws over maps assume no two keys collide
 * after mapping.
 */

import { binaryOperation, operation, partialOperation } from "../named.js";
import { variants } from "../variants.js";
import { Explorer } from "../explorer.js";

export type NumberKeyed = readonly [number, string];
export type StringKeyed = readonly [string, number];

export const numberKeyedExplorer = new Explorer<NumberKeyed, StringKeyed>("number-keyed entries", {
  endoTransforms: variants(
    "number-keyed endo-transforms",
    operation("inc1", ([k, v]: NumberKeyed): NumberKeyed => [k + 1, v])
  ),
  heteroTransforms: variants(
    "number-keyed swaps",
    operation("swap", ([k, v]: NumberKeyed): StringKeyed => [v, k])
  ),
  binaryOps: variants(
    "number-keyed binary ops",
    binaryOperation("sums", ([k, v]: NumberKeyed, [c, u]: NumberKeyed): NumberKeyed => [
      k + c,
      v + u,
    ])
  ),
  predicates: variants(
    "number-keyed predicates",
    operation("high", ([k, v]: NumberKeyed) => k > v.length)
  ),
  partialTransforms: variants(
    "number-keyed partials",
    partialOperation("akin", ([k, v]: NumberKeyed): NumberKeyed | undefined =>
      ((k ^ v.length) & 1) === 0 ? [k - 2, v] : undefined
    )
  ),
});

export const stringKeyedExplorer = new Explorer<StringKeyed, NumberKeyed>("string-keyed entries", {
  endoTransforms: variants(
    "string-keyed endo-transforms",
    operation("dots", ([k, v]: StringKeyed): StringKeyed => [k + "..", v])
  ),
  heteroTransforms: variants(
    "string-keyed swaps",
    operation("swap", ([k, v]: StringKeyed): NumberKeyed => [v, k])
  ),
  binaryOps: variants(
    "string-keyed binary ops",
    binaryOperation("sums", ([k, v]: StringKeyed, [c, u]: StringKeyed): StringKeyed => [
      k + c,
      v + u,
    ])
  ),
  predicates: variants(
    "string-keyed predicates",
    operation("high", ([k, v]: StringKeyed) => k.length < v)
  ),
  partialTransforms: variants(
    "string-keyed partials",
    partialOperation("akin", ([k, v]: StringKeyed): StringKeyed | undefined =>
      ((k.length ^ v) & 1) === 0 ? [k + "!", v] : undefined
    )
  ),
});
