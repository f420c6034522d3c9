/**
 * Operations over strings. The hetero-transforms map to an optional string.
 */

import { binaryOperation, operation, partialOperation } from "../named.js";
import type { BinaryOperation, NamedOperation, PartialOperation } from "../named.js";
import { VariantRegistry } from "../variants.js";
import { Explorer } from "../explorer.js";

const nonEmpty = (s: string): string | undefined => (s.length > 0 ? s : undefined);

export const stringEndoTransforms = new VariantRegistry<NamedOperation<string, string>>(
  "string endo-transforms"
);
export const upper = stringEndoTransforms.register(
  operation("upper", (s: string) => s.toUpperCase())
);
export const fishy = stringEndoTransforms.register(operation("fishy", (s: string) => `<${s}-<`));

export const stringToOptions = new VariantRegistry<NamedOperation<string, string | undefined>>(
  "string to optional string"
);
export const natural = stringToOptions.register(operation("natural", nonEmpty));
export const letter = stringToOptions.register(
  operation("letter", (s: string) => nonEmpty(s.replace(/\P{L}/gu, "")))
);

export const stringBinaryOps = new VariantRegistry<BinaryOperation<string>>("string binary ops");
export const concat = stringBinaryOps.register(
  binaryOperation("concat", (s: string, t: string) => s + t, {
    identity: "",
    associativity: "associative",
    symmetry: "asymmetric",
  })
);
export const interleave = stringBinaryOps.register(
  binaryOperation("interleave", (s: string, t: string) => {
    const n = Math.min(s.length, t.length);
    let out = "";
    for (let i = 0; i < n; i++) out += s[i] + t[i];
    return out;
  })
);

export const stringPredicates = new VariantRegistry<NamedOperation<string, boolean>>(
  "string predicates"
);
export const increasing = stringPredicates.register(
  operation("increasing", (s: string) => s.length < 2 || s[0] <= s[s.length - 1])
);
export const alwaysString = stringPredicates.register(operation("always", (_: string) => true));
export const neverString = stringPredicates.register(operation("never", (_: string) => false));

export const stringPartials = new VariantRegistry<PartialOperation<string>>("string partials");
export const oddMirror = stringPartials.register(
  partialOperation("oddMirror", (s: string) =>
    s.length % 2 === 1 ? [...s].reverse().join("") : undefined
  )
);
export const identicalString = stringPartials.register(
  partialOperation("identical", (s: string) => s)
);
export const uninhabitedString = stringPartials.register(
  partialOperation("uninhabited", (_: string): string | undefined => undefined)
);

/** 2 × 2 × 2 × 3 × 3 = 72 combinations */
export const stringExplorer = new Explorer<string, string | undefined>("strings", {
  endoTransforms: stringEndoTransforms,
  heteroTransforms: stringToOptions,
  binaryOps: stringBinaryOps,
  predicates: stringPredicates,
  partialTransforms: stringPartials,
});
