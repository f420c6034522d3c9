import { describe, it, expect } from "vitest";
import {
  alwaysNumber,
  bit33,
  cast,
  concat,
  fishy,
  halfEven,
  identicalNumber,
  increasing,
  interleave,
  letter,
  mod3,
  multiply,
  natural,
  neverNumber,
  numberExplorer,
  numberKeyedExplorer,
  oddMirror,
  quadratic,
  stringExplorer,
  stringKeyedExplorer,
  summation,
  uninhabitedString,
  upper,
} from "../src/catalog/index.js";

describe("number catalog", () => {
  it("endo-transforms", () => {
    expect(quadratic.fn(4)).toBe(5);
    expect(quadratic.fn(0)).toBe(1);
  });

  it("hetero-transforms widen to bigint", () => {
    expect(cast.fn(5)).toBe(5n);
    expect(bit33.fn(0)).toBe(8589934592n);
  });

  it("binary operations and their declarations", () => {
    expect(summation.fn(2, 3)).toBe(5);
    expect(summation.identity).toEqual({ value: 0 });
    expect(multiply.fn(2, 3)).toBe(-3);
    expect(multiply.identity).toBeUndefined();
    expect(multiply.associativity).toBe("nonassociative");
    expect(multiply.symmetry).toBe("asymmetric");
  });

  it("predicates", () => {
    expect([0, 1, 2, 3].map(mod3.fn)).toEqual([true, false, false, true]);
    expect(alwaysNumber.fn(7)).toBe(true);
    expect(neverNumber.fn(7)).toBe(false);
  });

  it("partial transforms", () => {
    expect(halfEven.fn(8)).toBe(4);
    expect(halfEven.fn(7)).toBeUndefined();
    expect(identicalNumber.fn(7)).toBe(7);
  });
});

describe("string catalog", () => {
  it("endo-transforms", () => {
    expect(upper.fn("abc")).toBe("ABC");
    expect(fishy.fn("a")).toBe("<a-<");
  });

  it("hetero-transforms give undefined for empty results", () => {
    expect(natural.fn("")).toBeUndefined();
    expect(natural.fn("x")).toBe("x");
    expect(letter.fn("a1b!")).toBe("ab");
    expect(letter.fn("123")).toBeUndefined();
  });

  it("binary operations", () => {
    expect(concat.fn("ab", "cd")).toBe("abcd");
    expect(concat.identity).toEqual({ value: "" });
    expect(interleave.fn("abc", "xy")).toBe("axby");
  });

  it("predicates and partial transforms", () => {
    expect(["ab", "ba", "z", ""].map(increasing.fn)).toEqual([true, false, true, true]);
    expect(oddMirror.fn("abc")).toBe("cba");
    expect(oddMirror.fn("ab")).toBeUndefined();
    expect(uninhabitedString.fn("abc")).toBeUndefined();
  });

  it("spans 72 combinations", () => {
    expect(stringExplorer.sizes).toEqual([2, 2, 2, 3, 3]);
    expect(stringExplorer.total).toBe(72);
    expect(numberExplorer.total).toBe(72);
  });
});

describe("entry catalogs", () => {
  it("number-keyed entries have one variant per role", () => {
    expect(numberKeyedExplorer.total).toBe(1);
    const ops = numberKeyedExplorer.lookup([0, 0, 0, 0, 0]);
    if (!ops) throw new Error("expected the only bundle");

    expect(ops.endoTransform([1, "a"])).toEqual([2, "a"]);
    expect(ops.heteroTransform([1, "a"])).toEqual(["a", 1]);
    expect(ops.binaryOp([1, "a"], [2, "b"])).toEqual([3, "ab"]);
    expect(ops.predicate([3, "ab"])).toBe(true);
    expect(ops.partialTransform.lift([4, "ab"])).toEqual([2, "ab"]);
    expect(ops.partialTransform.isDefinedAt([3, "ab"])).toBe(false);
  });

  it("string-keyed entries mirror them", () => {
    expect(stringKeyedExplorer.total).toBe(1);
    const ops = stringKeyedExplorer.lookup([0, 0, 0, 0, 0]);
    if (!ops) throw new Error("expected the only bundle");

    expect(ops.endoTransform(["k", 1])).toEqual(["k..", 1]);
    expect(ops.heteroTransform(["k", 1])).toEqual([1, "k"]);
    expect(ops.binaryOp(["a", 1], ["b", 2])).toEqual(["ab", 3]);
    expect(ops.predicate(["ab", 3])).toBe(true);
    expect(ops.partialTransform.lift(["ab", 2])).toEqual(["ab!", 2]);
    expect(ops.partialTransform.lift(["ab", 1])).toBeUndefined();
  });
});
