import { describe, it, expect, vi, afterEach } from "vitest";
import { ContractViolationError, config } from "@lawkit/core";
import {
  Tag,
  TagSet,
  not,
  requiresAssociative,
  requiresIdentity,
  requiresSymmetric,
  skip,
  tag,
  tags,
  type Selector,
  type TestInfo,
} from "../src/tags.js";
import { numberExplorer } from "../src/catalog/numbers.js";
import { stringExplorer } from "../src/catalog/strings.js";
import type { BundleSummary } from "../src/bundle.js";

function infoFor(bundle: BundleSummary | undefined): TestInfo {
  if (!bundle) throw new Error("expected a bundle");
  return { bundle, flags: new Set<Tag>() };
}

describe("Tag", () => {
  it("interns by name", () => {
    expect(Tag.of("interned")).toBe(tag("interned"));
    expect(tag("interned").equals(Tag.of("interned"))).toBe(true);
    expect(tag("interned").toString()).toBe("interned");
  });

  it("creates a disabled tag on request", () => {
    const off = tag("created-disabled", { disabled: true });
    expect(off.disabled).toBe(true);
    expect(tags("created-disabled").compatible([])).toBe(true);
  });

  it("returns the existing tag when the disabled option agrees or is left out", () => {
    const off = tag("reused-disabled", { disabled: true });
    expect(tag("reused-disabled")).toBe(off);
    expect(tag("reused-disabled", { disabled: true })).toBe(off);
    const on = tag("reused-enabled");
    expect(tag("reused-enabled", { disabled: false })).toBe(on);
  });

  it("rejects a conflicting disabled option for an existing tag", () => {
    tags("already-enabled");
    expect(() => tag("already-enabled", { disabled: true })).toThrow(ContractViolationError);
    expect(() => tag("already-enabled", { disabled: true })).toThrow(
      'Tag "already-enabled" already exists with disabled: false'
    );
    expect(tag("already-enabled").disabled).toBe(false);

    tag("already-disabled", { disabled: true });
    expect(() => Tag.of("already-disabled", { disabled: false })).toThrow(ContractViolationError);
  });

  describe("disabled through configuration", () => {
    afterEach(() => {
      config.reset();
    });

    it("reads tags.disabled at call time", () => {
      const t = tag("configured-off");
      expect(t.disabled).toBe(false);
      config.set({ tags: { disabled: ["configured-off"] } });
      expect(t.disabled).toBe(true);
      config.reset();
      expect(t.disabled).toBe(false);
    });

    it("lets a configured tag through compatibility", () => {
      const lawTags = tags("needs-config-tag");
      expect(lawTags.compatible([])).toBe(false);
      config.set({ tags: { disabled: ["needs-config-tag"] } });
      expect(lawTags.compatible([])).toBe(true);
      expect(lawTags.effectOf("needs-config-tag")).toBe("disabled");
    });
  });
});

describe("TagSet", () => {
  it("starts empty", () => {
    const empty = TagSet.empty();
    expect(empty.isEmpty).toBe(true);
    expect(empty.required).toEqual([]);
    expect(empty.excluded).toEqual([]);
    expect(empty.toString()).toBe("");
    expect(empty.compatible(["anything"])).toBe(true);
  });

  it("require removes the tag from the excluded set, and vice versa", () => {
    const excluded = TagSet.empty().exclude("swap");
    const required = excluded.require("swap");
    expect(required.required).toEqual([tag("swap")]);
    expect(required.excluded).toEqual([]);

    const back = required.exclude("swap");
    expect(back.required).toEqual([]);
    expect(back.excluded).toEqual([tag("swap")]);
  });

  it("returns the same set when nothing changes", () => {
    const s = TagSet.empty().require("kept").exclude("dropped");
    expect(s.require("kept")).toBe(s);
    expect(s.exclude("dropped")).toBe(s);
  });

  it("does not mutate the receiver", () => {
    const base = TagSet.empty();
    base.require("ignored").withSelector(requiresIdentity);
    expect(base.isEmpty).toBe(true);
  });

  describe("compatible", () => {
    const enabled = tag("cmp-enabled");
    const disabled = tag("cmp-disabled", { disabled: true });

    const cases: [string, TagSet, Tag[], boolean][] = [
      ["required, present", TagSet.empty().require(enabled), [enabled], true],
      ["required, absent", TagSet.empty().require(enabled), [], false],
      ["required, disabled and absent", TagSet.empty().require(disabled), [], true],
      ["excluded, present", TagSet.empty().exclude(enabled), [enabled], false],
      ["excluded, absent", TagSet.empty().exclude(enabled), [], true],
      ["excluded, disabled and present", TagSet.empty().exclude(disabled), [disabled], true],
      ["required, disabled and present", TagSet.empty().require(disabled), [disabled], true],
      ["excluded, disabled and absent", TagSet.empty().exclude(disabled), [], true],
      ["unmentioned, present", TagSet.empty(), [enabled], true],
      ["unmentioned, absent", TagSet.empty(), [], true],
      ["unmentioned, disabled and present", TagSet.empty(), [disabled], true],
      ["unmentioned, disabled and absent", TagSet.empty().require(enabled), [enabled], true],
    ];

    it.each(cases)("%s", (_label, set, present, expected) => {
      expect(set.compatible(present)).toBe(expected);
    });

    it("accepts tag names as well as tags", () => {
      const s = tags("cmp-enabled", not("cmp-other"));
      expect(s.compatible(["cmp-enabled"])).toBe(true);
      expect(s.compatible(new Set(["cmp-enabled", "cmp-other"]))).toBe(false);
    });
  });

  describe("effectOf", () => {
    it("reports how each tag is treated", () => {
      const s = tags("eff-req", not("eff-exc"), not(tag("eff-off", { disabled: true })));
      expect(s.effectOf("eff-req")).toBe("required");
      expect(s.effectOf("eff-exc")).toBe("excluded");
      expect(s.effectOf("eff-off")).toBe("disabled");
      expect(s.effectOf("eff-none")).toBeUndefined();
    });
  });

  describe("validate", () => {
    const info = infoFor(numberExplorer.lookup([0, 0, 0, 0, 0]));

    it("passes when no selector skips", () => {
      expect(tags(requiresIdentity, requiresAssociative).validate(info)).toBeUndefined();
    });

    it("returns the first skip and stops there", () => {
      const first = vi.fn<Selector>(() => undefined);
      const second = vi.fn<Selector>(() => skip("second"));
      const third = vi.fn<Selector>(() => skip("third"));

      const s = TagSet.empty().withSelector(first).withSelector(second).withSelector(third);
      expect(s.validate(info)).toEqual({ kind: "skip", reason: "second" });
      expect(first).toHaveBeenCalledWith(info);
      expect(second).toHaveBeenCalledTimes(1);
      expect(third).not.toHaveBeenCalled();
    });
  });

  describe("toString", () => {
    it("lists required then excluded tags, sorted, then the filter count", () => {
      expect(tags("str-b", "str-a", not("str-z"), requiresIdentity).toString()).toBe(
        "str-a str-b !str-z (1 filter)"
      );
      expect(tags("str-a", requiresIdentity, requiresSymmetric).toString()).toBe(
        "str-a (2 filters)"
      );
    });
  });
});

describe("tags", () => {
  it("sorts expressions into required, excluded and selectors", () => {
    const s = tags("tg-seq", not("tg-set"), requiresIdentity);
    expect(s.required).toEqual([tag("tg-seq")]);
    expect(s.excluded).toEqual([tag("tg-set")]);
    expect(s.selectors).toEqual([requiresIdentity]);
  });

  it("keeps a tag required when it is also negated, in either order", () => {
    for (const s of [tags("tg-both", not("tg-both")), tags(not("tg-both"), "tg-both")]) {
      expect(s.required).toEqual([tag("tg-both")]);
      expect(s.excluded).toEqual([]);
    }
  });

  it("keeps selectors in the order given", () => {
    const s = tags(requiresSymmetric, "tg-x", requiresIdentity);
    expect(s.selectors).toEqual([requiresSymmetric, requiresIdentity]);
  });
});

describe("bundle selectors", () => {
  it("requiresIdentity skips operations without an identity", () => {
    const withIdentity = numberExplorer.lookup([0, 0, 0, 0, 0]);
    const without = numberExplorer.lookup([0, 0, 1, 0, 0]);
    expect(requiresIdentity(infoFor(withIdentity))).toBeUndefined();
    expect(requiresIdentity(infoFor(without))).toEqual(
      skip("multiply has no identity element")
    );
    expect(withIdentity?.touched()).toBe(false);
    expect(without?.touched()).toBe(false);
  });

  it("requiresAssociative follows the declaration", () => {
    expect(requiresAssociative(infoFor(numberExplorer.lookup([0, 0, 0, 0, 0])))).toBeUndefined();
    expect(requiresAssociative(infoFor(numberExplorer.lookup([0, 0, 1, 0, 0])))).toEqual(
      skip("multiply is not associative")
    );
  });

  it("requiresSymmetric follows the declaration", () => {
    expect(requiresSymmetric(infoFor(numberExplorer.lookup([0, 0, 0, 0, 0])))).toBeUndefined();
    expect(requiresSymmetric(infoFor(stringExplorer.lookup([0, 0, 0, 0, 0])))).toEqual(
      skip("concat is not symmetric")
    );
  });
});
