/**
 * Tag Algebra
 *
 * Tags decide which laws apply to a run, in two phases:
 *
 * - `compatible(present)` is structural. It looks only at which tags a
 *   target carries, so it can prune configurations before any test data
 *   exists.
 * - `validate(info)` is dynamic. It runs the selectors in order against a
 *   concrete test case and returns the first skip.
 *
 * A tag may be globally disabled (from `tags.disabled` in the configuration,
 * or at creation). A disabled tag never blocks compatibility, whether a law
 * requires it or excludes it.
 *
 * @example
 * ```typescript
 * const lawTags = tags("seq", not("set"), requiresIdentity);
 * lawTags.compatible(new Set([tag("seq")]));   // → true
 * lawTags.validate({ bundle, flags });        // → skip(...) if no identity
 * ```
 */

import { ContractViolationError, config } from "@lawkit/core";
import type { BundleSummary } from "./bundle.js";

// ============================================================================
// Tags
// ============================================================================

export class Tag {
  private constructor(
    readonly name: string,
    private readonly disabledAtCreation: boolean
  ) {}

  /** Disabled at creation or listed in `tags.disabled` */
  get disabled(): boolean {
    return this.disabledAtCreation || config.getDisabledTags().includes(this.name);
  }

  equals(that: Tag): boolean {
    return this.name === that.name;
  }

  toString(): string {
    return this.name;
  }

  private static readonly interned = new Map<string, Tag>();

  /**
   * The tag with this name. Tags are interned, so the same name always yields
   * the same instance. Asking for an existing tag with a different `disabled`
   * option throws ContractViolationError.
   */
  static of(name: string, options: { disabled?: boolean } = {}): Tag {
    const existing = Tag.interned.get(name);
    if (existing) {
      if (options.disabled !== undefined && options.disabled !== existing.disabledAtCreation) {
        throw new ContractViolationError(
          `Tag "${name}" already exists with disabled: ${existing.disabledAtCreation}`,
          "tag-redefined"
        );
      }
      return existing;
    }
    const created = new Tag(name, options.disabled ?? false);
    Tag.interned.set(name, created);
    return created;
  }
}

export function tag(name: string, options: { disabled?: boolean } = {}): Tag {
  return Tag.of(name, options);
}

export type TagEffect = "required" | "excluded" | "disabled";

// ============================================================================
// Skips and test info
// ============================================================================

export interface Skip {
  readonly kind: "skip";
  readonly reason: string;
}

export function skip(reason: string): Skip {
  return { kind: "skip", reason };
}

/**
 * What dynamic selectors see for one concrete test case.
 */
export interface TestInfo {
  readonly bundle: BundleSummary;
  readonly flags: ReadonlySet<Tag>;
  readonly params?: Readonly<Record<string, unknown>>;
}

export type Selector<Info = TestInfo> = (info: Info) => Skip | undefined;

/**
 * Skips bundles whose binary operation declares no identity element.
 * Reads through `values`, so no usage flag is set.
 */
export const requiresIdentity: Selector = (info) =>
  info.bundle.values.binaryOp.identity
    ? undefined
    : skip(`${info.bundle.values.binaryOp.name} has no identity element`);

/** Skips bundles whose binary operation is not declared associative */
export const requiresAssociative: Selector = (info) =>
  info.bundle.values.binaryOp.associativity === "associative"
    ? undefined
    : skip(`${info.bundle.values.binaryOp.name} is not associative`);

/** Skips bundles whose binary operation is not declared symmetric */
export const requiresSymmetric: Selector = (info) =>
  info.bundle.values.binaryOp.symmetry === "symmetric"
    ? undefined
    : skip(`${info.bundle.values.binaryOp.name} is not symmetric`);

// ============================================================================
// TagSet
// ============================================================================

function toTag(t: Tag | string): Tag {
  return typeof t === "string" ? Tag.of(t) : t;
}

function containsTag(tags: Iterable<Tag | string>, t: Tag): boolean {
  for (const candidate of tags) {
    if (toTag(candidate).name === t.name) return true;
  }
  return false;
}

/**
 * Immutable value: required tags, excluded tags (disjoint), and ordered
 * dynamic selectors.
 */
export class TagSet<Info = TestInfo> {
  private constructor(
    private readonly requiredByName: ReadonlyMap<string, Tag>,
    private readonly excludedByName: ReadonlyMap<string, Tag>,
    readonly selectors: readonly Selector<Info>[]
  ) {}

  static empty<Info = TestInfo>(): TagSet<Info> {
    return new TagSet<Info>(new Map(), new Map(), []);
  }

  get required(): readonly Tag[] {
    return [...this.requiredByName.values()];
  }

  get excluded(): readonly Tag[] {
    return [...this.excludedByName.values()];
  }

  get isEmpty(): boolean {
    return (
      this.requiredByName.size === 0 && this.excludedByName.size === 0 && this.selectors.length === 0
    );
  }

  /**
   * How this set treats `t`. A disabled tag reports "disabled" if it appears
   * in either set.
   */
  effectOf(t: Tag | string): TagEffect | undefined {
    const resolved = toTag(t);
    const required = this.requiredByName.has(resolved.name);
    const excluded = this.excludedByName.has(resolved.name);
    if (!required && !excluded) return undefined;
    if (resolved.disabled) return "disabled";
    return required ? "required" : "excluded";
  }

  /** Require `t`, dropping it from the excluded set */
  require(t: Tag | string): TagSet<Info> {
    const resolved = toTag(t);
    if (this.requiredByName.has(resolved.name)) return this;
    const required = new Map(this.requiredByName).set(resolved.name, resolved);
    const excluded = new Map(this.excludedByName);
    excluded.delete(resolved.name);
    return new TagSet(required, excluded, this.selectors);
  }

  /** Exclude `t`, dropping it from the required set */
  exclude(t: Tag | string): TagSet<Info> {
    const resolved = toTag(t);
    if (this.excludedByName.has(resolved.name)) return this;
    const excluded = new Map(this.excludedByName).set(resolved.name, resolved);
    const required = new Map(this.requiredByName);
    required.delete(resolved.name);
    return new TagSet(required, excluded, this.selectors);
  }

  /** Append a dynamic selector; selectors run in the order added */
  withSelector(selector: Selector<Info>): TagSet<Info> {
    return new TagSet(this.requiredByName, this.excludedByName, [...this.selectors, selector]);
  }

  /**
   * Structural check: every non-disabled required tag is present and no
   * non-disabled excluded tag is.
   */
  compatible(present: Iterable<Tag | string>): boolean {
    const presentTags = [...present];
    for (const t of this.requiredByName.values()) {
      if (!t.disabled && !containsTag(presentTags, t)) return false;
    }
    for (const t of this.excludedByName.values()) {
      if (!t.disabled && containsTag(presentTags, t)) return false;
    }
    return true;
  }

  /**
   * Dynamic check: the first skip produced by the selectors, in order.
   * Selectors after the first skip are not run.
   */
  validate(info: Info): Skip | undefined {
    for (const selector of this.selectors) {
      const outcome = selector(info);
      if (outcome) return outcome;
    }
    return undefined;
  }

  toString(): string {
    const named = [
      ...[...this.requiredByName.keys()].sort(),
      ...[...this.excludedByName.keys()].sort().map((n) => `!${n}`),
    ];
    const n = this.selectors.length;
    if (n === 1) named.push("(1 filter)");
    else if (n > 1) named.push(`(${n} filters)`);
    return named.join(" ");
  }
}

// ============================================================================
// Tag expressions
// ============================================================================

export interface Negated {
  readonly kind: "not";
  readonly tag: Tag;
}

export function not(t: Tag | string): Negated {
  return { kind: "not", tag: toTag(t) };
}

export type TagExpression<Info = TestInfo> = Tag | string | Negated | Selector<Info>;

/**
 * Combine tag expressions into one TagSet. A bare tag (or name) is required,
 * `not(t)` is excluded, and a function is a dynamic selector. A tag that is
 * both required and excluded ends up required.
 */
export function tags<Info = TestInfo>(...expressions: TagExpression<Info>[]): TagSet<Info> {
  const positive: Tag[] = [];
  const negative: Tag[] = [];
  const selectors: Selector<Info>[] = [];

  for (const expr of expressions) {
    if (typeof expr === "function") selectors.push(expr);
    else if (typeof expr === "string" || expr instanceof Tag) positive.push(toTag(expr));
    else negative.push(expr.tag);
  }

  let result = TagSet.empty<Info>();
  for (const t of negative) {
    if (!positive.some((p) => p.name === t.name)) result = result.exclude(t);
  }
  for (const t of positive) result = result.require(t);
  for (const s of selectors) result = result.withSelector(s);
  return result;
}
