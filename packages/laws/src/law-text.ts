/**
 * Operation references in law text.
 *
 * Law descriptions name the operations they check in backticks:
 *
 *   "`map` then `filter` keeps the size when the predicate always holds"
 *
 * Each backtick pair must enclose a single operation name. An unclosed
 * backtick is a FormatError: a value, not a throw, so that many laws can be
 * checked in one pass and all problems reported together.
 */

import { createLogger } from "@lawkit/core";
import { CapabilityChecker } from "./capability/checker.js";

const log = createLogger("law-text");

/**
 * A malformed operation reference in a law description.
 */
export class FormatError {
  constructor(
    readonly description: string,
    readonly context: string,
    readonly position: number,
    readonly offendingText: string
  ) {}

  toString(): string {
    return `${this.description}.  At ${this.position} found ${this.offendingText}.  In ${this.context}`;
  }
}

export type ExtractResult =
  | { readonly ok: true; readonly names: readonly string[] }
  | { readonly ok: false; readonly error: FormatError };

const OPERATION_NAME = /^[A-Za-z_$][\w$]*$/;

/** Characters of offending text shown in a FormatError */
const FOCUS_LENGTH = 20;

/**
 * The operation names referenced by `text`, in order of first appearance.
 */
export function extractOperations(text: string): ExtractResult {
  const names: string[] = [];
  let i = 0;

  while (i < text.length) {
    const open = text.indexOf("`", i);
    if (open < 0) break;
    const close = text.indexOf("`", open + 1);
    if (close < 0) {
      return {
        ok: false,
        error: new FormatError(
          "Unclosed operation name",
          text,
          open,
          text.slice(open, open + FOCUS_LENGTH)
        ),
      };
    }
    const name = text.slice(open + 1, close);
    if (!OPERATION_NAME.test(name)) {
      return {
        ok: false,
        error: new FormatError(
          "Operation reference is not a single name",
          text,
          open,
          text.slice(open, close + 1)
        ),
      };
    }
    if (!names.includes(name)) names.push(name);
    i = close + 1;
  }

  return { ok: true, names };
}

export interface BatchExtraction {
  /** Union of names from every well-formed text, in order of first appearance */
  readonly names: readonly string[];
  readonly errors: readonly FormatError[];
}

/**
 * Extract from every text, collecting all errors rather than stopping at the first.
 */
export function extractAll(texts: Iterable<string>): BatchExtraction {
  const names: string[] = [];
  const errors: FormatError[] = [];

  for (const text of texts) {
    const result = extractOperations(text);
    if (result.ok) {
      for (const name of result.names) {
        if (!names.includes(name)) names.push(name);
      }
    } else {
      errors.push(result.error);
    }
  }

  if (errors.length > 0) {
    log.warn(`${errors.length} law description(s) have malformed operation references`);
  }
  return { names, errors };
}

/**
 * The capabilities a law description requires, or its FormatError.
 */
export function requiredCapabilities(text: string): CapabilityChecker | FormatError {
  const result = extractOperations(text);
  return result.ok ? CapabilityChecker.of(result.names) : result.error;
}
