/**
 * Capability manifests from TypeScript declarations.
 *
 * Parses interface and class declarations with the compiler API and records
 * their public members. Heritage clauses naming a declaration from the same
 * source are followed, so `interface Seq<A> extends Coll<A>` picks up
 * everything declared on `Coll`.
 *
 * @example
 * ```typescript
 * const manifest = declarationManifest(`
 *   interface Coll<A> { map<B>(f: (a: A) => B): Coll<B>; size: number }
 *   interface Seq<A> extends Coll<A> { head(): A }
 * `);
 * manifest.operationsOf("Seq");   // → Set { "head", "map", "size" }
 * ```
 */

import ts from "typescript";
import { CapabilityManifest } from "./manifest.js";
import type { Introspector } from "./checker.js";

type Declaration = ts.InterfaceDeclaration | ts.ClassDeclaration;

function memberName(member: ts.ClassElement | ts.TypeElement): string | undefined {
  const name = member.name;
  if (!name) return undefined;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  // Computed names and #private names are not part of the checked surface
  return undefined;
}

function isPublic(member: ts.ClassElement | ts.TypeElement): boolean {
  const flags = ts.getCombinedModifierFlags(member);
  if (flags & (ts.ModifierFlags.Private | ts.ModifierFlags.Protected | ts.ModifierFlags.Static)) {
    return false;
  }
  return true;
}

function isMemberKind(member: ts.ClassElement | ts.TypeElement): boolean {
  return (
    ts.isMethodSignature(member) ||
    ts.isPropertySignature(member) ||
    ts.isMethodDeclaration(member) ||
    ts.isPropertyDeclaration(member) ||
    ts.isGetAccessorDeclaration(member) ||
    ts.isSetAccessorDeclaration(member)
  );
}

function ownMembers(decl: Declaration): string[] {
  const names: string[] = [];
  const members: readonly (ts.ClassElement | ts.TypeElement)[] = decl.members;
  for (const member of members) {
    if (!isMemberKind(member) || !isPublic(member)) continue;
    const name = memberName(member);
    if (name !== undefined && !name.startsWith("_")) names.push(name);
  }
  return names;
}

function parentNames(decl: Declaration): string[] {
  const parents: string[] = [];
  for (const clause of decl.heritageClauses ?? []) {
    if (clause.token !== ts.SyntaxKind.ExtendsKeyword) continue;
    for (const type of clause.types) {
      if (ts.isIdentifier(type.expression)) parents.push(type.expression.text);
    }
  }
  return parents;
}

/**
 * Build a manifest from every top-level interface and class in `sourceText`.
 */
export function declarationManifest(
  sourceText: string,
  fileName = "capabilities.d.ts"
): CapabilityManifest {
  const sourceFile = ts.createSourceFile(fileName, sourceText, ts.ScriptTarget.Latest, true);

  const declarations = new Map<string, Declaration[]>();
  for (const statement of sourceFile.statements) {
    if (ts.isInterfaceDeclaration(statement) || ts.isClassDeclaration(statement)) {
      const name = statement.name?.text;
      if (!name) continue;
      const merged = declarations.get(name) ?? [];
      merged.push(statement);
      declarations.set(name, merged);
    }
  }

  const resolve = (name: string, visiting: Set<string>): string[] => {
    if (visiting.has(name)) return [];
    visiting.add(name);
    const names: string[] = [];
    for (const decl of declarations.get(name) ?? []) {
      names.push(...ownMembers(decl));
      for (const parent of parentNames(decl)) names.push(...resolve(parent, visiting));
    }
    return names;
  };

  const manifest = new CapabilityManifest();
  for (const name of declarations.keys()) {
    manifest.declare(name, resolve(name, new Set()));
  }
  return manifest;
}

/**
 * Introspector over the declarations in `sourceText`.
 */
export function declarationIntrospector(sourceText: string): Introspector<string> {
  return declarationManifest(sourceText).introspector();
}
