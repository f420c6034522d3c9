/**
 * @lawkit/laws: combinatorial machinery for law-based testing of container types.
 *
 * ## Usage
 *
 * ```typescript
 * import { numberExplorer, tags, not, requiresIdentity, CapabilityChecker, builtinManifest } from "@lawkit/laws";
 *
 * const arrays = CapabilityChecker.from("Array", builtinManifest().introspector());
 * const lawTags = tags("seq", not("set"), requiresIdentity);
 *
 * if (arrays.passes(["reduce"]) && lawTags.compatible(["seq"])) {
 *   for (const ops of numberExplorer.bundles()) {
 *     if (lawTags.validate({ bundle: ops, flags: new Set() })) continue;
 *     // evaluate the law against ops.binaryOp, ops.identityElement, ...
 *     // then require ops.touched()
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Operations
// ============================================================================

export {
  operation,
  binaryOperation,
  partialOperation,
  toPartialFunction,
  sameOperation,
  describeOperation,
  eqNamed,
  hashNamed,
  type Named,
  type NamedOperation,
  type BinaryOperation,
  type BinaryHints,
  type PartialOperation,
  type PartialFunction,
  type Identity,
  type Associativity,
  type Symmetry,
  type SourceLocation,
} from "./named.js";

export { eqString, hashString, eqArray, hashArray, eqBy, hashBy, type Eq, type Hash } from "./hash.js";

// ============================================================================
// Enumeration
// ============================================================================

export { VariantRegistry, variants } from "./variants.js";

export {
  Explorer,
  type Exploratory,
  type ExplorerRegistries,
  type IndexVector,
} from "./explorer.js";

export {
  OperationBundle,
  ROLES,
  ROLE_SLOT,
  eqOperationBundle,
  hashOperationBundle,
  distinctBundles,
  type Role,
  type BundleValues,
  type BundleIdentity,
  type BundleSummary,
} from "./bundle.js";

// ============================================================================
// Filtering
// ============================================================================

export {
  Tag,
  TagSet,
  tag,
  tags,
  not,
  skip,
  requiresIdentity,
  requiresAssociative,
  requiresSymmetric,
  type TagEffect,
  type TagExpression,
  type Negated,
  type Selector,
  type Skip,
  type TestInfo,
} from "./tags.js";

export {
  CapabilityChecker,
  IGNORED_OPERATIONS,
  ASSUMED_OPERATIONS,
  type Introspector,
} from "./capability/checker.js";
export { CapabilityManifest, builtinManifest } from "./capability/manifest.js";
export { declarationManifest, declarationIntrospector } from "./capability/declarations.js";

export {
  FormatError,
  extractOperations,
  extractAll,
  requiredCapabilities,
  type ExtractResult,
  type BatchExtraction,
} from "./law-text.js";

// ============================================================================
// Errors
// ============================================================================

export {
  VariantIndexError,
  RegistrySealedError,
  MissingIdentityElementError,
  PartialFunctionDomainError,
} from "./errors.js";

// ============================================================================
// Standard catalogs
// ============================================================================

export * from "./catalog/index.js";
