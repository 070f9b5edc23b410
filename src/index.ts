// src/index.ts
// ownlint - Public API
//
// Ownership-graph validation for an already-extracted declaration set.

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

export { validate, type ValidateOptions } from "./validate";

// ═══════════════════════════════════════════════════════════════════════════════
// DECLARATIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  indexDeclarations,
  isOwnershipNode,
  referenceType,
  valueType,
  type DeclarationIndex,
  type StoredMember,
  type TypeDeclaration,
  type TypeKind,
} from "./model";
export { decodeDeclarations, parseDeclarations } from "./model";

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  countBySeverity,
  hasErrors,
  sortDiagnostics,
  type Diagnostic,
  type DiagnosticFix,
  type DiagnosticKind,
  type DiagnosticSeverity,
} from "./outcome";
export { DIAGNOSTIC_CODES, lookupCode, makeDiagnostic } from "./outcome";
export {
  ConfigError,
  DeclarationFormatError,
  InternalInvariantError,
  OwnlintError,
  type FormatProblem,
} from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// ANALYSIS & PASSES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  analyzeOwnership,
  owns,
  related,
  type OwnershipAnalysis,
} from "./lint";
export { buildOwnershipGraph, type OwnershipGraph, type CarriedSet } from "./lint";
export { findStronglyConnectedComponents, type ComponentIndex } from "./lint";
export { LintRunner, createDefaultRunner, DEFAULT_PASSES, type RunResult } from "./lint";
export type { LintConfig, LogFn, Pass, PassConfig, PassContext, PassResult } from "./lint";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG & REPORTING
// ═══════════════════════════════════════════════════════════════════════════════

export { loadConfig, mergeConfigs, type OwnlintConfig } from "./core/config";
export { formatJson, formatText } from "./report";
export { explainCode, generateMarkdown, listRules } from "./report";
