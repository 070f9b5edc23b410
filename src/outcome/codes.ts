import type { Diagnostic, DiagnosticFix, DiagnosticKind, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
  summary: string;
}

export const DIAGNOSTIC_CODES: Record<DiagnosticKind, DiagCodeDef> = {
  DuplicateDeclaration: {
    code: "E0700",
    kind: "DuplicateDeclaration",
    severity: "error",
    category: "Input",
    template: "Duplicate declaration: {subject}",
    summary: "Two declarations share a name. The first one is kept and the rest are ignored.",
  },
  UnknownOwnedType: {
    code: "E0701",
    kind: "UnknownOwnedType",
    severity: "error",
    category: "Input",
    template: "{subject} lists unknown type {related} in its owns-list",
    summary: "An owns-list entry names a type that is not part of the declaration set.",
  },
  UnexpectedReference: {
    code: "E0702",
    kind: "UnexpectedReference",
    severity: "error",
    category: "Ownership",
    template: "{subject} stores {related}, but {related} is not in its owns-list",
    summary:
      "A stored reference is not covered by the owner's effective owns-list, although the two types are related through other ownership edges.",
  },
  DisjointOwnership: {
    code: "E0703",
    kind: "DisjointOwnership",
    severity: "error",
    category: "Ownership",
    template: "{subject} stores {related}, which has no ownership relation to {subject}",
    summary: "A stored reference has no ownership path to or from the owner in any direction.",
  },
  RetainCycleViolation: {
    code: "E0704",
    kind: "RetainCycleViolation",
    severity: "error",
    category: "Cycle",
    template: "Retain cycle between {first} and {second} is not declared by every member",
    summary:
      "Types that own each other form a cycle. Every member of the cycle must list every member, itself included.",
  },
  UnannotatedOwnedType: {
    code: "W0700",
    kind: "UnannotatedOwnedType",
    severity: "warning",
    category: "Ownership",
    template: "{subject} stores {related}, which has no ownership annotation",
    summary: "The stored type carries no owns-list, so the dependency is allowed but unchecked.",
  },
};

const BY_CODE = new Map(Object.values(DIAGNOSTIC_CODES).map(def => [def.code, def]));

export function lookupCode(code: string): DiagCodeDef | undefined {
  return BY_CODE.get(code.toUpperCase());
}

export function allCodes(): DiagCodeDef[] {
  return [...BY_CODE.values()].sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
}

interface MakeDiagnosticOpts {
  params?: Record<string, string>;
  data?: Record<string, unknown>;
  fixes?: DiagnosticFix[];
}

/**
 * Build a frozen diagnostic from the code table.
 * `{subject}` and `{related}` are always available to the template.
 */
export function makeDiagnostic(
  kind: DiagnosticKind,
  subjectType: string,
  relatedType: string | null,
  opts: MakeDiagnosticOpts = {}
): Diagnostic {
  const def = DIAGNOSTIC_CODES[kind];

  const params: Record<string, string> = {
    subject: subjectType,
    related: relatedType ?? "",
    ...opts.params,
  };
  let message = def.template;
  for (const [key, value] of Object.entries(params)) {
    message = message.replaceAll(`{${key}}`, value);
  }

  const diag: Diagnostic = {
    code: def.code,
    kind,
    severity: def.severity,
    subjectType,
    relatedType,
    message,
    ...(opts.data ? { data: freezeData(opts.data) } : {}),
    ...(opts.fixes && opts.fixes.length > 0 ? { fixes: Object.freeze(opts.fixes.map(f => Object.freeze({ ...f }))) } : {}),
  };
  return Object.freeze(diag);
}

/** Copies and freezes data, including the arrays it holds. */
function freezeData(data: Record<string, unknown>): Readonly<Record<string, unknown>> {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    copy[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
  }
  return Object.freeze(copy);
}

/** Render an owns annotation, e.g. `@owns(B, C)`. */
export function formatOwnsAnnotation(names: readonly string[]): string {
  return `@owns(${names.join(", ")})`;
}
