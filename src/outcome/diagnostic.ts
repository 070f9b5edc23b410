export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticKind =
  | "DuplicateDeclaration"
  | "UnknownOwnedType"
  | "UnannotatedOwnedType"
  | "UnexpectedReference"
  | "DisjointOwnership"
  | "RetainCycleViolation";

export interface DiagnosticFix {
  description: string;
  /** Declaration whose annotation the fix rewrites. */
  target: string;
  replacement: string;
}

export interface Diagnostic {
  readonly code: string;
  readonly kind: DiagnosticKind;
  readonly severity: DiagnosticSeverity;
  readonly subjectType: string;
  readonly relatedType: string | null;
  readonly message: string;
  readonly data?: Readonly<Record<string, unknown>>;
  readonly fixes?: readonly DiagnosticFix[];
}

export function hasErrors(diags: readonly Diagnostic[]): boolean {
  return diags.some(d => d.severity === "error");
}

export function countBySeverity(diags: readonly Diagnostic[]): Record<DiagnosticSeverity, number> {
  const counts: Record<DiagnosticSeverity, number> = { error: 0, warning: 0 };
  for (const d of diags) {
    counts[d.severity]++;
  }
  return counts;
}

/** Code-unit ordering; locale collation would make output machine-dependent. */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable sort by subject type, then kind. Ties keep emission order.
 */
export function sortDiagnostics(diags: readonly Diagnostic[]): Diagnostic[] {
  return diags
    .map((d, i) => ({ d, i }))
    .sort((x, y) =>
      compareText(x.d.subjectType, y.d.subjectType) ||
      compareText(x.d.kind, y.d.kind) ||
      x.i - y.i
    )
    .map(({ d }) => d);
}

/** Replace every diagnostic's severity, keeping each object immutable. */
export function withSeverity(diags: readonly Diagnostic[], severity: DiagnosticSeverity): Diagnostic[] {
  return diags.map(d => (d.severity === severity ? d : Object.freeze({ ...d, severity })));
}
