import type { TypeDeclaration } from "./model/declaration";
import { sortDiagnostics, type Diagnostic } from "./outcome/diagnostic";
import { createDefaultRunner } from "./lint/runner";
import type { LintConfig, LogFn } from "./lint/types";

export interface ValidateOptions {
  /** Cap on nested value-type flattening. */
  maxValueChainDepth?: number;
  lint?: Partial<LintConfig>;
  log?: LogFn;
}

/**
 * Validate a declaration set against its ownership annotations.
 *
 * Pure: the result depends only on the input, is sorted by subject type and
 * then kind, and holds frozen diagnostics. Problems in the input are always
 * reported as diagnostics; only a broken internal invariant throws
 * (InternalInvariantError).
 *
 * @example
 * const diags = validate([
 *   referenceType("A", ["B"], [["b", "B"]]),
 *   referenceType("B", [], []),
 * ]);
 * // diags.length === 0
 */
export function validate(declarations: readonly TypeDeclaration[], options: ValidateOptions = {}): Diagnostic[] {
  const runner = createDefaultRunner(options.lint, {
    analysis: { maxValueChainDepth: options.maxValueChainDepth },
    log: options.log,
  });
  return sortDiagnostics(runner.run(declarations).diagnostics);
}
