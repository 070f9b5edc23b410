import { countBySeverity, type Diagnostic } from "../outcome/diagnostic";

export interface TextFormatOptions {
  /** Print suggested owns-list rewrites under each diagnostic. */
  showFixes?: boolean;
}

/**
 * One line per diagnostic, then a summary line.
 *
 *   error[E0703] DisjointOwnership: A stores C, which has no ownership relation to A
 *   1 error, 0 warnings
 */
export function formatText(diags: readonly Diagnostic[], options: TextFormatOptions = {}): string {
  if (diags.length === 0) {
    return "No ownership problems found.";
  }

  const lines: string[] = [];
  for (const d of diags) {
    lines.push(formatDiagnostic(d));
    if (options.showFixes) {
      for (const fix of d.fixes ?? []) {
        lines.push(`  help: ${fix.description}: ${fix.target} ${fix.replacement}`);
      }
    }
  }
  lines.push(formatSummary(diags));
  return lines.join("\n");
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.severity}[${d.code}] ${d.kind}: ${d.message}`;
}

export function formatSummary(diags: readonly Diagnostic[]): string {
  const counts = countBySeverity(diags);
  return `${plural(counts.error, "error")}, ${plural(counts.warning, "warning")}`;
}

export function formatJson(diags: readonly Diagnostic[]): string {
  const counts = countBySeverity(diags);
  return JSON.stringify(
    {
      diagnostics: diags,
      summary: { errors: counts.error, warnings: counts.warning },
    },
    null,
    2
  );
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}
