import { allCodes, lookupCode } from "../outcome/codes";
import type { Pass } from "../lint/types";

/**
 * Generate a markdown reference of the diagnostic codes and the passes that
 * emit them.
 */
export function generateMarkdown(passes: readonly Pass[]): string {
  const lines: string[] = [];

  lines.push("# Ownership Diagnostics Reference\n");
  lines.push("| Code | Kind | Severity | Pass | Description |");
  lines.push("|------|------|----------|------|-------------|");

  for (const def of allCodes()) {
    const emitters = passes.filter(p => p.kinds.includes(def.kind)).map(p => `\`${p.id}\``);
    lines.push(`| ${def.code} | ${def.kind} | ${def.severity} | ${emitters.join(", ") || "-"} | ${def.summary} |`);
  }

  lines.push("");
  return lines.join("\n");
}

/** Plain-text rule list for terminals. */
export function listRules(passes: readonly Pass[]): string {
  return allCodes()
    .map(def => {
      const emitter = passes.find(p => p.kinds.includes(def.kind));
      return `${def.code}  ${def.severity.padEnd(7)}  ${def.kind.padEnd(22)}  ${emitter?.id ?? "-"}`;
    })
    .join("\n");
}

/** Long-form explanation of one code, or undefined for an unknown code. */
export function explainCode(code: string): string | undefined {
  const def = lookupCode(code);
  if (!def) return undefined;
  return [
    `${def.code} ${def.kind} (${def.severity}, ${def.category})`,
    "",
    def.summary,
    "",
    `Message: ${def.template}`,
  ].join("\n");
}
