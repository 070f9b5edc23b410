import type { DeclarationIndex, TypeDeclaration } from "../model/declaration";
import type { Diagnostic, DiagnosticKind } from "../outcome/diagnostic";
import type { OwnershipAnalysis } from "./analysis/ownership";

export interface PassResult {
  diagnostics: Diagnostic[];
  /** Replacement declaration set for every later pass. */
  transformed?: TypeDeclaration[];
  metadata?: Record<string, unknown>;
}

export type PassPhase =
  | "index"
  | "graph"
  | "lint";

export interface AnalysisOptions {
  maxValueChainDepth: number;
}

export interface PassContext {
  declarations: readonly TypeDeclaration[];
  index: DeclarationIndex;
  options: AnalysisOptions;
  /** Built on first use, then shared by every pass reading the same set. */
  analysis(): OwnershipAnalysis;
}

export interface Pass {
  id: string;
  name: string;
  phase: PassPhase;
  /** Diagnostic kinds this pass can emit. */
  kinds: DiagnosticKind[];
  dependencies?: string[];
  run(ctx: PassContext): PassResult;
}

export type SeverityOverride = "error" | "warning" | "off";

export interface PassConfig {
  enabled: boolean;
  severityOverride?: SeverityOverride;
}

export interface LintConfig {
  passes: Record<string, PassConfig>;
}

export type LogFn = (msg: string, data?: unknown) => void;
