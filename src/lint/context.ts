import { indexDeclarations, type TypeDeclaration } from "../model/declaration";
import { analyzeOwnership, type OwnershipAnalysis } from "./analysis/ownership";
import type { AnalysisOptions, PassContext } from "./types";

export function createPassContext(
  declarations: readonly TypeDeclaration[],
  options: AnalysisOptions
): PassContext {
  const index = indexDeclarations(declarations);
  let cached: OwnershipAnalysis | undefined;

  return {
    declarations,
    index,
    options,
    analysis() {
      cached ??= analyzeOwnership(index, { maxValueChainDepth: options.maxValueChainDepth });
      return cached;
    },
  };
}
