import type { TypeDeclaration } from "../../model/declaration";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { Pass, PassContext, PassResult } from "../types";

/**
 * First occurrence of a name wins. Later occurrences are reported and dropped
 * from the set every later pass sees.
 */
export const duplicateDeclarationPass: Pass = {
  id: "index/duplicate-declaration",
  name: "Duplicate Declaration Check",
  phase: "index",
  kinds: ["DuplicateDeclaration"],
  run(ctx: PassContext): PassResult {
    const diagnostics: Diagnostic[] = [];
    const firstIndex = new Map<string, number>();
    const kept: TypeDeclaration[] = [];

    ctx.declarations.forEach((decl, i) => {
      const first = firstIndex.get(decl.name);
      if (first === undefined) {
        firstIndex.set(decl.name, i);
        kept.push(decl);
        return;
      }
      diagnostics.push(
        makeDiagnostic("DuplicateDeclaration", decl.name, null, {
          data: { index: i, firstIndex: first },
        })
      );
    });

    if (diagnostics.length === 0) {
      return { diagnostics };
    }
    return { diagnostics, transformed: kept, metadata: { dropped: diagnostics.length } };
  },
};
