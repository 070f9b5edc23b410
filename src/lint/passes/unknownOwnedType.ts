import { makeDiagnostic } from "../../outcome/codes";
import type { Pass, PassContext, PassResult } from "../types";

export const unknownOwnedTypePass: Pass = {
  id: "graph/unknown-owned-type",
  name: "Unknown Owned Type Check",
  phase: "graph",
  kinds: ["UnknownOwnedType"],
  run(ctx: PassContext): PassResult {
    const { graph } = ctx.analysis();
    const diagnostics = graph.unknownEntries.map(entry =>
      makeDiagnostic("UnknownOwnedType", entry.owner, entry.entry, {
        data: { position: entry.index },
      })
    );
    return { diagnostics };
  },
};
