import { isOwnershipNode, type StoredMember, type TypeDeclaration } from "../../model/declaration";
import { formatOwnsAnnotation, makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic, DiagnosticKind } from "../../outcome/diagnostic";
import { owns, related, type OwnershipAnalysis } from "../analysis/ownership";
import type { Pass, PassContext, PassResult } from "../types";

/**
 * Every stored member of an annotated reference type must be owned by it.
 *
 * - unannotated reference: allowed, but warned about as unchecked
 * - annotated reference: must be reachable in the ownership graph
 * - value type: each reference it carries is checked as if stored directly
 *
 * Members of undeclared types are opaque (built-ins) and skipped. Unannotated
 * owners are unchecked.
 */
export const storedMembersPass: Pass = {
  id: "lint/stored-members",
  name: "Stored Member Ownership Check",
  phase: "lint",
  kinds: ["UnannotatedOwnedType", "UnexpectedReference", "DisjointOwnership"],
  dependencies: ["graph/unknown-owned-type"],
  run(ctx: PassContext): PassResult {
    const analysis = ctx.analysis();
    const collector = new DiagnosticCollector();

    for (const owner of ctx.index.byName.values()) {
      if (!isOwnershipNode(owner)) continue;

      for (const member of owner.storedMembers) {
        const target = ctx.index.byName.get(member.type);
        if (!target) continue;

        if (target.kind === "reference") {
          checkReference(owner, target.name, member, null, analysis, collector);
          continue;
        }

        const carried = analysis.graph.carried.get(target.name);
        for (const ref of carried?.references ?? []) {
          checkReference(owner, ref, member, target.name, analysis, collector);
        }
        const openedBy = carried?.open ? carried.openedBy : null;
        if (openedBy) {
          collector.add("UnannotatedOwnedType", owner.name, openedBy, () =>
            makeDiagnostic("UnannotatedOwnedType", owner.name, openedBy, {
              data: memberData(member, target.name),
            })
          );
        }
      }
    }

    return { diagnostics: collector.diagnostics };
  },
};

function checkReference(
  owner: TypeDeclaration,
  refName: string,
  member: StoredMember,
  via: string | null,
  analysis: OwnershipAnalysis,
  collector: DiagnosticCollector
): void {
  const ref = analysis.index.byName.get(refName);
  if (!ref) return;

  if (!ref.isAnnotated) {
    collector.add("UnannotatedOwnedType", owner.name, refName, () =>
      makeDiagnostic("UnannotatedOwnedType", owner.name, refName, { data: memberData(member, via) })
    );
    return;
  }

  if (owns(analysis, owner.name, refName)) return;

  const kind: DiagnosticKind = related(analysis, owner.name, refName) ? "UnexpectedReference" : "DisjointOwnership";
  collector.add(kind, owner.name, refName, () =>
    makeDiagnostic(kind, owner.name, refName, {
      data: memberData(member, via),
      fixes: [
        {
          description: `Add ${refName} to ${owner.name}'s owns-list`,
          target: owner.name,
          replacement: formatOwnsAnnotation([...owner.ownsList, refName]),
        },
      ],
    })
  );
}

function memberData(member: StoredMember, via: string | null): Record<string, unknown> {
  return {
    member: member.name,
    ...(via ? { via } : {}),
    ...(member.viaValueTypeChain ? { viaValueTypeChain: true } : {}),
  };
}

/** Keeps the first diagnostic per (kind, subject, related). */
class DiagnosticCollector {
  readonly diagnostics: Diagnostic[] = [];
  private keys = new Set<string>();

  add(kind: DiagnosticKind, subject: string, relatedType: string, build: () => Diagnostic): void {
    const key = `${kind}\u0000${subject}\u0000${relatedType}`;
    if (this.keys.has(key)) return;
    this.keys.add(key);
    this.diagnostics.push(build());
  }
}
