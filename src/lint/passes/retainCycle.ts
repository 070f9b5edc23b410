import { isOwnershipNode, type DeclarationIndex, type TypeDeclaration } from "../../model/declaration";
import { formatOwnsAnnotation, makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic, DiagnosticFix } from "../../outcome/diagnostic";
import { invariant } from "../../outcome/errors";
import type { OwnershipAnalysis } from "../analysis/ownership";
import { componentsInInputOrder } from "../analysis/scc";
import type { Pass, PassContext, PassResult } from "../types";

/**
 * A cycle of owners is only sanctioned when every member lists every member
 * of its component, itself included. `@owns(A, B) A` with `@owns(B, A) B` is
 * a valid cluster, `@owns(B) A` with `@owns(A) B` is not.
 *
 * One diagnostic per inconsistent component. When a declaration outside the
 * component stores one of its members, the first such declaration is blamed.
 */
export const retainCyclePass: Pass = {
  id: "lint/retain-cycle",
  name: "Retain Cycle Declaration Check",
  phase: "lint",
  kinds: ["RetainCycleViolation"],
  dependencies: ["graph/unknown-owned-type"],
  run(ctx: PassContext): PassResult {
    const analysis = ctx.analysis();
    const diagnostics: Diagnostic[] = [];

    for (const members of componentsInInputOrder(analysis.graph, analysis.sccs)) {
      if (members.length < 2) continue;
      const diag = checkComponent(members, analysis, ctx.index);
      if (diag) diagnostics.push(diag);
    }

    return { diagnostics };
  },
};

interface Shortfall {
  member: string;
  missing: string[];
}

function checkComponent(
  members: readonly string[],
  analysis: OwnershipAnalysis,
  index: DeclarationIndex
): Diagnostic | undefined {
  const shortfalls: Shortfall[] = [];
  for (const m of members) {
    const direct = new Set(analysis.graph.edges.get(m) ?? []);
    const missing = members.filter(x => !direct.has(x));
    if (missing.length > 0) shortfalls.push({ member: m, missing });
  }
  if (shortfalls.length === 0) return undefined;

  const { member, missing } = shortfalls[0];
  const partner = pairPartner(member, missing, members, analysis);
  const outer = findOuterOwner(members, analysis, index);

  const subject = outer ? outer.owner : member;
  const relatedType = outer ? member : partner;

  return makeDiagnostic("RetainCycleViolation", subject, relatedType, {
    params: { first: member, second: partner },
    data: {
      pair: [member, partner],
      members: [...members],
      missing: [...missing],
      ...(outer ? { storedBy: outer.owner, member: outer.member } : {}),
    },
    fixes: shortfalls.map(s => completeListFix(s, index)),
  });
}

/**
 * The other half of the inconsistent pair: the first other member the
 * insufficient member fails to list, or else the edge that closes the cycle.
 */
function pairPartner(
  member: string,
  missing: readonly string[],
  members: readonly string[],
  analysis: OwnershipAnalysis
): string {
  const unlisted = missing.find(x => x !== member);
  if (unlisted !== undefined) return unlisted;

  const direct = new Set(analysis.graph.edges.get(member) ?? []);
  const closing = members.find(x => x !== member && direct.has(x));
  invariant(closing !== undefined, `Component member ${member} has no edge into its component`, {
    member,
    members: [...members],
  });
  return closing;
}

function findOuterOwner(
  members: readonly string[],
  analysis: OwnershipAnalysis,
  index: DeclarationIndex
): { owner: string; member: string } | undefined {
  const inComponent = new Set(members);

  for (const decl of index.byName.values()) {
    if (!isOwnershipNode(decl) || inComponent.has(decl.name)) continue;
    for (const stored of decl.storedMembers) {
      const target = index.byName.get(stored.type);
      if (!target) continue;
      const carried =
        target.kind === "value" ? analysis.graph.carried.get(target.name)?.references ?? [] : [target.name];
      if (carried.some(r => inComponent.has(r))) {
        return { owner: decl.name, member: stored.name };
      }
    }
  }
  return undefined;
}

function completeListFix(shortfall: Shortfall, index: DeclarationIndex): DiagnosticFix {
  const decl: TypeDeclaration | undefined = index.byName.get(shortfall.member);
  const current = decl?.ownsList ?? [];
  const next = [...current, ...shortfall.missing.filter(m => !current.includes(m))];
  return {
    description: `List every member of the cycle in ${shortfall.member}'s owns-list`,
    target: shortfall.member,
    replacement: formatOwnsAnnotation(next),
  };
}
