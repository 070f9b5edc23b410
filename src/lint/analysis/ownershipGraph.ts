import { effectiveOwnsList, isOwnershipNode, type DeclarationIndex } from "../../model/declaration";
import { findStronglyConnectedComponents } from "./scc";

export const DEFAULT_MAX_VALUE_CHAIN_DEPTH = 32;

/**
 * References a value type may carry, flattened through nested value types.
 * `open` means the value type may carry anything: some value type on the
 * chain is unannotated, or the chain is deeper than the configured cap.
 */
export interface CarriedSet {
  references: readonly string[];
  open: boolean;
  /**
   * Value type responsible for `open`: the first unannotated value type
   * reached, else the innermost value type of the deepest chain.
   */
  openedBy: string | null;
}

export interface UnknownEntry {
  owner: string;
  entry: string;
  index: number;
}

export interface OwnershipGraph {
  /** Annotated reference types, in input order. */
  nodes: readonly string[];
  /** `A -> B`: A's owns-list permits A to hold B. No duplicates, list order. */
  edges: ReadonlyMap<string, readonly string[]>;
  /** Unannotated references an owner permits. Not graph nodes, so unchecked. */
  permitted: ReadonlyMap<string, ReadonlySet<string>>;
  /** Flattened carried set of every value type. */
  carried: ReadonlyMap<string, CarriedSet>;
  /** Owns-list entries naming types outside the declaration set. */
  unknownEntries: readonly UnknownEntry[];
}

export interface GraphOptions {
  maxValueChainDepth?: number;
}

export function buildOwnershipGraph(index: DeclarationIndex, options: GraphOptions = {}): OwnershipGraph {
  const maxDepth = options.maxValueChainDepth ?? DEFAULT_MAX_VALUE_CHAIN_DEPTH;
  const unknownEntries: UnknownEntry[] = [];

  for (const decl of index.byName.values()) {
    effectiveOwnsList(decl).forEach((entry, i) => {
      if (!index.byName.has(entry)) {
        unknownEntries.push({ owner: decl.name, entry, index: i });
      }
    });
  }

  const carried = flattenValueTypes(index, maxDepth);
  const nodes: string[] = [];
  const edges = new Map<string, string[]>();
  const permitted = new Map<string, Set<string>>();

  for (const decl of index.byName.values()) {
    if (!isOwnershipNode(decl)) continue;
    nodes.push(decl.name);

    const out = new Set<string>();
    const allowed = new Set<string>();
    const addTarget = (name: string) => {
      const target = index.byName.get(name);
      if (isOwnershipNode(target)) {
        out.add(name);
      } else if (target?.kind === "reference") {
        allowed.add(name);
      }
    };

    for (const entry of decl.ownsList) {
      const target = index.byName.get(entry);
      if (!target) continue;
      if (target.kind === "value") {
        for (const ref of carried.get(entry)?.references ?? []) addTarget(ref);
      } else {
        addTarget(entry);
      }
    }

    edges.set(decl.name, [...out]);
    permitted.set(decl.name, allowed);
  }

  return { nodes, edges, permitted, carried, unknownEntries };
}

interface ChainSummary {
  references: readonly string[];
  /** First unannotated value type reachable from the component. */
  unannotated: string | null;
  /** Value types on the longest nesting chain, a cycle counting each member. */
  level: number;
  innermost: string;
}

/**
 * Flatten every value type at once over the condensation of the value-type
 * nesting graph. Components arrive sinks-first, so each nested summary is
 * complete before the components that contain it are summarised; members of
 * one component share a summary. An unannotated value type has no outgoing
 * nesting edges.
 */
function flattenValueTypes(index: DeclarationIndex, maxDepth: number): Map<string, CarriedSet> {
  const nodes: string[] = [];
  const edges = new Map<string, string[]>();
  for (const decl of index.byName.values()) {
    if (decl.kind !== "value") continue;
    nodes.push(decl.name);
    edges.set(
      decl.name,
      effectiveOwnsList(decl).filter(entry => index.byName.get(entry)?.kind === "value")
    );
  }

  const sccs = findStronglyConnectedComponents({ nodes, edges });
  const summaries: ChainSummary[] = [];

  sccs.components.forEach((members, i) => {
    const own: string[] = [];
    const nested: ChainSummary[] = [];
    let unannotated: string | null = null;

    for (const name of members) {
      const decl = index.byName.get(name);
      if (!decl) continue;
      if (!decl.isAnnotated) {
        unannotated ??= name;
        continue;
      }
      for (const entry of decl.ownsList) {
        const target = index.byName.get(entry);
        if (!target) continue;
        if (target.kind === "reference") {
          own.push(entry);
          continue;
        }
        const j = sccs.componentOf.get(entry);
        if (j === undefined || j === i) continue;
        const summary = summaries[j];
        nested.push(summary);
        unannotated ??= summary.unannotated;
      }
    }

    let deepest: ChainSummary | undefined;
    for (const s of nested) {
      if (!deepest || s.level > deepest.level) deepest = s;
    }

    summaries[i] = {
      references: mergeReferences(own, nested),
      unannotated,
      level: members.length + (deepest?.level ?? 0),
      innermost: deepest?.innermost ?? members[0],
    };
  });

  const carried = new Map<string, CarriedSet>();
  for (const name of nodes) {
    const i = sccs.componentOf.get(name);
    if (i === undefined) continue;
    const { references, unannotated, level, innermost } = summaries[i];
    const openedBy = unannotated ?? (level > maxDepth ? innermost : null);
    carried.set(name, { references, open: openedBy !== null, openedBy });
  }
  return carried;
}

/** Reuses a nested list as-is when the component adds nothing of its own. */
function mergeReferences(own: readonly string[], nested: readonly ChainSummary[]): readonly string[] {
  const sources = nested.filter(s => s.references.length > 0);
  if (own.length === 0 && sources.length <= 1) {
    return sources[0]?.references ?? [];
  }
  const merged = new Set(own);
  for (const s of sources) {
    for (const r of s.references) merged.add(r);
  }
  return [...merged];
}
