import type { OwnershipGraph } from "./ownershipGraph";
import type { ComponentIndex } from "./scc";

type Graph = Pick<OwnershipGraph, "nodes" | "edges">;

/**
 * Reflexive-transitive closure over the condensation DAG.
 *
 * Components arrive sinks-first, so every successor's closure is complete by
 * the time a component is processed. All members of a component share one set.
 */
export function computeReachability(graph: Graph, sccs: ComponentIndex): Map<string, ReadonlySet<string>> {
  const closure: Array<Set<string>> = [];

  sccs.components.forEach((members, i) => {
    const reach = new Set<string>(members);
    for (const m of members) {
      for (const target of graph.edges.get(m) ?? []) {
        const j = sccs.componentOf.get(target);
        if (j === undefined || j === i) continue;
        for (const r of closure[j]) reach.add(r);
      }
    }
    closure[i] = reach;
  });

  const result = new Map<string, ReadonlySet<string>>();
  for (const node of graph.nodes) {
    const i = sccs.componentOf.get(node);
    if (i !== undefined) result.set(node, closure[i]);
  }
  return result;
}

/**
 * Weakly connected components: union-find over edges with direction ignored.
 * Returns a representative per node.
 */
export function weakComponents(graph: Graph): Map<string, string> {
  const parent = new Map<string, string>(graph.nodes.map(n => [n, n]));

  const find = (n: string): string => {
    let root = n;
    for (let p = parent.get(root); p !== undefined && p !== root; p = parent.get(root)) {
      root = p;
    }
    // path compression
    let cur = n;
    while (cur !== root) {
      const next = parent.get(cur) ?? root;
      parent.set(cur, root);
      cur = next;
    }
    return root;
  };

  for (const [from, targets] of graph.edges) {
    if (!parent.has(from)) continue;
    for (const to of targets) {
      if (!parent.has(to)) continue;
      const a = find(from);
      const b = find(to);
      if (a !== b) parent.set(b, a);
    }
  }

  const result = new Map<string, string>();
  for (const n of graph.nodes) result.set(n, find(n));
  return result;
}
