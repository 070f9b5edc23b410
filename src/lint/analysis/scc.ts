import { InternalInvariantError } from "../../outcome/errors";
import type { OwnershipGraph } from "./ownershipGraph";

type Graph = Pick<OwnershipGraph, "nodes" | "edges">;

export interface ComponentIndex {
  /**
   * Components in reverse topological order of the condensation: a component
   * comes after every component reachable from it.
   */
  components: readonly (readonly string[])[];
  componentOf: ReadonlyMap<string, number>;
}

/**
 * Tarjan's strongly connected components, iterative so deep ownership chains
 * cannot overflow the call stack. Members of each component are listed in
 * node (input) order.
 */
export function findStronglyConnectedComponents(graph: Graph): ComponentIndex {
  const order = new Map(graph.nodes.map((n, i) => [n, i]));
  const indexOf = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  for (const root of graph.nodes) {
    if (indexOf.has(root)) continue;

    const work: Array<{ node: string; next: number }> = [{ node: root, next: 0 }];
    indexOf.set(root, counter);
    lowlink.set(root, counter);
    counter++;
    stack.push(root);
    onStack.add(root);

    while (work.length > 0) {
      const frame = work[work.length - 1];
      const succ = graph.edges.get(frame.node) ?? [];

      if (frame.next < succ.length) {
        const target = succ[frame.next++];
        if (!order.has(target)) continue;
        const targetIndex = indexOf.get(target);
        if (targetIndex === undefined) {
          indexOf.set(target, counter);
          lowlink.set(target, counter);
          counter++;
          stack.push(target);
          onStack.add(target);
          work.push({ node: target, next: 0 });
        } else if (onStack.has(target)) {
          lowlink.set(frame.node, Math.min(low(lowlink, frame.node), targetIndex));
        }
        continue;
      }

      work.pop();
      const parent = work[work.length - 1];
      if (parent) {
        lowlink.set(parent.node, Math.min(low(lowlink, parent.node), low(lowlink, frame.node)));
      }

      if (low(lowlink, frame.node) === indexOf.get(frame.node)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) {
            throw new InternalInvariantError("Tarjan stack exhausted before component root", { root: frame.node });
          }
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.node);
        component.sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));
        components.push(component);
      }
    }
  }

  const componentOf = new Map<string, number>();
  components.forEach((members, i) => {
    for (const m of members) componentOf.set(m, i);
  });

  const result = { components, componentOf };
  assertPartition(graph, result);
  return result;
}

/**
 * Every node must belong to exactly one component, and components may only
 * contain graph nodes.
 */
export function assertPartition(graph: Graph, index: ComponentIndex): void {
  const nodes = new Set(graph.nodes);
  const seen = new Set<string>();

  index.components.forEach((members, i) => {
    if (members.length === 0) {
      throw new InternalInvariantError("Empty strongly connected component", { component: i });
    }
    for (const m of members) {
      if (!nodes.has(m)) {
        throw new InternalInvariantError(`Component contains unknown node: ${m}`, { component: i, node: m });
      }
      if (seen.has(m)) {
        throw new InternalInvariantError(`Node assigned to more than one component: ${m}`, { node: m });
      }
      if (index.componentOf.get(m) !== i) {
        throw new InternalInvariantError(`Component index out of sync for node: ${m}`, { node: m });
      }
      seen.add(m);
    }
  });

  for (const n of graph.nodes) {
    if (!seen.has(n)) {
      throw new InternalInvariantError(`Node missing from component partition: ${n}`, { node: n });
    }
  }
}

/**
 * Components in a presentation order: by the input position of their first
 * member.
 */
export function componentsInInputOrder(graph: Graph, index: ComponentIndex): string[][] {
  const order = new Map(graph.nodes.map((n, i) => [n, i]));
  return index.components
    .map(c => [...c])
    .sort((a, b) => (order.get(a[0]) ?? 0) - (order.get(b[0]) ?? 0));
}

function low(lowlink: Map<string, number>, node: string): number {
  const value = lowlink.get(node);
  if (value === undefined) {
    throw new InternalInvariantError(`Node visited without a lowlink: ${node}`, { node });
  }
  return value;
}
