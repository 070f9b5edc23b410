import type { DeclarationIndex } from "../../model/declaration";
import { buildOwnershipGraph, type GraphOptions, type OwnershipGraph } from "./ownershipGraph";
import { computeReachability, weakComponents } from "./reachability";
import { findStronglyConnectedComponents, type ComponentIndex } from "./scc";

export interface OwnershipAnalysis {
  index: DeclarationIndex;
  graph: OwnershipGraph;
  sccs: ComponentIndex;
  /** Node -> every node it owns, itself included. */
  reach: ReadonlyMap<string, ReadonlySet<string>>;
  /** Node -> weak-component representative. */
  weak: ReadonlyMap<string, string>;
}

/**
 * Build the ownership graph, collapse its SCCs and compute the closures the
 * lint passes query. Rebuilt from scratch for each declaration set.
 */
export function analyzeOwnership(index: DeclarationIndex, options: GraphOptions = {}): OwnershipAnalysis {
  const graph = buildOwnershipGraph(index, options);
  const sccs = findStronglyConnectedComponents(graph);
  const reach = computeReachability(graph, sccs);
  const weak = weakComponents(graph);
  return { index, graph, sccs, reach, weak };
}

/** Ownership is reflexive and transitive; SCC members own each other. */
export function owns(analysis: OwnershipAnalysis, owner: string, target: string): boolean {
  if (owner === target) return true;
  return analysis.reach.get(owner)?.has(target) ?? false;
}

/** True when some chain of ownership edges, in either direction, links the two. */
export function related(analysis: OwnershipAnalysis, a: string, b: string): boolean {
  const ra = analysis.weak.get(a);
  return ra !== undefined && ra === analysis.weak.get(b);
}
