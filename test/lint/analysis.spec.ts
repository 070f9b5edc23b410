import { describe, it, expect } from "vitest";
import { buildOwnershipGraph } from "../../src/lint/analysis/ownershipGraph";
import { analyzeOwnership, owns, related } from "../../src/lint/analysis/ownership";
import { computeReachability, weakComponents } from "../../src/lint/analysis/reachability";
import { assertPartition, componentsInInputOrder, findStronglyConnectedComponents } from "../../src/lint/analysis/scc";
import { indexDeclarations, referenceType as ref, valueType as val } from "../../src/model/declaration";
import { InternalInvariantError } from "../../src/outcome/errors";

function graphOf(edges: Record<string, string[]>) {
  return { nodes: Object.keys(edges), edges: new Map(Object.entries(edges)) };
}

describe("ownership analysis", () => {
  describe("buildOwnershipGraph", () => {
    it("keeps annotated references as nodes and flattens value types", () => {
      const index = indexDeclarations([
        ref("A", ["B", "U", "P", "X"], []),
        ref("B", [], []),
        ref("U", null, []),
        val("P", ["C", "U"], []),
        ref("C", [], []),
      ]);
      const graph = buildOwnershipGraph(index);

      expect(graph.nodes).toEqual(["A", "B", "C"]);
      expect(graph.edges.get("A")).toEqual(["B", "C"]);
      expect([...(graph.permitted.get("A") ?? [])]).toEqual(["U"]);
      expect(graph.unknownEntries).toEqual([{ owner: "A", entry: "X", index: 3 }]);
      expect(graph.carried.get("P")).toEqual({ references: ["C", "U"], open: false, openedBy: null });
    });

    it("ignores owns-lists of unannotated declarations", () => {
      const index = indexDeclarations([
        { name: "A", kind: "reference", isAnnotated: false, ownsList: ["Nope"], storedMembers: [] },
      ]);
      const graph = buildOwnershipGraph(index);

      expect(graph.nodes).toEqual([]);
      expect(graph.unknownEntries).toEqual([]);
    });

    it("marks value chains beyond the depth cap as open", () => {
      const index = indexDeclarations([
        val("V1", ["V2"], []),
        val("V2", ["V3"], []),
        val("V3", ["B"], []),
        ref("B", [], []),
      ]);

      expect(buildOwnershipGraph(index).carried.get("V1")).toEqual({
        references: ["B"],
        open: false,
        openedBy: null,
      });
      expect(buildOwnershipGraph(index, { maxValueChainDepth: 2 }).carried.get("V1")).toEqual({
        references: ["B"],
        open: true,
        openedBy: "V3",
      });
      expect(buildOwnershipGraph(index, { maxValueChainDepth: 2 }).carried.get("V2")?.open).toBe(false);
    });

    it("shares one carried set between members of a nesting cycle", () => {
      const index = indexDeclarations([
        val("P", ["Q", "B"], []),
        val("Q", ["P", "C"], []),
        ref("B", [], []),
        ref("C", [], []),
      ]);
      const graph = buildOwnershipGraph(index);

      expect(graph.carried.get("P")).toEqual({ references: ["B", "C"], open: false, openedBy: null });
      expect(graph.carried.get("Q")?.references).toBe(graph.carried.get("P")?.references);
    });

    it("prefers an unannotated value type over the depth cap", () => {
      const index = indexDeclarations([
        val("V1", ["V2", "Raw"], []),
        val("V2", ["V3"], []),
        val("V3", [], []),
        val("Raw", null, []),
      ]);
      expect(buildOwnershipGraph(index, { maxValueChainDepth: 1 }).carried.get("V1")?.openedBy).toBe("Raw");
    });

    it("flattens a wide owns-list in linear time", () => {
      const names = Array.from({ length: 40_000 }, (_, i) => `R${i}`);
      const index = indexDeclarations([
        ref("A", ["P"], []),
        val("P", names, []),
        ...names.map(n => ref(n, [], [])),
      ]);

      const started = Date.now();
      const graph = buildOwnershipGraph(index);
      expect(Date.now() - started).toBeLessThan(2_000);
      expect(graph.carried.get("P")?.references).toHaveLength(40_000);
      expect(graph.edges.get("A")).toHaveLength(40_000);
      expect(graph.edges.get("A")?.[39_999]).toBe("R39999");
    });

    it("flattens a long value-type chain once", () => {
      const chain = Array.from({ length: 20_000 }, (_, i) => `V${i}`);
      const index = indexDeclarations([
        ...chain.map((n, i) => val(n, i < chain.length - 1 ? [chain[i + 1]] : ["B"], [])),
        ref("B", [], []),
      ]);

      const started = Date.now();
      const graph = buildOwnershipGraph(index, { maxValueChainDepth: 100_000 });
      expect(Date.now() - started).toBeLessThan(2_000);
      expect(graph.carried.get("V0")).toEqual({ references: ["B"], open: false, openedBy: null });
      expect(buildOwnershipGraph(index, { maxValueChainDepth: 19_999 }).carried.get("V0")?.openedBy).toBe("V19999");
    });
  });

  describe("findStronglyConnectedComponents", () => {
    it("groups a cycle and emits sinks first", () => {
      const graph = graphOf({ A: ["B"], B: ["C"], C: ["A", "D"], D: [] });
      const sccs = findStronglyConnectedComponents(graph);

      expect(sccs.components).toEqual([["D"], ["A", "B", "C"]]);
      expect(sccs.componentOf.get("A")).toBe(1);
      expect(sccs.componentOf.get("D")).toBe(0);
      expect(componentsInInputOrder(graph, sccs)).toEqual([["A", "B", "C"], ["D"]]);
    });

    it("skips edges to non-nodes", () => {
      const graph = graphOf({ A: ["Z"] });
      expect(findStronglyConnectedComponents(graph).components).toEqual([["A"]]);
    });

    it("handles long chains without recursion", () => {
      const edges: Record<string, string[]> = {};
      for (let i = 0; i < 10_000; i++) {
        edges[`n${i}`] = i < 9_999 ? [`n${i + 1}`] : [];
      }
      const sccs = findStronglyConnectedComponents(graphOf(edges));

      expect(sccs.components).toHaveLength(10_000);
      expect(sccs.components[0]).toEqual(["n9999"]);
    });
  });

  describe("assertPartition", () => {
    it("throws when a node is missing", () => {
      const graph = graphOf({ A: [], B: [] });
      const bad = { components: [["A"]], componentOf: new Map([["A", 0]]) };

      expect(() => assertPartition(graph, bad)).toThrow(InternalInvariantError);
      expect(() => assertPartition(graph, bad)).toThrow("Node missing from component partition: B");
    });

    it("throws when a node sits in two components", () => {
      const graph = graphOf({ A: [], B: [] });
      const bad = {
        components: [["A"], ["A", "B"]],
        componentOf: new Map([["A", 0], ["B", 1]]),
      };

      expect(() => assertPartition(graph, bad)).toThrow("Node assigned to more than one component: A");
    });
  });

  describe("reachability", () => {
    it("computes the reflexive-transitive closure", () => {
      const graph = graphOf({ A: ["B"], B: ["C"], C: ["A", "D"], D: [] });
      const reach = computeReachability(graph, findStronglyConnectedComponents(graph));

      expect([...(reach.get("B") ?? [])].sort()).toEqual(["A", "B", "C", "D"]);
      expect([...(reach.get("D") ?? [])]).toEqual(["D"]);
    });

    it("finds weak components ignoring direction", () => {
      const weak = weakComponents(graphOf({ A: ["B"], B: [], C: ["B"], D: [] }));

      expect(weak.get("A")).toBe(weak.get("C"));
      expect(weak.get("A")).not.toBe(weak.get("D"));
    });
  });

  describe("owns / related", () => {
    const analysis = analyzeOwnership(
      indexDeclarations([
        ref("A", ["B"], []),
        ref("B", ["C"], []),
        ref("C", [], []),
        ref("X", ["Y"], []),
        ref("Y", ["X"], []),
      ])
    );

    it("is reflexive and transitive", () => {
      expect(owns(analysis, "A", "A")).toBe(true);
      expect(owns(analysis, "A", "C")).toBe(true);
      expect(owns(analysis, "C", "A")).toBe(false);
    });

    it("relates types linked in either direction", () => {
      expect(related(analysis, "C", "A")).toBe(true);
      expect(related(analysis, "A", "X")).toBe(false);
    });

    it("collapses mutual owners into one component", () => {
      const { componentOf } = analysis.sccs;
      expect(componentOf.get("X")).toBe(componentOf.get("Y"));
      expect(owns(analysis, "Y", "X")).toBe(true);
      expect(componentOf.get("A")).not.toBe(componentOf.get("B"));
    });
  });
});
