import { describe, expect, it } from "vitest";
import { adjacencyListGraph, adjacencyMapGraph } from "./graph-model.js";
import { computeDepths } from "./depths.js";
import { stronglyConnectedComponents } from "./scc.js";

const diamond = (): Map<string, string[]> =>
  new Map([
    ["A", ["B", "C"]],
    ["B", ["D"]],
    ["C", ["D"]],
    ["D", []],
  ]);

// Deterministic pseudo-random graphs (Park-Miller generator).
const createRandomGraph = (seed: number, vertexCount: number, edgeCount: number): number[][] => {
  let state = seed;
  const next = (bound: number): number => {
    state = (state * 48271) % 2147483647;
    return state % bound;
  };

  const list: number[][] = Array.from({ length: vertexCount }, () => []);
  for (let edge = 0; edge < edgeCount; edge += 1) {
    list[next(vertexCount)]?.push(next(vertexCount));
  }
  return list;
};

const reachableFrom = (list: readonly number[][], start: number): Set<number> => {
  const seen = new Set<number>([start]);
  const queue = [start];
  while (queue.length > 0) {
    const current = queue.pop();
    if (current === undefined) {
      break;
    }
    for (const next of list[current] ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return seen;
};

describe("stronglyConnectedComponents", () => {
  it("splits a two-vertex cycle from its sink", () => {
    const components = stronglyConnectedComponents(adjacencyListGraph([[1], [0, 2], []]));

    expect(components.size).toBe(2);
    expect(components.getByIndex(0)).toEqual([2]);
    expect(components.getByIndex(1)).toEqual([1, 0]);
    expect(components.isCyclic(1)).toBe(true);
    expect(components.isCyclic(0)).toBe(false);
    expect(components.successors(1)).toEqual([0, 1]);
    expect(components.successors(0)).toEqual([]);
    expect(components.depths()).toEqual([1, 0]);
    expect(components.orderByDepth()).toEqual([1, 0]);
  });

  it("treats a self loop as a cyclic singleton", () => {
    const components = stronglyConnectedComponents(adjacencyListGraph([[0]]));

    expect(components.size).toBe(1);
    expect(components.getByIndex(0)).toEqual([0]);
    expect(components.isCyclic(0)).toBe(true);
    expect(components.depths()).toEqual([0]);
  });

  it("returns absent results for an empty graph", () => {
    const components = stronglyConnectedComponents(adjacencyListGraph([]));

    expect(components.size).toBe(0);
    expect(components.isEmpty()).toBe(true);
    expect([...components]).toEqual([]);
    expect(components.vertexComponentIndex(0)).toBeUndefined();
    expect(components.getByIndex(0)).toBeUndefined();
    expect(components.get(0)).toBeUndefined();
    expect(components.successors(0)).toBeUndefined();
    expect(components.isCyclic(0)).toBeUndefined();
    expect(components.directSuccessors(0)).toBeUndefined();
    expect(components.predecessors()).toEqual([]);
    expect(components.depths()).toEqual([]);
    expect(components.orderByDepth()).toEqual([]);
  });

  it("reduces a diamond to its direct successors", () => {
    const components = stronglyConnectedComponents(adjacencyMapGraph(diamond()));
    const indexOf = (vertex: string): number => components.vertexComponentIndex(vertex) ?? -1;

    expect(components.directSuccessors(indexOf("A"))).toEqual(new Set([indexOf("B"), indexOf("C")]));
    expect(components.directSuccessors(indexOf("B"))).toEqual(new Set([indexOf("D")]));
    expect(components.directSuccessors(indexOf("D"))).toEqual(new Set());
  });

  it("drops a shortcut edge from the direct successors", () => {
    const graph = diamond();
    graph.set("A", ["B", "C", "D"]);
    const components = stronglyConnectedComponents(adjacencyMapGraph(graph));
    const indexOf = (vertex: string): number => components.vertexComponentIndex(vertex) ?? -1;

    expect(components.successors(indexOf("A"))).toEqual([
      indexOf("D"),
      indexOf("B"),
      indexOf("C"),
    ]);
    expect(components.directSuccessors(indexOf("A"))).toEqual(new Set([indexOf("B"), indexOf("C")]));
  });

  it("terminates on direct successors of a cyclic component and leaves itself out", () => {
    // {0, 1} is cyclic and points at 2 and 3; 3 -> 2.
    const components = stronglyConnectedComponents(adjacencyListGraph([[1, 3], [0, 2], [], [2]]));
    const cyclic = components.vertexComponentIndex(0) ?? -1;

    expect(components.isCyclic(cyclic)).toBe(true);
    expect(components.directSuccessors(cyclic)).toEqual(
      new Set([components.vertexComponentIndex(3)]),
    );
  });

  it("orders diamond components by depth", () => {
    const components = stronglyConnectedComponents(adjacencyMapGraph(diamond()));

    // Completion order is D, B, C, A.
    expect([...components]).toEqual([["D"], ["B"], ["C"], ["A"]]);
    expect(components.depths()).toEqual([2, 1, 1, 0]);
    expect(components.orderByDepth()).toEqual([3, 1, 2, 0]);
  });

  it("inverts successors into predecessors", () => {
    const components = stronglyConnectedComponents(adjacencyListGraph([[1], [0, 2], []]));

    expect(components.predecessors()).toEqual([new Set([1]), new Set([1])]);
  });

  it("returns undefined for unknown vertices and invalid indices", () => {
    const components = stronglyConnectedComponents(adjacencyListGraph([[1], []]));

    expect(components.get(7)).toBeUndefined();
    expect(components.vertexComponentIndex(7)).toBeUndefined();
    expect(components.getByIndex(-1)).toBeUndefined();
    expect(components.getByIndex(0.5)).toBeUndefined();
    expect(components.getByIndex(2)).toBeUndefined();
    expect(components.successors(2)).toBeUndefined();
    expect(components.isCyclic(2)).toBeUndefined();
    expect(components.directSuccessors(-3)).toBeUndefined();
  });

  it("looks up a vertex's component", () => {
    const components = stronglyConnectedComponents(adjacencyListGraph([[1], [0, 2], []]));

    expect(components.get(0)).toEqual([1, 0]);
    expect(components.get(2)).toEqual([2]);
  });

  it("yields the same results on repeated queries", () => {
    const components = stronglyConnectedComponents(adjacencyListGraph(createRandomGraph(7, 30, 45)));

    expect([...components]).toEqual([...components.iter()]);
    expect(components.depths()).toEqual(components.depths());
    expect(components.predecessors()).toEqual(components.predecessors());
    expect(components.orderByDepth()).toEqual(components.orderByDepth());
    for (let index = 0; index < components.size; index += 1) {
      expect(components.directSuccessors(index)).toEqual(components.directSuccessors(index));
    }
  });

  describe.each([
    { seed: 1, vertexCount: 12, edgeCount: 14 },
    { seed: 42, vertexCount: 25, edgeCount: 40 },
    { seed: 2024, vertexCount: 40, edgeCount: 55 },
    { seed: 99, vertexCount: 60, edgeCount: 150 },
  ])("on generated graph seed=$seed", ({ seed, vertexCount, edgeCount }) => {
    const list = createRandomGraph(seed, vertexCount, edgeCount);
    const components = stronglyConnectedComponents(adjacencyListGraph(list));
    const reach = list.map((_, vertex) => reachableFrom(list, vertex));

    it("partitions every vertex exactly once", () => {
      const seen = [...components].flat();
      expect(seen).toHaveLength(vertexCount);
      expect(new Set(seen).size).toBe(vertexCount);
    });

    it("groups exactly the mutually reachable vertices", () => {
      for (let u = 0; u < vertexCount; u += 1) {
        for (let v = 0; v < vertexCount; v += 1) {
          const mutual = (reach[u]?.has(v) ?? false) && (reach[v]?.has(u) ?? false);
          const together = components.vertexComponentIndex(u) === components.vertexComponentIndex(v);
          expect(together).toBe(mutual);
        }
      }
    });

    it("only points at components completed earlier", () => {
      for (let index = 0; index < components.size; index += 1) {
        for (const target of components.successors(index) ?? []) {
          expect(target).toBeLessThanOrEqual(index);
        }
      }
    });

    it("marks a component cyclic iff it has several vertices or a self loop", () => {
      for (let index = 0; index < components.size; index += 1) {
        const vertices = components.getByIndex(index) ?? [];
        const only = vertices[0];
        const selfLoop =
          vertices.length === 1 && only !== undefined && (list[only] ?? []).includes(only);
        expect(components.isCyclic(index)).toBe(vertices.length > 1 || selfLoop);
      }
    });

    it("satisfies the depth law", () => {
      const depths = components.depths();
      const predecessors = components.predecessors();

      predecessors.forEach((sources, index) => {
        const others = [...sources].filter((source) => source !== index);
        const expected =
          others.length === 0 ? 0 : 1 + Math.max(...others.map((source) => depths[source] ?? 0));
        expect(depths[index]).toBe(expected);
      });
    });

    it("orders every component once by ascending depth", () => {
      const depths = components.depths();
      const order = components.orderByDepth();

      expect([...order].sort((a, b) => a - b)).toEqual(
        Array.from({ length: components.size }, (_, index) => index),
      );
      for (let position = 1; position < order.length; position += 1) {
        expect(depths[order[position] ?? 0]).toBeGreaterThanOrEqual(depths[order[position - 1] ?? 0] ?? 0);
      }
    });

    it("agrees with the standalone depth computation over predecessors", () => {
      expect(computeDepths(components.predecessors())).toEqual(components.depths());
    });

    it("reduces successors to those not reachable through another successor", () => {
      const others = (index: number): number[] =>
        (components.successors(index) ?? []).filter((target) => target !== index);
      const reachable = (start: number): Set<number> => {
        const seen = new Set<number>();
        const pending = [...others(start)];
        while (pending.length > 0) {
          const current = pending.pop();
          if (current === undefined || seen.has(current)) {
            continue;
          }
          seen.add(current);
          pending.push(...others(current));
        }
        return seen;
      };

      for (let index = 0; index < components.size; index += 1) {
        const successors = others(index);
        const expected = successors.filter(
          (target) => !successors.some((other) => other !== target && reachable(other).has(target)),
        );
        expect([...(components.directSuccessors(index) ?? [])].sort((a, b) => a - b)).toEqual(expected);
      }
    });
  });
});
