import type { SccGraph } from "@scc-kit/core";

export type EdgeRecord<V> = {
  from: V;
  to: V;
};

const NO_SUCCESSORS: readonly never[] = [];

/** Graph over `0..list.length - 1` where `list[i]` holds the successors of `i`. */
export const adjacencyListGraph = (
  list: readonly Iterable<number>[],
): SccGraph<number> => ({
  vertices: () => list.keys(),
  successors: (vertex) => list[vertex] ?? NO_SUCCESSORS,
});

/** Graph whose vertices are the keys of `map`, in insertion order. */
export const adjacencyMapGraph = <V>(
  map: ReadonlyMap<V, Iterable<V>>,
): SccGraph<V> => ({
  vertices: () => map.keys(),
  successors: (vertex) => map.get(vertex) ?? NO_SUCCESSORS,
});

/**
 * Graph built from an edge list. Duplicate edges collapse; self loops are
 * kept. Edge endpoints missing from `vertices` are appended as vertices.
 */
export const edgeListGraph = <V>(
  vertices: Iterable<V>,
  edges: Iterable<EdgeRecord<V>>,
): SccGraph<V> => {
  const adjacency = new Map<V, Set<V>>();
  const ensure = (vertex: V): Set<V> => {
    const existing = adjacency.get(vertex);
    if (existing !== undefined) {
      return existing;
    }

    const created = new Set<V>();
    adjacency.set(vertex, created);
    return created;
  };

  for (const vertex of vertices) {
    ensure(vertex);
  }

  for (const edge of edges) {
    ensure(edge.from).add(edge.to);
    ensure(edge.to);
  }

  return adjacencyMapGraph(adjacency);
};
