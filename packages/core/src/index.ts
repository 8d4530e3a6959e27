/**
 * A directed graph as seen by the component engine.
 *
 * `vertices` enumerates the roots of the traversal; vertices reachable only
 * through edges are still discovered. Vertices are used as `Map` keys, so two
 * vertices are the same when they compare equal under SameValueZero.
 */
export type SccGraph<V> = {
  vertices: () => Iterable<V>;
  successors: (vertex: V) => Iterable<V>;
};

export type VertexId = string | number;

export type ComponentRecord = {
  index: number;
  vertices: readonly VertexId[];
  cyclic: boolean;
  depth: number;
  successors: readonly number[];
  directSuccessors: readonly number[];
};

export type ComponentCycle = {
  component: number;
  vertices: readonly VertexId[];
};

export type ComponentsMetrics = {
  vertexCount: number;
  componentCount: number;
  cyclicComponentCount: number;
  largestComponentSize: number;
  maxDepth: number;
  condensationEdgeCount: number;
};

export type ComponentsSummary = {
  components: readonly ComponentRecord[];
  order: readonly number[];
  cycles: readonly ComponentCycle[];
  metrics: ComponentsMetrics;
};

export type GraphSource = {
  sourcePath: string;
  format: "adjacency_list" | "adjacency_map" | "edge_list";
};

export type GraphAnalysisAvailable = {
  source: GraphSource;
  available: true;
  summary: ComponentsSummary;
};

export type GraphAnalysisUnavailable = {
  sourcePath: string;
  available: false;
  reason: "graph_file_not_found" | "invalid_json" | "invalid_graph_shape";
};

export type GraphAnalysisResult = GraphAnalysisAvailable | GraphAnalysisUnavailable;

export const createEmptySummary = (): ComponentsSummary => ({
  components: [],
  order: [],
  cycles: [],
  metrics: {
    vertexCount: 0,
    componentCount: 0,
    cyclicComponentCount: 0,
    largestComponentSize: 0,
    maxDepth: 0,
    condensationEdgeCount: 0,
  },
});
