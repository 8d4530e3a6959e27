import type { GraphSource, SccGraph } from "@scc-kit/core";
import { adjacencyListGraph, adjacencyMapGraph, edgeListGraph, type EdgeRecord } from "@scc-kit/engine";

export type ParsedGraph =
  | { format: "adjacency_list"; graph: SccGraph<number>; vertexCount: number }
  | { format: Exclude<GraphSource["format"], "adjacency_list">; graph: SccGraph<string>; vertexCount: number };

const invalidShape = (): Error => new Error("invalid_graph_shape");

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isVertexIndex = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "string");

const parseAdjacencyList = (value: unknown[]): ParsedGraph => {
  const list: number[][] = value.map((successors) => {
    if (!Array.isArray(successors) || !successors.every(isVertexIndex)) {
      throw invalidShape();
    }
    return successors;
  });

  return { format: "adjacency_list", graph: adjacencyListGraph(list), vertexCount: list.length };
};

const parseEdge = (value: unknown): EdgeRecord<string> => {
  if (!isRecord(value)) {
    throw invalidShape();
  }

  const from = value["from"];
  const to = value["to"];
  if (typeof from !== "string" || typeof to !== "string") {
    throw invalidShape();
  }

  return { from, to };
};

const parseEdgeList = (value: Record<string, unknown>): ParsedGraph => {
  const vertices = value["vertices"] ?? [];
  const edges = value["edges"];
  if (!isStringArray(vertices) || !Array.isArray(edges)) {
    throw invalidShape();
  }

  const graph = edgeListGraph(vertices, edges.map(parseEdge));
  return { format: "edge_list", graph, vertexCount: [...graph.vertices()].length };
};

const parseAdjacencyMap = (value: Record<string, unknown>): ParsedGraph => {
  const adjacency = new Map<string, readonly string[]>();
  for (const [vertex, successors] of Object.entries(value)) {
    if (!isStringArray(successors)) {
      throw invalidShape();
    }
    adjacency.set(vertex, successors);
  }

  return { format: "adjacency_map", graph: adjacencyMapGraph(adjacency), vertexCount: adjacency.size };
};

/**
 * Parses a graph file. Accepted shapes:
 *
 * - `[[1], [0, 2], []]`: successors by vertex index
 * - `{ "a": ["b"], "b": [] }`: successors by vertex name
 * - `{ "vertices": ["a"], "edges": [{ "from": "a", "to": "b" }] }`, when
 *   `edges` holds at least one non-string entry
 *
 * Throws `SyntaxError` for malformed JSON and `Error("invalid_graph_shape")`
 * for anything else it cannot read as a graph.
 */
export const parseGraphFile = (raw: string): ParsedGraph => {
  const parsed: unknown = JSON.parse(raw);

  if (Array.isArray(parsed)) {
    return parseAdjacencyList(parsed);
  }

  if (!isRecord(parsed)) {
    throw invalidShape();
  }

  // A string array under "edges" is the successor list of a vertex named "edges".
  const edges = parsed["edges"];
  if (Array.isArray(edges) && !isStringArray(edges)) {
    return parseEdgeList(parsed);
  }

  return parseAdjacencyMap(parsed);
};
