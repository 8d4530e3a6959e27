import {
  createEmptySummary,
  type ComponentCycle,
  type ComponentRecord,
  type ComponentsMetrics,
  type ComponentsSummary,
  type VertexId,
} from "@scc-kit/core";
import type { SummaryConfig } from "../config.js";
import type { Components } from "./components.js";

export const compareVertexIds = (a: VertexId, b: VertexId): number => {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }

  if (typeof a === "number") {
    return -1;
  }

  if (typeof b === "number") {
    return 1;
  }

  return a.localeCompare(b);
};

const orderVertices = <V extends VertexId>(
  vertices: readonly V[],
  config: SummaryConfig,
): readonly V[] =>
  config.vertexOrder === "sorted" ? [...vertices].sort(compareVertexIds) : [...vertices];

export const createComponentsSummary = <V extends VertexId>(
  components: Components<V>,
  config: SummaryConfig,
): ComponentsSummary => {
  if (components.isEmpty()) {
    return createEmptySummary();
  }

  const depths = components.depths();
  const records: ComponentRecord[] = [];
  const cycles: ComponentCycle[] = [];
  let vertexCount = 0;
  let largestComponentSize = 0;
  let condensationEdgeCount = 0;

  let index = 0;
  for (const component of components) {
    const vertices = orderVertices(component, config);
    const successors = (components.successors(index) ?? []).filter((target) => target !== index);
    const directSuccessors = [...(components.directSuccessors(index) ?? [])].sort((a, b) => a - b);
    const cyclic = components.isCyclic(index) === true;

    vertexCount += vertices.length;
    condensationEdgeCount += successors.length;
    if (vertices.length > largestComponentSize) {
      largestComponentSize = vertices.length;
    }

    if (cyclic && (vertices.length > 1 || config.includeSelfLoopCycles)) {
      cycles.push({ component: index, vertices });
    }

    records.push({
      index,
      vertices,
      cyclic,
      depth: depths[index] ?? 0,
      successors,
      directSuccessors,
    });
    index += 1;
  }

  cycles.sort((a, b) => b.vertices.length - a.vertices.length || a.component - b.component);

  const metrics: ComponentsMetrics = {
    vertexCount,
    componentCount: components.size,
    cyclicComponentCount: records.filter((record) => record.cyclic).length,
    largestComponentSize,
    maxDepth: depths.reduce((max, depth) => Math.max(max, depth), 0),
    condensationEdgeCount,
  };

  return {
    components: records,
    order: components.orderByDepth(),
    cycles: cycles.slice(0, Math.max(0, config.maxCycles)),
    metrics,
  };
};
