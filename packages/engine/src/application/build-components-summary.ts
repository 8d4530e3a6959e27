import type { ComponentsSummary, SccGraph, VertexId } from "@scc-kit/core";
import { resolveSummaryConfig, type SummaryConfig } from "../config.js";
import { createComponentsSummary } from "../domain/graph-metrics.js";
import { stronglyConnectedComponents } from "../domain/scc.js";

export type BuildComponentsSummaryProgressEvent =
  | { stage: "components_computed"; componentCount: number; cyclicComponentCount: number }
  | { stage: "summary_built"; vertexCount: number; maxDepth: number };

export type BuildComponentsSummaryInput<V extends VertexId> = {
  graph: SccGraph<V>;
  config?: Partial<SummaryConfig>;
  onProgress?: (event: BuildComponentsSummaryProgressEvent) => void;
};

export const buildComponentsSummary = <V extends VertexId>(
  input: BuildComponentsSummaryInput<V>,
): ComponentsSummary => {
  const components = stronglyConnectedComponents(input.graph);

  let cyclicComponentCount = 0;
  for (let index = 0; index < components.size; index += 1) {
    if (components.isCyclic(index) === true) {
      cyclicComponentCount += 1;
    }
  }
  input.onProgress?.({
    stage: "components_computed",
    componentCount: components.size,
    cyclicComponentCount,
  });

  const summary = createComponentsSummary(components, resolveSummaryConfig(input.config));
  input.onProgress?.({
    stage: "summary_built",
    vertexCount: summary.metrics.vertexCount,
    maxDepth: summary.metrics.maxDepth,
  });

  return summary;
};
