export { stronglyConnectedComponents } from "./domain/scc.js";
export type { Components } from "./domain/components.js";
export { computeDepths } from "./domain/depths.js";
export {
  adjacencyListGraph,
  adjacencyMapGraph,
  edgeListGraph,
  type EdgeRecord,
} from "./domain/graph-model.js";
export { compareVertexIds, createComponentsSummary } from "./domain/graph-metrics.js";
export {
  buildComponentsSummary,
  type BuildComponentsSummaryInput,
  type BuildComponentsSummaryProgressEvent,
} from "./application/build-components-summary.js";
export { DEFAULT_SUMMARY_CONFIG, resolveSummaryConfig, type SummaryConfig } from "./config.js";
