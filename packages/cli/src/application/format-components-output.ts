import type { ComponentCycle, GraphAnalysisAvailable } from "@scc-kit/core";

export type ComponentsOutputMode = "summary" | "json";

type SummaryShape = {
  sourcePath: string;
  format: GraphAnalysisAvailable["source"]["format"];
  metrics: GraphAnalysisAvailable["summary"]["metrics"];
  order: readonly number[];
  cyclesTop: readonly ComponentCycle[];
};

const createSummaryShape = (result: GraphAnalysisAvailable, top: number): SummaryShape => ({
  sourcePath: result.source.sourcePath,
  format: result.source.format,
  metrics: result.summary.metrics,
  order: result.summary.order,
  cyclesTop: result.summary.cycles.slice(0, Math.max(0, top)),
});

export const formatComponentsOutput = (
  result: GraphAnalysisAvailable,
  mode: ComponentsOutputMode,
  top = 5,
): string =>
  mode === "json"
    ? JSON.stringify(result, null, 2)
    : JSON.stringify(createSummaryShape(result, top), null, 2);
