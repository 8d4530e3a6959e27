export type SummaryConfig = {
  // Upper bound on `cycles` entries; the largest cyclic components are kept.
  maxCycles: number;
  // Singleton components cyclic only through a self loop.
  includeSelfLoopCycles: boolean;
  // Vertex order inside each reported component.
  vertexOrder: "discovery" | "sorted";
};

export const DEFAULT_SUMMARY_CONFIG: SummaryConfig = {
  maxCycles: 100,
  includeSelfLoopCycles: true,
  vertexOrder: "sorted",
};

export const resolveSummaryConfig = (overrides: Partial<SummaryConfig> = {}): SummaryConfig => ({
  ...DEFAULT_SUMMARY_CONFIG,
  ...overrides,
});
