import { resolve } from "node:path";
import type { ComponentsSummary, GraphAnalysisResult } from "@scc-kit/core";
import {
  buildComponentsSummary,
  type BuildComponentsSummaryProgressEvent,
  type SummaryConfig,
} from "@scc-kit/engine";
import { loadGraphFile } from "../infrastructure/fs-loader.js";
import { parseGraphFile, type ParsedGraph } from "../parsing/graph-file-parser.js";
import { createSilentLogger, type Logger } from "./logger.js";

export const resolveGraphPath = (inputPath: string, cwd: string): string => resolve(cwd, inputPath);

const createProgressReporter = (
  logger: Logger,
): ((event: BuildComponentsSummaryProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "components_computed":
        logger.info(
          `computed ${event.componentCount} components (${event.cyclicComponentCount} cyclic)`,
        );
        break;
      case "summary_built":
        logger.debug(`summary built (vertices=${event.vertexCount}, maxDepth=${event.maxDepth})`);
        break;
    }
  };
};

const parseOrReason = (
  raw: string,
): ParsedGraph | "invalid_json" | "invalid_graph_shape" => {
  try {
    return parseGraphFile(raw);
  } catch (error) {
    return error instanceof SyntaxError ? "invalid_json" : "invalid_graph_shape";
  }
};

export const runComponentsCommand = (
  inputPath: string,
  config: Partial<SummaryConfig> = {},
  logger: Logger = createSilentLogger(),
): GraphAnalysisResult => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const sourcePath = resolveGraphPath(inputPath, invocationCwd);
  logger.info(`reading graph: ${sourcePath}`);

  const graphFile = loadGraphFile(sourcePath);
  if (graphFile === null) {
    return { sourcePath, available: false, reason: "graph_file_not_found" };
  }

  const parsed = parseOrReason(graphFile.raw);
  if (typeof parsed === "string") {
    return { sourcePath, available: false, reason: parsed };
  }
  logger.debug(`graph parsed (format=${parsed.format}, vertices=${parsed.vertexCount})`);

  const onProgress = createProgressReporter(logger);
  let summary: ComponentsSummary;
  if (parsed.format === "adjacency_list") {
    summary = buildComponentsSummary<number>({ graph: parsed.graph, config, onProgress });
  } else {
    summary = buildComponentsSummary<string>({ graph: parsed.graph, config, onProgress });
  }

  return {
    source: { sourcePath, format: parsed.format },
    available: true,
    summary,
  };
};
