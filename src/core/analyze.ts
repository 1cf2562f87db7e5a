import { extractPackages } from "../extract/packages";
import { GraphBuilder } from "../graph/builder";
import { DependencyGraph } from "../graph/graph";
import { StageOrchestrator } from "../pipeline/orchestrator";
import { StageDescriptor } from "../pipeline/types";
import type { Logger } from "./logger";
import { AnalysisReport, DependencyEdgeRecord, Finding } from "./types";

export type AnalyzeRunOptions = {
  budgetMs: number;
  initialFindings?: readonly Finding[];
  logger?: Logger;
  toolVersion?: string;
  signal?: AbortSignal;
};

export type AnalysisOutcome = {
  graph: DependencyGraph;
  report: AnalysisReport;
};

/** Builds the graph, extracts the package set and runs the pipeline over it. */
export async function analyzeWithGraph(
  edges: Iterable<DependencyEdgeRecord>,
  pipeline: readonly StageDescriptor[],
  options: AnalyzeRunOptions
): Promise<AnalysisOutcome> {
  const graph = new GraphBuilder({ logger: options.logger }).build(edges);
  const initialFindings = options.initialFindings ?? [];
  const packages = extractPackages(initialFindings, graph);
  options.logger?.info({ ...graph.summary(), packages: packages.length }, "dependency graph built");

  const orchestrator = new StageOrchestrator({ logger: options.logger, toolVersion: options.toolVersion });
  const report = await orchestrator.run(packages, pipeline, {
    budgetMs: options.budgetMs,
    initialFindings,
    graph,
    signal: options.signal
  });
  return { graph, report };
}

export async function analyze(
  edges: Iterable<DependencyEdgeRecord>,
  pipeline: readonly StageDescriptor[],
  options: AnalyzeRunOptions
): Promise<AnalysisReport> {
  return (await analyzeWithGraph(edges, pipeline, options)).report;
}
export { serializeGraph } from "../graph/serialize";
