export * from "./core/types";
export * from "./core/errors";
export { analyze, analyzeWithGraph } from "./core/analyze";
export type { AnalysisOutcome, AnalyzeRunOptions } from "./core/analyze";
export { FindingSet, compareFindings, mergeFindings, toFinding } from "./core/findings";
export { createLogger, silentLogger } from "./core/logger";
export type { Logger } from "./core/logger";
export { GraphBuilder } from "./graph/builder";
export type { GraphBuilderOptions } from "./graph/builder";
export { DependencyGraph, packageIdentity, parseIdentity } from "./graph/graph";
export { DEFAULT_MAX_DEPTH, serializeGraph, serializeNode } from "./graph/serialize";
export { findDependencyPaths, tracePackage } from "./graph/paths";
export { renderMermaid } from "./graph/mermaid";
export { extractPackages } from "./extract/packages";
export { StageOrchestrator } from "./pipeline/orchestrator";
export type { OrchestratorOptions, RunOptions } from "./pipeline/orchestrator";
export { DEFAULT_BUDGET_MS, defaultPipeline } from "./pipeline/defaults";
export type { PipelineExecutors } from "./pipeline/defaults";
export { fallbackSynthesis } from "./pipeline/fallback";
export type * from "./pipeline/types";
export { EdgeSourceRegistry } from "./deps/registry";
export type * from "./deps/provider";
