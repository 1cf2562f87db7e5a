import { Finding, PackageIdentity } from "../core/types";
import { DependencyGraph } from "../graph/graph";

export type StageInput = {
  packages: readonly PackageIdentity[];
  /** Snapshot of the findings accumulated by earlier stages. */
  findings: readonly Finding[];
  graph?: DependencyGraph;
  /** Time left on the stage clock when the attempt starts. */
  timeoutMs: number;
  /** Aborted when the stage clock runs out; later results are discarded. */
  signal: AbortSignal;
};

export interface StageExecutor {
  execute(input: StageInput): Promise<Finding[]>;
}

export interface SynthesisExecutor {
  /** Raw output, checked by the orchestrator before use. */
  synthesize(input: StageInput): Promise<unknown>;
}

export type SkipContext = {
  packages: readonly PackageIdentity[];
  findings: readonly Finding[];
};

type StagePolicy = {
  name: string;
  timeoutMs: number;
  /** Clamped to 0 or 1. */
  retries: number;
  retryDelayMs: number;
  /** A stage is skipped when less budget than this is left. */
  minimumMs: number;
};

export type AnalysisStageDescriptor = StagePolicy & {
  kind: "analysis";
  skip?: (context: SkipContext) => boolean;
  executor: StageExecutor;
};

export type SynthesisStageDescriptor = StagePolicy & {
  kind: "synthesis";
  executor: SynthesisExecutor;
};

export type StageDescriptor = AnalysisStageDescriptor | SynthesisStageDescriptor;

export type OrchestratorState = "idle" | "running" | "completed";
