import { hasSuspiciousScriptEvidence } from "../stages/code";
import { supplyChainSkip } from "../stages/supplyChain";
import { SkipContext, StageDescriptor, StageExecutor, SynthesisExecutor } from "./types";

export const DEFAULT_BUDGET_MS = 90_000;

export type PipelineExecutors = {
  vulnerability: StageExecutor;
  reputation: StageExecutor;
  code: StageExecutor;
  supplyChain: StageExecutor;
  synthesis: SynthesisExecutor;
};

export function codeSkip(context: SkipContext): boolean {
  return !context.findings.some(hasSuspiciousScriptEvidence);
}

export function defaultPipeline(executors: PipelineExecutors): StageDescriptor[] {
  return [
    {
      kind: "analysis",
      name: "vulnerability",
      timeoutMs: 20_000,
      retries: 1,
      retryDelayMs: 500,
      minimumMs: 1_000,
      executor: executors.vulnerability
    },
    {
      kind: "analysis",
      name: "reputation",
      timeoutMs: 15_000,
      retries: 1,
      retryDelayMs: 500,
      minimumMs: 1_000,
      executor: executors.reputation
    },
    {
      kind: "analysis",
      name: "code",
      timeoutMs: 25_000,
      retries: 1,
      retryDelayMs: 500,
      minimumMs: 1_000,
      skip: codeSkip,
      executor: executors.code
    },
    {
      kind: "analysis",
      name: "supply-chain",
      timeoutMs: 20_000,
      retries: 1,
      retryDelayMs: 500,
      minimumMs: 1_000,
      skip: supplyChainSkip,
      executor: executors.supplyChain
    },
    {
      kind: "synthesis",
      name: "synthesis",
      timeoutMs: 15_000,
      retries: 1,
      retryDelayMs: 500,
      minimumMs: 500,
      executor: executors.synthesis
    }
  ];
}
