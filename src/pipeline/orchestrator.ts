import {
  StageBudgetExhaustedError,
  StageExecutionError,
  StageTimeoutError,
  SynthesisValidationError,
  describeError
} from "../core/errors";
import { FindingSet, compareFindings, toFinding } from "../core/findings";
import type { Logger } from "../core/logger";
import {
  AnalysisReport,
  DependencyGraphSummary,
  Finding,
  PackageIdentity,
  StageResult,
  SynthesisResult
} from "../core/types";
import { DependencyGraph } from "../graph/graph";
import { fallbackSynthesis } from "./fallback";
import { parseSynthesisResult } from "./synthesisSchema";
import { StageDeadline } from "./timeout";
import {
  AnalysisStageDescriptor,
  OrchestratorState,
  StageDescriptor,
  StageInput,
  SynthesisStageDescriptor
} from "./types";

export type OrchestratorOptions = {
  logger?: Logger;
  now?: () => number;
  toolName?: string;
  toolVersion?: string;
};

export type RunOptions = {
  budgetMs: number;
  initialFindings?: readonly Finding[];
  graph?: DependencyGraph;
  /** Aborting ends the run early; stages not yet started are skipped for budget. */
  signal?: AbortSignal;
};

type Checked<T> = { ok: true; value: T } | { ok: false; error: unknown };

type AttemptResult<T> =
  | { status: "success"; value: T; attempts: number }
  | { status: "failed"; error: unknown; attempts: number }
  | { status: "timed_out"; attempts: number };

const EMPTY_GRAPH_SUMMARY: DependencyGraphSummary = {
  packageCount: 0,
  circularDependencyCount: 0,
  versionConflictCount: 0,
  malformedEdgeCount: 0
};

function checkFindings(value: unknown): Checked<Finding[]> {
  if (!Array.isArray(value)) {
    return { ok: false, error: new Error("executor did not return a list of findings") };
  }
  const findings: Finding[] = [];
  for (const entry of value) {
    const finding = toFinding(entry);
    if (!finding) {
      return { ok: false, error: new Error("executor returned a malformed finding") };
    }
    findings.push(finding);
  }
  return { ok: true, value: findings };
}

function freezeFinding(finding: Finding): Finding {
  Object.freeze(finding.evidence);
  return Object.freeze(finding);
}

function freezeStageResult(result: StageResult): StageResult {
  result.findings.forEach(freezeFinding);
  Object.freeze(result.findings);
  return Object.freeze(result);
}

/**
 * Runs an ordered stage pipeline under one global budget. Stage failures are
 * recorded on the report, never thrown; only contract violations throw.
 */
export class StageOrchestrator {
  private readonly logger: Logger | undefined;
  private readonly now: () => number;
  private readonly toolName: string;
  private readonly toolVersion: string;
  private currentState: OrchestratorState = "idle";

  constructor(options: OrchestratorOptions = {}) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.toolName = options.toolName ?? "chainwarden";
    this.toolVersion = options.toolVersion ?? "0.0.0";
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  async run(
    packages: readonly PackageIdentity[],
    pipeline: readonly StageDescriptor[],
    options: RunOptions
  ): Promise<AnalysisReport> {
    if (!Array.isArray(packages)) {
      throw new TypeError("packages must be an array");
    }
    if (!Array.isArray(pipeline)) {
      throw new TypeError("pipeline must be an array of stage descriptors");
    }
    if (typeof options.budgetMs !== "number" || !Number.isFinite(options.budgetMs) || options.budgetMs <= 0) {
      throw new RangeError("budgetMs must be a positive number");
    }
    if (this.currentState === "running") {
      throw new Error("orchestrator is already running a pipeline");
    }

    this.currentState = "running";
    try {
      return await this.runPipeline(packages, pipeline, options);
    } finally {
      this.currentState = "completed";
    }
  }

  private async runPipeline(
    packages: readonly PackageIdentity[],
    pipeline: readonly StageDescriptor[],
    options: RunOptions
  ): Promise<AnalysisReport> {
    const startedAt = this.now();
    const deadlineAt = startedAt + options.budgetMs;
    const accumulated = new FindingSet(options.initialFindings ?? []);
    const stageResults: StageResult[] = [];
    let degraded = false;
    let synthesis: SynthesisResult | undefined;

    const remainingBudget = (): number => (options.signal?.aborted ? 0 : Math.max(0, deadlineAt - this.now()));
    const snapshot = (): readonly Finding[] => Object.freeze(accumulated.snapshot());

    this.logger?.info({ packages: packages.length, stages: pipeline.length, budgetMs: options.budgetMs }, "pipeline started");

    for (const descriptor of pipeline) {
      if (descriptor.kind === "analysis") {
        const decided = this.evaluateSkip(descriptor, packages, snapshot());
        if (decided) {
          degraded = degraded || decided.status === "failed";
          stageResults.push(decided);
          continue;
        }
      }

      const remaining = remainingBudget();
      if (remaining < descriptor.minimumMs) {
        const error = new StageBudgetExhaustedError(descriptor.name, remaining);
        stageResults.push(this.skipped(descriptor.name, "budget_exhausted", describeError(error)));
        degraded = true;
        this.logger?.warn({ stage: descriptor.name, status: "skipped", remainingMs: remaining }, "stage skipped for budget");
        if (descriptor.kind === "synthesis") {
          synthesis = this.fallback(snapshot(), packages.length, descriptor.name);
        }
        continue;
      }

      if (descriptor.kind === "synthesis") {
        const outcome = await this.runSynthesis(descriptor, packages, snapshot(), remaining, options);
        stageResults.push(outcome.result);
        synthesis = outcome.synthesis;
        degraded = degraded || outcome.degraded;
        continue;
      }

      const result = await this.runAnalysis(descriptor, packages, snapshot, remaining, options);
      if (result.status === "success") {
        accumulated.addAll(result.findings);
      } else if (result.status !== "skipped") {
        degraded = true;
      }
      stageResults.push(result);
    }

    const findings = accumulated.snapshot().sort(compareFindings);
    if (!synthesis) {
      synthesis = fallbackSynthesis(findings, packages.length);
    }

    const durationMs = this.now() - startedAt;
    this.logger?.info({ durationMs, degraded, findings: findings.length }, "pipeline completed");

    const report: AnalysisReport = {
      packagesAnalyzed: packages.length,
      findings: findings.map(freezeFinding),
      stageResults: stageResults.map(freezeStageResult),
      degraded,
      dependencyGraphSummary: options.graph ? options.graph.summary() : { ...EMPTY_GRAPH_SUMMARY },
      synthesis,
      meta: {
        tool: { name: this.toolName, version: this.toolVersion },
        startedAt: new Date(startedAt).toISOString(),
        durationMs
      }
    };
    return deepFreezeReport(report);
  }

  private async runAnalysis(
    descriptor: AnalysisStageDescriptor,
    packages: readonly PackageIdentity[],
    snapshot: () => readonly Finding[],
    remaining: number,
    options: RunOptions
  ): Promise<StageResult> {
    const findings = snapshot();
    const started = this.now();
    const timeoutMs = Math.min(descriptor.timeoutMs, remaining);
    this.logger?.info({ stage: descriptor.name, timeoutMs }, "stage started");
    const outcome = await this.attempt(
      descriptor,
      timeoutMs,
      options.signal,
      (signal, attemptTimeoutMs) =>
        descriptor.executor.execute({ packages, findings, graph: options.graph, timeoutMs: attemptTimeoutMs, signal }),
      checkFindings
    );
    return this.toStageResult(descriptor.name, timeoutMs, started, outcome, (value) => value);
  }

  /** Runs the skip predicate; a stage result when the stage does not run. */
  private evaluateSkip(
    descriptor: AnalysisStageDescriptor,
    packages: readonly PackageIdentity[],
    findings: readonly Finding[]
  ): StageResult | undefined {
    if (!descriptor.skip) {
      return undefined;
    }
    let skip: boolean;
    try {
      skip = descriptor.skip({ packages, findings });
    } catch (err) {
      const error = new StageExecutionError(descriptor.name, err);
      this.logger?.warn({ stage: descriptor.name, status: "failed", err: error }, "skip predicate failed");
      return { stageName: descriptor.name, status: "failed", durationMs: 0, attempts: 0, findings: [], error: describeError(error) };
    }
    if (!skip) {
      return undefined;
    }
    this.logger?.info({ stage: descriptor.name, status: "skipped" }, "stage skipped by predicate");
    return this.skipped(descriptor.name, "predicate");
  }

  private async runSynthesis(
    descriptor: SynthesisStageDescriptor,
    packages: readonly PackageIdentity[],
    findings: readonly Finding[],
    remaining: number,
    options: RunOptions
  ): Promise<{ result: StageResult; synthesis: SynthesisResult; degraded: boolean }> {
    const started = this.now();
    const timeoutMs = Math.min(descriptor.timeoutMs, remaining);
    this.logger?.info({ stage: descriptor.name, timeoutMs }, "stage started");
    const outcome = await this.attempt(
      descriptor,
      timeoutMs,
      options.signal,
      (signal, attemptTimeoutMs) =>
        descriptor.executor.synthesize({ packages, findings, graph: options.graph, timeoutMs: attemptTimeoutMs, signal }),
      (value): Checked<SynthesisResult> => {
        try {
          return { ok: true, value: parseSynthesisResult(value, findings, packages.length) };
        } catch (error) {
          return { ok: false, error };
        }
      }
    );

    const result = this.toStageResult(descriptor.name, timeoutMs, started, outcome, () => []);
    if (outcome.status === "success") {
      return { result, synthesis: outcome.value, degraded: false };
    }
    return { result, synthesis: this.fallback(findings, packages.length, descriptor.name), degraded: true };
  }

  private async attempt<T>(
    descriptor: StageDescriptor,
    timeoutMs: number,
    parentSignal: AbortSignal | undefined,
    invoke: (signal: AbortSignal, attemptTimeoutMs: number) => Promise<unknown>,
    check: (value: unknown) => Checked<T>
  ): Promise<AttemptResult<T>> {
    const retries = Math.min(1, Math.max(0, Math.floor(descriptor.retries)));
    const deadline = new StageDeadline(descriptor.name, timeoutMs, parentSignal, this.now);
    let attempts = 0;
    let lastError: unknown;

    try {
      for (;;) {
        attempts += 1;
        const outcome = await deadline.race(() => invoke(deadline.signal, deadline.remaining()));
        if (outcome.kind === "timeout") {
          return { status: "timed_out", attempts };
        }
        if (outcome.kind === "ok") {
          const checked = check(outcome.value);
          if (checked.ok) {
            return { status: "success", value: checked.value, attempts };
          }
          lastError = checked.error;
        } else {
          lastError = outcome.error;
        }

        if (attempts > retries || deadline.remaining() <= descriptor.retryDelayMs) {
          return { status: "failed", error: lastError, attempts };
        }
        this.logger?.warn(
          { stage: descriptor.name, attempt: attempts, delayMs: descriptor.retryDelayMs, err: lastError },
          "stage attempt failed, retrying"
        );
        if (!(await deadline.sleep(descriptor.retryDelayMs))) {
          return { status: "timed_out", attempts };
        }
      }
    } finally {
      deadline.dispose();
    }
  }

  private toStageResult<T>(
    stageName: string,
    timeoutMs: number,
    started: number,
    outcome: AttemptResult<T>,
    findingsOf: (value: T) => Finding[]
  ): StageResult {
    const durationMs = Math.max(0, this.now() - started);
    switch (outcome.status) {
      case "success":
        this.logger?.info({ stage: stageName, status: "success", durationMs }, "stage completed");
        return {
          stageName,
          status: "success",
          durationMs,
          attempts: outcome.attempts,
          findings: findingsOf(outcome.value)
        };
      case "timed_out": {
        const error = new StageTimeoutError(stageName, timeoutMs);
        this.logger?.warn({ stage: stageName, status: "timed_out", durationMs }, "stage timed out");
        return {
          stageName,
          status: "timed_out",
          durationMs,
          attempts: outcome.attempts,
          findings: [],
          error: describeError(error)
        };
      }
      case "failed": {
        const error =
          outcome.error instanceof SynthesisValidationError
            ? outcome.error
            : new StageExecutionError(stageName, outcome.error);
        this.logger?.warn({ stage: stageName, status: "failed", durationMs, err: error }, "stage failed");
        return {
          stageName,
          status: "failed",
          durationMs,
          attempts: outcome.attempts,
          findings: [],
          error: describeError(error)
        };
      }
    }
  }

  private skipped(stageName: string, reason: "predicate" | "budget_exhausted", error?: string): StageResult {
    return {
      stageName,
      status: "skipped",
      durationMs: 0,
      attempts: 0,
      findings: [],
      skipReason: reason,
      ...(error ? { error } : {})
    };
  }

  private fallback(findings: readonly Finding[], totalPackages: number, stageName: string): SynthesisResult {
    this.logger?.warn({ stage: stageName }, "using fallback synthesis");
    return fallbackSynthesis(findings, totalPackages);
  }
}

function deepFreezeReport(report: AnalysisReport): AnalysisReport {
  Object.freeze(report.findings);
  Object.freeze(report.stageResults);
  Object.freeze(report.dependencyGraphSummary);
  Object.freeze(report.synthesis.summary);
  Object.freeze(report.synthesis.riskAssessment);
  Object.freeze(report.synthesis.recommendations);
  Object.freeze(report.synthesis);
  Object.freeze(report.meta.tool);
  Object.freeze(report.meta);
  return Object.freeze(report);
}
