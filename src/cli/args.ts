import path from "node:path";
import { isSeverity } from "../core/findings";
import { AnalyzeOptions, GraphFormat, OutputFormat, Severity } from "../core/types";
import { DEFAULT_MAX_DEPTH } from "../graph/serialize";
import { DEFAULT_BUDGET_MS } from "../pipeline/defaults";

export type RawAnalyzeOptions = {
  root?: string;
  format?: string;
  budget?: string;
  maxDepth?: string;
  cacheDir?: string;
  offline?: boolean;
  findings?: string;
  severityThreshold?: string;
  exitCodeOn?: string;
  logLevel?: string;
  model?: boolean;
  showEvidence?: boolean;
};

export type RawGraphOptions = {
  root?: string;
  format?: string;
  maxDepth?: string;
  logLevel?: string;
};

export type GraphCommandOptions = {
  root: string;
  format: GraphFormat;
  maxDepth: number;
  logLevel: string;
};

export type ModelConfig = {
  url: string;
  model: string;
  apiKey?: string;
};

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const DEFAULT_MODEL = "gpt-4o-mini";

function parseFormat(value: string | undefined): OutputFormat {
  if (value === "text" || value === "json") {
    return value;
  }
  return "text";
}

function parseGraphFormat(value: string | undefined): GraphFormat {
  if (value === "json" || value === "mermaid") {
    return value;
  }
  return "json";
}

function parsePositiveInt(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${flag} value "${value}": expected a positive integer.`);
  }
  return parsed;
}

function parseSeverityThreshold(value: string | undefined): Severity | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase();
  if (!isSeverity(lower)) {
    throw new Error(`Invalid --severity-threshold value "${value}": expected low|medium|high|critical.`);
  }
  return lower;
}

function parseLogLevel(value: string | undefined): string {
  if (value === undefined) {
    return "warn";
  }
  const lower = value.toLowerCase();
  if (!LOG_LEVELS.includes(lower)) {
    throw new Error(`Invalid --log-level value "${value}": expected one of ${LOG_LEVELS.join("|")}.`);
  }
  return lower;
}

function defaultExitCodeOn(format: OutputFormat): "none" | "findings" {
  return format === "text" ? "findings" : "none";
}

function parseExitCodeOn(value: string | undefined, format: OutputFormat): "none" | "findings" {
  if (value === "none" || value === "findings") {
    return value;
  }
  return defaultExitCodeOn(format);
}

export function resolveAnalyzeOptions(raw: RawAnalyzeOptions, cwd: string): AnalyzeOptions {
  const format = parseFormat(raw.format);
  return {
    root: path.resolve(cwd, raw.root ?? "."),
    format,
    budgetMs: parsePositiveInt("--budget", raw.budget, DEFAULT_BUDGET_MS),
    maxDepth: parsePositiveInt("--max-depth", raw.maxDepth, DEFAULT_MAX_DEPTH),
    cacheDir: raw.cacheDir,
    offline: Boolean(raw.offline),
    findingsFile: raw.findings ? path.resolve(cwd, raw.findings) : undefined,
    severityThreshold: parseSeverityThreshold(raw.severityThreshold),
    exitCodeOn: parseExitCodeOn(raw.exitCodeOn, format),
    logLevel: parseLogLevel(raw.logLevel),
    // commander turns --no-model into model: false
    useModel: raw.model !== false,
    showEvidence: Boolean(raw.showEvidence)
  };
}

export function resolveGraphOptions(raw: RawGraphOptions, cwd: string): GraphCommandOptions {
  return {
    root: path.resolve(cwd, raw.root ?? "."),
    format: parseGraphFormat(raw.format),
    maxDepth: parsePositiveInt("--max-depth", raw.maxDepth, DEFAULT_MAX_DEPTH),
    logLevel: parseLogLevel(raw.logLevel)
  };
}

/** Model endpoint from the environment; synthesis runs locally without one. */
export function resolveModelConfig(env: NodeJS.ProcessEnv): ModelConfig | undefined {
  const url = env.CHAINWARDEN_MODEL_URL;
  if (!url) {
    return undefined;
  }
  return {
    url,
    model: env.CHAINWARDEN_MODEL || DEFAULT_MODEL,
    apiKey: env.CHAINWARDEN_MODEL_API_KEY || undefined
  };
}
