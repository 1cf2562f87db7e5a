#!/usr/bin/env node
import fs from "node:fs/promises";
import { Command, CommanderError } from "commander";
import packageJson from "../../package.json";
import { analyzeWithGraph } from "../core/analyze";
import { errorMessage } from "../core/errors";
import { toFinding } from "../core/findings";
import { createLogger, Logger } from "../core/logger";
import { AnalyzeOptions, Finding } from "../core/types";
import { EdgeSourceResult } from "../deps/provider";
import { EdgeSourceRegistry } from "../deps/registry";
import { GraphBuilder } from "../graph/builder";
import { DependencyGraph } from "../graph/graph";
import { renderMermaid } from "../graph/mermaid";
import { tracePackage } from "../graph/paths";
import { serializeGraph } from "../graph/serialize";
import { ChatClient } from "../llm/client";
import { OsvCache } from "../osv/cache";
import { OsvClient } from "../osv/client";
import { OsvProvider } from "../osv/provider";
import { defaultPipeline } from "../pipeline/defaults";
import { StageDescriptor, SynthesisExecutor } from "../pipeline/types";
import { RegistryClient } from "../registry/client";
import { renderGraphJson, renderJson } from "../report/json";
import { renderText } from "../report/text";
import { CodeStage, installScriptFindings } from "../stages/code";
import { ReputationStage } from "../stages/reputation";
import { SupplyChainStage } from "../stages/supplyChain";
import { LocalSynthesisStage, ModelSynthesisStage } from "../stages/synthesis";
import { VulnerabilityStage } from "../stages/vulnerability";
import {
  GraphCommandOptions,
  RawAnalyzeOptions,
  RawGraphOptions,
  resolveAnalyzeOptions,
  resolveGraphOptions,
  resolveModelConfig
} from "./args";
import { determineExitCode } from "./exitCode";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
  fetchImpl: typeof fetch;
};

function processIo(): CliIo {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    cwd: process.cwd(),
    env: process.env,
    fetchImpl: fetch
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads rule-based findings from a JSON array or a `{ "findings": [...] }` document. */
export async function loadInitialFindings(file: string, io: Pick<CliIo, "stderr">): Promise<Finding[]> {
  const raw = await fs.readFile(file, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Findings file ${file} is not valid JSON: ${errorMessage(error)}`);
  }

  const entries = Array.isArray(parsed) ? parsed : isRecord(parsed) ? parsed.findings : undefined;
  if (!Array.isArray(entries)) {
    throw new Error(`Findings file ${file} must contain an array of findings.`);
  }

  const findings: Finding[] = [];
  for (const entry of entries) {
    const finding = toFinding(entry);
    if (finding) {
      findings.push(finding);
    }
  }
  const skipped = entries.length - findings.length;
  if (skipped > 0) {
    io.stderr(`Warning: skipped ${skipped} invalid finding(s) in ${file}.\n`);
  }
  return findings;
}

async function loadEdges(root: string, io: CliIo): Promise<EdgeSourceResult> {
  const result = await new EdgeSourceRegistry().load(root);
  for (const warning of result.warnings) {
    io.stderr(`Warning: ${warning}\n`);
  }
  return result;
}

export function buildPipeline(opts: AnalyzeOptions, io: CliIo, logger: Logger): StageDescriptor[] {
  const registry = new RegistryClient(io.fetchImpl, opts.offline);
  const osv = new OsvProvider(new OsvClient(undefined, io.fetchImpl), new OsvCache(opts.cacheDir), opts.offline);
  const modelConfig = opts.useModel && !opts.offline ? resolveModelConfig(io.env) : undefined;
  const synthesis: SynthesisExecutor = modelConfig
    ? new ModelSynthesisStage(new ChatClient(modelConfig, io.fetchImpl))
    : new LocalSynthesisStage();

  return defaultPipeline({
    vulnerability: new VulnerabilityStage(osv, logger),
    reputation: new ReputationStage(registry, logger),
    code: new CodeStage(registry, logger),
    supplyChain: new SupplyChainStage(registry, logger),
    synthesis
  });
}

export async function runAnalyze(opts: AnalyzeOptions, io: CliIo): Promise<number> {
  const logger = createLogger({ level: opts.logLevel });
  const source = await loadEdges(opts.root, io);
  const fromFile = opts.findingsFile ? await loadInitialFindings(opts.findingsFile, io) : [];
  const initialFindings = [...installScriptFindings(source.installScripts), ...fromFile];

  const { graph, report } = await analyzeWithGraph(source.edges, buildPipeline(opts, io, logger), {
    budgetMs: opts.budgetMs,
    initialFindings,
    logger,
    toolVersion: packageJson.version
  });

  io.stdout(
    opts.format === "json" ? renderJson(report, { graph: serializeGraph(graph, opts.maxDepth) }) : renderText(report, opts.showEvidence)
  );
  return determineExitCode(report, opts);
}

async function loadGraph(opts: Pick<GraphCommandOptions, "root" | "logLevel">, io: CliIo): Promise<DependencyGraph> {
  const source = await loadEdges(opts.root, io);
  return new GraphBuilder({ logger: createLogger({ level: opts.logLevel }) }).build(source.edges);
}

export async function runGraph(opts: GraphCommandOptions, io: CliIo): Promise<number> {
  const graph = await loadGraph(opts, io);
  io.stdout(
    opts.format === "mermaid" ? `${renderMermaid(graph, opts.maxDepth)}\n` : renderGraphJson(serializeGraph(graph, opts.maxDepth))
  );
  return 0;
}

export async function runTrace(name: string, opts: GraphCommandOptions, io: CliIo): Promise<number> {
  const graph = await loadGraph(opts, io);
  const traces = tracePackage(graph, name);
  if (traces.length === 0) {
    io.stdout(`${name} is not in the dependency graph.\n`);
    return 1;
  }

  const lines: string[] = [];
  for (const trace of traces) {
    lines.push(`${trace.id} (depth ${trace.depth})`);
    for (const path of trace.paths) {
      lines.push(`  ${path.join(" -> ")}`);
    }
  }
  io.stdout(`${lines.join("\n")}\n`);
  return 0;
}

function addSourceOptions(command: Command): Command {
  return command
    .option("--root <dir>", "project root", ".")
    .option("--max-depth <n>", "maximum serialized tree depth")
    .option("--log-level <level>", "fatal|error|warn|info|debug|trace|silent");
}

export function createProgram(io: CliIo, setExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name("chainwarden")
    .description("supply-chain risk analyzer for npm and PyPI dependencies")
    .version(packageJson.version, "--version", "Show version")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  addSourceOptions(program.command("analyze", { isDefault: true }))
    .description("analyze the project's dependencies")
    .option("--format <format>", "output format: text|json")
    .option("--budget <ms>", "total analysis budget in milliseconds")
    .option("--cache-dir <dir>", "OSV cache directory")
    .option("--offline", "use cached vulnerability records only")
    .option("--findings <file>", "initial rule-based findings (JSON)")
    .option("--severity-threshold <level>", "low|medium|high|critical")
    .option("--exit-code-on <mode>", "none|findings")
    .option("--no-model", "synthesize locally even when a model is configured")
    .option("--show-evidence", "print the evidence behind each finding")
    .exitOverride()
    .action(async (_options: unknown, command: Command) => {
      setExitCode(await runAnalyze(resolveAnalyzeOptions(command.opts<RawAnalyzeOptions>(), io.cwd), io));
    });

  addSourceOptions(program.command("graph"))
    .description("print the dependency graph")
    .option("--format <format>", "json|mermaid")
    .exitOverride()
    .action(async (_options: unknown, command: Command) => {
      setExitCode(await runGraph(resolveGraphOptions(command.opts<RawGraphOptions>(), io.cwd), io));
    });

  addSourceOptions(program.command("trace"))
    .description("show the paths that pull a package into the graph")
    .argument("<package>")
    .exitOverride()
    .action(async (name: string, _options: unknown, command: Command) => {
      setExitCode(await runTrace(name, resolveGraphOptions(command.opts<RawGraphOptions>(), io.cwd), io));
    });

  return program;
}

/** Runs the CLI and resolves to its exit code: 0 clean, 1 findings, 2 errors. */
export async function runCli(argv: string[], io: CliIo = processIo()): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      // help and version exit 0; usage errors were already printed
      return err.exitCode === 0 ? 0 : 2;
    }
    io.stderr(`Error: ${errorMessage(err)}\n`);
    return 2;
  }
}

if (require.main === module) {
  runCli(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
      process.exitCode = 2;
    }
  );
}
