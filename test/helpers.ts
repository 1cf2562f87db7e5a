import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { AnalysisReport, Finding } from "../src/core/types";

const tempDirs: string[] = [];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/** Creates a temp project holding `files`, keyed by path relative to its root. */
export async function writeProject(files: Record<string, string>, prefix = "chainwarden-project-"): Promise<string> {
  const dir = await makeTempDir(prefix);
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(dir, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf8");
  }
  return dir;
}

export async function cleanupTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
}

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    packageName: "pkg",
    packageVersion: "1.0.0",
    findingType: "vulnerability",
    severity: "medium",
    description: "test",
    detectionMethod: "rule_based",
    confidence: 1,
    evidence: [],
    ...overrides
  };
}

export function makeReport(overrides: Partial<AnalysisReport> = {}): AnalysisReport {
  return {
    packagesAnalyzed: 2,
    findings: [],
    stageResults: [],
    degraded: false,
    dependencyGraphSummary: { packageCount: 2, circularDependencyCount: 0, versionConflictCount: 0, malformedEdgeCount: 0 },
    synthesis: {
      source: "local",
      summary: { totalPackages: 2, totalFindings: 0, critical: 0, high: 0, medium: 0, low: 0 },
      riskAssessment: { overallRisk: "LOW", riskScore: 0, reasoning: "No findings." },
      recommendations: []
    },
    meta: { tool: { name: "chainwarden", version: "0.1.0" }, startedAt: "2026-01-01T00:00:00.000Z", durationMs: 5 },
    ...overrides
  };
}
