import { AnalysisReport, Finding, StageResult } from "../core/types";

function formatStage(stage: StageResult): string {
  const parts = [`${stage.stageName}: ${stage.status}`, `${stage.durationMs}ms`];
  if (stage.attempts > 1) {
    parts.push(`attempts=${stage.attempts}`);
  }
  if (stage.skipReason) {
    parts.push(`reason=${stage.skipReason}`);
  }
  const line = `  ${parts.join("  ")}`;
  return stage.error ? `${line}\n    error: ${stage.error}` : line;
}

function appendFinding(lines: string[], finding: Finding, showEvidence: boolean): void {
  lines.push(
    `${finding.severity.toUpperCase()}  ${finding.findingType}  ${finding.packageName}@${finding.packageVersion}  ${finding.description || "(no description)"}`
  );
  if (finding.remediation) {
    lines.push(`  fix: ${finding.remediation}`);
  }
  if (showEvidence && finding.evidence.length > 0) {
    lines.push(`  evidence: ${finding.evidence.join(", ")}`);
  }
}

export function renderText(report: AnalysisReport, showEvidence = false): string {
  const lines: string[] = [];
  const graph = report.dependencyGraphSummary;
  const { riskAssessment, summary } = report.synthesis;

  lines.push(`Packages: ${report.packagesAnalyzed}`);
  lines.push(`Findings: ${report.findings.length}`);
  lines.push(
    `Graph: packages=${graph.packageCount}, cycles=${graph.circularDependencyCount}, conflicts=${graph.versionConflictCount}, malformed=${graph.malformedEdgeCount}`
  );
  lines.push(`Risk: ${riskAssessment.overallRisk} (${riskAssessment.riskScore}) via ${report.synthesis.source}`);
  lines.push(`Severity: critical=${summary.critical}, high=${summary.high}, medium=${summary.medium}, low=${summary.low}`);
  if (report.degraded) {
    lines.push("Degraded: one or more stages did not complete.");
  }

  lines.push("");
  lines.push("Stages:");
  for (const stage of report.stageResults) {
    lines.push(formatStage(stage));
  }

  lines.push("");
  if (report.findings.length === 0) {
    lines.push("No findings.");
  } else {
    for (const finding of report.findings) {
      appendFinding(lines, finding, showEvidence);
    }
  }

  lines.push("");
  lines.push(riskAssessment.reasoning);
  lines.push("");
  lines.push("Recommendations:");
  for (const recommendation of report.synthesis.recommendations) {
    lines.push(`  - ${recommendation}`);
  }

  return `${lines.join("\n")}\n`;
}
