import { severityRank } from "../core/findings";
import { AnalysisReport, AnalyzeOptions, Finding, Severity } from "../core/types";

export function meetsThreshold(finding: Finding, threshold: Severity | undefined): boolean {
  return threshold === undefined || severityRank(finding.severity) >= severityRank(threshold);
}

export function determineExitCode(
  report: AnalysisReport,
  opts: Pick<AnalyzeOptions, "exitCodeOn" | "severityThreshold">
): number {
  if (opts.exitCodeOn === "none") {
    return 0;
  }
  return report.findings.some((finding) => meetsThreshold(finding, opts.severityThreshold)) ? 1 : 0;
}
