import { Finding, RiskAssessment, SeveritySummary, SynthesisResult } from "../core/types";

const GENERAL_RECOMMENDATIONS = [
  "Implement dependency scanning in your CI/CD pipeline to catch issues early.",
  "Use Software Bill of Materials (SBOM) to maintain visibility into your dependencies.",
  "Regularly update dependencies and monitor security advisories.",
  "Consider using dependency pinning and lock files to ensure reproducible builds.",
  "Implement security policies for dependency management and approval processes."
];

function isMalicious(finding: Finding): boolean {
  return finding.findingType === "malicious_package" || finding.findingType === "malicious_script";
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

function round(score: number): number {
  return Math.round(Math.min(1, score) * 100) / 100;
}

export function summarizeFindings(findings: readonly Finding[], totalPackages: number): SeveritySummary {
  const summary: SeveritySummary = {
    totalPackages,
    totalFindings: findings.length,
    critical: 0,
    high: 0,
    medium: 0,
    low: 0
  };
  for (const finding of findings) {
    summary[finding.severity] += 1;
  }
  return summary;
}

export function assessRisk(findings: readonly Finding[], summary: SeveritySummary): RiskAssessment {
  const malicious = findings.filter(isMalicious).length;
  const counts = `${summary.critical} critical, ${summary.high} high, ${summary.medium} medium, ${summary.low} low`;

  if (malicious > 0 || summary.critical > 0) {
    return {
      overallRisk: "CRITICAL",
      riskScore: round(0.9 + 0.01 * summary.critical + 0.05 * malicious),
      reasoning: `${counts} findings; ${plural(malicious, "malicious indicator")}.`
    };
  }
  if (summary.high > 2) {
    return {
      overallRisk: "HIGH",
      riskScore: round(0.7 + 0.02 * summary.high),
      reasoning: `${counts} findings; several high-severity issues.`
    };
  }
  if (summary.high > 0 || summary.medium > 3) {
    return {
      overallRisk: "MEDIUM",
      riskScore: round(0.5 + 0.05 * summary.high + 0.01 * summary.medium),
      reasoning: `${counts} findings.`
    };
  }
  return {
    overallRisk: "LOW",
    riskScore: 0.3,
    reasoning: `${counts} findings.`
  };
}

export function recommend(findings: readonly Finding[], summary: SeveritySummary): string[] {
  const recommendations: string[] = [];
  const maliciousPackages = new Set(findings.filter(isMalicious).map((finding) => finding.packageName));
  const highPackages = new Set(
    findings.filter((finding) => finding.severity === "high").map((finding) => finding.packageName)
  );

  if (summary.critical > 0) {
    recommendations.push(
      `URGENT: Address ${plural(summary.critical, "critical security finding")}. These may indicate active security threats.`
    );
  }
  if (maliciousPackages.size > 0) {
    recommendations.push(
      `Remove ${plural(maliciousPackages.size, "identified malicious package")} immediately. Scan systems for signs of compromise and review all dependencies.`
    );
  }
  if (highPackages.size > 0) {
    recommendations.push(
      `Update ${plural(highPackages.size, "package")} with high-severity findings to patched versions. Prioritize based on severity and exploitability.`
    );
  }

  recommendations.push(...GENERAL_RECOMMENDATIONS);
  return recommendations;
}

/**
 * Deterministic synthesis over already-collected findings. Pure; never throws for
 * well-formed findings.
 */
export function fallbackSynthesis(
  findings: readonly Finding[],
  totalPackages: number,
  source: SynthesisResult["source"] = "fallback"
): SynthesisResult {
  const summary = summarizeFindings(findings, totalPackages);
  return {
    source,
    summary,
    riskAssessment: assessRisk(findings, summary),
    recommendations: recommend(findings, summary)
  };
}
