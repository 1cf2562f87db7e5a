import { DetectionMethod, Finding, FindingType, Severity } from "./types";

const SEVERITY_ORDER: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3
};

const FINDING_TYPES: FindingType[] = [
  "vulnerability",
  "malicious_package",
  "malicious_script",
  "low_reputation",
  "supply_chain_risk"
];

const DETECTION_METHODS: DetectionMethod[] = ["rule_based", "agent"];

export function severityRank(level: Severity): number {
  return SEVERITY_ORDER[level];
}

export function isSeverity(value: unknown): value is Severity {
  return value === "critical" || value === "high" || value === "medium" || value === "low";
}

export function isFindingType(value: unknown): value is FindingType {
  return typeof value === "string" && FINDING_TYPES.some((type) => type === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

export function findingKey(finding: Pick<Finding, "packageName" | "packageVersion" | "findingType" | "severity">): string {
  return [finding.packageName, finding.packageVersion, finding.findingType, finding.severity].join("\u0000");
}

function unionEvidence(left: string[], right: string[]): string[] {
  const out = [...left];
  const seen = new Set(left);
  for (const entry of right) {
    if (seen.has(entry)) {
      continue;
    }
    seen.add(entry);
    out.push(entry);
  }
  return out;
}

/**
 * Parses an untrusted value into a finding. Returns undefined when a required
 * field is missing or has the wrong shape.
 */
export function toFinding(value: unknown): Finding | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  const { packageName, packageVersion, findingType, severity, description } = value;
  if (typeof packageName !== "string" || packageName.length === 0) {
    return undefined;
  }
  if (typeof packageVersion !== "string" || !isFindingType(findingType) || !isSeverity(severity)) {
    return undefined;
  }

  const evidence = Array.isArray(value.evidence)
    ? value.evidence.filter((entry): entry is string => typeof entry === "string")
    : [];
  const detectionMethod = DETECTION_METHODS.find((method) => method === value.detectionMethod) ?? "rule_based";
  const confidence = typeof value.confidence === "number" ? clampConfidence(value.confidence) : 1;

  return {
    packageName,
    packageVersion: packageVersion || "unknown",
    findingType,
    severity,
    description: typeof description === "string" ? description : "",
    detectionMethod,
    confidence,
    evidence,
    ...(typeof value.remediation === "string" && value.remediation.length > 0 ? { remediation: value.remediation } : {})
  };
}

/**
 * Append-only accumulator keyed by finding identity. Duplicates collapse into the
 * first recorded finding and only ever add evidence to it.
 */
export class FindingSet {
  private readonly byKey = new Map<string, Finding>();

  constructor(initial: Iterable<Finding> = []) {
    this.addAll(initial);
  }

  get size(): number {
    return this.byKey.size;
  }

  add(finding: Finding): void {
    const key = findingKey(finding);
    const existing = this.byKey.get(key);
    if (!existing) {
      this.byKey.set(key, {
        ...finding,
        confidence: clampConfidence(finding.confidence),
        evidence: unionEvidence([], finding.evidence)
      });
      return;
    }

    existing.evidence = unionEvidence(existing.evidence, finding.evidence);
    existing.confidence = Math.max(existing.confidence, clampConfidence(finding.confidence));
    if (!existing.remediation && finding.remediation) {
      existing.remediation = finding.remediation;
    }
  }

  addAll(findings: Iterable<Finding>): void {
    for (const finding of findings) {
      this.add(finding);
    }
  }

  /** Deep copy, so callers cannot reach into the accumulator. */
  snapshot(): Finding[] {
    return Array.from(this.byKey.values(), (finding) => ({ ...finding, evidence: [...finding.evidence] }));
  }
}

export function mergeFindings(findings: Iterable<Finding>): Finding[] {
  return new FindingSet(findings).snapshot();
}

export function compareFindings(a: Finding, b: Finding): number {
  const bySeverity = severityRank(b.severity) - severityRank(a.severity);
  if (bySeverity !== 0) {
    return bySeverity;
  }
  const byName = a.packageName.localeCompare(b.packageName);
  if (byName !== 0) {
    return byName;
  }
  return a.findingType.localeCompare(b.findingType);
}
