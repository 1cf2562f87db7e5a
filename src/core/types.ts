export type Ecosystem = "npm" | "pypi" | "other";
export type OutputFormat = "text" | "json";
export type GraphFormat = "json" | "mermaid";

export type FindingType =
  | "vulnerability"
  | "malicious_package"
  | "malicious_script"
  | "low_reputation"
  | "supply_chain_risk";
export type Severity = "critical" | "high" | "medium" | "low";
export type DetectionMethod = "rule_based" | "agent";

export const UNKNOWN_VERSION = "unknown";

export type DependencyEdgeRecord = {
  /** `name@version` of the depending package; `null` declares a root. */
  parent: string | null;
  name: string;
  version?: string;
  ecosystem: Ecosystem;
};

export type GraphNode = {
  id: string;
  name: string;
  version: string;
  ecosystem: Ecosystem;
  depth: number;
  /** child name -> child identity in the graph arena */
  dependencies: ReadonlyMap<string, string>;
};

export type CircularDependency = {
  from: string;
  to: string;
  cycle: string[];
};

export type VersionConflict = {
  packageName: string;
  versions: string[];
  paths: string[][];
};

export type GraphPackage = {
  name: string;
  version: string;
  ecosystem: Ecosystem;
};

export type DependencyGraphSummary = {
  packageCount: number;
  circularDependencyCount: number;
  versionConflictCount: number;
  malformedEdgeCount: number;
};

export type SerializedNode = {
  name: string;
  version: string;
  ecosystem: Ecosystem;
  depth: number;
  dependencies: Record<string, SerializedNode>;
  circularReference: boolean;
  truncated?: true;
};

export type PackageSource = "finding" | "graph-node" | "package-list" | "metadata";

export type PackageIdentity = {
  name: string;
  version: string;
  ecosystem: Ecosystem;
  depth?: number;
  sources: PackageSource[];
};

export type Finding = {
  packageName: string;
  packageVersion: string;
  findingType: FindingType;
  severity: Severity;
  description: string;
  detectionMethod: DetectionMethod;
  confidence: number;
  evidence: string[];
  remediation?: string;
};

export type StageStatus = "success" | "failed" | "skipped" | "timed_out";
export type SkipReason = "predicate" | "budget_exhausted";

export type StageResult = {
  stageName: string;
  status: StageStatus;
  durationMs: number;
  attempts: number;
  findings: Finding[];
  error?: string;
  skipReason?: SkipReason;
};

export type SeveritySummary = {
  totalPackages: number;
  totalFindings: number;
  critical: number;
  high: number;
  medium: number;
  low: number;
};

export type RiskLevel = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";

export type RiskAssessment = {
  overallRisk: RiskLevel;
  riskScore: number;
  reasoning: string;
};

export type SynthesisResult = {
  source: "model" | "local" | "fallback";
  summary: SeveritySummary;
  riskAssessment: RiskAssessment;
  recommendations: string[];
};

export type AnalysisReport = {
  packagesAnalyzed: number;
  findings: Finding[];
  stageResults: StageResult[];
  degraded: boolean;
  dependencyGraphSummary: DependencyGraphSummary;
  synthesis: SynthesisResult;
  meta: {
    tool: {
      name: string;
      version: string;
    };
    startedAt: string;
    durationMs: number;
  };
};

export type OsvBatchMatch = {
  id: string;
  modified?: string;
};

export type OsvReference = {
  type?: string;
  url?: string;
};

export type OsvSeverity = {
  type: string;
  score: string;
};

export type OsvVulnerability = {
  id: string;
  aliases?: string[];
  summary?: string;
  details?: string;
  modified?: string;
  published?: string;
  severity?: OsvSeverity[];
  database_specific?: {
    severity?: string;
  };
  affected?: Array<{
    package?: {
      ecosystem?: string;
      name?: string;
      purl?: string;
    };
    ranges?: Array<{
      type?: string;
      events?: Array<{
        introduced?: string;
        fixed?: string;
        last_affected?: string;
        limit?: string;
      }>;
    }>;
  }>;
  references?: OsvReference[];
};

export type AnalyzeOptions = {
  root: string;
  format: OutputFormat;
  budgetMs: number;
  maxDepth: number;
  cacheDir?: string;
  offline: boolean;
  findingsFile?: string;
  severityThreshold?: Severity;
  exitCodeOn: "none" | "findings";
  logLevel: string;
  useModel: boolean;
  showEvidence: boolean;
};
