import popularPackages from "../data/popular-packages.json";
import { severityRank } from "../core/findings";
import type { Logger } from "../core/logger";
import { Ecosystem, Finding, PackageIdentity } from "../core/types";
import { MetadataSource, PackageMetadata } from "../registry/client";
import { SkipContext, StageExecutor, StageInput } from "../pipeline/types";
import { daysBetween, mapInBatches, registryPackages } from "./util";

const REGISTRY_CONCURRENCY = 8;
const RAPID_RELEASE_MS = 60 * 60 * 1000;
const NEW_PACKAGE_DAYS = 30;

const POPULAR: Record<Ecosystem, string[]> = {
  npm: popularPackages.npm,
  pypi: popularPackages.pypi,
  other: []
};

function editDistance(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  const previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    let diagonal = previous[0];
    previous[0] = i;
    for (let j = 1; j <= b.length; j += 1) {
      const above = previous[j];
      previous[j] = Math.min(previous[j] + 1, previous[j - 1] + 1, diagonal + (a[i - 1] === b[j - 1] ? 0 : 1));
      diagonal = above;
    }
  }
  return previous[b.length];
}

function collapseSeparators(name: string): string {
  return name.toLowerCase().replace(/[-_.]/g, "");
}

function unscoped(name: string): string {
  return name.startsWith("@") && name.includes("/") ? name.slice(name.indexOf("/") + 1) : name;
}

/** The popular package `name` imitates, if any. */
export function findTyposquatTarget(name: string, ecosystem: Ecosystem): string | undefined {
  const candidates = POPULAR[ecosystem];
  const lower = name.toLowerCase();
  if (candidates.includes(lower)) {
    return undefined;
  }
  const bare = unscoped(lower);
  for (const target of candidates) {
    if (bare === target && bare !== lower) {
      return target;
    }
    if (collapseSeparators(bare) === collapseSeparators(target)) {
      return target;
    }
    if (target.length >= 4 && editDistance(bare, target) === 1) {
      return target;
    }
  }
  return undefined;
}

function isMalicious(finding: Finding): boolean {
  return finding.findingType === "malicious_package" || finding.findingType === "malicious_script";
}

function isSeriousReputation(finding: Finding): boolean {
  return finding.findingType === "low_reputation" && severityRank(finding.severity) >= severityRank("high");
}

/** Runs only when earlier stages left a serious reputation or malicious finding. */
export function supplyChainSkip(context: SkipContext): boolean {
  return !context.findings.some((finding) => isMalicious(finding) || isSeriousReputation(finding));
}

function riskFinding(
  pkg: PackageIdentity,
  severity: Finding["severity"],
  description: string,
  evidence: string[],
  confidence: number
): Finding {
  return {
    packageName: pkg.name,
    packageVersion: pkg.version,
    findingType: "supply_chain_risk",
    severity,
    description,
    detectionMethod: "rule_based",
    confidence,
    evidence
  };
}

export function correlateFindings(pkg: PackageIdentity, findings: readonly Finding[]): Finding[] {
  const own = findings.filter((finding) => finding.packageName === pkg.name);
  const evidence = own.flatMap((finding) => finding.evidence);
  const out: Finding[] = [];

  const lowReputation = own.some((finding) => finding.findingType === "low_reputation");
  const script = own.some((finding) => finding.findingType === "malicious_script");
  if (lowReputation && script) {
    out.push(
      riskFinding(pkg, "critical", `${pkg.name} combines a low reputation with a suspicious install script`, [
        "correlation:low_reputation+malicious_script"
      ], 0.9)
    );
  }

  const network = evidence.includes("technique:network_activity");
  if (network && evidence.includes("technique:env_access")) {
    out.push(
      riskFinding(pkg, "critical", `${pkg.name} reads environment variables and talks to the network at install time`, [
        "behavior:env_access+network_activity"
      ], 0.85)
    );
  } else if (network && evidence.includes("technique:file_access")) {
    out.push(
      riskFinding(pkg, "high", `${pkg.name} reads local files and talks to the network at install time`, [
        "behavior:file_access+network_activity"
      ], 0.75)
    );
  }
  return out;
}

export function publishingAnomalies(pkg: PackageIdentity, metadata: PackageMetadata, now: Date): Finding[] {
  const out: Finding[] = [];
  const created = metadata.createdAt ? new Date(metadata.createdAt) : undefined;
  const isNew = created !== undefined && daysBetween(created, now) < NEW_PACKAGE_DAYS;
  if (isNew && metadata.maintainers.length <= 1) {
    out.push(
      riskFinding(pkg, "medium", `${pkg.name} is a new package with a single maintainer`, [
        `maintainers:${metadata.maintainers.length}`,
        `created:${metadata.createdAt}`
      ], 0.6)
    );
  }

  const times = metadata.releaseTimes.map((time) => new Date(time).getTime());
  for (let i = 1; i < times.length; i += 1) {
    const gap = times[i] - times[i - 1];
    if (gap >= 0 && gap < RAPID_RELEASE_MS) {
      out.push(
        riskFinding(pkg, "medium", `${pkg.name} published releases less than an hour apart`, [
          `release-gap-minutes:${Math.round(gap / 60_000)}`
        ], 0.5)
      );
      break;
    }
  }
  return out;
}

/** Typosquatting, cross-stage correlation and publishing anomalies. */
export class SupplyChainStage implements StageExecutor {
  constructor(
    private readonly registry: MetadataSource,
    private readonly logger?: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async execute(input: StageInput): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const pkg of input.packages) {
      const target = findTyposquatTarget(pkg.name, pkg.ecosystem);
      if (target) {
        findings.push(riskFinding(pkg, "high", `${pkg.name} looks like a typosquat of ${target}`, [`typosquat-of:${target}`], 0.7));
      }
    }

    const flagged = new Set(
      input.findings.filter((finding) => isMalicious(finding) || isSeriousReputation(finding)).map((finding) => finding.packageName)
    );
    const suspects = registryPackages(input.packages).filter((pkg) => flagged.has(pkg.name));
    this.logger?.debug({ suspects: suspects.length }, "correlating supply-chain signals");

    const perPackage = await mapInBatches(suspects, REGISTRY_CONCURRENCY, input.signal, async (pkg) => {
      const correlated = correlateFindings(pkg, input.findings);
      const metadata = await this.registry.fetchMetadata(pkg.name, pkg.ecosystem, pkg.version, input.signal);
      return metadata ? [...correlated, ...publishingAnomalies(pkg, metadata, this.now())] : correlated;
    });
    findings.push(...perPackage.flat());
    return findings;
  }
}
