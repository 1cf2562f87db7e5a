import type { Logger } from "../core/logger";
import { Finding, OsvVulnerability, PackageIdentity } from "../core/types";
import { OsvEcosystem } from "../osv/client";
import { OsvPackageQuery, VulnerabilityProvider, queryKey } from "../osv/provider";
import { StageExecutor, StageInput } from "../pipeline/types";
import { vulnerabilitySeverity } from "../policy/severity";
import { compareVersion, hasKnownVersion, mapInBatches, throwIfAborted } from "./util";

const DETAIL_CONCURRENCY = 8;

function osvEcosystem(pkg: PackageIdentity): OsvEcosystem | undefined {
  if (pkg.ecosystem === "npm") {
    return "npm";
  }
  if (pkg.ecosystem === "pypi") {
    return "PyPI";
  }
  return undefined;
}

function isSameOrNewer(candidate: string, current: string): boolean {
  return compareVersion(candidate, current) >= 0;
}

export function collectFixedVersions(vuln: OsvVulnerability, packageName: string): string[] {
  const versions = new Set<string>();
  for (const affected of vuln.affected ?? []) {
    if (affected.package?.name !== packageName) {
      continue;
    }
    for (const range of affected.ranges ?? []) {
      for (const event of range.events ?? []) {
        if (event.fixed) {
          versions.add(event.fixed.trim());
        }
      }
    }
  }
  return Array.from(versions).filter(Boolean).sort(compareVersion);
}

export function toVulnerabilityFinding(vuln: OsvVulnerability, pkg: PackageIdentity): Finding {
  const malicious = vuln.id.startsWith("MAL-");
  const fixed = collectFixedVersions(vuln, pkg.name).find((candidate) => isSameOrNewer(candidate, pkg.version));
  const evidence = [`osv:${vuln.id}`, ...(vuln.aliases ?? []).map((alias) => `alias:${alias}`)];
  const advisory = vuln.references?.find((ref) => ref.type === "ADVISORY" && ref.url)?.url;
  if (advisory) {
    evidence.push(`advisory:${advisory}`);
  }

  return {
    packageName: pkg.name,
    packageVersion: pkg.version,
    findingType: malicious ? "malicious_package" : "vulnerability",
    severity: malicious ? "critical" : vulnerabilitySeverity(vuln),
    description: vuln.summary ?? vuln.details?.split("\n")[0] ?? vuln.id,
    detectionMethod: "rule_based",
    confidence: malicious ? 1 : 0.95,
    evidence,
    ...(malicious
      ? { remediation: `Remove ${pkg.name} and rotate any credentials exposed to it.` }
      : fixed
        ? { remediation: `Upgrade ${pkg.name} to >= ${fixed}.` }
        : {})
  };
}

/** Known vulnerabilities and malicious-package advisories from OSV. */
export class VulnerabilityStage implements StageExecutor {
  constructor(
    private readonly provider: VulnerabilityProvider,
    private readonly logger?: Logger
  ) {}

  async execute(input: StageInput): Promise<Finding[]> {
    const queries: Array<OsvPackageQuery & { pkg: PackageIdentity }> = [];
    for (const pkg of input.packages) {
      const ecosystem = osvEcosystem(pkg);
      if (ecosystem && hasKnownVersion(pkg)) {
        queries.push({ ecosystem, name: pkg.name, version: pkg.version, pkg });
      }
    }
    if (queries.length === 0) {
      return [];
    }

    const matches = await this.provider.queryPackages(queries, input.signal);
    throwIfAborted(input.signal);

    const pairs: Array<{ pkg: PackageIdentity; id: string; modified?: string }> = [];
    for (const query of queries) {
      for (const match of matches.get(queryKey(query)) ?? []) {
        pairs.push({ pkg: query.pkg, id: match.id, modified: match.modified });
      }
    }
    this.logger?.debug({ queried: queries.length, matched: pairs.length }, "osv lookup complete");

    return mapInBatches(pairs, DETAIL_CONCURRENCY, input.signal, async (pair) => {
      const vuln = await this.provider.getVuln(pair.id, pair.modified, input.signal);
      return toVulnerabilityFinding(vuln, pair.pkg);
    });
  }
}
