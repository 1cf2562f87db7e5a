import type { Logger } from "../core/logger";
import { Finding, PackageIdentity } from "../core/types";
import { MetadataSource, PackageMetadata } from "../registry/client";
import { StageExecutor, StageInput } from "../pipeline/types";
import { daysBetween, mapInBatches, registryPackages } from "./util";

const REGISTRY_CONCURRENCY = 8;

export type ReputationFactors = {
  age: number;
  downloads: number;
  author: number;
  maintenance: number;
};

export type ReputationScore = {
  score: number;
  factors: ReputationFactors;
  flags: string[];
};

function ageScore(metadata: PackageMetadata, now: Date): number {
  if (!metadata.createdAt) {
    return 0.5;
  }
  const days = daysBetween(new Date(metadata.createdAt), now);
  if (Number.isNaN(days)) {
    return 0.5;
  }
  if (days < 30) {
    return 0.2;
  }
  if (days < 90) {
    return 0.5;
  }
  if (days < 365) {
    return 0.7;
  }
  if (days < 730) {
    return 0.9;
  }
  return 1;
}

function downloadsScore(metadata: PackageMetadata): number {
  const weekly = metadata.weeklyDownloads;
  if (weekly === undefined) {
    return 0.5;
  }
  if (weekly < 100) {
    return 0.2;
  }
  if (weekly < 1_000) {
    return 0.5;
  }
  if (weekly < 10_000) {
    return 0.7;
  }
  if (weekly < 100_000) {
    return 0.9;
  }
  return 1;
}

function authorScore(metadata: PackageMetadata): number {
  if (metadata.maintainers.length > 1 || metadata.publishedByOrganization) {
    return 1;
  }
  return metadata.author ? 0.8 : 0.3;
}

function maintenanceScore(metadata: PackageMetadata, now: Date): number {
  if (!metadata.modifiedAt) {
    return 0.5;
  }
  const days = daysBetween(new Date(metadata.modifiedAt), now);
  if (Number.isNaN(days)) {
    return 0.5;
  }
  if (days > 730) {
    return 0.2;
  }
  if (days > 365) {
    return 0.5;
  }
  if (days > 180) {
    return 0.7;
  }
  return 1;
}

/** Weighted 0..1 trust score: age and downloads 0.3 each, author and maintenance 0.2 each. */
export function scoreReputation(metadata: PackageMetadata, now: Date = new Date()): ReputationScore {
  const factors: ReputationFactors = {
    age: ageScore(metadata, now),
    downloads: downloadsScore(metadata),
    author: authorScore(metadata),
    maintenance: maintenanceScore(metadata, now)
  };
  const score = factors.age * 0.3 + factors.downloads * 0.3 + factors.author * 0.2 + factors.maintenance * 0.2;

  const flags: string[] = [];
  if (factors.age < 0.5) {
    flags.push("new_package");
  }
  if (factors.downloads < 0.5) {
    flags.push("low_downloads");
  }
  if (factors.author < 0.5) {
    flags.push("unknown_author");
  }
  if (factors.maintenance < 0.5) {
    flags.push("unmaintained");
  }

  return { score: Math.round(score * 1000) / 1000, factors, flags };
}

export function toReputationFinding(pkg: PackageIdentity, result: ReputationScore): Finding | undefined {
  if (result.score >= 0.5) {
    return undefined;
  }
  const severity = result.score < 0.3 ? "high" : "medium";
  return {
    packageName: pkg.name,
    packageVersion: pkg.version,
    findingType: "low_reputation",
    severity,
    description: `${pkg.name} has a low reputation score (${result.score.toFixed(2)})`,
    detectionMethod: "rule_based",
    confidence: 0.7,
    evidence: [`reputation-score:${result.score}`, ...result.flags.map((flag) => `flag:${flag}`)],
    remediation: "Review the package's maintainers and source before depending on it."
  };
}

/** Registry-metadata trust scoring. */
export class ReputationStage implements StageExecutor {
  constructor(
    private readonly registry: MetadataSource,
    private readonly logger?: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async execute(input: StageInput): Promise<Finding[]> {
    const candidates = registryPackages(input.packages);
    const results = await mapInBatches(candidates, REGISTRY_CONCURRENCY, input.signal, async (pkg) => {
      const metadata = await this.registry.fetchMetadata(pkg.name, pkg.ecosystem, pkg.version, input.signal);
      if (!metadata) {
        this.logger?.debug({ package: pkg.name }, "no registry metadata");
        return undefined;
      }
      return toReputationFinding(pkg, scoreReputation(metadata, this.now()));
    });
    return results.filter((finding): finding is Finding => finding !== undefined);
  }
}
