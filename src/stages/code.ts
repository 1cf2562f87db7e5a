import type { Logger } from "../core/logger";
import { Finding, PackageIdentity } from "../core/types";
import { MetadataSource } from "../registry/client";
import { StageExecutor, StageInput } from "../pipeline/types";
import { hasKnownVersion, mapInBatches, registryPackages } from "./util";

const REGISTRY_CONCURRENCY = 8;
const SCRIPT_EXCERPT_LENGTH = 200;

export const LIFECYCLE_HOOKS = ["preinstall", "install", "postinstall", "prepublish", "prepare"] as const;
const INSTALL_HOOK_PATTERN = /\b(preinstall|install|postinstall)\b/;

export type ScriptTechnique =
  | "remote_shell"
  | "base64_decode"
  | "eval_execution"
  | "process_spawning"
  | "network_activity"
  | "env_access"
  | "file_access";

const TECHNIQUE_PATTERNS: Record<ScriptTechnique, RegExp[]> = {
  remote_shell: [/\b(curl|wget)\b[^|;&]*\|\s*(ba|z)?sh\b/i, /\b(iwr|invoke-webrequest)\b.*\|\s*iex\b/i],
  base64_decode: [/\batob\s*\(/, /Buffer\.from\s*\([^,]+,\s*["']base64["']/, /\bbase64\s+(-d|--decode)\b/],
  eval_execution: [/\beval\s*\(/, /\bnew\s+Function\s*\(/, /\bnode\s+-e\b/],
  process_spawning: [/child_process/, /\b(exec|execSync|spawn|spawnSync|fork)\s*\(/],
  network_activity: [/https?:\/\/[^\s'"]+/, /\bfetch\s*\(/, /\bhttps?\.request\b/, /\bnet\.connect\b/, /\b(curl|wget)\b/],
  env_access: [/process\.env\b/, /\$\{?[A-Z_]*(TOKEN|SECRET|KEY|PASSWORD)[A-Z_]*\}?/],
  file_access: [/fs\.(readFile|writeFile|unlink)/, /~\/\.(ssh|npmrc|aws)/, /\/etc\/passwd/]
};

const TECHNIQUES: ScriptTechnique[] = [
  "remote_shell",
  "base64_decode",
  "eval_execution",
  "process_spawning",
  "network_activity",
  "env_access",
  "file_access"
];

export function detectTechniques(script: string): ScriptTechnique[] {
  return TECHNIQUES.filter((technique) => TECHNIQUE_PATTERNS[technique].some((pattern) => pattern.test(script)));
}

function isCritical(techniques: ScriptTechnique[]): boolean {
  const has = (technique: ScriptTechnique): boolean => techniques.includes(technique);
  if (has("remote_shell")) {
    return true;
  }
  if ((has("eval_execution") || has("process_spawning")) && has("network_activity")) {
    return true;
  }
  return has("env_access") && has("network_activity");
}

export function inspectScripts(pkg: PackageIdentity, scripts: Record<string, string>): Finding[] {
  const findings: Finding[] = [];
  for (const hook of LIFECYCLE_HOOKS) {
    const script = scripts[hook];
    if (!script) {
      continue;
    }
    const techniques = detectTechniques(script);
    if (techniques.length === 0) {
      continue;
    }

    findings.push({
      packageName: pkg.name,
      packageVersion: pkg.version,
      findingType: "malicious_script",
      severity: isCritical(techniques) || techniques.length >= 3 ? "critical" : "high",
      description: `${hook} script of ${pkg.name} uses ${techniques.join(", ")}`,
      detectionMethod: "rule_based",
      confidence: techniques.length >= 2 ? 0.85 : 0.6,
      evidence: [
        `hook:${hook}`,
        ...techniques.map((technique) => `technique:${technique}`),
        `script:${script.slice(0, SCRIPT_EXCERPT_LENGTH)}`
      ],
      remediation: `Audit the ${hook} script before installing; install with --ignore-scripts until it is cleared.`
    });
  }
  return findings;
}

/** True when a finding points at an install-time script. */
export function hasSuspiciousScriptEvidence(finding: Finding): boolean {
  if (finding.findingType === "malicious_script") {
    return true;
  }
  return finding.evidence.some((entry) => INSTALL_HOOK_PATTERN.test(entry));
}

/** Rule-based findings for packages a lockfile marks as running install scripts. */
export function installScriptFindings(packages: ReadonlyArray<{ name: string; version: string }>): Finding[] {
  return packages.map((pkg): Finding => ({
    packageName: pkg.name,
    packageVersion: pkg.version,
    findingType: "supply_chain_risk",
    severity: "low",
    description: `${pkg.name} runs a script at install time`,
    detectionMethod: "rule_based",
    confidence: 1,
    evidence: ["lockfile:hasInstallScript", "hook:install"]
  }));
}

/** Inspects install lifecycle scripts published with each package version. */
export class CodeStage implements StageExecutor {
  constructor(
    private readonly registry: MetadataSource,
    private readonly logger?: Logger
  ) {}

  async execute(input: StageInput): Promise<Finding[]> {
    const flagged = new Set(input.findings.filter(hasSuspiciousScriptEvidence).map((finding) => finding.packageName));
    const candidates = registryPackages(input.packages, ["npm"]).filter(
      (pkg) => hasKnownVersion(pkg) && (flagged.size === 0 || flagged.has(pkg.name))
    );
    this.logger?.debug({ candidates: candidates.length }, "inspecting lifecycle scripts");

    const perPackage = await mapInBatches(candidates, REGISTRY_CONCURRENCY, input.signal, async (pkg) => {
      const metadata = await this.registry.fetchMetadata(pkg.name, pkg.ecosystem, pkg.version, input.signal);
      return metadata ? inspectScripts(pkg, metadata.scripts) : [];
    });
    return perPackage.flat();
  }
}
