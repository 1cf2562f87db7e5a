import { severityRank } from "../core/findings";
import { OsvSeverity, OsvVulnerability, Severity } from "../core/types";

type WeightTable = Readonly<Record<string, number>>;

const ATTACK_VECTOR: WeightTable = { N: 0.85, A: 0.62, L: 0.55, P: 0.2 };
const ATTACK_COMPLEXITY: WeightTable = { L: 0.77, H: 0.44 };
const USER_INTERACTION: WeightTable = { N: 0.85, R: 0.62 };
const IMPACT: WeightTable = { N: 0, L: 0.22, H: 0.56 };
const PRIVILEGES_CHANGED: WeightTable = { N: 0.85, L: 0.68, H: 0.5 };
const PRIVILEGES_UNCHANGED: WeightTable = { N: 0.85, L: 0.62, H: 0.27 };

function weight(table: WeightTable, key: string | undefined): number | undefined {
  if (key === undefined || !Object.prototype.hasOwnProperty.call(table, key)) {
    return undefined;
  }
  return table[key];
}

function parseSeverityLabel(text: string): Severity | undefined {
  const lower = text.toLowerCase();
  if (lower.includes("critical")) {
    return "critical";
  }
  if (lower.includes("high")) {
    return "high";
  }
  if (lower.includes("medium") || lower.includes("moderate")) {
    return "medium";
  }
  if (lower.includes("low")) {
    return "low";
  }
  return undefined;
}

function parseNumericCvssScore(score: string): number | undefined {
  const trimmed = score.trim();
  if (!/^(10(?:\.0+)?|[0-9](?:\.[0-9]+)?)$/.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

function roundUpOneDecimal(value: number): number {
  return Math.ceil(value * 10 - 1e-10) / 10;
}

/** CVSS v3.x base score from a vector string. */
export function cvssV3BaseScore(vector: string): number | undefined {
  const trimmed = vector.trim().toUpperCase();
  if (!trimmed.startsWith("CVSS:3.0/") && !trimmed.startsWith("CVSS:3.1/")) {
    return undefined;
  }

  const metrics = new Map<string, string>();
  for (const part of trimmed.split("/").slice(1)) {
    const [key, value] = part.split(":");
    if (key && value) {
      metrics.set(key, value);
    }
  }

  const scope = metrics.get("S");
  if (scope !== "U" && scope !== "C") {
    return undefined;
  }

  const av = weight(ATTACK_VECTOR, metrics.get("AV"));
  const ac = weight(ATTACK_COMPLEXITY, metrics.get("AC"));
  const ui = weight(USER_INTERACTION, metrics.get("UI"));
  const pr = weight(scope === "C" ? PRIVILEGES_CHANGED : PRIVILEGES_UNCHANGED, metrics.get("PR"));
  const c = weight(IMPACT, metrics.get("C"));
  const i = weight(IMPACT, metrics.get("I"));
  const a = weight(IMPACT, metrics.get("A"));
  if (av === undefined || ac === undefined || ui === undefined || pr === undefined) {
    return undefined;
  }
  if (c === undefined || i === undefined || a === undefined) {
    return undefined;
  }

  const impact = 1 - (1 - c) * (1 - i) * (1 - a);
  if (impact <= 0) {
    return 0;
  }

  const impactSubScore =
    scope === "U" ? 6.42 * impact : 7.52 * (impact - 0.029) - 3.25 * Math.pow(impact - 0.02, 15);
  const exploitability = 8.22 * av * ac * pr * ui;
  const base =
    scope === "U"
      ? Math.min(impactSubScore + exploitability, 10)
      : Math.min(1.08 * (impactSubScore + exploitability), 10);

  return roundUpOneDecimal(base);
}

export function scoreToSeverity(score: number): Severity | undefined {
  if (score >= 9) {
    return "critical";
  }
  if (score >= 7) {
    return "high";
  }
  if (score >= 4) {
    return "medium";
  }
  if (score > 0) {
    return "low";
  }
  return undefined;
}

function severityEntryToLevel(severity: OsvSeverity): Severity | undefined {
  const fromLabel = parseSeverityLabel(severity.score);
  if (fromLabel) {
    return fromLabel;
  }
  const numeric = parseNumericCvssScore(severity.score) ?? cvssV3BaseScore(severity.score);
  return numeric === undefined ? undefined : scoreToSeverity(numeric);
}

/**
 * Highest severity an OSV record carries, from its CVSS entries or the database
 * label. Records with neither fall back to `fallback`.
 */
export function vulnerabilitySeverity(vuln: OsvVulnerability, fallback: Severity = "medium"): Severity {
  let best: Severity | undefined;
  for (const entry of vuln.severity ?? []) {
    const level = severityEntryToLevel(entry);
    if (level && (!best || severityRank(level) > severityRank(best))) {
      best = level;
    }
  }

  if (!best && vuln.database_specific?.severity) {
    best = parseSeverityLabel(vuln.database_specific.severity);
  }
  return best ?? fallback;
}
