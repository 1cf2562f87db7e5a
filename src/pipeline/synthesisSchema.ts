import { SynthesisValidationError } from "../core/errors";
import { Finding, RiskLevel, SynthesisResult } from "../core/types";
import { summarizeFindings } from "./fallback";

const RISK_LEVELS: RiskLevel[] = ["CRITICAL", "HIGH", "MEDIUM", "LOW"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRiskLevel(value: unknown): RiskLevel | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const upper = value.trim().toUpperCase();
  return RISK_LEVELS.find((level) => level === upper);
}

const FENCED_BLOCK = /^```[A-Za-z]*\s*\n?([\s\S]*?)\n?\s*```$/;

/** Models often wrap JSON in a markdown code block, with or without a language tag. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

function decode(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  try {
    return JSON.parse(stripCodeFence(value));
  } catch {
    throw new SynthesisValidationError("output is not valid JSON");
  }
}

/**
 * Checks a synthesis executor's output. Severity counts are always recomputed from
 * the accumulated findings rather than trusted from the executor.
 */
export function parseSynthesisResult(
  raw: unknown,
  findings: readonly Finding[],
  totalPackages: number
): SynthesisResult {
  const value = decode(raw);
  if (!isRecord(value)) {
    throw new SynthesisValidationError("output is not an object");
  }

  const assessment = value.riskAssessment;
  if (!isRecord(assessment)) {
    throw new SynthesisValidationError("riskAssessment is missing");
  }
  const overallRisk = toRiskLevel(assessment.overallRisk);
  if (!overallRisk) {
    throw new SynthesisValidationError("riskAssessment.overallRisk is not a known risk level");
  }
  const riskScore = assessment.riskScore;
  if (typeof riskScore !== "number" || !Number.isFinite(riskScore) || riskScore < 0 || riskScore > 1) {
    throw new SynthesisValidationError("riskAssessment.riskScore must be a number between 0 and 1");
  }
  const reasoning = typeof assessment.reasoning === "string" ? assessment.reasoning : "";

  const recommendations = value.recommendations;
  if (!Array.isArray(recommendations) || recommendations.length === 0) {
    throw new SynthesisValidationError("recommendations must be a non-empty list");
  }
  if (!recommendations.every((entry): entry is string => typeof entry === "string" && entry.trim().length > 0)) {
    throw new SynthesisValidationError("recommendations must be non-empty strings");
  }

  return {
    source: value.source === "local" ? "local" : "model",
    summary: summarizeFindings(findings, totalPackages),
    riskAssessment: { overallRisk, riskScore, reasoning },
    recommendations
  };
}
