import { compareFindings } from "../core/findings";
import { Finding } from "../core/types";
import { ChatMessage, ChatModel } from "../llm/client";
import { fallbackSynthesis } from "../pipeline/fallback";
import { StageInput, SynthesisExecutor } from "../pipeline/types";

const DIGEST_LIMIT = 40;

const SYSTEM_PROMPT = [
  "You are a software supply-chain security analyst.",
  "Given findings from automated dependency checks, assess the overall project risk.",
  "Answer with one JSON object of the form",
  '{"riskAssessment":{"overallRisk":"CRITICAL|HIGH|MEDIUM|LOW","riskScore":0.0,"reasoning":"..."},"recommendations":["..."]}',
  "where riskScore is between 0 and 1. Do not add any other text."
].join(" ");

type DigestEntry = Pick<Finding, "packageName" | "packageVersion" | "findingType" | "severity" | "description"> & {
  evidence: string[];
};

export function findingDigest(findings: readonly Finding[], limit = DIGEST_LIMIT): DigestEntry[] {
  return [...findings]
    .sort(compareFindings)
    .slice(0, limit)
    .map((finding) => ({
      packageName: finding.packageName,
      packageVersion: finding.packageVersion,
      findingType: finding.findingType,
      severity: finding.severity,
      description: finding.description,
      evidence: finding.evidence.slice(0, 5)
    }));
}

export function synthesisMessages(input: StageInput): ChatMessage[] {
  const payload = {
    packagesAnalyzed: input.packages.length,
    totalFindings: input.findings.length,
    findings: findingDigest(input.findings)
  };
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: JSON.stringify(payload) }
  ];
}

/** Asks a chat model for the risk assessment; the orchestrator checks the answer. */
export class ModelSynthesisStage implements SynthesisExecutor {
  constructor(private readonly model: ChatModel) {}

  async synthesize(input: StageInput): Promise<unknown> {
    return this.model.complete(synthesisMessages(input), { signal: input.signal });
  }
}

/** Deterministic synthesis for runs without a configured model. */
export class LocalSynthesisStage implements SynthesisExecutor {
  async synthesize(input: StageInput): Promise<unknown> {
    return fallbackSynthesis(input.findings, input.packages.length, "local");
  }
}
