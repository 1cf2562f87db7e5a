import { describe, expect, it } from "vitest";
import { SynthesisValidationError } from "../src/core/errors";
import { Finding } from "../src/core/types";
import { ChatMessage, ChatModel, CompletionOptions } from "../src/llm/client";
import { assessRisk, fallbackSynthesis, recommend, summarizeFindings } from "../src/pipeline/fallback";
import { parseSynthesisResult, stripCodeFence } from "../src/pipeline/synthesisSchema";
import { findingDigest, ModelSynthesisStage, synthesisMessages } from "../src/stages/synthesis";

function finding(overrides: Partial<Finding>): Finding {
  return {
    packageName: "pkg",
    packageVersion: "1.0.0",
    findingType: "vulnerability",
    severity: "medium",
    description: "",
    detectionMethod: "rule_based",
    confidence: 1,
    evidence: [],
    ...overrides
  };
}

describe("fallback synthesis", () => {
  it("counts findings by severity", () => {
    const summary = summarizeFindings(
      [finding({ severity: "critical" }), finding({ severity: "low" }), finding({ severity: "low" })],
      7
    );
    expect(summary).toEqual({ totalPackages: 7, totalFindings: 3, critical: 1, high: 0, medium: 0, low: 2 });
  });

  it("rates several high findings as HIGH", () => {
    const findings = [
      finding({ severity: "high", packageName: "a" }),
      finding({ severity: "high", packageName: "b" }),
      finding({ severity: "high", packageName: "c" })
    ];
    expect(assessRisk(findings, summarizeFindings(findings, 3))).toEqual({
      overallRisk: "HIGH",
      riskScore: 0.76,
      reasoning: "0 critical, 3 high, 0 medium, 0 low findings; several high-severity issues."
    });
  });

  it("caps the critical score at 1", () => {
    const findings = Array.from({ length: 20 }, (_, index) =>
      finding({ severity: "critical", findingType: "malicious_package", packageName: `m${index}` })
    );
    expect(assessRisk(findings, summarizeFindings(findings, 20)).riskScore).toBe(1);
  });

  it("rates many medium findings as MEDIUM", () => {
    const findings = Array.from({ length: 4 }, (_, index) => finding({ packageName: `p${index}` }));
    expect(assessRisk(findings, summarizeFindings(findings, 4))).toMatchObject({ overallRisk: "MEDIUM", riskScore: 0.54 });
  });

  it("leads with targeted recommendations", () => {
    const findings = [
      finding({ severity: "critical", findingType: "malicious_script", packageName: "evil" }),
      finding({ severity: "high", packageName: "old" })
    ];
    const recommendations = recommend(findings, summarizeFindings(findings, 2));

    expect(recommendations.slice(0, 3)).toEqual([
      "URGENT: Address 1 critical security finding. These may indicate active security threats.",
      "Remove 1 identified malicious package immediately. Scan systems for signs of compromise and review all dependencies.",
      "Update 1 package with high-severity findings to patched versions. Prioritize based on severity and exploitability."
    ]);
    expect(recommendations).toHaveLength(8);
  });

  it("tags the source", () => {
    expect(fallbackSynthesis([], 0).source).toBe("fallback");
    expect(fallbackSynthesis([], 0, "local").source).toBe("local");
  });
});

describe("parseSynthesisResult", () => {
  const valid = {
    riskAssessment: { overallRisk: "LOW", riskScore: 0.1, reasoning: "fine" },
    recommendations: ["Keep going."]
  };

  it("accepts local output and keeps its source", () => {
    expect(parseSynthesisResult({ ...valid, source: "local" }, [], 3).source).toBe("local");
  });

  it.each<{ label: string; raw: string }>([
    { label: "a json-tagged fence", raw: "```json\n" + JSON.stringify(valid) + "\n```" },
    { label: "a bare fence", raw: "\n```\n" + JSON.stringify(valid, null, 2) + "\n```\n" }
  ])("accepts model output wrapped in $label", ({ raw }) => {
    expect(parseSynthesisResult(raw, [], 0)).toMatchObject({
      source: "model",
      riskAssessment: { overallRisk: "LOW", riskScore: 0.1, reasoning: "fine" },
      recommendations: ["Keep going."]
    });
  });

  it("trims unfenced text and unwraps a fenced block", () => {
    expect(stripCodeFence('  {"a":1} ')).toBe('{"a":1}');
    expect(stripCodeFence("```json\n[1]\n```")).toBe("[1]");
  });

  it.each<{ raw: unknown; reason: string }>([
    { raw: "not json", reason: "output is not valid JSON" },
    { raw: [1, 2], reason: "output is not an object" },
    {
      raw: { ...valid, riskAssessment: { ...valid.riskAssessment, overallRisk: "SEVERE" } },
      reason: "riskAssessment.overallRisk is not a known risk level"
    },
    {
      raw: { ...valid, riskAssessment: { ...valid.riskAssessment, riskScore: 1.5 } },
      reason: "riskAssessment.riskScore must be a number between 0 and 1"
    },
    { raw: { ...valid, recommendations: [] }, reason: "recommendations must be a non-empty list" },
    { raw: { ...valid, recommendations: ["ok", " "] }, reason: "recommendations must be non-empty strings" }
  ])("rejects output when $reason", ({ raw, reason }) => {
    expect(() => parseSynthesisResult(raw, [], 0)).toThrow(new SynthesisValidationError(reason).message);
  });
});

class RecordingModel implements ChatModel {
  calls: Array<{ messages: ChatMessage[]; options?: CompletionOptions }> = [];

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
    this.calls.push({ messages, options });
    return '{"riskAssessment":{"overallRisk":"LOW","riskScore":0.2,"reasoning":"ok"},"recommendations":["r"]}';
  }
}

describe("ModelSynthesisStage", () => {
  it("sends a digest of the findings and passes the stage signal", async () => {
    const model = new RecordingModel();
    const controller = new AbortController();
    const input = {
      packages: [],
      findings: [finding({ severity: "low", packageName: "b" }), finding({ severity: "critical", packageName: "a" })],
      timeoutMs: 1_000,
      signal: controller.signal
    };

    const raw = await new ModelSynthesisStage(model).synthesize(input);

    expect(typeof raw).toBe("string");
    expect(model.calls[0].options?.signal).toBe(controller.signal);
    expect(model.calls[0].messages).toEqual(synthesisMessages(input));
    const payload: unknown = JSON.parse(model.calls[0].messages[1].content);
    expect(payload).toMatchObject({ packagesAnalyzed: 0, totalFindings: 2 });
    expect(findingDigest(input.findings).map((entry) => entry.packageName)).toEqual(["a", "b"]);
  });
});
