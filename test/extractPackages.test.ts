import { describe, expect, it } from "vitest";
import { Finding } from "../src/core/types";
import { extractPackages } from "../src/extract/packages";
import { GraphBuilder } from "../src/graph/builder";

function finding(packageName: string, packageVersion: string): Finding {
  return {
    packageName,
    packageVersion,
    findingType: "supply_chain_risk",
    severity: "low",
    description: "",
    detectionMethod: "rule_based",
    confidence: 1,
    evidence: []
  };
}

describe("extractPackages", () => {
  it("merges finding and graph identities, filling gaps from later sources", () => {
    const graph = new GraphBuilder().build([
      { parent: null, name: "app", version: "1.0.0", ecosystem: "npm" },
      { parent: "app@1.0.0", name: "dep", version: "2.0.0", ecosystem: "npm" }
    ]);

    expect(extractPackages([finding("dep", "2.0.0")], graph)).toEqual([
      { name: "dep", version: "2.0.0", ecosystem: "npm", depth: 1, sources: ["finding", "graph-node", "package-list"] },
      { name: "app", version: "1.0.0", ecosystem: "npm", depth: 0, sources: ["graph-node", "package-list"] }
    ]);
  });

  it("folds an unknown-version entry into a known version of the same name", () => {
    const graph = new GraphBuilder().build([{ parent: null, name: "lib", version: "3.1.0", ecosystem: "pypi" }]);

    expect(extractPackages([finding("lib", "unknown")], graph)).toEqual([
      { name: "lib", version: "3.1.0", ecosystem: "pypi", depth: 0, sources: ["graph-node", "package-list", "finding", "metadata"] }
    ]);
  });

  it("defaults the ecosystem to other without a graph", () => {
    expect(extractPackages([finding("solo", "1.0.0"), finding("solo", "1.0.0")])).toEqual([
      { name: "solo", version: "1.0.0", ecosystem: "other", sources: ["finding"] }
    ]);
  });

  it("leaves the ecosystem open when the graph mixes ecosystems", () => {
    const graph = new GraphBuilder().build([
      { parent: null, name: "web", version: "1.0.0", ecosystem: "npm" },
      { parent: null, name: "api", version: "1.0.0", ecosystem: "pypi" }
    ]);

    const [first] = extractPackages([finding("tool", "0.1.0")], graph);
    expect(first).toEqual({ name: "tool", version: "0.1.0", ecosystem: "other", sources: ["finding"] });
  });
});
