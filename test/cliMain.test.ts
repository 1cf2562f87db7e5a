import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CliIo, loadInitialFindings, runCli } from "../src/cli/main";
import { cleanupTempDirs, makeTempDir, writeProject } from "./helpers";

afterEach(async () => {
  await cleanupTempDirs();
});

const LOCKFILE = `lockfileVersion: '9.0'
importers:
  .:
    dependencies:
      a:
        specifier: ^1.0.0
        version: 1.0.0
packages:
  a@1.0.0:
    resolution: {integrity: sha512-test}
  b@2.0.0:
    resolution: {integrity: sha512-test}
    requiresBuild: true
snapshots:
  a@1.0.0:
    dependencies:
      b: 2.0.0
  b@2.0.0: {}
`;

const ADVISORY = {
  id: "GHSA-test-0001",
  modified: "2025-01-01T00:00:00Z",
  summary: "Prototype pollution",
  severity: [{ type: "CVSS_V3", score: "CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H" }],
  affected: [{ package: { ecosystem: "npm", name: "a" }, ranges: [{ type: "SEMVER", events: [{ introduced: "0" }, { fixed: "1.2.3" }] }] }]
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

/** Answers OSV for package `a` and 404s every registry lookup. */
function makeFetch(calls: string[]): typeof fetch {
  return async (input, init) => {
    const url = requestUrl(input);
    calls.push(url);
    if (url.endsWith("/v1/querybatch")) {
      const body: unknown = JSON.parse(typeof init?.body === "string" ? init.body : "{}");
      const queries = isRecord(body) && Array.isArray(body.queries) ? body.queries : [];
      const results = queries.map((query: unknown) =>
        isRecord(query) && isRecord(query.package) && query.package.name === "a"
          ? { vulns: [{ id: ADVISORY.id, modified: ADVISORY.modified }] }
          : {}
      );
      return new Response(JSON.stringify({ results }), { status: 200 });
    }
    if (url.endsWith(`/v1/vulns/${ADVISORY.id}`)) {
      return new Response(JSON.stringify(ADVISORY), { status: 200 });
    }
    return new Response("not found", { status: 404 });
  };
}

type CapturedIo = CliIo & { out: string[]; err: string[]; calls: string[] };

function makeIo(cwd: string): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  const calls: string[] = [];
  return {
    out,
    err,
    calls,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
    cwd,
    env: {},
    fetchImpl: makeFetch(calls)
  };
}

async function run(io: CapturedIo, ...args: string[]): Promise<number> {
  return runCli(["node", "chainwarden", ...args], io);
}

describe("chainwarden analyze", () => {
  it("reports vulnerabilities and install scripts in text form", async () => {
    const root = await writeProject({ "pnpm-lock.yaml": LOCKFILE });
    const cacheDir = await makeTempDir("chainwarden-cli-cache-");
    const io = makeIo(root);

    const code = await run(io, "analyze", "--cache-dir", cacheDir, "--log-level", "silent");
    const lines = io.out.join("").split("\n");

    expect(code).toBe(1);
    expect(lines.slice(0, 2)).toEqual(["Packages: 2", "Findings: 2"]);
    expect(lines).toContain("Graph: packages=2, cycles=0, conflicts=0, malformed=0");
    expect(lines).toContain("CRITICAL  vulnerability  a@1.0.0  Prototype pollution");
    expect(lines).toContain("  fix: Upgrade a to >= 1.2.3.");
    expect(lines).toContain("LOW  supply_chain_risk  b@2.0.0  b runs a script at install time");
    expect(io.calls.filter((url) => url.startsWith("https://registry.npmjs.org/"))).toEqual([
      "https://registry.npmjs.org/a",
      "https://registry.npmjs.org/b"
    ]);
    expect(io.err).toEqual([]);
  });

  it("embeds the dependency graph in JSON output and exits 0", async () => {
    const root = await writeProject({ "pnpm-lock.yaml": LOCKFILE });
    const io = makeIo(root);

    const code = await run(io, "analyze", "--format", "json", "--cache-dir", await makeTempDir("chainwarden-cli-cache-"), "--log-level", "silent");
    const payload: unknown = JSON.parse(io.out.join(""));

    expect(code).toBe(0);
    expect(payload).toMatchObject({
      packagesAnalyzed: 2,
      synthesis: { source: "local" },
      dependencyGraph: [
        {
          name: "a",
          depth: 0,
          dependencies: { b: { name: "b", version: "2.0.0", depth: 1, dependencies: {}, circularReference: false } }
        }
      ]
    });
  });

  it("filters the exit code by severity threshold", async () => {
    const root = await writeProject({ "requirements.txt": "requests\n" });
    const io = makeIo(root);

    const code = await run(io, "analyze", "--severity-threshold", "high", "--cache-dir", await makeTempDir("chainwarden-cli-cache-"), "--log-level", "silent");

    expect(code).toBe(0);
    expect(io.out.join("").split("\n")).toContain("No findings.");
  });

  it("merges findings from a file", async () => {
    const root = await writeProject({
      "requirements.txt": "requests==2.31.0\n",
      "rules.json": JSON.stringify({
        findings: [
          {
            packageName: "requests",
            packageVersion: "2.31.0",
            findingType: "supply_chain_risk",
            severity: "medium",
            description: "flagged by policy",
            detectionMethod: "rule_based",
            confidence: 0.5,
            evidence: []
          },
          { packageName: "" }
        ]
      })
    });
    const io = makeIo(root);

    const code = await run(io, "analyze", "--findings", "rules.json", "--cache-dir", await makeTempDir("chainwarden-cli-cache-"), "--log-level", "silent");

    expect(code).toBe(1);
    expect(io.out.join("").split("\n")).toContain("MEDIUM  supply_chain_risk  requests@2.31.0  flagged by policy");
    expect(io.err).toEqual([`Warning: skipped 1 invalid finding(s) in ${path.join(root, "rules.json")}.\n`]);
  });

  it("exits 2 when no manifest is found", async () => {
    const root = await makeTempDir("chainwarden-cli-empty-");
    const io = makeIo(root);

    expect(await run(io, "analyze")).toBe(2);
    expect(io.err).toEqual([
      `Error: No supported manifest found in ${root}. Expected one of: pnpm-lock.yaml, package-lock.json, npm-shrinkwrap.json, requirements.txt.\n`
    ]);
  });

  it("exits 2 on invalid options", async () => {
    const io = makeIo(await makeTempDir("chainwarden-cli-empty-"));

    expect(await run(io, "analyze", "--budget", "soon")).toBe(2);
    expect(io.err).toEqual(['Error: Invalid --budget value "soon": expected a positive integer.\n']);
  });

  it("prints the version", async () => {
    const io = makeIo(await makeTempDir("chainwarden-cli-empty-"));

    expect(await run(io, "--version")).toBe(0);
    expect(io.out).toEqual(["0.1.0\n"]);
  });
});

describe("chainwarden graph and trace", () => {
  it("prints the graph as Mermaid", async () => {
    const root = await writeProject({ "pnpm-lock.yaml": LOCKFILE });
    const io = makeIo(root);

    expect(await run(io, "graph", "--format", "mermaid", "--log-level", "silent")).toBe(0);
    expect(io.out.join("")).toBe(
      ["graph TD", '    N0["a@1.0.0"]', "    style N0 fill:#e1f5ff", '    N1["b@2.0.0"]', "    N0 --> N1", ""].join("\n")
    );
    expect(io.calls).toEqual([]);
  });

  it("traces the paths to a package", async () => {
    const root = await writeProject({ "pnpm-lock.yaml": LOCKFILE });
    const io = makeIo(root);

    expect(await run(io, "trace", "b", "--log-level", "silent")).toBe(0);
    expect(io.out.join("")).toBe("b@2.0.0 (depth 1)\n  a@1.0.0 -> b@2.0.0\n");
  });

  it("exits 1 for a package outside the graph", async () => {
    const root = await writeProject({ "pnpm-lock.yaml": LOCKFILE });
    const io = makeIo(root);

    expect(await run(io, "trace", "zzz", "--log-level", "silent")).toBe(1);
    expect(io.out).toEqual(["zzz is not in the dependency graph.\n"]);
  });
});

describe("loadInitialFindings", () => {
  it("accepts a bare array", async () => {
    const root = await writeProject({
      "findings.json": JSON.stringify([
        {
          packageName: "x",
          packageVersion: "1.0.0",
          findingType: "vulnerability",
          severity: "low",
          description: "",
          detectionMethod: "rule_based",
          confidence: 1,
          evidence: []
        }
      ])
    });
    const err: string[] = [];

    const findings = await loadInitialFindings(path.join(root, "findings.json"), { stderr: (text) => err.push(text) });

    expect(findings.map((finding) => finding.packageName)).toEqual(["x"]);
    expect(err).toEqual([]);
  });

  it("rejects documents without a findings list", async () => {
    const root = await writeProject({ "findings.json": JSON.stringify({ items: [] }), "broken.json": "{" });
    const file = path.join(root, "findings.json");

    await expect(loadInitialFindings(file, { stderr: () => undefined })).rejects.toThrow(
      `Findings file ${file} must contain an array of findings.`
    );
    await expect(loadInitialFindings(path.join(root, "broken.json"), { stderr: () => undefined })).rejects.toThrow(
      "is not valid JSON"
    );
  });
});
