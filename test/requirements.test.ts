import { afterEach, describe, expect, it } from "vitest";
import { RequirementsTxtProvider, normalizePythonName, parseRequirementLine, parseRequirements } from "../src/deps/requirements";
import { cleanupTempDirs, writeProject } from "./helpers";

afterEach(async () => {
  await cleanupTempDirs();
});

describe("requirements parsing", () => {
  it("normalizes names", () => {
    expect(normalizePythonName("Zope.Interface__Extra")).toBe("zope-interface-extra");
  });

  it("reads pins, ranges, extras and markers", () => {
    expect(parseRequirementLine("Requests==2.31.0")).toEqual({ name: "requests", version: "2.31.0" });
    expect(parseRequirementLine("urllib3===1.26.0  # pinned")).toEqual({ name: "urllib3", version: "1.26.0" });
    expect(parseRequirementLine("uvicorn[standard]==0.30.1")).toEqual({ name: "uvicorn", version: "0.30.1" });
    expect(parseRequirementLine('pywin32==306 ; sys_platform == "win32"')).toEqual({ name: "pywin32", version: "306" });
    expect(parseRequirementLine("django>=4.2,<5")).toEqual({ name: "django", version: "unknown" });
    expect(parseRequirementLine("flask==2.*")).toEqual({ name: "flask", version: "unknown" });
  });

  it("skips comments, options and URLs", () => {
    expect(parseRequirementLine("# comment")).toBeUndefined();
    expect(parseRequirementLine("-r base.txt")).toBeUndefined();
    expect(parseRequirementLine("--index-url https://pypi.example/simple")).toBeUndefined();
    expect(parseRequirementLine("https://example.test/pkg.whl")).toBeUndefined();
  });

  it("joins continuation lines", () => {
    expect(parseRequirements("six==1.16.0 \\\n    --hash=sha256:test\nidna\n")).toEqual([
      { name: "six", version: "1.16.0" },
      { name: "idna", version: "unknown" }
    ]);
  });
});

describe("RequirementsTxtProvider", () => {
  it("emits one root edge per requirement", async () => {
    const root = await writeProject({ "requirements.txt": "requests==2.31.0\nPyYAML\n" });
    const result = await new RequirementsTxtProvider().load(root);

    expect(result.edges).toEqual([
      { parent: null, name: "requests", version: "2.31.0", ecosystem: "pypi" },
      { parent: null, name: "pyyaml", version: "unknown", ecosystem: "pypi" }
    ]);
    expect(result.warnings).toEqual([]);
  });

  it("warns about an empty file", async () => {
    const root = await writeProject({ "requirements.txt": "# nothing yet\n" });
    const result = await new RequirementsTxtProvider().load(root);

    expect(result.edges).toEqual([]);
    expect(result.warnings).toEqual([`No requirements found in ${result.manifestPath}.`]);
  });
});
