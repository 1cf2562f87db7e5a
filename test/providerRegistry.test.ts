import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { EdgeSourceRegistry } from "../src/deps/registry";
import { cleanupTempDirs, makeTempDir, writeProject } from "./helpers";

afterEach(async () => {
  await cleanupTempDirs();
});

const PNPM_LOCKFILE = `lockfileVersion: '9.0'
importers:
  .:
    dependencies:
      a:
        specifier: ^1.0.0
        version: 1.0.0
packages:
  a@1.0.0:
    resolution: {integrity: sha512-test}
snapshots:
  a@1.0.0: {}
`;
const NPM_LOCKFILE = JSON.stringify({ name: "mixed", lockfileVersion: 3, packages: { "": { version: "1.0.0" } } });

describe("EdgeSourceRegistry", () => {
  it("prefers pnpm when several manifests exist without packageManager", async () => {
    const root = await writeProject({ "pnpm-lock.yaml": PNPM_LOCKFILE, "package-lock.json": NPM_LOCKFILE });
    const selected = await new EdgeSourceRegistry().select(root);

    expect(selected?.source.name).toBe("pnpm");
    expect(selected?.warnings).toEqual(["Multiple manifests detected (pnpm, npm). Using pnpm by default priority order."]);
  });

  it("honors packageManager when its lockfile exists", async () => {
    const root = await writeProject({
      "package.json": JSON.stringify({ name: "mixed", packageManager: "npm@10.8.0" }),
      "pnpm-lock.yaml": PNPM_LOCKFILE,
      "package-lock.json": NPM_LOCKFILE
    });
    const selected = await new EdgeSourceRegistry().select(root);

    expect(selected?.detected).toEqual({ source: "npm", manifestPath: path.join(root, "package-lock.json") });
    expect(selected?.warnings).toEqual([
      "Multiple manifests detected (pnpm, npm). Using npm based on package.json#packageManager."
    ]);
  });

  it("warns when packageManager names a missing lockfile", async () => {
    const root = await writeProject({
      "package.json": JSON.stringify({ name: "py", packageManager: "pnpm@9.0.0" }),
      "requirements.txt": "requests==2.31.0\n"
    });
    const result = await new EdgeSourceRegistry().load(root);

    expect(result.edges).toEqual([{ parent: null, name: "requests", version: "2.31.0", ecosystem: "pypi" }]);
    expect(result.warnings).toEqual([
      'package.json#packageManager is "pnpm" but matching lockfile was not found; falling back to detected manifest.'
    ]);
  });

  it("puts selection warnings before the source's own", async () => {
    const root = await writeProject({ "pnpm-lock.yaml": PNPM_LOCKFILE, "requirements.txt": "" });
    const result = await new EdgeSourceRegistry().load(root);

    expect(result.manifestPath).toBe(path.join(root, "pnpm-lock.yaml"));
    expect(result.warnings).toEqual(["Multiple manifests detected (pnpm, pip). Using pnpm by default priority order."]);
  });

  it("reports the supported manifests when none is found", async () => {
    const root = await makeTempDir("chainwarden-empty-");

    expect(await new EdgeSourceRegistry().detect(root)).toBeNull();
    await expect(new EdgeSourceRegistry().load(root)).rejects.toThrow(
      `No supported manifest found in ${root}. Expected one of: pnpm-lock.yaml, package-lock.json, npm-shrinkwrap.json, requirements.txt.`
    );
  });
});
