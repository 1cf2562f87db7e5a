import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { DependencyEdgeRecord, UNKNOWN_VERSION } from "../core/types";
import { DetectResult, EdgeSource, EdgeSourceResult, InstallScriptPackage } from "./provider";

type DependencySection = "dependencies" | "devDependencies" | "optionalDependencies" | "peerDependencies";

const IMPORTER_SECTIONS: DependencySection[] = [
  "dependencies",
  "devDependencies",
  "optionalDependencies",
  "peerDependencies"
];
const PACKAGE_SECTIONS: DependencySection[] = ["dependencies", "optionalDependencies", "peerDependencies"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function lockfileMajorVersion(lockfileVersion: unknown): number {
  if (typeof lockfileVersion === "number") {
    return Math.floor(lockfileVersion);
  }
  if (typeof lockfileVersion === "string") {
    const parsed = Number.parseInt(lockfileVersion, 10);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function normalizePnpmKey(key: string): string {
  return key.startsWith("/") ? key.slice(1) : key;
}

export function stripPeerSuffix(version: string): string {
  let out = version;
  if (out.startsWith("npm:")) {
    out = out.slice(4);
  }
  const underscoreIndex = out.indexOf("_");
  if (underscoreIndex >= 0) {
    out = out.slice(0, underscoreIndex);
  }
  const parenIndex = out.indexOf("(");
  if (parenIndex >= 0) {
    out = out.slice(0, parenIndex);
  }
  return out;
}

/** Package keys: `name@1.0.0(peer)` from v6 on, `/name/1.0.0_peer` before. */
export function parsePackageKey(key: string): { name: string; version: string } | undefined {
  const normalized = normalizePnpmKey(key).split("(")[0];
  const scopeEnd = normalized.startsWith("@") ? normalized.indexOf("/") + 1 : 0;
  if (normalized.startsWith("@") && scopeEnd === 0) {
    return undefined;
  }
  const rest = normalized.slice(scopeEnd);
  const separator = rest.search(/[@/]/);
  if (separator <= 0) {
    return undefined;
  }
  const name = normalized.slice(0, scopeEnd) + rest.slice(0, separator);
  const version = stripPeerSuffix(rest.slice(separator + 1));
  return version ? { name, version } : undefined;
}

function dependencyRef(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (isRecord(value) && typeof value.version === "string") {
    return value.version;
  }
  return undefined;
}

/** Package a dependency reference resolves to, `undefined` for local links. */
export function resolveDependencyRef(depName: string, ref: string): { name: string; version: string } | undefined {
  if (ref.startsWith("link:") || ref.startsWith("workspace:")) {
    return undefined;
  }
  if (ref.startsWith("file:") || ref.startsWith("git") || ref.startsWith("http")) {
    return { name: depName, version: UNKNOWN_VERSION };
  }
  const bare = normalizePnpmKey(stripPeerSuffix(ref));
  // aliases and older path-style refs carry the real package name
  if (bare.includes("@") || bare.includes("/")) {
    return parsePackageKey(bare) ?? { name: depName, version: UNKNOWN_VERSION };
  }
  return { name: depName, version: bare || UNKNOWN_VERSION };
}

async function readImporterManifest(rootDir: string, importerKey: string): Promise<{ name: string; version: string }> {
  const importerDir = importerKey === "." ? rootDir : path.resolve(rootDir, importerKey);
  const fallback = { name: path.basename(importerDir), version: "0.0.0" };
  const raw = await fs.readFile(path.join(importerDir, "package.json"), "utf8").catch(() => undefined);
  if (!raw) {
    return fallback;
  }
  try {
    const manifest: unknown = JSON.parse(raw);
    if (!isRecord(manifest)) {
      return fallback;
    }
    return {
      name: typeof manifest.name === "string" && manifest.name.length > 0 ? manifest.name : fallback.name,
      version: typeof manifest.version === "string" && manifest.version.length > 0 ? manifest.version : fallback.version
    };
  } catch {
    return fallback;
  }
}

export class PnpmLockfileProvider implements EdgeSource {
  readonly name = "pnpm";

  async detect(rootDir: string): Promise<DetectResult | null> {
    const manifestPath = path.join(rootDir, "pnpm-lock.yaml");
    const stat = await fs.stat(manifestPath).catch(() => null);
    return stat?.isFile() ? { source: "pnpm", manifestPath } : null;
  }

  async load(rootDir: string): Promise<EdgeSourceResult> {
    const detected = await this.detect(rootDir);
    if (!detected) {
      throw new Error(`pnpm lockfile not found in ${rootDir}`);
    }

    const parsed: unknown = parseYaml(await fs.readFile(detected.manifestPath, "utf8"));
    const lockfile = toRecord(parsed);
    const importers = toRecord(lockfile.importers);
    const packages = toRecord(lockfile.packages);
    const snapshots = toRecord(lockfile.snapshots);
    const isV9 = lockfileMajorVersion(lockfile.lockfileVersion) >= 9 || Object.keys(snapshots).length > 0;

    const edges: DependencyEdgeRecord[] = [];
    const installScripts: InstallScriptPackage[] = [];
    const warnings: string[] = [];

    const addSections = (parent: string | null, entry: Record<string, unknown>, sections: DependencySection[]): void => {
      for (const section of sections) {
        for (const [depName, value] of Object.entries(toRecord(entry[section]))) {
          const ref = dependencyRef(value);
          if (!ref) {
            continue;
          }
          const target = resolveDependencyRef(depName, ref);
          if (!target) {
            continue;
          }
          edges.push({ parent, name: target.name, version: target.version, ecosystem: "npm" });
        }
      }
    };

    // older lockfiles without `importers` keep the root's dependencies at top level
    const importerEntries = Object.keys(importers).length > 0 ? Object.entries(importers) : [[".", lockfile] as const];
    for (const [importerKey, importerValue] of importerEntries) {
      const entry = toRecord(importerValue);
      if (importerKey === ".") {
        addSections(null, entry, IMPORTER_SECTIONS);
        continue;
      }
      const manifest = await readImporterManifest(rootDir, importerKey);
      edges.push({ parent: null, name: manifest.name, version: manifest.version, ecosystem: "npm" });
      addSections(`${manifest.name}@${manifest.version}`, entry, IMPORTER_SECTIONS);
    }

    const packageEntries = isV9 ? snapshots : packages;
    for (const [key, value] of Object.entries(packageEntries)) {
      const parsedKey = parsePackageKey(key);
      if (!parsedKey) {
        warnings.push(`Skipping unrecognized pnpm package key "${key}".`);
        continue;
      }
      const entry = toRecord(value);
      const info = isV9 ? toRecord(packages[normalizePnpmKey(key).split("(")[0]]) : entry;
      if (info.requiresBuild === true || info.hasInstallScript === true) {
        installScripts.push(parsedKey);
      }
      addSections(`${parsedKey.name}@${parsedKey.version}`, entry, PACKAGE_SECTIONS);
    }

    return { edges, manifestPath: detected.manifestPath, installScripts, warnings };
  }
}
