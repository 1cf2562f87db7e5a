import fs from "node:fs/promises";
import path from "node:path";
import { DependencyEdgeRecord, UNKNOWN_VERSION } from "../core/types";
import { DetectResult, EdgeSource, EdgeSourceResult } from "./provider";

export type Requirement = {
  name: string;
  version: string;
};

const NAME_PATTERN = /^([A-Za-z0-9][A-Za-z0-9._-]*)/;

/** PyPI names compare case-insensitively with runs of `-`, `_` and `.` folded. */
export function normalizePythonName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

function stripComment(line: string): string {
  const hash = line.search(/(^|\s)#/);
  return (hash >= 0 ? line.slice(0, hash) : line).trim();
}

/**
 * Parses one requirement line. Options (`-r`, `--index-url`), URLs and editable
 * installs return undefined; only `==` and `===` pins give a version.
 */
export function parseRequirementLine(rawLine: string): Requirement | undefined {
  const line = stripComment(rawLine);
  if (!line || line.startsWith("-") || line.includes("://")) {
    return undefined;
  }

  // per-requirement options such as --hash follow the specifier
  const withoutMarker = line.split(";")[0].split(/\s--?[a-z]/)[0].trim();
  const match = NAME_PATTERN.exec(withoutMarker);
  if (!match) {
    return undefined;
  }

  const name = normalizePythonName(match[1]);
  const specifier = withoutMarker.slice(match[1].length).replace(/^\s*\[[^\]]*\]/, "").trim();
  const pin = /^===?\s*([^\s,]+)$/.exec(specifier);
  const version = pin && !pin[1].includes("*") ? pin[1] : UNKNOWN_VERSION;
  return { name, version };
}

export function parseRequirements(text: string): Requirement[] {
  const out: Requirement[] = [];
  // backslash continuations join physical lines
  for (const line of text.replace(/\\\r?\n/g, " ").split(/\r?\n/)) {
    const requirement = parseRequirementLine(line);
    if (requirement) {
      out.push(requirement);
    }
  }
  return out;
}

export class RequirementsTxtProvider implements EdgeSource {
  readonly name = "pip";

  async detect(rootDir: string): Promise<DetectResult | null> {
    const manifestPath = path.join(rootDir, "requirements.txt");
    const stat = await fs.stat(manifestPath).catch(() => null);
    return stat?.isFile() ? { source: "pip", manifestPath } : null;
  }

  async load(rootDir: string): Promise<EdgeSourceResult> {
    const detected = await this.detect(rootDir);
    if (!detected) {
      throw new Error(`requirements.txt not found in ${rootDir}`);
    }

    const requirements = parseRequirements(await fs.readFile(detected.manifestPath, "utf8"));
    const edges: DependencyEdgeRecord[] = requirements.map((requirement) => ({
      parent: null,
      name: requirement.name,
      version: requirement.version,
      ecosystem: "pypi"
    }));
    const warnings = requirements.length === 0 ? [`No requirements found in ${detected.manifestPath}.`] : [];

    // requirements.txt declares no install hooks
    return { edges, manifestPath: detected.manifestPath, installScripts: [], warnings };
  }
}
