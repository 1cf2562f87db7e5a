import fs from "node:fs/promises";
import path from "node:path";
import { NpmArboristProvider } from "./npmArborist";
import { PnpmLockfileProvider } from "./pnpm";
import { DetectResult, EdgeSource, EdgeSourceName, EdgeSourceResult } from "./provider";
import { RequirementsTxtProvider } from "./requirements";

type EdgeSourceSelection = {
  source: EdgeSource;
  detected: DetectResult;
  warnings: string[];
};

const PRIORITY: EdgeSourceName[] = ["pnpm", "npm", "pip"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeManager(packageManager: unknown): EdgeSourceName | undefined {
  if (typeof packageManager !== "string" || packageManager.length === 0) {
    return undefined;
  }
  const [name] = packageManager.split("@", 1);
  if (name === "npm" || name === "pnpm") {
    return name;
  }
  return undefined;
}

async function readPackageManagerField(projectRoot: string): Promise<EdgeSourceName | undefined> {
  const raw = await fs.readFile(path.join(projectRoot, "package.json"), "utf8").catch(() => undefined);
  if (!raw) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? normalizeManager(parsed.packageManager) : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Picks the manifest to analyze. `package.json#packageManager` wins when its
 * lockfile exists; otherwise the first detected source in pnpm, npm, pip order.
 */
export class EdgeSourceRegistry {
  private readonly sources: EdgeSource[];

  constructor(sources: EdgeSource[] = [new PnpmLockfileProvider(), new NpmArboristProvider(), new RequirementsTxtProvider()]) {
    this.sources = sources;
  }

  async select(projectRoot: string): Promise<EdgeSourceSelection | null> {
    const [preferred, detections] = await Promise.all([
      readPackageManagerField(projectRoot),
      Promise.all(this.sources.map(async (source) => ({ source, detected: await source.detect(projectRoot) })))
    ]);

    const available = detections.filter(
      (item): item is { source: EdgeSource; detected: DetectResult } => item.detected !== null
    );
    if (available.length === 0) {
      return null;
    }

    const detectedSources = available.map((item) => item.detected.source);
    const warnings: string[] = [];
    if (preferred && !detectedSources.includes(preferred)) {
      warnings.push(
        `package.json#packageManager is "${preferred}" but matching lockfile was not found; falling back to detected manifest.`
      );
    }

    let reason = "based on package.json#packageManager";
    let chosen = preferred ? available.find((item) => item.detected.source === preferred) : undefined;
    if (!chosen) {
      reason = "by default priority order";
      for (const name of PRIORITY) {
        chosen = available.find((item) => item.detected.source === name);
        if (chosen) {
          break;
        }
      }
    }
    const selected = chosen ?? available[0];

    if (available.length > 1) {
      warnings.unshift(
        `Multiple manifests detected (${detectedSources.join(", ")}). Using ${selected.detected.source} ${reason}.`
      );
    }
    return { ...selected, warnings };
  }

  async detect(projectRoot: string): Promise<DetectResult | null> {
    const selected = await this.select(projectRoot);
    return selected?.detected ?? null;
  }

  async load(projectRoot: string): Promise<EdgeSourceResult> {
    const selected = await this.select(projectRoot);
    if (!selected) {
      throw new Error(
        `No supported manifest found in ${projectRoot}. Expected one of: pnpm-lock.yaml, package-lock.json, npm-shrinkwrap.json, requirements.txt.`
      );
    }
    const result = await selected.source.load(projectRoot);
    return { ...result, warnings: [...selected.warnings, ...result.warnings] };
  }
}
