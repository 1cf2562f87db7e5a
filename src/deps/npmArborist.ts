import fs from "node:fs/promises";
import path from "node:path";
import Arborist from "@npmcli/arborist";
import { DependencyEdgeRecord } from "../core/types";
import { DetectResult, EdgeSource, EdgeSourceResult, InstallScriptPackage } from "./provider";

type ArboristEdge = {
  name?: string;
  type?: string;
  to?: ArboristNode | null;
};

type ArboristNode = {
  location: string;
  name?: string;
  packageName?: string;
  version?: string;
  isLink?: boolean;
  target?: ArboristNode | null;
  hasInstallScript?: boolean;
  edgesOut?: Map<string, ArboristEdge>;
  inventory?: {
    values: () => IterableIterator<ArboristNode>;
  };
};

function resolveTarget(node: ArboristNode): ArboristNode {
  return node.isLink && node.target ? node.target : node;
}

function nodeName(node: ArboristNode): string | undefined {
  const name = node.packageName ?? node.name;
  return name && name.length > 0 ? name : undefined;
}

function identityOf(node: ArboristNode): string | undefined {
  const name = nodeName(node);
  return name ? `${name}@${node.version || "unknown"}` : undefined;
}

/** npm lockfiles through Arborist's virtual tree; the project's direct dependencies are the roots. */
export class NpmArboristProvider implements EdgeSource {
  readonly name = "npm";

  async detect(rootDir: string): Promise<DetectResult | null> {
    for (const file of ["package-lock.json", "npm-shrinkwrap.json"]) {
      const manifestPath = path.join(rootDir, file);
      const stat = await fs.stat(manifestPath).catch(() => null);
      if (stat?.isFile()) {
        return { source: "npm", manifestPath };
      }
    }
    return null;
  }

  async load(rootDir: string): Promise<EdgeSourceResult> {
    const detected = await this.detect(rootDir);
    if (!detected) {
      throw new Error(`npm lockfile not found in ${rootDir}`);
    }

    const arb = new Arborist({ path: rootDir });
    const rootNode = (await arb.loadVirtual()) as ArboristNode;
    const inventory = rootNode.inventory ? Array.from(rootNode.inventory.values()) : [rootNode];

    const edges: DependencyEdgeRecord[] = [];
    const installScripts: InstallScriptPackage[] = [];
    const rootLocation = rootNode.location;

    for (const node of inventory) {
      if (node.isLink) {
        continue;
      }
      let parent: string | null = null;
      if (node.location !== rootLocation) {
        const id = identityOf(node);
        const name = nodeName(node);
        if (!id || !name) {
          continue;
        }
        parent = id;
        if (node.hasInstallScript) {
          installScripts.push({ name, version: node.version || "unknown" });
        }
      }

      for (const edge of node.edgesOut?.values() ?? []) {
        if (!edge.to) {
          continue;
        }
        const target = resolveTarget(edge.to);
        edges.push({
          parent,
          name: nodeName(target) ?? edge.name ?? "",
          version: target.version,
          ecosystem: "npm"
        });
      }
    }

    return { edges, manifestPath: detected.manifestPath, installScripts, warnings: [] };
  }
}
