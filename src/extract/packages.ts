import { Ecosystem, Finding, PackageIdentity, PackageSource, UNKNOWN_VERSION } from "../core/types";
import { DependencyGraph, packageIdentity } from "../graph/graph";

type Candidate = {
  name: string;
  version?: string;
  ecosystem?: Ecosystem;
  depth?: number;
};

type Draft = {
  name: string;
  version: string;
  ecosystem?: Ecosystem;
  depth?: number;
  sources: PackageSource[];
};

function fillMissing(target: Draft, from: Candidate | Draft): void {
  if (target.ecosystem === undefined && from.ecosystem !== undefined) {
    target.ecosystem = from.ecosystem;
  }
  if (target.depth === undefined && from.depth !== undefined) {
    target.depth = from.depth;
  }
}

function addSource(target: Draft, source: PackageSource): void {
  if (!target.sources.includes(source)) {
    target.sources.push(source);
  }
}

/**
 * Merges package identities from the initial findings and the graph into one list
 * keyed by `name@version`. The first source to mention an identity owns its
 * fields; later sources only fill gaps.
 */
export function extractPackages(initialFindings: readonly Finding[], graph?: DependencyGraph): PackageIdentity[] {
  const drafts = new Map<string, Draft>();

  const add = (candidate: Candidate, source: PackageSource): void => {
    const name = candidate.name.trim();
    if (name.length === 0) {
      return;
    }
    const version = candidate.version?.trim() || UNKNOWN_VERSION;
    const id = packageIdentity(name, version);
    const existing = drafts.get(id);
    if (existing) {
      fillMissing(existing, candidate);
      addSource(existing, source);
      return;
    }
    drafts.set(id, { ...candidate, name, version, sources: [source] });
  };

  for (const finding of initialFindings) {
    add({ name: finding.packageName, version: finding.packageVersion }, "finding");
  }

  if (graph) {
    for (const node of graph.nodes.values()) {
      add({ name: node.name, version: node.version, ecosystem: node.ecosystem, depth: node.depth }, "graph-node");
    }
    for (const entry of graph.packageList()) {
      add(entry, "package-list");
    }
  }

  const graphEcosystem = graph?.singleEcosystem();
  for (const draft of drafts.values()) {
    if (draft.ecosystem === undefined && graphEcosystem !== undefined) {
      draft.ecosystem = graphEcosystem;
      addSource(draft, "metadata");
    }
  }

  const firstKnown = new Map<string, Draft>();
  for (const draft of drafts.values()) {
    if (draft.version !== UNKNOWN_VERSION && !firstKnown.has(draft.name)) {
      firstKnown.set(draft.name, draft);
    }
  }

  const kept: Draft[] = [];
  for (const draft of drafts.values()) {
    const known = draft.version === UNKNOWN_VERSION ? firstKnown.get(draft.name) : undefined;
    if (!known) {
      kept.push(draft);
      continue;
    }
    fillMissing(known, draft);
    for (const source of draft.sources) {
      addSource(known, source);
    }
  }

  const output: PackageIdentity[] = kept.map((draft) => ({
    name: draft.name,
    version: draft.version,
    ecosystem: draft.ecosystem ?? "other",
    ...(draft.depth !== undefined ? { depth: draft.depth } : {}),
    sources: draft.sources
  }));

  return output;
}
