import {
  CircularDependency,
  DependencyGraphSummary,
  Ecosystem,
  GraphNode,
  GraphPackage,
  UNKNOWN_VERSION,
  VersionConflict
} from "../core/types";

export function packageIdentity(name: string, version: string): string {
  return `${name}@${version || UNKNOWN_VERSION}`;
}

/** Splits `name@version`; a leading `@` belongs to a scoped name. */
export function parseIdentity(id: string): { name: string; version: string } {
  const at = id.lastIndexOf("@");
  if (at <= 0) {
    return { name: id, version: UNKNOWN_VERSION };
  }
  const version = id.slice(at + 1);
  return { name: id.slice(0, at), version: version.length > 0 ? version : UNKNOWN_VERSION };
}

export type DependencyGraphInit = {
  nodes: Map<string, GraphNode>;
  rootIds: string[];
  circularDependencies: CircularDependency[];
  versionConflicts: VersionConflict[];
  malformedEdgeCount: number;
};

function frozenCopy(values: string[]): string[] {
  const copy = [...values];
  Object.freeze(copy);
  return copy;
}

function freezeCycle(entry: CircularDependency): CircularDependency {
  return Object.freeze({ ...entry, cycle: frozenCopy(entry.cycle) });
}

function freezeConflict(entry: VersionConflict): VersionConflict {
  const copy = { ...entry, versions: [...entry.versions], paths: entry.paths.map(frozenCopy) };
  Object.freeze(copy.versions);
  Object.freeze(copy.paths);
  return Object.freeze(copy);
}

/**
 * Arena of package nodes keyed by identity. Children are identity references into
 * the same arena, so cycles in the relation never become ownership cycles.
 * Instances are frozen on construction.
 */
export class DependencyGraph {
  readonly nodes: ReadonlyMap<string, GraphNode>;
  readonly rootIds: readonly string[];
  readonly circularDependencies: readonly CircularDependency[];
  readonly versionConflicts: readonly VersionConflict[];
  readonly malformedEdgeCount: number;
  readonly metadata: { readonly ecosystems: readonly Ecosystem[] };

  constructor(init: DependencyGraphInit) {
    this.nodes = init.nodes;
    this.rootIds = Object.freeze([...init.rootIds]);
    this.circularDependencies = Object.freeze(init.circularDependencies.map(freezeCycle));
    this.versionConflicts = Object.freeze(init.versionConflicts.map(freezeConflict));
    this.malformedEdgeCount = init.malformedEdgeCount;

    const ecosystems: Ecosystem[] = [];
    for (const node of init.nodes.values()) {
      if (!ecosystems.includes(node.ecosystem)) {
        ecosystems.push(node.ecosystem);
      }
    }
    this.metadata = Object.freeze({ ecosystems: Object.freeze(ecosystems) });
    Object.freeze(this);
  }

  get packageCount(): number {
    return this.nodes.size;
  }

  get(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  children(id: string): GraphNode[] {
    const node = this.nodes.get(id);
    if (!node) {
      return [];
    }
    const out: GraphNode[] = [];
    for (const childId of node.dependencies.values()) {
      const child = this.nodes.get(childId);
      if (child) {
        out.push(child);
      }
    }
    return out;
  }

  /** The graph's ecosystem when every node shares one. */
  singleEcosystem(): Ecosystem | undefined {
    return this.metadata.ecosystems.length === 1 ? this.metadata.ecosystems[0] : undefined;
  }

  packageList(): GraphPackage[] {
    return Array.from(this.nodes.values(), (node) => ({
      name: node.name,
      version: node.version,
      ecosystem: node.ecosystem
    }));
  }

  summary(): DependencyGraphSummary {
    return {
      packageCount: this.packageCount,
      circularDependencyCount: this.circularDependencies.length,
      versionConflictCount: this.versionConflicts.length,
      malformedEdgeCount: this.malformedEdgeCount
    };
  }
}

export function emptyGraph(): DependencyGraph {
  return new DependencyGraph({
    nodes: new Map(),
    rootIds: [],
    circularDependencies: [],
    versionConflicts: [],
    malformedEdgeCount: 0
  });
}
