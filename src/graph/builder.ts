import { MalformedEdgeError } from "../core/errors";
import type { Logger } from "../core/logger";
import {
  CircularDependency,
  DependencyEdgeRecord,
  Ecosystem,
  GraphNode,
  UNKNOWN_VERSION,
  VersionConflict
} from "../core/types";
import { DependencyGraph, packageIdentity, parseIdentity } from "./graph";
import { findPathsIn } from "./paths";

type EdgeTarget = {
  id: string;
  name: string;
  version: string;
  ecosystem: Ecosystem;
};

type MutableNode = Omit<GraphNode, "dependencies"> & {
  dependencies: Map<string, string>;
};

type ShadowedEdge = {
  parentId: string;
  target: EdgeTarget;
};

type Frame = {
  node: MutableNode;
  edges: EdgeTarget[];
  next: number;
};

export type GraphBuilderOptions = {
  logger?: Logger;
  /** Example paths kept per conflicting version. */
  conflictPathLimit?: number;
};

function normalizeVersion(version: unknown): string {
  if (typeof version !== "string") {
    return UNKNOWN_VERSION;
  }
  const trimmed = version.trim();
  return trimmed.length > 0 ? trimmed : UNKNOWN_VERSION;
}

export class GraphBuilder {
  private readonly logger: Logger | undefined;
  private readonly conflictPathLimit: number;

  constructor(options: GraphBuilderOptions = {}) {
    this.logger = options.logger;
    this.conflictPathLimit = options.conflictPathLimit ?? 3;
  }

  build(edges: Iterable<DependencyEdgeRecord>): DependencyGraph {
    const adjacency = new Map<string, EdgeTarget[]>();
    const parentOrder: string[] = [];
    const parentEcosystem = new Map<string, Ecosystem>();
    const childIds = new Set<string>();
    const declaredRoots: EdgeTarget[] = [];
    let malformedEdgeCount = 0;

    for (const record of edges) {
      const name = typeof record.name === "string" ? record.name.trim() : "";
      if (name.length === 0) {
        malformedEdgeCount += 1;
        const error = new MalformedEdgeError(`edge from ${record.parent ?? "(root)"} has no package name`);
        this.logger?.debug({ err: error }, "skipping malformed dependency edge");
        continue;
      }

      const version = normalizeVersion(record.version);
      const target: EdgeTarget = { id: packageIdentity(name, version), name, version, ecosystem: record.ecosystem };

      if (record.parent === null) {
        declaredRoots.push(target);
        continue;
      }

      childIds.add(target.id);
      const list = adjacency.get(record.parent);
      if (list) {
        list.push(target);
      } else {
        adjacency.set(record.parent, [target]);
        parentOrder.push(record.parent);
        parentEcosystem.set(record.parent, record.ecosystem);
      }
    }

    if (malformedEdgeCount > 0) {
      this.logger?.warn({ malformedEdgeCount }, "skipped malformed dependency edges");
    }

    const nodes = new Map<string, MutableNode>();
    const rootIds: string[] = [];
    const circularDependencies: CircularDependency[] = [];
    const shadowed: ShadowedEdge[] = [];

    const materialize = (target: EdgeTarget, depth: number): MutableNode => {
      const node: MutableNode = {
        id: target.id,
        name: target.name,
        version: target.version,
        ecosystem: target.ecosystem,
        depth,
        dependencies: new Map()
      };
      nodes.set(node.id, node);
      return node;
    };

    const insertFrom = (root: MutableNode): void => {
      const stack: Frame[] = [{ node: root, edges: adjacency.get(root.id) ?? [], next: 0 }];
      const onStack = new Set<string>([root.id]);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        if (frame.next >= frame.edges.length) {
          stack.pop();
          onStack.delete(frame.node.id);
          continue;
        }

        const edge = frame.edges[frame.next];
        frame.next += 1;
        const parent = frame.node;
        const bound = parent.dependencies.get(edge.name);
        if (bound !== undefined) {
          if (bound !== edge.id) {
            // one child per name; the losing version still counts as a conflict
            shadowed.push({ parentId: parent.id, target: edge });
          }
          continue;
        }

        if (onStack.has(edge.id)) {
          parent.dependencies.set(edge.name, edge.id);
          const start = stack.findIndex((entry) => entry.node.id === edge.id);
          const cycle = stack.slice(start).map((entry) => entry.node.id);
          cycle.push(edge.id);
          circularDependencies.push({ from: parent.id, to: edge.id, cycle });
          continue;
        }

        const existing = nodes.get(edge.id);
        if (existing) {
          // first-seen depth wins
          parent.dependencies.set(edge.name, existing.id);
          continue;
        }

        const child = materialize(edge, parent.depth + 1);
        parent.dependencies.set(edge.name, child.id);
        stack.push({ node: child, edges: adjacency.get(child.id) ?? [], next: 0 });
        onStack.add(child.id);
      }
    };

    const startRoot = (target: EdgeTarget): void => {
      if (nodes.has(target.id)) {
        if (!rootIds.includes(target.id)) {
          rootIds.push(target.id);
        }
        return;
      }
      rootIds.push(target.id);
      insertFrom(materialize(target, 0));
    };

    const parentTarget = (id: string): EdgeTarget => {
      const { name, version } = parseIdentity(id);
      return { id, name, version, ecosystem: parentEcosystem.get(id) ?? "other" };
    };

    for (const root of declaredRoots) {
      startRoot(root);
    }
    for (const parentId of parentOrder) {
      if (!childIds.has(parentId)) {
        startRoot(parentTarget(parentId));
      }
    }
    // cycles with no entry point
    for (const parentId of parentOrder) {
      if (!nodes.has(parentId)) {
        startRoot(parentTarget(parentId));
      }
    }

    const versionConflicts = this.findVersionConflicts(nodes, rootIds, shadowed);
    for (const node of nodes.values()) {
      Object.freeze(node);
    }

    return new DependencyGraph({
      nodes,
      rootIds,
      circularDependencies,
      versionConflicts,
      malformedEdgeCount
    });
  }

  private findVersionConflicts(
    nodes: Map<string, MutableNode>,
    rootIds: string[],
    shadowed: ShadowedEdge[]
  ): VersionConflict[] {
    const versionsByName = new Map<string, Map<string, { version: string; paths: Array<() => string[][]> }>>();
    const addVariant = (name: string, version: string, id: string, paths: () => string[][]): void => {
      if (version === UNKNOWN_VERSION) {
        return;
      }
      let variants = versionsByName.get(name);
      if (!variants) {
        variants = new Map();
        versionsByName.set(name, variants);
      }
      const variant = variants.get(id);
      if (variant) {
        variant.paths.push(paths);
      } else {
        variants.set(id, { version, paths: [paths] });
      }
    };

    // paths are only walked for names that turn out to conflict
    const view = { nodes, rootIds };
    for (const node of nodes.values()) {
      addVariant(node.name, node.version, node.id, () => findPathsIn(view, node.id, this.conflictPathLimit));
    }
    for (const { parentId, target } of shadowed) {
      if (nodes.has(target.id)) {
        continue;
      }
      addVariant(target.name, target.version, target.id, () =>
        findPathsIn(view, parentId, this.conflictPathLimit).map((path) => [...path, target.id])
      );
    }

    const conflicts: VersionConflict[] = [];
    for (const [packageName, variants] of versionsByName) {
      if (variants.size < 2) {
        continue;
      }
      const versions: string[] = [];
      const paths: string[][] = [];
      for (const variant of variants.values()) {
        versions.push(variant.version);
        paths.push(...variant.paths.flatMap((walk) => walk()).slice(0, this.conflictPathLimit));
      }
      conflicts.push({ packageName, versions, paths });
    }
    return conflicts;
  }
}
