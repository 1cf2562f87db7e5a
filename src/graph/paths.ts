import { GraphNode } from "../core/types";
import { DependencyGraph } from "./graph";

type GraphView = {
  nodes: ReadonlyMap<string, GraphNode>;
  rootIds: readonly string[];
};

/** Breadth-first root-to-target paths, rendered as identities. */
export function findPathsIn(view: GraphView, targetId: string, maxPaths = 3): string[][] {
  const output: string[][] = [];
  if (!view.nodes.has(targetId)) {
    return output;
  }

  const queue: string[][] = view.rootIds.map((rootId) => [rootId]);
  while (queue.length > 0 && output.length < maxPaths) {
    const nodePath = queue.shift();
    if (!nodePath) {
      continue;
    }

    const current = nodePath[nodePath.length - 1];
    if (current === targetId) {
      output.push(nodePath);
      continue;
    }

    const node = view.nodes.get(current);
    if (!node) {
      continue;
    }
    for (const childId of node.dependencies.values()) {
      if (nodePath.includes(childId)) {
        continue;
      }
      queue.push([...nodePath, childId]);
    }
  }

  return output;
}

export function findDependencyPaths(graph: DependencyGraph, targetId: string, maxPaths = 3): string[][] {
  return findPathsIn(graph, targetId, maxPaths);
}

export type PackageTrace = {
  id: string;
  depth: number;
  paths: string[][];
};

/** Every version of `name` in the graph, with the paths that pull it in. */
export function tracePackage(graph: DependencyGraph, name: string, maxPaths = 10): PackageTrace[] {
  const traces: PackageTrace[] = [];
  for (const node of graph.nodes.values()) {
    if (node.name !== name) {
      continue;
    }
    traces.push({ id: node.id, depth: node.depth, paths: findPathsIn(graph, node.id, maxPaths) });
  }
  return traces;
}
