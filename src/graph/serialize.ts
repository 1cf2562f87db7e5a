import { GraphNode, SerializedNode } from "../core/types";
import { DependencyGraph } from "./graph";

export const DEFAULT_MAX_DEPTH = 10;

function terminal(node: GraphNode, circularReference: boolean): SerializedNode {
  const record: SerializedNode = {
    name: node.name,
    version: node.version,
    ecosystem: node.ecosystem,
    depth: node.depth,
    dependencies: {},
    circularReference
  };
  if (!circularReference) {
    record.truncated = true;
  }
  return record;
}

function walk(graph: DependencyGraph, node: GraphNode, path: ReadonlySet<string>, maxDepth: number): SerializedNode {
  if (path.has(node.id)) {
    return terminal(node, true);
  }
  if (path.size >= maxDepth) {
    return terminal(node, false);
  }

  // each child gets its own copy so siblings never share path history
  const dependencies: Record<string, SerializedNode> = {};
  for (const [childName, childId] of node.dependencies) {
    const child = graph.get(childId);
    if (!child) {
      continue;
    }
    const childPath = new Set(path);
    childPath.add(node.id);
    dependencies[childName] = walk(graph, child, childPath, maxDepth);
  }

  return {
    name: node.name,
    version: node.version,
    ecosystem: node.ecosystem,
    depth: node.depth,
    dependencies,
    circularReference: false
  };
}

/**
 * Bounded tree view of one node. Re-entering the current ancestor chain yields a
 * `circularReference` terminal; paths of `maxDepth` ancestors yield a `truncated` one.
 */
export function serializeNode(graph: DependencyGraph, id: string, maxDepth = DEFAULT_MAX_DEPTH): SerializedNode | undefined {
  const node = graph.get(id);
  if (!node) {
    return undefined;
  }
  return walk(graph, node, new Set(), Math.max(0, maxDepth));
}

export function serializeGraph(graph: DependencyGraph, maxDepth = DEFAULT_MAX_DEPTH): SerializedNode[] {
  const trees: SerializedNode[] = [];
  for (const rootId of graph.rootIds) {
    const tree = serializeNode(graph, rootId, maxDepth);
    if (tree) {
      trees.push(tree);
    }
  }
  return trees;
}
