import { DependencyGraph } from "./graph";

function label(text: string): string {
  return `"${text.replace(/"/g, "#quot;")}"`;
}

/**
 * Renders the graph as a Mermaid flowchart. Each identity is declared once and
 * each edge drawn once; nodes deeper than `maxDepth` below a root are left out.
 */
export function renderMermaid(graph: DependencyGraph, maxDepth = 3): string {
  if (graph.rootIds.length === 0) {
    return "graph TD\n    N0[\"(empty graph)\"]";
  }

  const lines = ["graph TD"];
  const nodeIds = new Map<string, string>();
  const declare = (id: string): string => {
    const existing = nodeIds.get(id);
    if (existing) {
      return existing;
    }
    const key = `N${nodeIds.size}`;
    nodeIds.set(id, key);
    lines.push(`    ${key}[${label(id)}]`);
    return key;
  };

  const expanded = new Set<string>();
  const queue: Array<{ id: string; depth: number }> = [];
  for (const rootId of graph.rootIds) {
    const key = declare(rootId);
    lines.push(`    style ${key} fill:#e1f5ff`);
    queue.push({ id: rootId, depth: 0 });
  }

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current || expanded.has(current.id) || current.depth >= maxDepth) {
      continue;
    }
    expanded.add(current.id);

    const node = graph.get(current.id);
    if (!node) {
      continue;
    }
    const from = declare(node.id);
    for (const childId of node.dependencies.values()) {
      const to = declare(childId);
      lines.push(`    ${from} --> ${to}`);
      queue.push({ id: childId, depth: current.depth + 1 });
    }
  }

  if (graph.circularDependencies.length > 0) {
    lines.push("", "    %% Circular dependencies");
    graph.circularDependencies.slice(0, 3).forEach((entry, index) => {
      lines.push(`    %% Cycle ${index + 1}: ${entry.cycle.join(" -> ")}`);
    });
  }

  if (graph.versionConflicts.length > 0) {
    lines.push("", "    %% Version conflicts");
    graph.versionConflicts.slice(0, 3).forEach((entry, index) => {
      lines.push(`    %% Conflict ${index + 1}: ${entry.packageName} (${entry.versions.join(", ")})`);
    });
  }

  return lines.join("\n");
}
