import { AnalysisReport, SerializedNode } from "../core/types";

export type RenderJsonOptions = {
  /** Serialized dependency trees to embed under `dependencyGraph`. */
  graph?: SerializedNode[];
};

export function renderJson(report: AnalysisReport, options: RenderJsonOptions = {}): string {
  const payload = options.graph ? { ...report, dependencyGraph: options.graph } : report;
  return `${JSON.stringify(payload, null, 2)}\n`;
}

export function renderGraphJson(trees: SerializedNode[]): string {
  return `${JSON.stringify(trees, null, 2)}\n`;
}
