import { DependencyEdgeRecord } from "../core/types";

export type EdgeSourceName = "npm" | "pnpm" | "pip";

export interface DetectResult {
  source: EdgeSourceName;
  manifestPath: string;
  details?: Record<string, unknown>;
}

export type InstallScriptPackage = {
  name: string;
  version: string;
};

export type EdgeSourceResult = {
  edges: DependencyEdgeRecord[];
  manifestPath: string;
  /** Packages the manifest marks as running install-time scripts. */
  installScripts: InstallScriptPackage[];
  warnings: string[];
};

export interface EdgeSource {
  name: EdgeSourceName;
  detect(rootDir: string): Promise<DetectResult | null>;
  load(rootDir: string): Promise<EdgeSourceResult>;
}
