import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { OsvBatchMatch } from "../core/types";

function sanitize(value: string): string {
  return encodeURIComponent(value);
}

function splitCacheFileName(fileName: string): { id: string; modified: string } | null {
  if (!fileName.endsWith(".json")) {
    return null;
  }
  const withoutExt = fileName.slice(0, -5);
  const splitIndex = withoutExt.lastIndexOf("__");
  if (splitIndex < 0) {
    return null;
  }

  const id = withoutExt.slice(0, splitIndex);
  const modified = withoutExt.slice(splitIndex + 2);
  if (!id || !modified) {
    return null;
  }
  return { id: decodeURIComponent(id), modified: decodeURIComponent(modified) };
}

async function readJson(file: string): Promise<unknown> {
  const text = await fs.readFile(file, "utf8").catch(() => undefined);
  if (text === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    // a truncated write reads as a cache miss
    return undefined;
  }
}

function isBatchMatchList(value: unknown): value is OsvBatchMatch[] {
  return (
    Array.isArray(value) &&
    value.every((entry) => typeof entry === "object" && entry !== null && typeof entry.id === "string")
  );
}

export function defaultCacheDir(): string {
  const xdg = process.env.XDG_CACHE_HOME;
  if (xdg && xdg.length > 0) {
    return path.join(xdg, "chainwarden", "osv");
  }
  return path.join(os.homedir(), ".cache", "chainwarden", "osv");
}

/**
 * On-disk OSV cache: full records under `vulns/` keyed by id and modification
 * time, batch query results under `queries/` keyed by ecosystem, name and version.
 */
export class OsvCache {
  readonly dir: string;
  private readonly vulnDir: string;
  private readonly queryDir: string;

  constructor(cacheDir?: string) {
    this.dir = cacheDir ?? defaultCacheDir();
    this.vulnDir = path.join(this.dir, "vulns");
    this.queryDir = path.join(this.dir, "queries");
  }

  async ensureDir(): Promise<void> {
    await Promise.all([fs.mkdir(this.vulnDir, { recursive: true }), fs.mkdir(this.queryDir, { recursive: true })]);
  }

  private vulnFilePath(id: string, modified: string): string {
    return path.join(this.vulnDir, `${sanitize(id)}__${sanitize(modified)}.json`);
  }

  private queryFilePath(ecosystem: string, name: string, version: string): string {
    return path.join(this.queryDir, `${sanitize(ecosystem)}__${sanitize(name)}__${sanitize(version)}.json`);
  }

  async get(id: string, modified: string): Promise<unknown> {
    return readJson(this.vulnFilePath(id, modified));
  }

  async getLatestById(id: string): Promise<unknown> {
    const files = await fs.readdir(this.vulnDir).catch(() => []);
    let best: { file: string; modifiedMs: number } | undefined;

    for (const file of files) {
      const parsed = splitCacheFileName(file);
      if (!parsed || parsed.id !== id) {
        continue;
      }
      const modifiedMs = new Date(parsed.modified).getTime();
      const rank = Number.isNaN(modifiedMs) ? 0 : modifiedMs;
      if (!best || rank > best.modifiedMs) {
        best = { file, modifiedMs: rank };
      }
    }

    return best ? readJson(path.join(this.vulnDir, best.file)) : undefined;
  }

  async put(id: string, modified: string, payload: unknown): Promise<void> {
    await this.ensureDir();
    await fs.writeFile(this.vulnFilePath(id, modified), JSON.stringify(payload), "utf8");
  }

  async getQuery(ecosystem: string, name: string, version: string): Promise<OsvBatchMatch[] | undefined> {
    const value = await readJson(this.queryFilePath(ecosystem, name, version));
    return isBatchMatchList(value) ? value : undefined;
  }

  async putQuery(ecosystem: string, name: string, version: string, matches: OsvBatchMatch[]): Promise<void> {
    await this.ensureDir();
    await fs.writeFile(this.queryFilePath(ecosystem, name, version), JSON.stringify(matches), "utf8");
  }
}
