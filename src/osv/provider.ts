import { OsvBatchMatch, OsvVulnerability } from "../core/types";
import { OsvCache } from "./cache";
import { chunk } from "../stages/util";
import { OsvApi, OsvEcosystem, OsvQuery } from "./client";

export type OsvPackageQuery = {
  ecosystem: OsvEcosystem;
  name: string;
  version: string;
};

export interface VulnerabilityProvider {
  name: string;
  queryPackages(pkgs: OsvPackageQuery[], signal?: AbortSignal): Promise<Map<string, OsvBatchMatch[]>>;
  getVuln(id: string, modified?: string, signal?: AbortSignal): Promise<OsvVulnerability>;
}

type QueryState = OsvPackageQuery & {
  pageToken?: string;
};

const BATCH_SIZE = 256;

export function queryKey(query: OsvPackageQuery): string {
  return `${query.ecosystem}:${query.name}@${query.version}`;
}

function toBatchQuery(state: QueryState): OsvQuery {
  return {
    package: {
      ecosystem: state.ecosystem,
      name: state.name
    },
    version: state.version,
    ...(state.pageToken ? { page_token: state.pageToken } : {})
  };
}

function isOptionalArray(value: unknown): boolean {
  return value === undefined || Array.isArray(value);
}

export function isOsvVulnerability(value: unknown): value is OsvVulnerability {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return (
    "id" in value &&
    typeof value.id === "string" &&
    (!("aliases" in value) || isOptionalArray(value.aliases)) &&
    (!("severity" in value) || isOptionalArray(value.severity)) &&
    (!("affected" in value) || isOptionalArray(value.affected))
  );
}

export class OsvProvider implements VulnerabilityProvider {
  readonly name = "osv";

  constructor(
    private readonly client: OsvApi,
    private readonly cache: OsvCache,
    private readonly offline: boolean
  ) {}

  async queryPackages(pkgs: OsvPackageQuery[], signal?: AbortSignal): Promise<Map<string, OsvBatchMatch[]>> {
    const dedup = new Map<string, QueryState>();
    for (const pkg of pkgs) {
      const key = queryKey(pkg);
      if (!dedup.has(key)) {
        dedup.set(key, { ecosystem: pkg.ecosystem, name: pkg.name, version: pkg.version });
      }
    }

    const states = Array.from(dedup.values());
    const out = new Map<string, OsvBatchMatch[]>();
    for (const state of states) {
      out.set(queryKey(state), []);
    }

    if (this.offline) {
      const missing: string[] = [];
      for (const state of states) {
        const cached = await this.cache.getQuery(state.ecosystem, state.name, state.version);
        if (!cached) {
          missing.push(`${state.name}@${state.version}`);
          continue;
        }
        out.set(queryKey(state), cached);
      }

      if (missing.length > 0) {
        const preview = missing.slice(0, 5);
        const suffix = missing.length > preview.length ? " ..." : "";
        throw new Error(
          `Offline mode: missing cached OSV query results for ${preview.join(", ")}${suffix}. ` +
            "Run an online analysis once to warm the cache."
        );
      }
      return out;
    }

    for (const group of chunk(states, BATCH_SIZE)) {
      await this.queryBatchWithPaging(group, out, signal);
    }

    for (const state of states) {
      await this.cache.putQuery(state.ecosystem, state.name, state.version, out.get(queryKey(state)) ?? []);
    }

    return out;
  }

  async getVuln(id: string, modified?: string, signal?: AbortSignal): Promise<OsvVulnerability> {
    const cached = modified ? await this.cache.get(id, modified) : await this.cache.getLatestById(id);
    if (isOsvVulnerability(cached)) {
      return cached;
    }

    if (this.offline) {
      const latest = await this.cache.getLatestById(id);
      if (isOsvVulnerability(latest)) {
        return latest;
      }
      throw new Error(`Offline mode: vulnerability ${id} is not in cache.`);
    }

    const vuln = await this.client.getVulnerability(id, signal);
    if (!isOsvVulnerability(vuln)) {
      throw new Error(`OSV returned a malformed record for ${id}`);
    }
    await this.cache.put(id, modified ?? vuln.modified ?? "unknown", vuln);
    return vuln;
  }

  private async queryBatchWithPaging(
    initial: QueryState[],
    out: Map<string, OsvBatchMatch[]>,
    signal?: AbortSignal
  ): Promise<void> {
    let pending: QueryState[] = initial;

    while (pending.length > 0) {
      const results = await this.client.queryBatch(pending.map(toBatchQuery), signal);
      if (results.length !== pending.length) {
        throw new Error("OSV querybatch: response/result length mismatch");
      }

      const next: QueryState[] = [];
      for (let i = 0; i < results.length; i += 1) {
        const state = pending[i];
        const result = results[i];
        const list = out.get(queryKey(state));
        if (!list) {
          continue;
        }

        for (const vuln of result.vulns) {
          if (!list.some((entry) => entry.id === vuln.id && entry.modified === vuln.modified)) {
            list.push(vuln);
          }
        }

        if (result.next_page_token) {
          next.push({ ...state, pageToken: result.next_page_token });
        }
      }

      pending = next;
    }
  }
}
