import { OsvBatchMatch } from "../core/types";

const DEFAULT_BASE_URL = "https://api.osv.dev";

/** OSV ecosystem names, which differ from ours in case. */
export type OsvEcosystem = "npm" | "PyPI";

export type OsvQuery = {
  package: {
    ecosystem: OsvEcosystem;
    name: string;
  };
  version?: string;
  page_token?: string;
};

export type OsvBatchResult = {
  vulns: OsvBatchMatch[];
  next_page_token?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toBatchResult(value: unknown): OsvBatchResult {
  if (!isRecord(value)) {
    return { vulns: [] };
  }
  const vulns: OsvBatchMatch[] = [];
  for (const entry of Array.isArray(value.vulns) ? value.vulns : []) {
    if (isRecord(entry) && typeof entry.id === "string") {
      vulns.push({ id: entry.id, ...(typeof entry.modified === "string" ? { modified: entry.modified } : {}) });
    }
  }
  return {
    vulns,
    ...(typeof value.next_page_token === "string" && value.next_page_token.length > 0
      ? { next_page_token: value.next_page_token }
      : {})
  };
}

/** The calls the provider makes, so tests can stand in for the HTTP client. */
export type OsvApi = Pick<OsvClient, "queryBatch" | "getVulnerability">;

export class OsvClient {
  constructor(
    private readonly baseUrl = DEFAULT_BASE_URL,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async queryBatch(queries: OsvQuery[], signal?: AbortSignal): Promise<OsvBatchResult[]> {
    const response = await this.fetchImpl(`${this.baseUrl}/v1/querybatch`, {
      method: "POST",
      headers: {
        "content-type": "application/json"
      },
      body: JSON.stringify({ queries }),
      signal
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`OSV querybatch failed (${response.status}): ${body}`);
    }

    const payload: unknown = await response.json();
    if (!isRecord(payload) || !Array.isArray(payload.results)) {
      throw new Error("OSV querybatch: response has no results list");
    }
    return payload.results.map(toBatchResult);
  }

  async getVulnerability(id: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}/v1/vulns/${encodeURIComponent(id)}`, { signal });
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`OSV vuln fetch failed for ${id} (${response.status}): ${body}`);
    }

    return response.json();
  }
}
