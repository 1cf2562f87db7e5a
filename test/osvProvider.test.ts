import { afterEach, describe, expect, it } from "vitest";
import { OsvVulnerability } from "../src/core/types";
import { OsvCache } from "../src/osv/cache";
import { OsvApi, OsvBatchResult, OsvQuery } from "../src/osv/client";
import { OsvProvider } from "../src/osv/provider";
import { cleanupTempDirs, makeTempDir } from "./helpers";

class FakeClient implements OsvApi {
  queryCalls: OsvQuery[][] = [];
  queryResponses: OsvBatchResult[][] = [];
  vulnCalls: string[] = [];
  vulnResponses = new Map<string, unknown>();

  async queryBatch(queries: OsvQuery[]): Promise<OsvBatchResult[]> {
    this.queryCalls.push(queries);
    const response = this.queryResponses.shift();
    if (!response) {
      throw new Error("Unexpected queryBatch call");
    }
    return response;
  }

  async getVulnerability(id: string): Promise<unknown> {
    this.vulnCalls.push(id);
    if (!this.vulnResponses.has(id)) {
      throw new Error(`Unexpected getVulnerability call for ${id}`);
    }
    return this.vulnResponses.get(id);
  }
}

async function makeProvider(client: FakeClient, offline = false): Promise<{ provider: OsvProvider; cache: OsvCache }> {
  const cache = new OsvCache(await makeTempDir("chainwarden-osv-cache-"));
  return { provider: new OsvProvider(client, cache, offline), cache };
}

afterEach(async () => {
  await cleanupTempDirs();
});

describe("OsvProvider.queryPackages", () => {
  it("maps querybatch results by input order", async () => {
    const client = new FakeClient();
    client.queryResponses.push([
      { vulns: [{ id: "GHSA-b", modified: "2025-01-01T00:00:00Z" }] },
      { vulns: [{ id: "PYSEC-a", modified: "2025-01-02T00:00:00Z" }] }
    ]);

    const { provider } = await makeProvider(client);
    const results = await provider.queryPackages([
      { ecosystem: "npm", name: "pkg-one", version: "1.0.0" },
      { ecosystem: "PyPI", name: "pkg-two", version: "2.0.0" }
    ]);

    expect(results.get("npm:pkg-one@1.0.0")?.[0].id).toBe("GHSA-b");
    expect(results.get("PyPI:pkg-two@2.0.0")?.[0].id).toBe("PYSEC-a");
    expect(client.queryCalls[0]).toEqual([
      { package: { ecosystem: "npm", name: "pkg-one" }, version: "1.0.0" },
      { package: { ecosystem: "PyPI", name: "pkg-two" }, version: "2.0.0" }
    ]);
  });

  it("sends each distinct package once", async () => {
    const client = new FakeClient();
    client.queryResponses.push([{ vulns: [] }]);

    const { provider } = await makeProvider(client);
    const results = await provider.queryPackages([
      { ecosystem: "npm", name: "left-pad", version: "1.3.0" },
      { ecosystem: "npm", name: "left-pad", version: "1.3.0" }
    ]);

    expect(client.queryCalls[0]).toHaveLength(1);
    expect(Array.from(results.keys())).toEqual(["npm:left-pad@1.3.0"]);
  });

  it("follows pagination tokens for the queries that return them", async () => {
    const client = new FakeClient();
    client.queryResponses.push([
      { vulns: [{ id: "GHSA-a1" }], next_page_token: "token-a" },
      { vulns: [{ id: "GHSA-b1" }] },
      { vulns: [{ id: "GHSA-c1" }], next_page_token: "token-c" }
    ]);
    client.queryResponses.push([{ vulns: [{ id: "GHSA-a2" }] }, { vulns: [{ id: "GHSA-c2" }] }]);

    const { provider } = await makeProvider(client);
    const results = await provider.queryPackages([
      { ecosystem: "npm", name: "pkg-a", version: "1.0.0" },
      { ecosystem: "npm", name: "pkg-b", version: "1.0.0" },
      { ecosystem: "npm", name: "pkg-c", version: "1.0.0" }
    ]);

    expect(client.queryCalls).toHaveLength(2);
    expect(client.queryCalls[1].map((query) => [query.package.name, query.page_token])).toEqual([
      ["pkg-a", "token-a"],
      ["pkg-c", "token-c"]
    ]);
    expect(results.get("npm:pkg-a@1.0.0")?.map((entry) => entry.id)).toEqual(["GHSA-a1", "GHSA-a2"]);
    expect(results.get("npm:pkg-b@1.0.0")?.map((entry) => entry.id)).toEqual(["GHSA-b1"]);
    expect(results.get("npm:pkg-c@1.0.0")?.map((entry) => entry.id)).toEqual(["GHSA-c1", "GHSA-c2"]);
  });

  it("rejects a response whose length does not match the request", async () => {
    const client = new FakeClient();
    client.queryResponses.push([]);

    const { provider } = await makeProvider(client);
    await expect(provider.queryPackages([{ ecosystem: "npm", name: "a", version: "1.0.0" }])).rejects.toThrow(
      "OSV querybatch: response/result length mismatch"
    );
  });

  it("reads query matches from cache in offline mode", async () => {
    const onlineClient = new FakeClient();
    onlineClient.queryResponses.push([{ vulns: [{ id: "GHSA-offline", modified: "2025-01-01T00:00:00Z" }] }]);

    const { provider, cache } = await makeProvider(onlineClient);
    await provider.queryPackages([{ ecosystem: "npm", name: "pkg-a", version: "1.0.0" }]);

    const offlineClient = new FakeClient();
    const offline = new OsvProvider(offlineClient, new OsvCache(cache.dir), true);
    const results = await offline.queryPackages([{ ecosystem: "npm", name: "pkg-a", version: "1.0.0" }]);

    expect(results.get("npm:pkg-a@1.0.0")).toEqual([{ id: "GHSA-offline", modified: "2025-01-01T00:00:00Z" }]);
    expect(offlineClient.queryCalls).toEqual([]);
  });

  it("throws in offline mode when a query was never cached", async () => {
    const client = new FakeClient();
    const { provider } = await makeProvider(client, true);

    await expect(provider.queryPackages([{ ecosystem: "npm", name: "pkg-missing", version: "1.0.0" }])).rejects.toThrow(
      "Offline mode: missing cached OSV query results for pkg-missing@1.0.0."
    );
    expect(client.queryCalls).toEqual([]);
  });
});

describe("OsvProvider.getVuln", () => {
  const cached: OsvVulnerability = { id: "GHSA-cache", modified: "2025-01-01T00:00:00Z", summary: "cached" };

  it("serves a cached record for the same modification time", async () => {
    const client = new FakeClient();
    const { provider, cache } = await makeProvider(client);
    await cache.put("GHSA-cache", "2025-01-01T00:00:00Z", cached);

    expect((await provider.getVuln("GHSA-cache", "2025-01-01T00:00:00Z")).summary).toBe("cached");
    expect((await provider.getVuln("GHSA-cache")).summary).toBe("cached");
    expect(client.vulnCalls).toEqual([]);
  });

  it("re-fetches and caches when the record changed", async () => {
    const client = new FakeClient();
    client.vulnResponses.set("GHSA-cache", { id: "GHSA-cache", modified: "2025-02-01T00:00:00Z", summary: "fresh" });
    const { provider, cache } = await makeProvider(client);
    await cache.put("GHSA-cache", "2025-01-01T00:00:00Z", cached);

    const vuln = await provider.getVuln("GHSA-cache", "2025-02-01T00:00:00Z");

    expect(vuln.summary).toBe("fresh");
    expect(client.vulnCalls).toEqual(["GHSA-cache"]);
    expect(await cache.get("GHSA-cache", "2025-02-01T00:00:00Z")).toEqual({
      id: "GHSA-cache",
      modified: "2025-02-01T00:00:00Z",
      summary: "fresh"
    });
  });

  it("rejects a malformed record", async () => {
    const client = new FakeClient();
    client.vulnResponses.set("GHSA-bad", { summary: "no id" });
    const { provider } = await makeProvider(client);

    await expect(provider.getVuln("GHSA-bad", "2025-01-01T00:00:00Z")).rejects.toThrow(
      "OSV returned a malformed record for GHSA-bad"
    );
  });

  it("uses the latest cached record in offline mode", async () => {
    const client = new FakeClient();
    const { cache } = await makeProvider(client);
    await cache.put("GHSA-offline", "2024-01-01T00:00:00Z", { id: "GHSA-offline", summary: "old" });
    await cache.put("GHSA-offline", "2025-01-01T00:00:00Z", { id: "GHSA-offline", summary: "new" });

    const provider = new OsvProvider(client, cache, true);
    expect((await provider.getVuln("GHSA-offline", "2026-01-01T00:00:00Z")).summary).toBe("new");
    await expect(provider.getVuln("GHSA-unknown")).rejects.toThrow("Offline mode: vulnerability GHSA-unknown is not in cache.");
    expect(client.vulnCalls).toEqual([]);
  });
});
