import { Ecosystem } from "../core/types";

const NPM_REGISTRY_URL = "https://registry.npmjs.org";
const NPM_DOWNLOADS_URL = "https://api.npmjs.org/downloads/point/last-week";
const PYPI_URL = "https://pypi.org/pypi";

export type PackageMetadata = {
  name: string;
  ecosystem: Ecosystem;
  createdAt?: string;
  modifiedAt?: string;
  /** Publish times of every release, oldest first. */
  releaseTimes: string[];
  maintainers: string[];
  author?: string;
  publishedByOrganization: boolean;
  weeklyDownloads?: number;
  /** Lifecycle scripts of the requested version (npm only). */
  scripts: Record<string, string>;
  repository?: string;
};

export interface MetadataSource {
  fetchMetadata(
    name: string,
    ecosystem: Ecosystem,
    version: string,
    signal?: AbortSignal
  ): Promise<PackageMetadata | undefined>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function personName(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value.trim() || undefined;
  }
  if (isRecord(value)) {
    return stringField(value, "name") ?? stringField(value, "email");
  }
  return undefined;
}

function stringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) {
    return out;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      out[key] = entry;
    }
  }
  return out;
}

function sortedTimes(times: string[]): string[] {
  return times
    .filter((time) => !Number.isNaN(new Date(time).getTime()))
    .sort((a, b) => new Date(a).getTime() - new Date(b).getTime());
}

export function parseNpmMetadata(doc: unknown, version: string, weeklyDownloads?: number): PackageMetadata | undefined {
  if (!isRecord(doc)) {
    return undefined;
  }
  const name = stringField(doc, "name");
  if (!name) {
    return undefined;
  }

  const time = isRecord(doc.time) ? doc.time : {};
  const releaseTimes: string[] = [];
  for (const [key, value] of Object.entries(time)) {
    if (key !== "created" && key !== "modified" && typeof value === "string") {
      releaseTimes.push(value);
    }
  }

  const versions = isRecord(doc.versions) ? doc.versions : {};
  const manifest = isRecord(versions[version]) ? versions[version] : undefined;
  const maintainers = (Array.isArray(doc.maintainers) ? doc.maintainers : [])
    .map(personName)
    .filter((entry): entry is string => entry !== undefined);
  const publisher = isRecord(doc.publisher) ? doc.publisher : undefined;
  const repository = isRecord(doc.repository) ? stringField(doc.repository, "url") : stringField(doc, "repository");

  return {
    name,
    ecosystem: "npm",
    createdAt: stringField(time, "created"),
    modifiedAt: stringField(time, "modified"),
    releaseTimes: sortedTimes(releaseTimes),
    maintainers,
    author: personName(doc.author) ?? (manifest ? personName(manifest.author) : undefined),
    publishedByOrganization: publisher !== undefined && publisher.type === "organization",
    weeklyDownloads,
    scripts: manifest ? stringRecord(manifest.scripts) : {},
    repository
  };
}

export function parsePypiMetadata(doc: unknown): PackageMetadata | undefined {
  if (!isRecord(doc) || !isRecord(doc.info)) {
    return undefined;
  }
  const info = doc.info;
  const name = stringField(info, "name");
  if (!name) {
    return undefined;
  }

  const releaseTimes: string[] = [];
  if (isRecord(doc.releases)) {
    for (const files of Object.values(doc.releases)) {
      if (!Array.isArray(files) || files.length === 0 || !isRecord(files[0])) {
        continue;
      }
      const uploaded = stringField(files[0], "upload_time_iso_8601") ?? stringField(files[0], "upload_time");
      if (uploaded) {
        releaseTimes.push(uploaded);
      }
    }
  }
  const sorted = sortedTimes(releaseTimes);
  const maintainers = [stringField(info, "maintainer"), stringField(info, "author")].filter(
    (entry, index, list): entry is string => entry !== undefined && list.indexOf(entry) === index
  );

  return {
    name,
    ecosystem: "pypi",
    createdAt: sorted[0],
    modifiedAt: sorted[sorted.length - 1],
    releaseTimes: sorted,
    maintainers,
    author: stringField(info, "author") ?? stringField(info, "author_email"),
    publishedByOrganization: false,
    scripts: {},
    repository: stringField(info, "home_page") ?? stringField(info, "project_url")
  };
}

/**
 * Registry metadata for npm and PyPI. Documents are fetched once per package name
 * and shared by every stage holding the same client. A 404 means the registry has
 * no such package; transport errors, aborts and other failed statuses reject and
 * leave nothing cached.
 */
export class RegistryClient implements MetadataSource {
  private readonly documents = new Map<string, Promise<unknown>>();
  private readonly downloads = new Map<string, Promise<number | undefined>>();

  constructor(
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly offline = false
  ) {}

  async fetchMetadata(
    name: string,
    ecosystem: Ecosystem,
    version: string,
    signal?: AbortSignal
  ): Promise<PackageMetadata | undefined> {
    if (this.offline) {
      return undefined;
    }
    if (ecosystem === "npm") {
      const [doc, weekly] = await Promise.all([
        this.document(`${NPM_REGISTRY_URL}/${encodeURIComponent(name).replace(/^%40/, "@")}`, signal),
        this.weeklyDownloads(name, signal)
      ]);
      return parseNpmMetadata(doc, version, weekly);
    }
    if (ecosystem === "pypi") {
      return parsePypiMetadata(await this.document(`${PYPI_URL}/${encodeURIComponent(name)}/json`, signal));
    }
    return undefined;
  }

  private document(url: string, signal?: AbortSignal): Promise<unknown> {
    return cached(this.documents, url, () => this.getJson(url, signal));
  }

  private weeklyDownloads(name: string, signal?: AbortSignal): Promise<number | undefined> {
    return cached(this.downloads, name, () =>
      this.getJson(`${NPM_DOWNLOADS_URL}/${name}`, signal).then((body) =>
        isRecord(body) && typeof body.downloads === "number" ? body.downloads : undefined
      )
    );
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: { accept: "application/json" },
      signal
    });
    if (response.status === 404) {
      return undefined;
    }
    if (!response.ok) {
      throw new Error(`registry request failed (${response.status}): ${url}`);
    }
    return response.json();
  }
}

function cached<T>(cache: Map<string, Promise<T>>, key: string, load: () => Promise<T>): Promise<T> {
  const hit = cache.get(key);
  if (hit) {
    return hit;
  }
  const loaded = load();
  cache.set(key, loaded);
  // a failed load is retried by the next caller
  loaded.catch(() => cache.delete(key));
  return loaded;
}
