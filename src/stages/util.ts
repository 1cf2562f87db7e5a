import { Ecosystem, PackageIdentity, UNKNOWN_VERSION } from "../core/types";

type SemverParts = {
  major: number;
  minor: number;
  patch: number;
};

function parseSemverParts(version: string): SemverParts | undefined {
  const normalized = version.trim().replace(/^v/i, "").split("-")[0].split("+")[0];
  const match = normalized.match(/^(\d+)\.(\d+)\.(\d+)$/);
  if (!match) {
    return undefined;
  }
  return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
}

export function compareVersion(a: string, b: string): number {
  const parsedA = parseSemverParts(a);
  const parsedB = parseSemverParts(b);
  if (parsedA && parsedB) {
    if (parsedA.major !== parsedB.major) {
      return parsedA.major - parsedB.major;
    }
    if (parsedA.minor !== parsedB.minor) {
      return parsedA.minor - parsedB.minor;
    }
    return parsedA.patch - parsedB.patch;
  }
  return a.localeCompare(b);
}

export function chunk<T>(list: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < list.length; i += size) {
    result.push(list.slice(i, i + size));
  }
  return result;
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new Error("aborted");
  }
}

/** Runs `fn` over `items` in sequential batches of `size` parallel calls. */
export async function mapInBatches<T, R>(
  items: readonly T[],
  size: number,
  signal: AbortSignal,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const out: R[] = [];
  for (const group of chunk(items, size)) {
    throwIfAborted(signal);
    out.push(...(await Promise.all(group.map(fn))));
  }
  return out;
}

/** Packages a registry can be asked about. */
export function registryPackages(packages: readonly PackageIdentity[], ecosystems: Ecosystem[] = ["npm", "pypi"]): PackageIdentity[] {
  return packages.filter((pkg) => ecosystems.includes(pkg.ecosystem) && pkg.name.length > 0);
}

export function hasKnownVersion(pkg: PackageIdentity): boolean {
  return pkg.version !== UNKNOWN_VERSION;
}

export function daysBetween(earlier: Date, later: Date): number {
  return (later.getTime() - earlier.getTime()) / 86_400_000;
}
