import type { AnyToolchainRecord, DiscoveryMethod } from '../compiler/compilerTypes.js';
import { hostPath } from '../host/hostTypes.js';
import type { HostSystem } from '../host/hostTypes.js';
import { compareVersions } from '../version/versionInfo.js';

const METHOD_WEIGHT: Record<DiscoveryMethod, number> = {
  inventory: 3,
  packageManagers: 2,
  standardLocations: 1,
  environment: 0,
  path: 0,
};

/** How much a record says about where it came from; higher wins a merge. */
export function provenanceScore(r: AnyToolchainRecord): number {
  return (r.provenance.packageManager ? 10 : 0) + METHOD_WEIGHT[r.provenance.discoveryMethod];
}

export function normalizeExecutablePath(host: HostSystem, p: string): string {
  const n = hostPath(host).normalize(p);
  return host.platform === 'win32' ? n.toLowerCase() : n;
}

/** `(family, executablePath)`, plus the target triple for cross records. */
export function recordIdentity(host: HostSystem, r: AnyToolchainRecord): string {
  const triple = 'targetTriple' in r ? `::${r.targetTriple}` : '';
  return `${r.family}::${normalizeExecutablePath(host, r.executablePath)}${triple}`;
}

/** Keeps one record per identity: the richer provenance, or the first seen on a tie. */
export function dedupeRecords<R extends AnyToolchainRecord>(host: HostSystem, records: readonly R[]): R[] {
  const byId = new Map<string, R>();
  for (const r of records) {
    const id = recordIdentity(host, r);
    const existing = byId.get(id);
    if (!existing || provenanceScore(r) > provenanceScore(existing)) byId.set(id, r);
  }
  return [...byId.values()];
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/** Newest first (stable), head flagged `recommended`; returns fresh frozen records. */
export function rankRecords<R extends AnyToolchainRecord>(host: HostSystem, records: readonly R[]): R[] {
  const sorted = dedupeRecords(host, records).sort((a, b) => compareVersions(b.version, a.version));
  return sorted.map((r, i) => deepFreeze({ ...r, recommended: i === 0 }));
}
