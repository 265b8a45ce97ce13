import type { HostPlatform } from '../compiler/compilerTypes.js';
import { findEnvKey, setEnv } from '../host/envAccess.js';
import type { EnvMap } from '../host/hostTypes.js';

/** Frozen copy of a process environment. */
export type EnvironmentSnapshot = Readonly<Record<string, string>>;

export type EnvironmentDiff = {
  added: Record<string, string>;
  /** New values of variables present on both sides. */
  changed: Record<string, string>;
  removed: string[];
};

export function captureEnvironment(env: EnvMap): EnvironmentSnapshot {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined) out[k] = v;
  }
  return Object.freeze(out);
}

function keyIndex(snapshot: EnvironmentSnapshot, platform: HostPlatform): Map<string, string> {
  const index = new Map<string, string>();
  for (const k of Object.keys(snapshot)) index.set(platform === 'win32' ? k.toUpperCase() : k, k);
  return index;
}

/** Variable names compare case-insensitively on win32. */
export function diffSnapshots(
  before: EnvironmentSnapshot,
  after: EnvironmentSnapshot,
  platform: HostPlatform,
): EnvironmentDiff {
  const norm = (k: string) => (platform === 'win32' ? k.toUpperCase() : k);
  const beforeKeys = keyIndex(before, platform);
  const afterKeys = keyIndex(after, platform);
  const diff: EnvironmentDiff = { added: {}, changed: {}, removed: [] };

  for (const [k, v] of Object.entries(after)) {
    const prev = beforeKeys.get(norm(k));
    if (prev === undefined) diff.added[k] = v;
    else if (before[prev] !== v) diff.changed[prev] = v;
  }
  for (const k of Object.keys(before)) {
    if (!afterKeys.has(norm(k))) diff.removed.push(k);
  }
  return diff;
}

export function isEmptyDiff(d: EnvironmentDiff): boolean {
  return Object.keys(d.added).length === 0 && Object.keys(d.changed).length === 0 && d.removed.length === 0;
}

export function applyDiff(env: EnvMap, diff: EnvironmentDiff, platform: HostPlatform) {
  for (const k of diff.removed) {
    const key = findEnvKey(env, k, platform);
    if (key !== undefined) delete env[key];
  }
  for (const [k, v] of Object.entries(diff.changed)) setEnv(env, k, v, platform);
  for (const [k, v] of Object.entries(diff.added)) setEnv(env, k, v, platform);
}

/** Makes `env` hold exactly the variables of `snapshot`. */
export function replaceEnvironment(env: EnvMap, snapshot: EnvironmentSnapshot, platform: HostPlatform) {
  applyDiff(env, diffSnapshots(captureEnvironment(env), snapshot, platform), platform);
}
