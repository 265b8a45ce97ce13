import { InvalidArgumentError } from '../errors.js';

export type VersionInfo = {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  /** Informational only; never part of ordering or equality. */
  readonly build?: string;
  readonly raw: string;
};

function checkComponent(name: string, n: number) {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(`Version ${name} must be a non-negative integer, got ${n}`, []);
  }
}

export function makeVersion(
  major: number,
  minor = 0,
  patch = 0,
  build?: string,
  raw?: string,
): VersionInfo {
  checkComponent('major', major);
  checkComponent('minor', minor);
  checkComponent('patch', patch);
  const text = raw ?? [major, minor, patch, ...(build ? [build] : [])].join('.');
  return Object.freeze(build === undefined ? { major, minor, patch, raw: text } : { major, minor, patch, build, raw: text });
}

export const ZERO_VERSION: VersionInfo = makeVersion(0, 0, 0, undefined, '0.0.0');

const DOTTED = /^\s*v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:\.(\d+))?/;

/** Parses `13`, `13.2`, `13.2.0` or `19.38.33135.0`; null when no leading number. */
export function parseVersion(text: string): VersionInfo | null {
  const m = DOTTED.exec(text);
  if (!m) return null;
  const [, major, minor, patch, build] = m;
  return makeVersion(Number(major), Number(minor ?? 0), Number(patch ?? 0), build, text.trim());
}

/**
 * Runs each pattern over `output` in order and parses the first capture
 * group that matches. Patterns without a group use the whole match.
 */
export function extractVersion(output: string, patterns: readonly (RegExp | string)[]): VersionInfo | null {
  for (const pattern of patterns) {
    const re = typeof pattern === 'string' ? new RegExp(pattern, 'i') : pattern;
    const m = re.exec(output);
    if (!m) continue;
    const token = m[1] ?? m[0];
    const v = parseVersion(token);
    if (v) return v;
  }
  return null;
}

export function compareVersions(a: VersionInfo, b: VersionInfo): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function versionsEqual(a: VersionInfo, b: VersionInfo): boolean {
  return compareVersions(a, b) === 0;
}

export function versionAtLeast(v: VersionInfo, min: VersionInfo): boolean {
  return compareVersions(v, min) >= 0;
}

export function isZeroVersion(v: VersionInfo): boolean {
  return v.major === 0 && v.minor === 0 && v.patch === 0;
}

export function formatVersion(v: VersionInfo): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}
