import { InvalidArchitectureError } from '../errors.js';

export const HOST_ARCHES = ['x64', 'x86'] as const;
export const TARGET_ARCHES = ['x64', 'x86', 'arm', 'arm64'] as const;
export const ARCHITECTURE_IDS = ['amd64', 'x86', 'x86_amd64', 'amd64_x86', 'amd64_arm', 'amd64_arm64'] as const;

export type HostArch = (typeof HOST_ARCHES)[number];
export type TargetArch = (typeof TARGET_ARCHES)[number];
export type ArchitectureId = (typeof ARCHITECTURE_IDS)[number];

export type ArchitectureSpec = {
  readonly host: HostArch;
  readonly target: TargetArch;
};

type MatrixEntry = {
  spec: ArchitectureSpec;
  activationScript: string;
  hostTargetDir: string;
  triple: string;
};

// One row per supported combination. Adding an architecture is a row here
// (plus an alias, if it has one).
const MATRIX: Readonly<Record<ArchitectureId, MatrixEntry>> = {
  amd64: {
    spec: { host: 'x64', target: 'x64' },
    activationScript: 'vcvars64.bat',
    hostTargetDir: 'Hostx64/x64',
    triple: 'x86_64-pc-windows-msvc',
  },
  x86: {
    spec: { host: 'x86', target: 'x86' },
    activationScript: 'vcvars32.bat',
    hostTargetDir: 'Hostx86/x86',
    triple: 'i686-pc-windows-msvc',
  },
  x86_amd64: {
    spec: { host: 'x86', target: 'x64' },
    activationScript: 'vcvarsx86_amd64.bat',
    hostTargetDir: 'Hostx86/x64',
    triple: 'x86_64-pc-windows-msvc',
  },
  amd64_x86: {
    spec: { host: 'x64', target: 'x86' },
    activationScript: 'vcvarsamd64_x86.bat',
    hostTargetDir: 'Hostx64/x86',
    triple: 'i686-pc-windows-msvc',
  },
  amd64_arm: {
    spec: { host: 'x64', target: 'arm' },
    activationScript: 'vcvarsamd64_arm.bat',
    hostTargetDir: 'Hostx64/arm',
    triple: 'armv7-pc-windows-msvc',
  },
  amd64_arm64: {
    spec: { host: 'x64', target: 'arm64' },
    activationScript: 'vcvarsamd64_arm64.bat',
    hostTargetDir: 'Hostx64/arm64',
    triple: 'aarch64-pc-windows-msvc',
  },
};

const ID_ALIASES: Readonly<Record<string, ArchitectureId>> = {
  x64: 'amd64',
  '32': 'x86',
  'x86-x64': 'x86_amd64',
  'amd64-x86': 'amd64_x86',
  'amd64-arm': 'amd64_arm',
  'amd64-arm64': 'amd64_arm64',
};

const HOST_ALIASES: Readonly<Record<string, HostArch>> = {
  x64: 'x64',
  amd64: 'x64',
  x86_64: 'x64',
  x86: 'x86',
  '32': 'x86',
  i386: 'x86',
  i686: 'x86',
  ia32: 'x86',
};

const TARGET_ALIASES: Readonly<Record<string, TargetArch>> = {
  ...HOST_ALIASES,
  arm: 'arm',
  armv7: 'arm',
  arm64: 'arm64',
  aarch64: 'arm64',
};

function isArchitectureId(s: string): s is ArchitectureId {
  return ARCHITECTURE_IDS.some((id) => id === s);
}

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

function describeCombination(id: ArchitectureId): string {
  const { host, target } = MATRIX[id].spec;
  return `${host}->${target} (${id})`;
}

function idOf(spec: ArchitectureSpec): ArchitectureId {
  const id = ARCHITECTURE_IDS.find((i) => MATRIX[i].spec.host === spec.host && MATRIX[i].spec.target === spec.target);
  if (!id) {
    throw new InvalidArchitectureError(
      `Unsupported architecture combination ${spec.host}->${spec.target}`,
      ARCHITECTURE_IDS.map(describeCombination),
    );
  }
  return id;
}

function entry(spec: ArchitectureSpec): MatrixEntry {
  return MATRIX[idOf(spec)];
}

/** Parses a canonical id (`amd64_arm64`) or alias (`x64`, `amd64-arm64`). */
export function fromString(s: string): ArchitectureSpec {
  const k = s.trim().toLowerCase();
  const id = isArchitectureId(k) ? k : lookup(ID_ALIASES, k);
  if (!id) {
    throw new InvalidArchitectureError(`Unknown architecture "${s}"`, [
      ...ARCHITECTURE_IDS,
      ...Object.keys(ID_ALIASES),
    ]);
  }
  return MATRIX[id].spec;
}

export function fromHostTarget(host: string, target: string): ArchitectureSpec {
  const h = lookup(HOST_ALIASES, host.trim().toLowerCase());
  if (!h) throw new InvalidArchitectureError(`Unknown host architecture "${host}"`, HOST_ARCHES);
  const t = lookup(TARGET_ALIASES, target.trim().toLowerCase());
  if (!t) throw new InvalidArchitectureError(`Unknown target architecture "${target}"`, TARGET_ARCHES);
  return entry({ host: h, target: t }).spec;
}

/** Like fromString(), but null for anything outside the matrix. */
export function tryParseArchitecture(s: string): ArchitectureSpec | null {
  const k = s.trim().toLowerCase();
  const id = isArchitectureId(k) ? k : lookup(ID_ALIASES, k);
  return id ? MATRIX[id].spec : null;
}

export function toCanonicalString(spec: ArchitectureSpec): ArchitectureId {
  return idOf(spec);
}

export function isNative(spec: ArchitectureSpec): boolean {
  return spec.host === spec.target;
}

export function isCross(spec: ArchitectureSpec): boolean {
  return !isNative(spec);
}

export function activationScriptName(spec: ArchitectureSpec): string {
  return entry(spec).activationScript;
}

/** `Hostx64/arm64`-style fragment inside an MSVC toolset `bin` directory. */
export function hostTargetDir(spec: ArchitectureSpec): string {
  return entry(spec).hostTargetDir;
}

export function targetTriple(spec: ArchitectureSpec): string {
  return entry(spec).triple;
}

export function allArchitectures(): ArchitectureSpec[] {
  return ARCHITECTURE_IDS.map((id) => MATRIX[id].spec);
}

/** Every combination whose host side is `host`; [] for hosts outside the matrix. */
export function architecturesForHost(host: string): ArchitectureSpec[] {
  const h = lookup(HOST_ALIASES, host.trim().toLowerCase());
  if (!h) return [];
  return allArchitectures().filter((s) => s.host === h);
}

/** Node's `process.arch` (or an alias) as a matrix host; null for CPUs with no host row. */
export function normalizeHostArch(arch: string): HostArch | null {
  return lookup(HOST_ALIASES, arch.trim().toLowerCase()) ?? null;
}

/** The non-cross combination for a host CPU, if the matrix has one. */
export function nativeArchitecture(host: string): ArchitectureSpec | null {
  return architecturesForHost(host).find(isNative) ?? null;
}

/** Maps Node/compiler CPU names onto x64/x86/arm/arm64; anything else passes through lowercased. */
export function normalizeCpu(arch: string): string {
  const k = arch.trim().toLowerCase();
  return lookup(TARGET_ALIASES, k) ?? k;
}
