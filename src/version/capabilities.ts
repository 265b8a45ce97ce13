import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { FAMILIES } from '../compiler/compilerTypes.js';
import type { FamilyId } from '../compiler/compilerTypes.js';
import { ConfigError } from '../errors.js';
import { compareVersions, formatVersion, parseVersion, versionAtLeast } from './versionInfo.js';
import type { VersionInfo } from './versionInfo.js';

export const LANGUAGE_FLAGS = [
  'cpp11',
  'cpp14',
  'cpp17',
  'cpp20',
  'cpp23',
  'concepts',
  'coroutines',
  'ranges',
  'modules',
  'stdFormat',
] as const;

export type LanguageFlag = (typeof LANGUAGE_FLAGS)[number];
export type CapabilityFlag = LanguageFlag | 'nativeCompatible' | 'posixCompatible';
export type CapabilityInfo = Readonly<Record<CapabilityFlag, boolean>>;

/** `native`: MSVC ABI; `posix`: MinGW/MSYS2 layer. */
export type Compatibility = 'native' | 'posix' | 'none';

export type CapabilityStage = {
  minVersion: VersionInfo;
  flags: readonly LanguageFlag[];
};

export type CapabilityProfile = {
  name: string;
  /** Ascending by minVersion; each stage adds to the ones below it. */
  stages: readonly CapabilityStage[];
};

const versionString = z.string().transform((s, ctx) => {
  const v = parseVersion(s);
  if (!v) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a version: ${s}` });
    return z.NEVER;
  }
  return v;
});

const stageSchema = z.object({
  minVersion: versionString,
  flags: z.array(z.enum(LANGUAGE_FLAGS)).min(1),
});

const capabilityTableSchema = z.object({
  profiles: z.record(z.string(), z.array(stageSchema).min(1)),
  families: z.record(
    z.enum(FAMILIES),
    z.object({ profile: z.string(), compatibility: z.enum(['native', 'posix', 'none']) }),
  ),
});

type CapabilityTable = {
  profiles: Map<string, CapabilityProfile>;
  families: Map<FamilyId, { profile: CapabilityProfile; compatibility: Compatibility }>;
};

/** Throws ConfigError if stage thresholds are not strictly ascending. */
export function validateProfile(profile: CapabilityProfile): CapabilityProfile {
  for (let i = 1; i < profile.stages.length; i++) {
    const prev = profile.stages[i - 1].minVersion;
    const cur = profile.stages[i].minVersion;
    if (compareVersions(prev, cur) >= 0) {
      throw new ConfigError(
        `Capability profile "${profile.name}" is not ascending: ${formatVersion(prev)} then ${formatVersion(cur)}`,
      );
    }
  }
  return profile;
}

export function parseCapabilityTable(raw: unknown): CapabilityTable {
  const parsed = capabilityTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid capability table: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }

  const profiles = new Map<string, CapabilityProfile>();
  for (const [name, stages] of Object.entries(parsed.data.profiles)) {
    profiles.set(name, validateProfile({ name, stages }));
  }

  const families: CapabilityTable['families'] = new Map();
  for (const family of FAMILIES) {
    const entry = parsed.data.families[family];
    if (!entry) throw new ConfigError(`Capability table has no entry for family "${family}"`);
    const profile = profiles.get(entry.profile);
    if (!profile) throw new ConfigError(`Family "${family}" references unknown profile "${entry.profile}"`);
    families.set(family, { profile, compatibility: entry.compatibility });
  }

  return { profiles, families };
}

let table: CapabilityTable | null = null;

function loadTable(): CapabilityTable {
  if (table) return table;
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/capabilities.json', import.meta.url), 'utf8'),
  );
  table = parseCapabilityTable(raw);
  return table;
}

export function capabilityProfile(name: string): CapabilityProfile | undefined {
  return loadTable().profiles.get(name);
}

export function familyCapabilityProfile(family: FamilyId): CapabilityProfile {
  const entry = loadTable().families.get(family);
  if (!entry) throw new ConfigError(`No capability profile for family "${family}"`);
  return entry.profile;
}

/** Applies every stage at or below `version`; flags never switch back off. */
export function deriveCapabilities(
  version: VersionInfo,
  profile: CapabilityProfile,
  compatibility: Compatibility = 'none',
): CapabilityInfo {
  const flags: Record<CapabilityFlag, boolean> = {
    cpp11: false,
    cpp14: false,
    cpp17: false,
    cpp20: false,
    cpp23: false,
    concepts: false,
    coroutines: false,
    ranges: false,
    modules: false,
    stdFormat: false,
    nativeCompatible: compatibility === 'native',
    posixCompatible: compatibility === 'posix',
  };
  for (const stage of profile.stages) {
    if (!versionAtLeast(version, stage.minVersion)) break;
    for (const f of stage.flags) flags[f] = true;
  }
  return Object.freeze(flags);
}

export function capabilitiesForFamily(family: FamilyId, version: VersionInfo): CapabilityInfo {
  const entry = loadTable().families.get(family);
  if (!entry) throw new ConfigError(`No capability profile for family "${family}"`);
  return deriveCapabilities(version, entry.profile, entry.compatibility);
}

export const STANDARDS = ['c++11', 'c++14', 'c++17', 'c++20', 'c++23'] as const;
export type CppStandard = (typeof STANDARDS)[number];

const standardFlag: Record<CppStandard, LanguageFlag> = {
  'c++11': 'cpp11',
  'c++14': 'cpp14',
  'c++17': 'cpp17',
  'c++20': 'cpp20',
  'c++23': 'cpp23',
};

export function supportsStandard(caps: CapabilityInfo, std: CppStandard): boolean {
  return caps[standardFlag[std]];
}

export function highestStandard(caps: CapabilityInfo): CppStandard | null {
  for (let i = STANDARDS.length - 1; i >= 0; i--) {
    if (supportsStandard(caps, STANDARDS[i])) return STANDARDS[i];
  }
  return null;
}
