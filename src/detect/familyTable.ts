import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { DISCOVERY_METHODS, HOST_PLATFORMS, NATIVE_FAMILIES, PACKAGE_MANAGERS } from '../compiler/compilerTypes.js';
import type { NativeFamily } from '../compiler/compilerTypes.js';
import { ConfigError } from '../errors.js';

const regexString = z.string().refine(
  (s) => {
    try {
      new RegExp(s);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'invalid regular expression' },
);

const binSubdirSchema = z.union([
  z.string(),
  z.object({
    path: z.string(),
    architecture: z.string().optional(),
    /** MSYS2 environment whose variables apply to this directory */
    msystem: z.string().optional(),
  }),
]);

const familySchema = z.object({
  id: z.enum(NATIVE_FAMILIES),
  displayName: z.string(),
  hostPlatforms: z.array(z.enum(HOST_PLATFORMS)).min(1),
  /** Driver names trusted by name alone (`.exe` is added on win32). */
  executables: z.array(z.string()).min(1),
  /** Names shared between families (`cc`); needs identifyPattern. */
  genericExecutables: z.array(z.string()).default([]),
  /** Version-suffixed names to fall back on when a directory has no plain driver. */
  versionedPattern: regexString.optional(),
  /** When set, `--version` output must match it for any candidate to count. */
  identifyPattern: regexString.optional(),
  rejectPattern: regexString.optional(),
  versionArgs: z.array(z.string()),
  versionPatterns: z.array(regexString).min(1),
  /** `msvc`: the third component of `19.40.33811` is a build number, not a patch level. */
  versionScheme: z.enum(['dotted', 'msvc']).default('dotted'),
  strategies: z.array(z.enum(DISCOVERY_METHODS)).min(1),
  environmentVariables: z.array(z.string()).default([]),
  /** `%VAR%` and a leading `~` expand; a `*` in the last segment matches directory names. */
  installRoots: z
    .object({
      linux: z.array(z.string()).optional(),
      darwin: z.array(z.string()).optional(),
      win32: z.array(z.string()).optional(),
    })
    .default({}),
  binSubdirs: z.array(binSubdirSchema).default(['bin']),
  packages: z
    .array(
      z.object({
        manager: z.enum(PACKAGE_MANAGERS),
        name: z.string(),
        binSubdirs: z.array(z.string()).optional(),
      }),
    )
    .default([]),
  layout: z.enum(['bin', 'msvcToolset']).default('bin'),
  companions: z.object({ c: z.array(z.string()).min(1), cxx: z.array(z.string()).min(1) }),
});

const msys2Schema = z.object({
  prefix: z.string(),
  chost: z.string(),
  architecture: z.string(),
});

const familyTableSchema = z.object({
  envDefaults: z.record(z.string(), z.string()),
  msys2: z.record(z.string(), msys2Schema),
  vswhere: z.object({ locations: z.array(z.string()), args: z.array(z.string()) }),
  families: z.array(familySchema),
});

export type FamilyConfig = z.infer<typeof familySchema>;
export type BinSubdir = z.infer<typeof binSubdirSchema>;
export type Msys2Environment = z.infer<typeof msys2Schema>;
export type FamilyTable = {
  envDefaults: Readonly<Record<string, string>>;
  msys2: Readonly<Record<string, Msys2Environment>>;
  vswhere: { locations: readonly string[]; args: readonly string[] };
  families: ReadonlyMap<NativeFamily, FamilyConfig>;
};

export function parseFamilyTable(raw: unknown): FamilyTable {
  const parsed = familyTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid family table: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
    );
  }
  const families = new Map<NativeFamily, FamilyConfig>();
  for (const f of parsed.data.families) {
    if (families.has(f.id)) throw new ConfigError(`Family "${f.id}" is listed twice`);
    if (f.genericExecutables.length && !f.identifyPattern) {
      throw new ConfigError(`Family "${f.id}" lists generic executables without an identifyPattern`);
    }
    for (const sub of f.binSubdirs) {
      if (typeof sub !== 'string' && sub.msystem && !parsed.data.msys2[sub.msystem]) {
        throw new ConfigError(`Family "${f.id}" references unknown MSYS2 environment "${sub.msystem}"`);
      }
    }
    families.set(f.id, f);
  }
  return { ...parsed.data, families };
}

let table: FamilyTable | null = null;

export function familyTable(): FamilyTable {
  if (table) return table;
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/families.json', import.meta.url), 'utf8'));
  table = parseFamilyTable(raw);
  return table;
}

export function familyConfig(id: NativeFamily): FamilyConfig {
  const cfg = familyTable().families.get(id);
  if (!cfg) throw new ConfigError(`No detection config for family "${id}"`);
  return cfg;
}

export function binSubdirPath(sub: BinSubdir): string {
  return typeof sub === 'string' ? sub : sub.path;
}
