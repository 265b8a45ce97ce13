import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { FAMILIES } from '../compiler/compilerTypes.js';
import type { FamilyId } from '../compiler/compilerTypes.js';
import { ConfigError } from '../errors.js';

export const TARGET_PLATFORMS = ['windows', 'linux', 'macos', 'wasm', 'android', 'ios'] as const;
export type TargetPlatform = (typeof TARGET_PLATFORMS)[number];

export function isTargetPlatform(s: string): s is TargetPlatform {
  return TARGET_PLATFORMS.some((p) => p === s);
}

const generatorSchema = z.object({
  name: z.string().min(1),
  supportsMultiConfig: z.boolean(),
  /** Any one of these on PATH (or at an absolute path) makes the generator usable. */
  requiredTools: z.array(z.string()).min(1),
  /** Compiler the generator drives; only warned about when absent. */
  toolchainTools: z.array(z.string()).default([]),
  supportedPlatforms: z.array(z.enum(TARGET_PLATFORMS)).min(1),
  description: z.string(),
});

const generatorTableSchema = z.object({
  generators: z.array(generatorSchema).min(1),
  preferences: z.array(
    z.object({
      family: z.enum(FAMILIES),
      platform: z.enum(TARGET_PLATFORMS),
      generators: z.array(z.string()).min(1),
    }),
  ),
  platformDefaults: z.record(z.enum(TARGET_PLATFORMS), z.string()),
});

export type GeneratorCandidate = Readonly<z.infer<typeof generatorSchema>>;

export type GeneratorTable = {
  generators: ReadonlyMap<string, GeneratorCandidate>;
  /** Keyed by `family/platform`; order is preference order. */
  preferences: ReadonlyMap<string, readonly string[]>;
  defaults: Readonly<Record<TargetPlatform, string>>;
};

export function preferenceKey(family: FamilyId, platform: TargetPlatform): string {
  return `${family}/${platform}`;
}

export function parseGeneratorTable(raw: unknown): GeneratorTable {
  const parsed = generatorTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid generator table: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
    );
  }
  const generators = new Map<string, GeneratorCandidate>();
  for (const g of parsed.data.generators) {
    if (generators.has(g.name)) throw new ConfigError(`Generator "${g.name}" is listed twice`);
    generators.set(g.name, Object.freeze(g));
  }
  const known = (name: string, where: string) => {
    if (!generators.has(name)) throw new ConfigError(`${where} names unknown generator "${name}"`);
  };

  const preferences = new Map<string, readonly string[]>();
  for (const pref of parsed.data.preferences) {
    const key = preferenceKey(pref.family, pref.platform);
    if (preferences.has(key)) throw new ConfigError(`Preference list ${key} is listed twice`);
    pref.generators.forEach((n) => known(n, `Preference list ${key}`));
    preferences.set(key, Object.freeze([...pref.generators]));
  }

  const d = parsed.data.platformDefaults;
  const defaults: Record<TargetPlatform, string> = {
    windows: d.windows ?? 'Ninja',
    linux: d.linux ?? 'Ninja',
    macos: d.macos ?? 'Ninja',
    wasm: d.wasm ?? 'Ninja',
    android: d.android ?? 'Ninja',
    ios: d.ios ?? 'Ninja',
  };
  for (const platform of TARGET_PLATFORMS) known(defaults[platform], `Default for ${platform}`);

  return { generators, preferences, defaults: Object.freeze(defaults) };
}

let table: GeneratorTable | null = null;

export function generatorTable(): GeneratorTable {
  if (table) return table;
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/generators.json', import.meta.url), 'utf8'));
  table = parseGeneratorTable(raw);
  return table;
}
