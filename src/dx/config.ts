import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';

import { FAMILIES } from '../compiler/compilerTypes.js';
import type { FamilyId } from '../compiler/compilerTypes.js';
import { ConfigError } from '../errors.js';
import { logDebug, setDebugEnabled } from './logger.js';

/** Upper bounds for external calls; config may lower them, never raise. */
export const TIMEOUT_LIMITS = {
  versionQueryMs: 10_000,
  inventoryQueryMs: 30_000,
  activationScriptMs: 300_000,
} as const;

const timeoutMs = z.number().int().positive();

export const toolprobeConfigSchema = z
  .object({
    /** Enable debug logs without env var */
    debug: z.boolean().optional(),
    /** Restrict detection to these families */
    families: z.array(z.enum(FAMILIES)).optional(),
    /** Extra install roots, searched before the built-in ones */
    searchRoots: z.record(z.enum(FAMILIES), z.array(z.string())).optional(),
    timeouts: z
      .object({
        versionQueryMs: timeoutMs.optional(),
        inventoryQueryMs: timeoutMs.optional(),
        activationScriptMs: timeoutMs.optional(),
      })
      .strict()
      .optional(),
    generator: z
      .object({
        preferMultiConfig: z.boolean().optional(),
        allowFallback: z.boolean().optional(),
      })
      .strict()
      .optional(),
    msvc: z
      .object({
        platformType: z.enum(['desktop', 'uwp', 'store']).optional(),
        spectre: z.boolean().optional(),
        /** `14.38` style toolset passed as -vcvars_ver */
        toolsetVersion: z.string().regex(/^\d+\.\d+(\.\d+)?$/).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ToolprobeConfig = z.infer<typeof toolprobeConfigSchema>;

export type ToolprobeSettings = {
  families: readonly FamilyId[];
  searchRoots: Partial<Record<FamilyId, readonly string[]>>;
  timeouts: { versionQueryMs: number; inventoryQueryMs: number; activationScriptMs: number };
  generator: { preferMultiConfig: boolean; allowFallback: boolean };
  msvc: { platformType: 'desktop' | 'uwp' | 'store'; spectre: boolean; toolsetVersion?: string };
};

export function parseConfig(raw: unknown, source = 'config'): ToolprobeConfig {
  const parsed = toolprobeConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join('; ')}`, {
      suggestion: 'Fix or remove the listed keys.',
      details: { issues },
    });
  }
  return parsed.data;
}

function clamp(value: number | undefined, limit: number): number {
  return value === undefined ? limit : Math.min(value, limit);
}

export function resolveSettings(config: ToolprobeConfig | null = null): ToolprobeSettings {
  const c = config ?? {};
  return {
    families: c.families ?? FAMILIES,
    searchRoots: c.searchRoots ?? {},
    timeouts: {
      versionQueryMs: clamp(c.timeouts?.versionQueryMs, TIMEOUT_LIMITS.versionQueryMs),
      inventoryQueryMs: clamp(c.timeouts?.inventoryQueryMs, TIMEOUT_LIMITS.inventoryQueryMs),
      activationScriptMs: clamp(c.timeouts?.activationScriptMs, TIMEOUT_LIMITS.activationScriptMs),
    },
    generator: {
      preferMultiConfig: c.generator?.preferMultiConfig ?? false,
      allowFallback: c.generator?.allowFallback ?? true,
    },
    msvc: {
      platformType: c.msvc?.platformType ?? 'desktop',
      spectre: c.msvc?.spectre ?? false,
      toolsetVersion: c.msvc?.toolsetVersion,
    },
  };
}

let cached:
  | { loaded: true; config: ToolprobeConfig | null }
  | { loaded: false } = { loaded: false };

export function configPath(projectRoot: string) {
  return join(projectRoot, 'toolprobe.config.js');
}

/**
 * Loads optional `toolprobe.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 * - Validated: unknown keys or wrong types raise ConfigError
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<ToolprobeConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
  const cfg = parseConfig(exported, p);
  cached = { loaded: true, config: cfg };
  if (cfg.debug) setDebugEnabled(true);
  logDebug('loaded config', { path: p });
  return cfg;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
