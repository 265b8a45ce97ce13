import { FAMILIES, isFamilyId } from '../compiler/compilerTypes.js';
import type { FamilyId, HostPlatform } from '../compiler/compilerTypes.js';
import { familyTable } from '../detect/familyTable.js';
import { expandVariables } from '../detect/installRoots.js';
import { logDebug } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import { GeneratorSelectionError, InvalidArgumentError } from '../errors.js';
import type { HostSystem } from '../host/hostTypes.js';
import { createNodeHost } from '../host/nodeHost.js';
import { which } from '../utils/which.js';
import { TARGET_PLATFORMS, generatorTable, isTargetPlatform, preferenceKey } from './generatorTable.js';
import type { GeneratorCandidate, TargetPlatform } from './generatorTable.js';

export type GeneratorValidation = {
  /** false only for hard failures (unknown generator, unsupported platform) */
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** Whether one of the generator's required tools was found. */
  toolsFound: boolean;
};

export type SelectGeneratorOptions = {
  preferMultiConfig?: boolean;
  allowFallback?: boolean;
  /** Tried ahead of the family's preference list, e.g. a cross record's generator hint. */
  preferred?: string;
  host?: HostSystem;
};

export type GeneratorSelection = {
  generator: string;
  candidate: GeneratorCandidate;
  family: FamilyId;
  platform: TargetPlatform;
  fallbackUsed: boolean;
  warnings: string[];
};

export function platformForHost(platform: HostPlatform): TargetPlatform {
  if (platform === 'win32') return 'windows';
  if (platform === 'darwin') return 'macos';
  return 'linux';
}

function parsePlatform(platform: string | undefined, host: HostSystem): TargetPlatform {
  if (platform === undefined) return platformForHost(host.platform);
  const p = platform.trim().toLowerCase();
  if (!isTargetPlatform(p)) throw new InvalidArgumentError(`Unknown target platform "${platform}"`, TARGET_PLATFORMS);
  return p;
}

function parseFamily(family: string): FamilyId {
  const f = family.trim().toLowerCase();
  if (!isFamilyId(f)) throw new InvalidArgumentError(`Unknown compiler family "${family}"`, FAMILIES);
  return f;
}

function toolPresent(host: HostSystem, tool: string): boolean {
  const expanded = expandVariables(host, tool, familyTable().envDefaults);
  return expanded !== null && which(host, expanded) !== null;
}

function toolNames(tools: readonly string[]): string {
  return tools.filter((t) => !/[\\/]/.test(t)).join(' or ');
}

function candidate(name: string): GeneratorCandidate {
  const g = generatorTable().generators.get(name);
  if (!g) {
    throw new InvalidArgumentError(`Unknown generator "${name}"`, [...generatorTable().generators.keys()]);
  }
  return g;
}

export function listGenerators(platform?: TargetPlatform): GeneratorCandidate[] {
  const all = [...generatorTable().generators.values()];
  return platform ? all.filter((g) => g.supportedPlatforms.includes(platform)) : all;
}

/**
 * Checks `name` against `platform` and the host's PATH. An unsupported
 * platform is an error; missing companion tools are warnings.
 */
export function validateGenerator(name: string, platform: TargetPlatform, host: HostSystem): GeneratorValidation {
  const g = generatorTable().generators.get(name);
  if (!g) return { valid: false, errors: [`Unknown generator "${name}"`], warnings: [], toolsFound: false };

  const errors: string[] = [];
  const warnings: string[] = [];
  if (!g.supportedPlatforms.includes(platform)) {
    errors.push(`Generator ${name} is not supported on ${platform} (supported: ${g.supportedPlatforms.join(', ')})`);
  }
  const toolsFound = g.requiredTools.some((t) => toolPresent(host, t));
  if (!toolsFound) warnings.push(`Generator ${name} needs ${toolNames(g.requiredTools)} on PATH`);
  if (g.toolchainTools.length && !g.toolchainTools.some((t) => toolPresent(host, t))) {
    warnings.push(`Generator ${name} drives ${toolNames(g.toolchainTools)}, which is not on PATH`);
  }
  return { valid: errors.length === 0, errors, warnings, toolsFound };
}

function usable(v: GeneratorValidation): boolean {
  return v.valid && v.toolsFound;
}

/**
 * Picks a build generator for `family` on `platform` (the host's platform by
 * default) from the family's ordered preference list.
 *
 * The head (the first multi-config entry under `preferMultiConfig`) must be
 * supported and have its tool installed. Otherwise, with fallback allowed, the
 * entries after it are tried in list order and then the platform default;
 * without fallback a GeneratorSelectionError is raised.
 */
export function selectGenerator(
  family: string,
  platform?: string,
  opts: SelectGeneratorOptions = {},
): GeneratorSelection {
  const host = opts.host ?? createNodeHost();
  const fam = parseFamily(family);
  const plat = parsePlatform(platform, host);
  const allowFallback = opts.allowFallback ?? true;
  const { preferences, defaults } = generatorTable();
  const listed = preferences.get(preferenceKey(fam, plat));
  if (opts.preferred !== undefined) candidate(opts.preferred);
  const list =
    opts.preferred === undefined ? listed : [opts.preferred, ...(listed ?? []).filter((n) => n !== opts.preferred)];

  const result = (name: string, fallbackUsed: boolean, warnings: string[]): GeneratorSelection => {
    traceInfo('generator.select', { family: fam, platform: plat, generator: name, fallbackUsed });
    return { generator: name, candidate: candidate(name), family: fam, platform: plat, fallbackUsed, warnings };
  };

  if (!list) {
    const name = defaults[plat];
    const message = `No generator preference for ${fam} on ${plat}; using default ${name}`;
    warn({ code: 'GENERATOR_FALLBACK', message });
    return result(name, true, [message, ...validateGenerator(name, plat, host).warnings]);
  }

  const multi = opts.preferMultiConfig ? list.find((n) => candidate(n).supportsMultiConfig) : undefined;
  const head = multi ?? list[0];
  const headCheck = validateGenerator(head, plat, host);
  if (usable(headCheck)) return result(head, false, headCheck.warnings);

  const problems = [...headCheck.errors, ...headCheck.warnings];
  if (!allowFallback) {
    throw new GeneratorSelectionError(`Generator ${head} is not usable on ${plat}: ${problems.join('; ')}`, {
      suggestion: `Install ${toolNames(candidate(head).requiredTools)} or allow generator fallback.`,
      details: { family: fam, platform: plat, generator: head, problems },
    });
  }

  const warnings = [...problems];
  for (const name of list.slice(list.indexOf(head) + 1)) {
    const check = validateGenerator(name, plat, host);
    if (usable(check)) {
      const message = `Falling back from ${head} to ${name}`;
      warn({ code: 'GENERATOR_FALLBACK', message });
      return result(name, true, [...warnings, message, ...check.warnings]);
    }
    logDebug(`generator ${name} rejected`, check);
  }

  const name = defaults[plat];
  const message = `Falling back from ${head} to platform default ${name}`;
  warn({ code: 'GENERATOR_FALLBACK', message });
  const defaultCheck = validateGenerator(name, plat, host);
  return result(name, true, [...warnings, message, ...defaultCheck.warnings.filter((w) => !warnings.includes(w))]);
}

export type PlatformGeneratorOptions = {
  preferMultiConfig?: boolean;
  /** Visual Studio on windows, Xcode on macOS/iOS, when their tools are present. Default true. */
  preferNative?: boolean;
  host?: HostSystem;
};

/** A generator for `platform` without a compiler family in mind. */
export function selectGeneratorForPlatform(platform: string, opts: PlatformGeneratorOptions = {}): string {
  const host = opts.host ?? createNodeHost();
  const plat = parsePlatform(platform, host);
  const preferNative = opts.preferNative ?? true;

  if (preferNative) {
    const native = plat === 'windows' ? 'Visual Studio 17 2022' : plat === 'macos' || plat === 'ios' ? 'Xcode' : null;
    if (native && validateGenerator(native, plat, host).toolsFound) return native;
  }
  if (opts.preferMultiConfig) {
    const multi = listGenerators(plat).find((g) => g.supportsMultiConfig);
    if (multi) return multi.name;
  }
  return generatorTable().defaults[plat];
}
