import {
  activationScriptName,
  fromHostTarget,
  fromString,
  normalizeCpu,
  toCanonicalString,
  tryParseArchitecture,
} from '../arch/architectureMatrix.js';
import type { ArchitectureSpec } from '../arch/architectureMatrix.js';
import { isCrossRecord } from '../compiler/compilerTypes.js';
import type { AnyToolchainRecord } from '../compiler/compilerTypes.js';
import type { ToolprobeSettings } from '../dx/config.js';
import { ActivationError } from '../errors.js';
import { getEnv, pathDelimiter, setEnv, splitPathList } from '../host/envAccess.js';
import { hostPath } from '../host/hostTypes.js';
import type { HostSystem } from '../host/hostTypes.js';
import { ACTIVATION_PROFILES, resolveTemplate } from './activationTables.js';
import type { ActivationProfile } from './activationTables.js';
import { applyDiff } from './environmentSnapshot.js';
import type { EnvironmentDiff, EnvironmentSnapshot } from './environmentSnapshot.js';
import type { ScriptInvocation } from './scriptEnvironment.js';

/** Everything activation will do, resolved against the host but not yet applied. */
export type ActivationPlan = {
  profile: ActivationProfile;
  script: ScriptInvocation | null;
  variables: Record<string, string>;
  pathPrepend: string[];
  pathLists: Record<string, string[]>;
};

/** Placeholder values available to the family's templates. */
export function templateValues(record: AnyToolchainRecord, host: HostSystem): Record<string, string> {
  const p = hostPath(host);
  const extra = record.environmentHints.extraVariables;
  const values: Record<string, string> = {
    ...extra,
    binDir: p.dirname(record.executablePath),
    root: record.provenance.installationRoot,
    arch: record.architecture,
    cc: extra.CC || record.executablePath,
  };
  if (extra.CXX) values.cxx = extra.CXX;
  if (isCrossRecord(record)) {
    values.triple = record.targetTriple;
    values.cxx = record.tools.cxx;
    values.ar = record.tools.ar;
    values.strip = record.tools.strip;
    values.generator = record.generatorHint;
    if (record.sysrootPath) values.sysroot = record.sysrootPath;
  }
  return values;
}

function samePath(a: string, b: string, host: HostSystem): boolean {
  const p = hostPath(host);
  const norm = (s: string) => {
    const n = p.normalize(s).replace(/[\\/]+$/, '');
    return host.platform === 'win32' ? n.toLowerCase() : n;
  };
  return norm(a) === norm(b);
}

/**
 * Puts `entries` at the front of a path list, in order. Existing occurrences
 * are moved rather than repeated, so prepending twice changes nothing.
 */
export function prependPathEntries(host: HostSystem, current: string | undefined, entries: readonly string[]): string {
  const rest = splitPathList(current, host.platform).filter((e) => !entries.some((n) => samePath(e, n, host)));
  const unique = entries.filter((e, i) => entries.findIndex((o) => samePath(o, e, host)) === i);
  return [...unique, ...rest].join(pathDelimiter(host.platform));
}

/** Matrix entry for an MSVC-style record: requested, recorded, or host->record CPU. */
export function activationArchitecture(
  record: AnyToolchainRecord,
  host: HostSystem,
  requested?: string,
): ArchitectureSpec {
  if (requested) return fromString(requested);
  return tryParseArchitecture(record.architecture) ?? fromHostTarget(normalizeCpu(host.arch), record.architecture);
}

/** vcvarsall.bat with matrix arguments, else the per-architecture vcvars script; null if neither exists. */
export function resolveActivationScript(
  record: AnyToolchainRecord,
  host: HostSystem,
  settings: ToolprobeSettings,
  requested?: string,
): ScriptInvocation | null {
  const p = hostPath(host);
  const spec = activationArchitecture(record, host, requested);
  const buildDir = p.join(record.provenance.installationRoot, 'VC', 'Auxiliary', 'Build');
  const vcvarsall = p.join(buildDir, 'vcvarsall.bat');

  if (host.exists(vcvarsall)) {
    const { platformType, spectre } = settings.msvc;
    const toolset = settings.msvc.toolsetVersion ?? record.environmentHints.extraVariables.VCToolsVersion;
    const args = [
      toCanonicalString(spec),
      ...(platformType === 'desktop' ? [] : [platformType]),
      ...(spectre ? ['-vcvars_spectre_libs=spectre'] : []),
      ...(toolset ? [`-vcvars_ver=${toolset}`] : []),
    ];
    return { script: vcvarsall, args };
  }

  const single = p.join(buildDir, activationScriptName(spec));
  return host.exists(single) ? { script: single, args: [] } : null;
}

function existingDirs(host: HostSystem, templates: readonly string[], values: Record<string, string>): string[] {
  const p = hostPath(host);
  return templates
    .map((t) => resolveTemplate(t, values))
    .flatMap((d) => (d === null ? [] : [p.normalize(d)]))
    .filter((d) => host.isDirectory(d));
}

export function planActivation(
  record: AnyToolchainRecord,
  host: HostSystem,
  settings: ToolprobeSettings,
  requestedArchitecture?: string,
): ActivationPlan {
  const profile = ACTIVATION_PROFILES[record.family];
  const values = templateValues(record, host);

  let script: ScriptInvocation | null = null;
  if (profile.script) {
    script = resolveActivationScript(record, host, settings, requestedArchitecture);
    // msvc_clang without a script falls back to direct activation.
    if (!script && record.family === 'msvc') {
      throw new ActivationError(`No activation script under ${record.provenance.installationRoot}`, {
        suggestion: 'Install the "Desktop development with C++" workload or repair the Visual Studio installation.',
      });
    }
  }

  const variables: Record<string, string> = {};
  const variableTemplates = { ...profile.variables, ...(profile.architectureVariables?.[record.architecture] ?? {}) };
  for (const [name, template] of Object.entries(variableTemplates)) {
    const v = resolveTemplate(template, values);
    if (v !== null) variables[name] = v;
  }

  const pathLists: Record<string, string[]> = {};
  for (const [name, templates] of Object.entries(profile.pathLists ?? {})) {
    const dirs = existingDirs(host, templates, values);
    if (dirs.length > 0) pathLists[name] = dirs;
  }

  return { profile, script, variables, pathPrepend: existingDirs(host, profile.pathPrepend, values), pathLists };
}

/**
 * The environment `plan` produces on top of `base`: the script's changes
 * first, then the family's variables and path prepends. Pure.
 */
export function applyPlan(
  host: HostSystem,
  base: EnvironmentSnapshot,
  plan: ActivationPlan,
  scriptDiff: EnvironmentDiff | null,
): Record<string, string> {
  const next: Record<string, string> = { ...base };
  if (scriptDiff) applyDiff(next, scriptDiff, host.platform);
  const get = (name: string) => getEnv(next, name, host.platform);

  for (const [name, value] of Object.entries(plan.variables)) setEnv(next, name, value, host.platform);
  for (const [name, dirs] of Object.entries(plan.pathLists)) {
    setEnv(next, name, prependPathEntries(host, get(name), dirs), host.platform);
  }
  if (plan.pathPrepend.length > 0) {
    setEnv(next, 'PATH', prependPathEntries(host, get('PATH'), plan.pathPrepend), host.platform);
  }
  return next;
}
