import { z } from 'zod';

import { architecturesForHost, hostTargetDir, normalizeCpu, toCanonicalString } from '../arch/architectureMatrix.js';
import type { DiscoveryMethod, PackageManager } from '../compiler/compilerTypes.js';
import { getEnv } from '../host/envAccess.js';
import { combinedOutput, hostPath, isRunSuccess } from '../host/hostTypes.js';
import type { HostSystem } from '../host/hostTypes.js';
import { which, whichAll } from '../utils/which.js';
import { binSubdirPath, familyTable } from './familyTable.js';
import type { BinSubdir, FamilyConfig } from './familyTable.js';
import { expandInstallRoot, expandVariables } from './installRoots.js';
import type { Candidate, DetectionContext, DetectionStrategy } from './detectorTypes.js';

export function exeName(host: HostSystem, name: string): string {
  return host.platform === 'win32' && !hostPath(host).extname(name) ? `${name}.exe` : name;
}

function stripExe(host: HostSystem, name: string): string {
  return host.platform === 'win32' ? name.replace(/\.exe$/i, '') : name;
}

/** The family's driver(s) inside one bin directory. */
export function driversInDir(host: HostSystem, cfg: FamilyConfig, dir: string): string[] {
  const p = hostPath(host);
  for (const name of [...cfg.executables, ...cfg.genericExecutables]) {
    const full = p.join(dir, exeName(host, name));
    if (host.isExecutable(full)) return [full];
  }
  if (!cfg.versionedPattern) return [];
  const re = new RegExp(cfg.versionedPattern);
  return host
    .listDir(dir)
    .filter((n) => re.test(stripExe(host, n)))
    .map((n) => p.join(dir, n))
    .filter((full) => host.isExecutable(full));
}

type Origin = {
  discoveryMethod: DiscoveryMethod;
  packageManager?: PackageManager;
};

function binLayoutCandidates(
  ctx: DetectionContext,
  cfg: FamilyConfig,
  root: string,
  origin: Origin,
  subdirs: readonly BinSubdir[] = cfg.binSubdirs,
): Candidate[] {
  const { host } = ctx;
  const p = hostPath(host);
  const table = familyTable();
  const out: Candidate[] = [];
  for (const sub of subdirs) {
    const binDir = p.join(root, ...binSubdirPath(sub).split('/'));
    if (!host.isDirectory(binDir)) continue;
    const msystem = typeof sub === 'string' ? undefined : sub.msystem;
    const msys = msystem ? table.msys2[msystem] : undefined;
    const architecture = typeof sub === 'string' ? undefined : sub.architecture ?? msys?.architecture;
    for (const exe of driversInDir(host, cfg, binDir)) {
      out.push({ executablePath: exe, binDir, installationRoot: root, ...origin, architecture, msystem });
    }
  }
  return out;
}

/** `<vs>/VC/Tools/MSVC/<ver>/bin/Host<h>/<t>/cl.exe` for every toolset and host arch. */
function msvcToolsetCandidates(ctx: DetectionContext, cfg: FamilyConfig, root: string, origin: Origin): Candidate[] {
  const { host } = ctx;
  const p = hostPath(host);
  const toolsRoot = p.join(root, 'VC', 'Tools', 'MSVC');
  const versions = host.listDir(toolsRoot).sort().reverse();
  const out: Candidate[] = [];
  for (const ver of versions) {
    const toolsetDir = p.join(toolsRoot, ver);
    for (const spec of architecturesForHost(normalizeCpu(host.arch))) {
      const binDir = p.join(toolsetDir, 'bin', ...hostTargetDir(spec).split('/'));
      for (const name of cfg.executables) {
        const exe = p.join(binDir, exeName(host, name));
        if (!host.isExecutable(exe)) continue;
        out.push({
          executablePath: exe,
          binDir,
          installationRoot: root,
          ...origin,
          architecture: toCanonicalString(spec),
          toolsetDir,
        });
      }
    }
  }
  return out;
}

export function candidatesInRoot(
  ctx: DetectionContext,
  cfg: FamilyConfig,
  root: string,
  origin: Origin,
  subdirs?: readonly BinSubdir[],
): Candidate[] {
  return cfg.layout === 'msvcToolset'
    ? msvcToolsetCandidates(ctx, cfg, root, origin)
    : binLayoutCandidates(ctx, cfg, root, origin, subdirs);
}

function endsWithSegments(host: HostSystem, dir: string, suffix: string): string | null {
  const p = hostPath(host);
  const norm = (s: string) => (host.platform === 'win32' ? s.toLowerCase() : s);
  const dirParts = p.normalize(dir).split(p.sep).filter(Boolean);
  const sufParts = suffix.split('/').filter(Boolean);
  if (sufParts.length >= dirParts.length) return null;
  const tail = dirParts.slice(dirParts.length - sufParts.length);
  if (!tail.every((part, i) => norm(part) === norm(sufParts[i]))) return null;
  let root = dir;
  for (let i = 0; i < sufParts.length; i++) root = p.dirname(root);
  return root;
}

/** Works out root, architecture and MSYS2 environment for an executable found by path. */
export function candidateFromExecutable(
  ctx: DetectionContext,
  cfg: FamilyConfig,
  executablePath: string,
  origin: Origin,
): Candidate {
  const { host } = ctx;
  const p = hostPath(host);
  const binDir = p.dirname(executablePath);

  if (cfg.layout === 'msvcToolset') {
    const target = p.basename(binDir);
    const hostDir = p.basename(p.dirname(binDir));
    const m = /^host(\w+)$/i.exec(hostDir);
    const spec = m ? architecturesForHost(m[1]).find((a) => a.target === normalizeCpu(target)) : undefined;
    if (spec) {
      const toolsetDir = p.dirname(p.dirname(p.dirname(binDir)));
      const root = p.dirname(p.dirname(p.dirname(p.dirname(toolsetDir))));
      return {
        executablePath,
        binDir,
        installationRoot: root,
        ...origin,
        architecture: toCanonicalString(spec),
        toolsetDir,
      };
    }
  }

  const msys2 = familyTable().msys2;
  for (const sub of cfg.binSubdirs) {
    const root = endsWithSegments(host, binDir, binSubdirPath(sub));
    if (!root) continue;
    const msystem = typeof sub === 'string' ? undefined : sub.msystem;
    const architecture =
      typeof sub === 'string' ? undefined : sub.architecture ?? (msystem ? msys2[msystem]?.architecture : undefined);
    return { executablePath, binDir, installationRoot: root, ...origin, architecture, msystem };
  }
  return { executablePath, binDir, installationRoot: p.dirname(binDir), ...origin };
}

const vswhereOutputSchema = z.array(z.object({ installationPath: z.string() }).passthrough());

/** Install roots reported by vswhere; [] when vswhere is not installed. */
export function queryVisualStudioInstallations(ctx: DetectionContext): string[] {
  const { host, settings } = ctx;
  const table = familyTable();
  const located = table.vswhere.locations
    .map((l) => expandVariables(host, l, table.envDefaults))
    .find((l): l is string => l !== null && host.isExecutable(l));
  const vswhere = located ?? which(host, 'vswhere');
  if (!vswhere) return [];

  const res = host.run(vswhere, table.vswhere.args, { timeoutMs: settings.timeouts.inventoryQueryMs });
  if (res.timedOut) throw Object.assign(new Error(`vswhere timed out after ${settings.timeouts.inventoryQueryMs}ms`), { code: 'ETIMEDOUT' });
  if (!isRunSuccess(res)) {
    throw new Error(`vswhere failed (exit ${res.exitCode ?? res.error ?? 'unknown'}): ${combinedOutput(res).trim()}`);
  }
  const parsed = vswhereOutputSchema.parse(JSON.parse(res.stdout || '[]'));
  return parsed.map((e) => e.installationPath);
}

export function inventoryStrategy(ctx: DetectionContext, cfg: FamilyConfig): DetectionStrategy {
  return {
    name: 'inventory',
    discover() {
      return queryVisualStudioInstallations(ctx).flatMap((root) =>
        candidatesInRoot(ctx, cfg, root, { discoveryMethod: 'inventory' }),
      );
    },
  };
}

export function environmentStrategy(ctx: DetectionContext, cfg: FamilyConfig): DetectionStrategy {
  return {
    name: 'environment',
    discover() {
      const { host } = ctx;
      const out: Candidate[] = [];
      for (const name of cfg.environmentVariables) {
        const value = getEnv(host.env, name, host.platform)?.trim();
        if (!value) continue;
        // CC may carry flags ("gcc -m32"); fall back to the first word.
        const exe = which(host, value) ?? which(host, value.split(/\s+/)[0]);
        if (!exe) continue;
        out.push(candidateFromExecutable(ctx, cfg, exe, { discoveryMethod: 'environment' }));
      }
      return out;
    },
  };
}

export function standardLocationsStrategy(ctx: DetectionContext, cfg: FamilyConfig): DetectionStrategy {
  return {
    name: 'standardLocations',
    discover() {
      const { host, settings } = ctx;
      const defaults = familyTable().envDefaults;
      const patterns = [...(settings.searchRoots[cfg.id] ?? []), ...(cfg.installRoots[host.platform] ?? [])];
      const seen = new Set<string>();
      const out: Candidate[] = [];
      for (const pattern of patterns) {
        for (const root of expandInstallRoot(host, pattern, defaults)) {
          const k = host.platform === 'win32' ? root.toLowerCase() : root;
          if (seen.has(k)) continue;
          seen.add(k);
          out.push(...candidatesInRoot(ctx, cfg, root, { discoveryMethod: 'standardLocations' }));
        }
      }
      return out;
    },
  };
}

function packageRoots(host: HostSystem, manager: PackageManager, name: string): string[] {
  const p = hostPath(host);
  const defaults = familyTable().envDefaults;
  const env = (v: string) => expandVariables(host, `%${v}%`, defaults);
  const under = (base: string | null, ...parts: string[]) => (base ? [p.join(base, ...parts)] : []);

  switch (manager) {
    case 'scoop':
      if (host.platform !== 'win32') return [];
      return [...under(env('SCOOP'), 'apps', name, 'current'), ...under(env('SCOOP_GLOBAL'), 'apps', name, 'current')];
    case 'chocolatey':
      if (host.platform !== 'win32') return [];
      return under(env('ChocolateyInstall'), 'lib', name);
    case 'winget':
      if (host.platform !== 'win32') return [];
      return [...under(env('ProgramFiles'), name), ...under(env('ProgramFiles(x86)'), name)];
    case 'homebrew': {
      if (host.platform === 'win32') return [];
      const prefixes = [env('HOMEBREW_PREFIX'), '/opt/homebrew', '/usr/local', '/home/linuxbrew/.linuxbrew'];
      return prefixes.flatMap((prefix) => under(prefix, 'opt', name));
    }
  }
}

export function packageManagersStrategy(ctx: DetectionContext, cfg: FamilyConfig): DetectionStrategy {
  return {
    name: 'packageManagers',
    discover() {
      const { host } = ctx;
      const out: Candidate[] = [];
      for (const pkg of cfg.packages) {
        for (const root of packageRoots(host, pkg.manager, pkg.name)) {
          if (!host.isDirectory(root)) continue;
          out.push(
            ...candidatesInRoot(
              ctx,
              cfg,
              root,
              { discoveryMethod: 'packageManagers', packageManager: pkg.manager },
              pkg.binSubdirs,
            ),
          );
        }
      }
      return out;
    },
  };
}

export function pathStrategy(ctx: DetectionContext, cfg: FamilyConfig): DetectionStrategy {
  return {
    name: 'path',
    discover() {
      const names = [...cfg.executables, ...cfg.genericExecutables];
      return names.flatMap((name) =>
        whichAll(ctx.host, name).map((exe) => candidateFromExecutable(ctx, cfg, exe, { discoveryMethod: 'path' })),
      );
    },
  };
}

export function buildStrategy(method: DiscoveryMethod, ctx: DetectionContext, cfg: FamilyConfig): DetectionStrategy {
  switch (method) {
    case 'inventory':
      return inventoryStrategy(ctx, cfg);
    case 'environment':
      return environmentStrategy(ctx, cfg);
    case 'standardLocations':
      return standardLocationsStrategy(ctx, cfg);
    case 'packageManagers':
      return packageManagersStrategy(ctx, cfg);
    case 'path':
      return pathStrategy(ctx, cfg);
  }
}
