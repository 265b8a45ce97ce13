import { getEnv, splitPathList } from '../host/envAccess.js';
import { hostPath } from '../host/hostTypes.js';
import type { HostSystem } from '../host/hostTypes.js';

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

function candidateNames(host: HostSystem, cmd: string): string[] {
  if (host.platform !== 'win32') return [cmd];
  if (hostPath(host).extname(cmd)) return [cmd];
  const exts = (getEnv(host.env, 'PATHEXT', host.platform) ?? DEFAULT_PATHEXT)
    .split(';')
    .filter(Boolean)
    .map((e) => e.toLowerCase());
  return exts.map((e) => `${cmd}${e}`);
}

/**
 * Resolve `cmd` against a PATH value (the host's own PATH by default).
 * Names containing a separator are checked as paths.
 */
export function which(host: HostSystem, cmd: string, pathValue?: string): string | null {
  const p = hostPath(host);
  if (cmd.includes('/') || (host.platform === 'win32' && cmd.includes('\\'))) {
    for (const name of candidateNames(host, cmd)) {
      if (host.isExecutable(name)) return name;
    }
    return null;
  }

  const dirs = splitPathList(pathValue ?? getEnv(host.env, 'PATH', host.platform), host.platform);
  for (const dir of dirs) {
    for (const name of candidateNames(host, cmd)) {
      const full = p.join(dir, name);
      if (host.isExecutable(full)) return full;
    }
  }
  return null;
}

/** Like which(), but returns every match in PATH order. */
export function whichAll(host: HostSystem, cmd: string, pathValue?: string): string[] {
  const p = hostPath(host);
  const found: string[] = [];
  const dirs = splitPathList(pathValue ?? getEnv(host.env, 'PATH', host.platform), host.platform);
  for (const dir of dirs) {
    for (const name of candidateNames(host, cmd)) {
      const full = p.join(dir, name);
      if (host.isExecutable(full) && !found.includes(full)) found.push(full);
    }
  }
  return found;
}
