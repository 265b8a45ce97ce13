import { getEnv } from '../host/envAccess.js';
import { hostPath } from '../host/hostTypes.js';
import type { HostSystem } from '../host/hostTypes.js';

function expandHome(host: HostSystem, s: string): string {
  if (s === '~') return host.homeDir;
  if (s.startsWith('~/') || s.startsWith('~\\')) return hostPath(host).join(host.homeDir, s.slice(2));
  return s;
}

/** Replaces `%VAR%` from the host env (then `defaults`) and a leading `~`. */
export function expandVariables(
  host: HostSystem,
  pattern: string,
  defaults: Readonly<Record<string, string>> = {},
): string | null {
  let missing = false;
  const out = pattern.replace(/%([^%]+)%/g, (_m, name: string) => {
    const v = getEnv(host.env, name, host.platform) || defaults[name];
    if (!v) {
      missing = true;
      return '';
    }
    return expandHome(host, v);
  });
  return missing ? null : expandHome(host, out);
}

function globToRegExp(segment: string, caseInsensitive: boolean): RegExp {
  const escaped = segment.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`, caseInsensitive ? 'i' : '');
}

/**
 * Expands one install-root pattern into existing directories. A `*` is only
 * honoured in the last segment; matches come back sorted by name.
 */
export function expandInstallRoot(
  host: HostSystem,
  pattern: string,
  defaults: Readonly<Record<string, string>> = {},
): string[] {
  const expanded = expandVariables(host, pattern, defaults);
  if (!expanded) return [];
  const p = hostPath(host);
  const base = p.basename(expanded);
  if (!base.includes('*')) return host.isDirectory(expanded) ? [p.normalize(expanded)] : [];

  const parent = p.dirname(expanded);
  const re = globToRegExp(base, host.platform === 'win32');
  return host
    .listDir(parent)
    .filter((name) => re.test(name))
    .sort()
    .map((name) => p.join(parent, name))
    .filter((dir) => host.isDirectory(dir));
}
