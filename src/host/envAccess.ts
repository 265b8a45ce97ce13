import type { HostPlatform } from '../compiler/compilerTypes.js';
import type { EnvMap } from './hostTypes.js';

/** Windows variable names are case-insensitive; find the key actually stored. */
export function findEnvKey(env: EnvMap, name: string, platform: HostPlatform): string | undefined {
  if (platform !== 'win32') return env[name] === undefined ? undefined : name;
  if (env[name] !== undefined) return name;
  const lower = name.toLowerCase();
  return Object.keys(env).find((k) => k.toLowerCase() === lower && env[k] !== undefined);
}

export function getEnv(env: EnvMap, name: string, platform: HostPlatform): string | undefined {
  const key = findEnvKey(env, name, platform);
  return key === undefined ? undefined : env[key];
}

/** Sets `name`, reusing the existing spelling of the key on Windows. */
export function setEnv(env: EnvMap, name: string, value: string, platform: HostPlatform) {
  const key = findEnvKey(env, name, platform) ?? name;
  env[key] = value;
}

export function pathDelimiter(platform: HostPlatform): string {
  return platform === 'win32' ? ';' : ':';
}

export function splitPathList(value: string | undefined, platform: HostPlatform): string[] {
  if (!value) return [];
  return value.split(pathDelimiter(platform)).filter((p) => p.length > 0);
}
