import path from 'node:path';

import type { HostPlatform } from '../compiler/compilerTypes.js';

/** Live, mutable process environment (process.env for the real host). */
export type EnvMap = Record<string, string | undefined>;

export type RunOptions = {
  timeoutMs: number;
  env?: Record<string, string>;
  cwd?: string;
  /** Pass arguments to cmd.exe without re-quoting them. */
  windowsVerbatimArguments?: boolean;
};

/**
 * Outcome of one external process call. Never thrown: a spawn failure is
 * `exitCode: null` with `error` set, a timeout is `timedOut: true`.
 */
export type RunResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  elapsedMs: number;
  timedOut: boolean;
  error?: string;
};

/** Every filesystem probe and process call goes through this boundary. */
export type HostSystem = {
  readonly platform: HostPlatform;
  /** Node-style arch (`x64`, `ia32`, `arm64`, ...). */
  readonly arch: string;
  readonly env: EnvMap;
  readonly homeDir: string;
  exists(p: string): boolean;
  isDirectory(p: string): boolean;
  isExecutable(p: string): boolean;
  /** Entry names, or [] when `p` is not a readable directory. */
  listDir(p: string): string[];
  /** File contents, or null when unreadable. */
  readFile(p: string): string | null;
  run(command: string, args: readonly string[], opts: RunOptions): RunResult;
};

export function hostPath(host: Pick<HostSystem, 'platform'>): path.PlatformPath {
  return host.platform === 'win32' ? path.win32 : path.posix;
}

export function isRunSuccess(r: RunResult): boolean {
  return !r.timedOut && r.error === undefined && r.exitCode === 0;
}

export function combinedOutput(r: RunResult): string {
  return `${r.stdout}\n${r.stderr}`;
}
