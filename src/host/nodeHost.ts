import { accessSync, constants, existsSync, readFileSync, readdirSync, statSync } from 'node:fs';
import { spawnSync } from 'node:child_process';
import { homedir } from 'node:os';
import { performance } from 'node:perf_hooks';

import type { HostPlatform } from '../compiler/compilerTypes.js';
import type { HostSystem, RunOptions, RunResult } from './hostTypes.js';

function currentPlatform(): HostPlatform {
  const p = process.platform;
  if (p === 'win32' || p === 'darwin') return p;
  // Other unixes probe like linux.
  return 'linux';
}

function errnoOf(err: Error): string {
  const code = 'code' in err ? err.code : undefined;
  return typeof code === 'string' ? code : err.message;
}

function quoteForCmd(arg: string): string {
  return /[\s"&|<>^]/.test(arg) ? `"${arg.replace(/"/g, '""')}"` : arg;
}

/** Batch files cannot be spawned directly; they go through cmd.exe. */
export function batchInvocation(command: string, args: readonly string[]): { command: string; args: string[] } {
  const line = [command, ...args].map(quoteForCmd).join(' ');
  return { command: 'cmd.exe', args: ['/d', '/s', '/c', `"${line}"`] };
}

export function createNodeHost(): HostSystem {
  const platform = currentPlatform();

  return {
    platform,
    arch: process.arch,
    env: process.env,
    homeDir: homedir(),

    exists(p) {
      return existsSync(p);
    },

    isDirectory(p) {
      try {
        return statSync(p).isDirectory();
      } catch {
        return false;
      }
    },

    isExecutable(p) {
      try {
        if (!statSync(p).isFile()) return false;
        if (platform === 'win32') return true;
        accessSync(p, constants.X_OK);
        return true;
      } catch {
        return false;
      }
    },

    listDir(p) {
      try {
        return readdirSync(p);
      } catch {
        return [];
      }
    },

    readFile(p) {
      try {
        return readFileSync(p, 'utf8');
      } catch {
        return null;
      }
    },

    run(command: string, args: readonly string[], opts: RunOptions): RunResult {
      const started = performance.now();
      const batch = platform === 'win32' && /\.(bat|cmd)$/i.test(command);
      const call = batch ? batchInvocation(command, args) : { command, args: [...args] };
      const res = spawnSync(call.command, call.args, {
        encoding: 'utf8',
        timeout: opts.timeoutMs,
        env: opts.env ?? process.env,
        cwd: opts.cwd,
        windowsHide: true,
        windowsVerbatimArguments: batch || opts.windowsVerbatimArguments,
        maxBuffer: 16 * 1024 * 1024,
      });
      const elapsedMs = performance.now() - started;
      const errno = res.error ? errnoOf(res.error) : undefined;
      const timedOut = errno === 'ETIMEDOUT';

      return {
        exitCode: res.status,
        stdout: res.stdout ?? '',
        stderr: res.stderr ?? '',
        elapsedMs,
        timedOut,
        error: timedOut ? undefined : errno,
      };
    },
  };
}
