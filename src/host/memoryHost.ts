import type { HostPlatform } from '../compiler/compilerTypes.js';
import { hostPath } from './hostTypes.js';
import type { EnvMap, HostSystem, RunOptions, RunResult } from './hostTypes.js';

export type CommandOutcome = {
  stdout?: string;
  stderr?: string;
  exitCode?: number | null;
  timedOut?: boolean;
  error?: string;
};

export type CommandHandler = (args: readonly string[], opts: RunOptions) => CommandOutcome;

type Entry =
  | { kind: 'dir'; name: string }
  | { kind: 'file'; name: string; content: string; executable: boolean; handler?: CommandHandler };

export type MemoryHostOptions = {
  platform?: HostPlatform;
  arch?: string;
  env?: EnvMap;
  homeDir?: string;
};

export type RecordedCall = {
  command: string;
  args: readonly string[];
  opts: RunOptions;
};

export type MemoryHost = HostSystem & {
  readonly calls: RecordedCall[];
  addDir(p: string): MemoryHost;
  addFile(p: string, content?: string): MemoryHost;
  /** Adds an executable file; without a handler it runs and prints nothing. */
  addExecutable(p: string, handler?: CommandHandler | CommandOutcome): MemoryHost;
  /** Registers a command that is not a file (a shell, a bare name). */
  setCommand(command: string, handler: CommandHandler | CommandOutcome): MemoryHost;
  remove(p: string): MemoryHost;
};

function toHandler(h: CommandHandler | CommandOutcome): CommandHandler {
  return typeof h === 'function' ? h : () => h;
}

/**
 * In-process stand-in for a machine: a synthetic filesystem plus scripted
 * command results. Paths follow the platform's flavour; on win32 they are
 * matched case-insensitively.
 */
export function createMemoryHost(opts: MemoryHostOptions = {}): MemoryHost {
  const platform = opts.platform ?? 'linux';
  const p = hostPath({ platform });
  const entries = new Map<string, Entry>();
  const commands = new Map<string, CommandHandler>();
  const calls: RecordedCall[] = [];
  const root = platform === 'win32' ? '' : '/';

  function key(raw: string): string {
    let n = p.normalize(raw);
    if (n.length > 1 && (n.endsWith('/') || n.endsWith('\\'))) n = n.slice(0, -1);
    return platform === 'win32' ? n.toLowerCase() : n;
  }

  function ensureDir(dir: string) {
    const k = key(dir);
    if (entries.has(k)) return;
    const parent = p.dirname(dir);
    if (parent !== dir) ensureDir(parent);
    entries.set(k, { kind: 'dir', name: p.basename(dir) || dir });
  }

  const host: MemoryHost = {
    platform,
    arch: opts.arch ?? 'x64',
    env: opts.env ?? {},
    homeDir: opts.homeDir ?? (platform === 'win32' ? 'C:\\Users\\dev' : '/home/dev'),
    calls,

    exists(path) {
      return entries.has(key(path));
    },

    isDirectory(path) {
      return entries.get(key(path))?.kind === 'dir';
    },

    isExecutable(path) {
      const e = entries.get(key(path));
      return e?.kind === 'file' && e.executable;
    },

    listDir(path) {
      const e = entries.get(key(path));
      if (e?.kind !== 'dir') return [];
      const dirKey = key(path);
      const names: string[] = [];
      for (const [k, child] of entries) {
        if (k !== dirKey && key(p.dirname(k)) === dirKey) names.push(child.name);
      }
      return names.sort();
    },

    readFile(path) {
      const e = entries.get(key(path));
      return e?.kind === 'file' ? e.content : null;
    },

    run(command, args, runOpts): RunResult {
      calls.push({ command, args: [...args], opts: runOpts });
      const file = entries.get(key(command));
      const handler: CommandHandler | undefined =
        file?.kind === 'file' && file.executable
          ? file.handler ?? (() => ({}))
          : commands.get(command);
      if (!handler) {
        return { exitCode: null, stdout: '', stderr: '', elapsedMs: 0, timedOut: false, error: 'ENOENT' };
      }
      const out = handler(args, runOpts);
      return {
        exitCode: out.timedOut ? null : out.exitCode === undefined ? 0 : out.exitCode,
        stdout: out.stdout ?? '',
        stderr: out.stderr ?? '',
        elapsedMs: 0,
        timedOut: out.timedOut ?? false,
        error: out.error,
      };
    },

    addDir(path) {
      ensureDir(path);
      return host;
    },

    addFile(path, content = '') {
      ensureDir(p.dirname(path));
      entries.set(key(path), { kind: 'file', name: p.basename(path), content, executable: false });
      return host;
    },

    addExecutable(path, handler) {
      ensureDir(p.dirname(path));
      entries.set(key(path), {
        kind: 'file',
        name: p.basename(path),
        content: '',
        executable: true,
        handler: handler === undefined ? undefined : toHandler(handler),
      });
      return host;
    },

    setCommand(command, handler) {
      commands.set(command, toHandler(handler));
      return host;
    },

    remove(path) {
      const k = key(path);
      for (const existing of [...entries.keys()]) {
        if (existing === k || existing.startsWith(k + p.sep)) entries.delete(existing);
      }
      return host;
    },
  };

  if (root) ensureDir(root);
  return host;
}
