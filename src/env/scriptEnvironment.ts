import { traceDebug } from '../dx/trace.js';
import { ActivationError } from '../errors.js';
import { combinedOutput } from '../host/hostTypes.js';
import type { HostSystem } from '../host/hostTypes.js';
import type { EnvironmentSnapshot } from './environmentSnapshot.js';

export const ENV_MARKER = '___TOOLPROBE_ENV___';

export type ScriptInvocation = {
  script: string;
  args: readonly string[];
};

function quote(arg: string, platform: HostSystem['platform']): string {
  if (platform === 'win32') return /[\s&|<>^]/.test(arg) ? `"${arg}"` : arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** The shell command line that runs `inv` and prints the resulting environment after a marker. */
export function scriptCommand(host: Pick<HostSystem, 'platform'>, inv: ScriptInvocation): { command: string; args: string[] } {
  const args = inv.args.map((a) => quote(a, host.platform)).join(' ');
  if (host.platform === 'win32') {
    const line = `call "${inv.script}" ${args} >nul && echo ${ENV_MARKER} && set`;
    return { command: 'cmd.exe', args: ['/d', '/s', '/c', `"${line}"`] };
  }
  // `.` takes no arguments in POSIX sh; the script sees them as positional parameters.
  const line = `set -- ${args}; . ${quote(inv.script, host.platform)} >/dev/null && echo ${ENV_MARKER} && env`;
  return { command: '/bin/sh', args: ['-c', line] };
}

/** Variables printed after the marker line; null when the marker never appeared. */
export function parseEnvironmentDump(output: string): Record<string, string> | null {
  const lines = output.split(/\r?\n/);
  const start = lines.findIndex((l) => l.trim() === ENV_MARKER);
  if (start < 0) return null;
  const env: Record<string, string> = {};
  for (const line of lines.slice(start + 1)) {
    const eq = line.indexOf('=');
    // cmd prints drive-cwd entries such as `=C:=C:\`; they are not variables.
    if (eq <= 0) continue;
    env[line.slice(0, eq)] = line.slice(eq + 1);
  }
  return env;
}

/**
 * Runs an activation script in a child shell seeded with `base` and returns
 * the environment it leaves behind. Nothing in the current process changes.
 */
export function runActivationScript(
  host: HostSystem,
  inv: ScriptInvocation,
  base: EnvironmentSnapshot,
  timeoutMs: number,
): Record<string, string> {
  const { command, args } = scriptCommand(host, inv);
  traceDebug('env.script', { script: inv.script, args: inv.args });
  const res = host.run(command, args, {
    timeoutMs,
    env: { ...base },
    windowsVerbatimArguments: host.platform === 'win32',
  });

  if (res.timedOut) {
    throw new ActivationError(`Activation script timed out after ${timeoutMs}ms: ${inv.script}`, {
      suggestion: 'Raise timeouts.activationScriptMs or check that the script does not wait for input.',
    });
  }
  if (res.error !== undefined || res.exitCode !== 0) {
    throw new ActivationError(
      `Activation script failed (${res.error ?? `exit ${res.exitCode}`}): ${inv.script}`,
      { details: { output: combinedOutput(res).trim() } },
    );
  }
  const env = parseEnvironmentDump(res.stdout);
  if (!env) {
    throw new ActivationError(`Activation script printed no environment: ${inv.script}`, {
      details: { output: combinedOutput(res).trim() },
    });
  }
  return env;
}
