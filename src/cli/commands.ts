import {
  activationScriptName,
  architecturesForHost,
  fromHostTarget,
  fromString,
  hostTargetDir,
  isCross,
  normalizeHostArch,
  targetTriple,
  toCanonicalString,
} from '../arch/architectureMatrix.js';
import type { ArchitectureSpec } from '../arch/architectureMatrix.js';
import { FAMILIES, isCrossRecord } from '../compiler/compilerTypes.js';
import type { AnyToolchainRecord } from '../compiler/compilerTypes.js';
import { captureEnvironment, diffSnapshots, isEmptyDiff } from '../env/environmentSnapshot.js';
import type { EnvironmentSnapshot } from '../env/environmentSnapshot.js';
import { ToolprobeError, errorMessage } from '../errors.js';
import type { ToolchainRegistry } from '../registry/toolchainRegistry.js';

export type CommandOutput = {
  lines: string[];
  exitCode: 0 | 1;
};

export function fmtOk(msg: string) {
  return `✓ ${msg}`;
}

export function fmtFail(msg: string) {
  return `✗ ${msg}`;
}

function failed(lines: readonly string[]): 0 | 1 {
  return lines.some((l) => l.startsWith('✗')) ? 1 : 0;
}

/** `✗ message` plus the error's suggestion, if it has one. */
export function formatError(err: unknown): string[] {
  const lines = [fmtFail(errorMessage(err))];
  if (err instanceof ToolprobeError && err.suggestion) lines.push(`  hint: ${err.suggestion}`);
  return lines;
}

function describeRecord(r: AnyToolchainRecord): string {
  const target = isCrossRecord(r) ? ` -> ${r.targetTriple}` : '';
  const flags = [r.architecture, r.provenance.discoveryMethod, ...(r.recommended ? ['recommended'] : [])];
  return `${r.family} ${r.version.raw} ${r.executablePath}${target} (${flags.join(', ')})`;
}

export function detectCommand(registry: ToolchainRegistry, opts: { json?: boolean } = {}): CommandOutput {
  const result = registry.detectAll();
  const found = Object.values(result.toolchains).reduce((n, list) => n + (list?.length ?? 0), 0);
  if (opts.json) return { lines: [JSON.stringify(result, null, 2)], exitCode: found > 0 ? 0 : 1 };

  const lines: string[] = [];
  for (const family of registry.families) {
    const records = result.toolchains[family] ?? [];
    for (const r of records) lines.push(fmtOk(describeRecord(r)));
  }
  for (const e of result.errors) {
    lines.push(fmtFail(`${e.component} failed: ${e.message}`));
    if (e.suggestion) lines.push(`  hint: ${e.suggestion}`);
  }
  for (const w of result.warnings) lines.push(`  ${w}`);
  if (found === 0) lines.push(fmtFail('No toolchains found'));
  return { lines, exitCode: found > 0 ? 0 : 1 };
}

export function doctorCommand(registry: ToolchainRegistry): CommandOutput {
  const lines: string[] = [];
  const best = registry.recommended();
  if (best) lines.push(fmtOk(`Recommended toolchain: ${describeRecord(best)}`));
  else lines.push(fmtFail(`No native toolchain found for ${registry.host.platform}`));

  const { errors } = registry.detectAll();
  for (const e of errors) lines.push(fmtFail(`${e.component} failed: ${e.message}`));

  const validation = registry.validateAll();
  lines.push(...validation.errors.map(fmtFail));
  lines.push(...validation.warnings.map((w) => `  warning: ${w}`));
  if (validation.valid && best) lines.push(fmtOk('All detected toolchains validate'));

  if (best) {
    try {
      const sel = registry.selectGenerator(best.family);
      lines.push(fmtOk(`Generator: ${sel.generator}${sel.fallbackUsed ? ' (fallback)' : ''}`));
      lines.push(...sel.warnings.map((w) => `  warning: ${w}`));
    } catch (err) {
      lines.push(...formatError(err));
    }
  }
  return { lines, exitCode: failed(lines) };
}

export type GeneratorCommandOptions = {
  multiConfig?: boolean;
  noFallback?: boolean;
};

export function generatorCommand(
  registry: ToolchainRegistry,
  family: string,
  platform?: string,
  opts: GeneratorCommandOptions = {},
): CommandOutput {
  const sel = registry.selectGenerator(family, platform, {
    ...(opts.multiConfig ? { preferMultiConfig: true } : {}),
    ...(opts.noFallback ? { allowFallback: false } : {}),
  });
  const lines = [fmtOk(`${sel.generator} (${sel.family} on ${sel.platform}${sel.fallbackUsed ? ', fallback' : ''})`)];
  lines.push(...sel.warnings.map((w) => `  warning: ${w}`));
  return { lines, exitCode: 0 };
}

function activateOnce(registry: ToolchainRegistry, family: string, architecture?: string): EnvironmentSnapshot {
  try {
    return registry.activate(family, architecture);
  } finally {
    if (registry.session.state === 'active') registry.restore();
  }
}

/** Prints what activating `family` would change, then puts the environment back. */
export function envCommand(registry: ToolchainRegistry, family: string, architecture?: string): CommandOutput {
  const { host } = registry;
  const before = captureEnvironment(host.env);
  const diff = diffSnapshots(before, activateOnce(registry, family, architecture), host.platform);
  if (isEmptyDiff(diff)) return { lines: ['(no changes)'], exitCode: 0 };

  const sorted = (o: Record<string, string>) => Object.entries(o).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const lines = [
    ...sorted(diff.added).map(([k, v]) => `+ ${k}=${v}`),
    ...sorted(diff.changed).map(([k, v]) => `~ ${k}=${v}`),
    ...[...diff.removed].sort().map((k) => `- ${k}`),
  ];
  return { lines, exitCode: 0 };
}

function describeArchitecture(spec: ArchitectureSpec): string[] {
  return [
    `${toCanonicalString(spec)}: ${spec.host} -> ${spec.target}${isCross(spec) ? ' (cross)' : ''}`,
    `  script: ${activationScriptName(spec)}`,
    `  bin: ${hostTargetDir(spec)}`,
    `  triple: ${targetTriple(spec)}`,
  ];
}

/** `arch` lists the host's combinations; `arch <spec>` or `arch <host> <target>` describes one. */
export function archCommand(args: readonly string[], hostArch: string): CommandOutput {
  if (args.length === 0) {
    const host = normalizeHostArch(hostArch);
    const specs = host ? architecturesForHost(host) : [];
    if (specs.length === 0) return { lines: [fmtFail(`No architecture combinations for host ${hostArch}`)], exitCode: 1 };
    return { lines: specs.flatMap(describeArchitecture), exitCode: 0 };
  }
  const spec = args.length === 1 ? fromString(args[0]) : fromHostTarget(args[0], args[1]);
  return { lines: describeArchitecture(spec), exitCode: 0 };
}

export function usage(): string {
  return `toolprobe

Usage:
  toolprobe detect [--json]
  toolprobe doctor
  toolprobe generator <family> [platform] [--multi-config] [--no-fallback]
  toolprobe env <family> [arch]
  toolprobe arch [<spec> | <host> <target>]

Families: ${FAMILIES.join(', ')}

Examples:
  toolprobe generator mingw_gcc windows
  toolprobe env msvc amd64_arm64
  toolprobe arch x64 arm64
`;
}
