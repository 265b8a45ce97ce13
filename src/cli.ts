#!/usr/bin/env node

import {
  archCommand,
  detectCommand,
  doctorCommand,
  envCommand,
  formatError,
  generatorCommand,
  usage,
} from './cli/commands.js';
import type { CommandOutput } from './cli/commands.js';
import { traceDebug } from './dx/trace.js';
import { ToolchainRegistry } from './registry/toolchainRegistry.js';

function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(name);
}

function positional(argv: string[]): string[] {
  return argv.filter((a) => !a.startsWith('--'));
}

async function run(argv: string[]): Promise<CommandOutput> {
  const [cmd, ...rest] = argv;
  const args = positional(rest);
  traceDebug('cli.run', { cmd, args });

  if (cmd === 'arch') return archCommand(args, process.arch);

  const registry = await ToolchainRegistry.fromProject();
  switch (cmd) {
    case 'detect':
      return detectCommand(registry, { json: hasFlag(rest, '--json') });
    case 'doctor':
      return doctorCommand(registry);
    case 'generator':
      if (!args[0]) break;
      return generatorCommand(registry, args[0], args[1], {
        multiConfig: hasFlag(rest, '--multi-config'),
        noFallback: hasFlag(rest, '--no-fallback'),
      });
    case 'env':
      if (!args[0]) break;
      return envCommand(registry, args[0], args[1]);
  }
  return { lines: [usage()], exitCode: 1 };
}

async function main() {
  const argv = process.argv.slice(2);
  if (argv.length === 0 || hasFlag(argv, '--help') || hasFlag(argv, '-h')) {
    console.log(usage());
    return 0;
  }
  try {
    const out = await run(argv);
    for (const line of out.lines) console.log(line);
    return out.exitCode;
  } catch (err) {
    for (const line of formatError(err)) console.error(line);
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
