import { normalizeCpu } from '../../arch/architectureMatrix.js';
import { getEnv, splitPathList } from '../../host/envAccess.js';
import { hostPath } from '../../host/hostTypes.js';
import { expandInstallRoot } from '../installRoots.js';
import { exeName } from '../strategies.js';
import { CrossDetector } from './crossDetector.js';
import type { CrossCandidate, CrossStrategy } from './crossDetector.js';

export const LINUX_CROSS_TARGETS = [
  { triple: 'x86_64-linux-gnu', processor: 'x86_64', architecture: 'x64' },
  { triple: 'i686-linux-gnu', processor: 'i686', architecture: 'x86' },
  { triple: 'aarch64-linux-gnu', processor: 'aarch64', architecture: 'arm64' },
  { triple: 'arm-linux-gnueabihf', processor: 'arm', architecture: 'arm' },
  { triple: 'arm-linux-gnueabi', processor: 'arm', architecture: 'arm' },
] as const;

export type LinuxCrossTarget = (typeof LINUX_CROSS_TARGETS)[number];

const CONVENTIONAL_BIN_DIRS: Record<'linux' | 'darwin' | 'win32', string[]> = {
  linux: ['/usr/bin', '/usr/local/bin', '/opt/cross/bin'],
  darwin: ['/opt/homebrew/bin', '/usr/local/bin', '/opt/cross/bin'],
  win32: [],
};

/**
 * Triple-prefixed GNU toolchains (`aarch64-linux-gnu-gcc` and friends) targeting Linux.
 * On a Linux host the triple matching the host CPU is the native compiler and is skipped.
 */
export class LinuxCrossDetector extends CrossDetector {
  override readonly family = 'linux_cross';
  protected override readonly versionArgs = ['--version'];
  protected override readonly versionPatterns = [
    'gcc[^\\n]*?\\)\\s*(\\d+\\.\\d+(?:\\.\\d+)?)',
    '(\\d+\\.\\d+\\.\\d+)',
  ];
  protected override readonly generatorHint = 'Ninja';

  protected override strategies(): CrossStrategy[] {
    return [
      { name: 'standardLocations', discover: () => this.scan(this.conventionalDirs(), 'standardLocations') },
      { name: 'path', discover: () => this.scan(this.pathDirs(), 'path') },
    ];
  }

  private conventionalDirs(): string[] {
    const { host, settings } = this.ctx;
    const p = hostPath(host);
    const roots = (settings.searchRoots.linux_cross ?? []).flatMap((r) => expandInstallRoot(host, r));
    return [...roots.map((r) => p.join(r, 'bin')), ...CONVENTIONAL_BIN_DIRS[host.platform]];
  }

  private targets(): readonly LinuxCrossTarget[] {
    const { host } = this.ctx;
    if (host.platform !== 'linux') return LINUX_CROSS_TARGETS;
    const native = normalizeCpu(host.arch);
    return LINUX_CROSS_TARGETS.filter((t) => t.architecture !== native);
  }

  private pathDirs(): string[] {
    const { host } = this.ctx;
    return splitPathList(getEnv(host.env, 'PATH', host.platform), host.platform);
  }

  private scan(dirs: readonly string[], discoveryMethod: 'standardLocations' | 'path'): CrossCandidate[] {
    const { host } = this.ctx;
    const p = hostPath(host);
    const out: CrossCandidate[] = [];
    const seen = new Set<string>();
    for (const dir of dirs) {
      const bin = p.normalize(dir);
      if (seen.has(bin) || !host.isDirectory(bin)) continue;
      seen.add(bin);
      for (const target of this.targets()) {
        const cand = this.candidateIn(bin, target, discoveryMethod);
        if (cand) out.push(cand);
      }
    }
    return out;
  }

  /** All four tools must sit side by side; a lone `-gcc` is not a usable toolchain. */
  candidateIn(
    binDir: string,
    target: LinuxCrossTarget,
    discoveryMethod: CrossCandidate['discoveryMethod'],
  ): CrossCandidate | null {
    const { host } = this.ctx;
    const p = hostPath(host);
    const tool = (suffix: string) => p.join(binDir, exeName(host, `${target.triple}-${suffix}`));
    const tools = { cc: tool('gcc'), cxx: tool('g++'), ar: tool('gcc-ar'), strip: tool('strip') };
    if (!Object.values(tools).every((t) => host.isExecutable(t))) return null;

    const prefix = p.dirname(binDir);
    const sysroots = [p.join(prefix, target.triple), ...(host.platform === 'win32' ? [] : [p.join('/usr', target.triple)])];
    const sysrootPath = sysroots.find((d) => host.isDirectory(d)) ?? null;

    return {
      targetPlatform: 'linux',
      targetArchitecture: target.architecture,
      targetTriple: target.triple,
      installationRoot: prefix,
      discoveryMethod,
      binDir,
      tools,
      sysrootPath,
      extraVariables: {
        CROSS_COMPILE: `${target.triple}-`,
        CMAKE_SYSTEM_PROCESSOR: target.processor,
      },
    };
  }
}
