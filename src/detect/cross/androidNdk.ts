import { getEnv } from '../../host/envAccess.js';
import { hostPath } from '../../host/hostTypes.js';
import type { HostSystem } from '../../host/hostTypes.js';
import { familyTable } from '../familyTable.js';
import { expandInstallRoot } from '../installRoots.js';
import { exeName } from '../strategies.js';
import { CrossDetector } from './crossDetector.js';
import type { CrossCandidate, CrossStrategy } from './crossDetector.js';

export const ANDROID_ABIS = [
  { abi: 'arm64-v8a', triple: 'aarch64-linux-android', architecture: 'arm64', processor: 'aarch64' },
  { abi: 'armeabi-v7a', triple: 'armv7a-linux-androideabi', architecture: 'arm', processor: 'armv7-a' },
  { abi: 'x86_64', triple: 'x86_64-linux-android', architecture: 'x64', processor: 'x86_64' },
  { abi: 'x86', triple: 'i686-linux-android', architecture: 'x86', processor: 'i686' },
] as const;

export type AndroidAbi = (typeof ANDROID_ABIS)[number];

export const DEFAULT_ANDROID_API = 21;

const NDK_ROOT_VARIABLES = ['ANDROID_NDK_ROOT', 'ANDROID_NDK_HOME', 'NDK_HOME'];
const SDK_ROOT_VARIABLES = ['ANDROID_HOME', 'ANDROID_SDK_ROOT'];

// Directories that hold NDKs, one per child (side-by-side `ndk/<revision>` layout).
const NDK_CONTAINERS: Record<'linux' | 'darwin' | 'win32', string[]> = {
  linux: ['~/Android/Sdk/ndk/*', '/opt/android-sdk/ndk/*', '/opt/android-ndk*'],
  darwin: ['~/Library/Android/sdk/ndk/*', '/opt/homebrew/share/android-ndk', '/usr/local/share/android-ndk'],
  win32: [
    '%LOCALAPPDATA%\\Android\\Sdk\\ndk\\*',
    'C:\\Android\\Sdk\\ndk\\*',
    'C:\\Android\\ndk\\*',
    'C:\\Android\\android-ndk*',
    '%ProgramFiles%\\Android\\ndk\\*',
    'C:\\tools\\android-ndk*',
  ],
};

export function ndkHostTag(host: Pick<HostSystem, 'platform'>): string {
  switch (host.platform) {
    case 'win32':
      return 'windows-x86_64';
    case 'darwin':
      return 'darwin-x86_64';
    case 'linux':
      return 'linux-x86_64';
  }
}

/** `Pkg.Revision` from source.properties, then release.txt, then an `android-ndk-rNN` folder name. */
export function ndkRevision(host: HostSystem, root: string): string | null {
  const p = hostPath(host);
  const props = host.readFile(p.join(root, 'source.properties'));
  const fromProps = props?.match(/Pkg\.Revision\s*=\s*([\d.]+)/);
  if (fromProps) return fromProps[1];

  const release = host.readFile(p.join(root, 'RELEASE.TXT')) ?? host.readFile(p.join(root, 'release.txt'));
  const fromRelease = release?.match(/r?(\d+(?:\.\d+)*)/);
  if (fromRelease) return fromRelease[1];

  const fromName = p.basename(root).match(/android-ndk-r?(\d+)/);
  return fromName ? fromName[1] : null;
}

/** Android NDK (r19+ unified LLVM layout), one record per ABI. */
export class AndroidNdkDetector extends CrossDetector {
  override readonly family = 'android_ndk';
  protected override readonly versionArgs = ['--version'];
  protected override readonly versionPatterns = ['clang version (\\d+\\.\\d+\\.\\d+)'];
  protected override readonly generatorHint = 'Ninja';

  protected override strategies(): CrossStrategy[] {
    return [
      { name: 'environment', discover: () => this.fromRoots(this.environmentRoots(), 'environment') },
      { name: 'standardLocations', discover: () => this.fromRoots(this.conventionalRoots(), 'standardLocations') },
    ];
  }

  private environmentRoots(): string[] {
    const { host } = this.ctx;
    const p = hostPath(host);
    const value = (name: string) => getEnv(host.env, name, host.platform)?.trim() || null;
    const direct = NDK_ROOT_VARIABLES.flatMap((v) => value(v) ?? []);
    const viaSdk = SDK_ROOT_VARIABLES.flatMap((v) => {
      const sdk = value(v);
      return sdk ? [...expandInstallRoot(host, p.join(sdk, 'ndk', '*')), p.join(sdk, 'ndk-bundle')] : [];
    });
    return [...direct, ...viaSdk];
  }

  private conventionalRoots(): string[] {
    const { host, settings } = this.ctx;
    const defaults = familyTable().envDefaults;
    const patterns = [...(settings.searchRoots.android_ndk ?? []), ...NDK_CONTAINERS[host.platform]];
    return patterns.flatMap((pattern) => expandInstallRoot(host, pattern, defaults));
  }

  private fromRoots(roots: readonly string[], discoveryMethod: CrossCandidate['discoveryMethod']): CrossCandidate[] {
    const { host } = this.ctx;
    const seen = new Set<string>();
    const out: CrossCandidate[] = [];
    for (const raw of roots) {
      const root = hostPath(host).normalize(raw);
      const k = host.platform === 'win32' ? root.toLowerCase() : root;
      if (seen.has(k)) continue;
      seen.add(k);
      out.push(...this.candidatesInNdk(root, discoveryMethod));
    }
    return out;
  }

  prebuiltDir(root: string): string {
    return hostPath(this.ctx.host).join(root, 'toolchains', 'llvm', 'prebuilt', ndkHostTag(this.ctx.host));
  }

  /** Highest API level with a `<triple><api>-clang` wrapper, or the default. */
  apiLevel(binDir: string, abi: AndroidAbi): number {
    const re = new RegExp(`^${abi.triple}(\\d+)-clang(?:\\.cmd)?$`, 'i');
    const levels = this.ctx.host
      .listDir(binDir)
      .map((name) => name.match(re))
      .flatMap((m) => (m ? [Number(m[1])] : []));
    return levels.length > 0 ? Math.max(...levels) : DEFAULT_ANDROID_API;
  }

  candidatesInNdk(root: string, discoveryMethod: CrossCandidate['discoveryMethod']): CrossCandidate[] {
    const { host } = this.ctx;
    const p = hostPath(host);
    const prebuilt = this.prebuiltDir(root);
    const binDir = p.join(prebuilt, 'bin');
    if (!host.isDirectory(binDir)) return [];

    const tool = (name: string) => p.join(binDir, exeName(host, name));
    const tools = { cc: tool('clang'), cxx: tool('clang++'), ar: tool('llvm-ar'), strip: tool('llvm-strip') };
    if (!Object.values(tools).every((t) => host.isExecutable(t))) return [];

    const sysroot = p.join(prebuilt, 'sysroot');
    const revision = ndkRevision(host, root);

    return ANDROID_ABIS.map((abi) => {
      const api = this.apiLevel(binDir, abi);
      return {
        targetPlatform: 'android',
        targetArchitecture: abi.architecture,
        targetTriple: abi.triple,
        installationRoot: root,
        discoveryMethod,
        binDir,
        tools,
        sysrootPath: host.isDirectory(sysroot) ? sysroot : null,
        extraVariables: {
          ANDROID_ABI: abi.abi,
          ANDROID_NDK_ROOT: root,
          ...(revision ? { ANDROID_NDK_VERSION: revision } : {}),
          ANDROID_PLATFORM: `android-${api}`,
          CMAKE_SYSTEM_PROCESSOR: abi.processor,
        },
      };
    });
  }
}
