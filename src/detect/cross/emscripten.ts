import { getEnv } from '../../host/envAccess.js';
import { hostPath } from '../../host/hostTypes.js';
import { whichAll } from '../../utils/which.js';
import { familyTable } from '../familyTable.js';
import { expandInstallRoot } from '../installRoots.js';
import { CrossDetector } from './crossDetector.js';
import type { CrossCandidate, CrossStrategy } from './crossDetector.js';

export const WASM_TARGETS = ['wasm32', 'wasm64'] as const;

const CONVENTIONAL_ROOTS: Record<'linux' | 'darwin' | 'win32', string[]> = {
  linux: ['~/emsdk/upstream/emscripten', '/opt/emsdk/upstream/emscripten', '/usr/lib/emscripten', '/usr/share/emscripten'],
  darwin: ['~/emsdk/upstream/emscripten', '/opt/homebrew/opt/emscripten/libexec', '/usr/local/opt/emscripten/libexec'],
  win32: [
    '~\\emsdk\\upstream\\emscripten',
    'C:\\emsdk\\upstream\\emscripten',
    'C:\\tools\\emsdk\\upstream\\emscripten',
    '%ProgramFiles%\\Emscripten',
  ],
};

/** Emscripten (emsdk, distro package or loose checkout); one record per wasm target. */
export class EmscriptenDetector extends CrossDetector {
  override readonly family = 'emscripten';
  protected override readonly versionArgs = ['--version'];
  protected override readonly versionPatterns = ['emcc \\(Emscripten[^)]*\\)\\s*(\\d+\\.\\d+\\.\\d+)', '(\\d+\\.\\d+\\.\\d+)'];
  protected override readonly generatorHint = 'Ninja';

  protected override strategies(): CrossStrategy[] {
    return [
      { name: 'environment', discover: () => this.fromRoots(this.environmentRoots(), 'environment') },
      { name: 'standardLocations', discover: () => this.fromRoots(this.conventionalRoots(), 'standardLocations') },
      { name: 'path', discover: () => this.fromRoots(this.pathRoots(), 'path') },
    ];
  }

  private tool(root: string, name: string): string {
    const { host } = this.ctx;
    return hostPath(host).join(root, host.platform === 'win32' ? `${name}.bat` : name);
  }

  private environmentRoots(): string[] {
    const { host } = this.ctx;
    const p = hostPath(host);
    const emsdk = getEnv(host.env, 'EMSDK', host.platform)?.trim();
    const emscripten = getEnv(host.env, 'EMSCRIPTEN', host.platform)?.trim();
    return [
      ...(emsdk ? [p.join(emsdk, 'upstream', 'emscripten')] : []),
      ...(emscripten ? [emscripten] : []),
    ];
  }

  private conventionalRoots(): string[] {
    const { host, settings } = this.ctx;
    const defaults = familyTable().envDefaults;
    const patterns = [...(settings.searchRoots.emscripten ?? []), ...CONVENTIONAL_ROOTS[host.platform]];
    return patterns.flatMap((pattern) => expandInstallRoot(host, pattern, defaults));
  }

  private pathRoots(): string[] {
    const p = hostPath(this.ctx.host);
    return whichAll(this.ctx.host, 'emcc').map((exe) => p.dirname(exe));
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
      out.push(...this.candidatesInRoot(root, discoveryMethod));
    }
    return out;
  }

  candidatesInRoot(root: string, discoveryMethod: CrossCandidate['discoveryMethod']): CrossCandidate[] {
    const { host } = this.ctx;
    const p = hostPath(host);
    const tools = {
      cc: this.tool(root, 'emcc'),
      cxx: this.tool(root, 'em++'),
      ar: this.tool(root, 'emar'),
      strip: this.tool(root, 'emstrip'),
    };
    if (!Object.values(tools).every((t) => host.isExecutable(t))) return [];

    const sysroot = p.join(root, 'cache', 'sysroot');
    const toolchainFile = p.join(root, 'cmake', 'Modules', 'Platform', 'Emscripten.cmake');
    // emsdk keeps Emscripten under <emsdk>/upstream/emscripten.
    const emsdk = p.basename(p.dirname(root)) === 'upstream' ? p.dirname(p.dirname(root)) : null;
    const extra: Record<string, string> = { EMSCRIPTEN: root };
    if (emsdk) extra.EMSDK = emsdk;
    if (host.exists(toolchainFile)) extra.CMAKE_TOOLCHAIN_FILE = toolchainFile;

    return WASM_TARGETS.map((target) => ({
      targetPlatform: 'wasm',
      targetArchitecture: target,
      targetTriple: `${target}-unknown-emscripten`,
      installationRoot: root,
      discoveryMethod,
      binDir: root,
      tools,
      sysrootPath: host.isDirectory(sysroot) ? sysroot : null,
      extraVariables: { ...extra, CMAKE_SYSTEM_PROCESSOR: target },
    }));
  }
}
