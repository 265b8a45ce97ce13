import { resolveSettings } from '../dx/config.js';
import type { ToolprobeConfig } from '../dx/config.js';
import type { DetectionContext } from '../detect/detectorTypes.js';
import type {
  AnyToolchainRecord,
  FamilyId,
  NativeFamily,
  RecordValidation,
  ToolchainRecord,
} from '../compiler/compilerTypes.js';
import type { ToolchainDetector } from '../detect/detectorTypes.js';
import type { CommandOutcome, MemoryHost } from '../host/memoryHost.js';
import { hostPath } from '../host/hostTypes.js';
import type { HostSystem } from '../host/hostTypes.js';
import { capabilitiesForFamily } from '../version/capabilities.js';
import { makeVersion } from '../version/versionInfo.js';
import type { VersionInfo } from '../version/versionInfo.js';

export function testContext(host: HostSystem, config: ToolprobeConfig | null = null): DetectionContext {
  return { host, settings: resolveSettings(config) };
}

/** A compiler that answers `--version` (or any call) with `text` on stdout. */
export function printsVersion(text: string): CommandOutcome {
  return { stdout: `${text}\n` };
}

export const GCC_13 = 'gcc (GCC) 13.2.0\nCopyright (C) 2023 Free Software Foundation, Inc.';
export const GCC_12 = 'gcc (Debian 12.2.0-14) 12.2.0\nCopyright (C) 2022 Free Software Foundation, Inc.';
export const CLANG_17 = 'clang version 17.0.6\nTarget: x86_64-pc-linux-gnu\nThread model: posix';

export const AARCH64_GCC_13 =
  'aarch64-linux-gnu-gcc (Ubuntu 13.2.0-4ubuntu3) 13.2.0\nCopyright (C) 2023 Free Software Foundation, Inc.';
export const NDK_CLANG_17 =
  'Android (10552028, +pgo, +bolt, +lto, -mlo, based on r487747d) clang version 17.0.2\nTarget: x86_64-unknown-linux-gnu';
export const NDK_CLANG_16 =
  'Android (9519653, +pgo, +bolt, +lto, -mlo, based on r475365b) clang version 16.0.2\nTarget: x86_64-unknown-linux-gnu';
export const EMCC_3 =
  'emcc (Emscripten gcc/clang-like replacement + linker emulating GNU ld) 3.1.51 (c0c2ca1314672a25699846b4663701bcb6f69cca)';

export type SampleRecordOptions = {
  root?: string;
  architecture?: string;
  version?: VersionInfo;
  extra?: Record<string, string>;
};

/** A detected-looking native record, for tests that start after detection. */
export function sampleRecord(
  host: HostSystem,
  family: NativeFamily,
  executablePath: string,
  opts: SampleRecordOptions = {},
): ToolchainRecord {
  const version = opts.version ?? makeVersion(13, 2, 0);
  const p = hostPath(host);
  return {
    family,
    version,
    versionParsed: true,
    executablePath,
    architecture: opts.architecture ?? 'x64',
    capabilities: capabilitiesForFamily(family, version),
    environmentHints: { includePaths: [], libraryPaths: [], extraVariables: { CC: executablePath, ...opts.extra } },
    provenance: { installationRoot: opts.root ?? p.dirname(p.dirname(executablePath)), discoveryMethod: 'path' },
    recommended: true,
  };
}

export function addGnuCross(host: MemoryHost, binDir: string, triple: string, version: string): MemoryHost {
  for (const tool of ['gcc', 'g++', 'gcc-ar', 'strip']) {
    host.addExecutable(`${binDir}/${triple}-${tool}`, printsVersion(version));
  }
  return host;
}

export function addNdk(host: MemoryHost, root: string, clangOutput: string, revision: string): MemoryHost {
  const prebuilt = `${root}/toolchains/llvm/prebuilt/linux-x86_64`;
  host.addFile(`${root}/source.properties`, `Pkg.Desc = Android NDK\nPkg.Revision = ${revision}\n`);
  host.addExecutable(`${prebuilt}/bin/clang`, printsVersion(clangOutput));
  for (const tool of ['clang++', 'llvm-ar', 'llvm-strip']) host.addExecutable(`${prebuilt}/bin/${tool}`);
  host.addDir(`${prebuilt}/sysroot`);
  return host;
}

export type FakeDetector = ToolchainDetector & { detectCalls: number };

/** A detector that returns (or throws from) `detect` and counts its calls. */
export function fakeDetector(
  family: FamilyId,
  detect: () => AnyToolchainRecord[],
  validation: RecordValidation = { valid: true, errors: [], warnings: [] },
): FakeDetector {
  const fake: FakeDetector = {
    family,
    detectCalls: 0,
    detect() {
      fake.detectCalls += 1;
      return detect();
    },
    detectVersion: () => null,
    detectCapabilities: (v) => capabilitiesForFamily(family, v),
    validate: () => validation,
    lastWarnings: () => [],
  };
  return fake;
}
