import { describe, it, expect } from 'vitest';

import { createMemoryHost } from '../host/memoryHost.js';
import { CLANG_17, GCC_12, GCC_13, printsVersion, testContext } from '../testing/fixtures.js';
import { FamilyDetector } from './familyDetector.js';
import type { DetectionStrategy } from './detectorTypes.js';

describe('family detector (gcc/clang on linux)', () => {
  it('finds a lone standalone cc on PATH', () => {
    const host = createMemoryHost({ env: { PATH: '/opt/toolchain/bin' } }).addExecutable(
      '/opt/toolchain/bin/cc',
      printsVersion('cc (GCC) 13.2.0\nCopyright (C) 2023 Free Software Foundation, Inc.'),
    );
    const records = new FamilyDetector('gcc', testContext(host)).detect();

    expect(records).toHaveLength(1);
    const [r] = records;
    expect(r.executablePath).toBe('/opt/toolchain/bin/cc');
    expect([r.version.major, r.version.minor, r.version.patch]).toEqual([13, 2, 0]);
    expect(r.versionParsed).toBe(true);
    expect(r.recommended).toBe(true);
    expect(r.capabilities.cpp17).toBe(true);
    expect(r.architecture).toBe('x64');
    expect(r.provenance).toEqual({ installationRoot: '/opt/toolchain', discoveryMethod: 'path' });
    expect(r.environmentHints.extraVariables).toEqual({ CC: '/opt/toolchain/bin/cc' });
    expect(Object.isFrozen(r)).toBe(true);
    expect(Object.isFrozen(r.environmentHints.extraVariables)).toBe(true);
  });

  it('does not claim a gcc-flavoured cc for clang', () => {
    const host = createMemoryHost({ env: { PATH: '/opt/toolchain/bin' } }).addExecutable(
      '/opt/toolchain/bin/cc',
      printsVersion(GCC_13),
    );
    expect(new FamilyDetector('clang', testContext(host)).detect()).toEqual([]);
  });

  it('merges duplicates, keeping the richer provenance', () => {
    const host = createMemoryHost({ env: { PATH: '/usr/bin' } })
      .addExecutable('/usr/bin/gcc', printsVersion(GCC_12))
      .addExecutable('/usr/bin/g++', printsVersion(GCC_12))
      .addDir('/usr/include');
    const records = new FamilyDetector('gcc', testContext(host)).detect();

    expect(records).toHaveLength(1);
    expect(records[0].provenance.discoveryMethod).toBe('standardLocations');
    expect(records[0].environmentHints.includePaths).toEqual(['/usr/include']);
    expect(records[0].environmentHints.extraVariables).toEqual({ CC: '/usr/bin/gcc', CXX: '/usr/bin/g++' });
    // One version query per executable, even when two strategies find it.
    expect(host.calls.filter((c) => c.command === '/usr/bin/gcc')).toHaveLength(1);
  });

  it('sorts newest first and flags only the head as recommended', () => {
    const host = createMemoryHost({ env: { PATH: '/usr/bin:/usr/local/bin' } })
      .addExecutable('/usr/bin/gcc', printsVersion(GCC_12))
      .addExecutable('/usr/local/bin/gcc', printsVersion(GCC_13));
    const records = new FamilyDetector('gcc', testContext(host)).detect();

    expect(records.map((r) => r.executablePath)).toEqual(['/usr/local/bin/gcc', '/usr/bin/gcc']);
    expect(records.map((r) => r.recommended)).toEqual([true, false]);
  });

  it('keeps an unparseable version as 0.0.0 and says so', () => {
    const host = createMemoryHost({ env: { PATH: '/opt/x/bin' } }).addExecutable(
      '/opt/x/bin/gcc',
      printsVersion('gcc (custom snapshot build)'),
    );
    const detector = new FamilyDetector('gcc', testContext(host));
    const records = detector.detect();

    expect(records).toHaveLength(1);
    expect(records[0].version.raw).toBe('0.0.0');
    expect(records[0].versionParsed).toBe(false);
    expect(records[0].capabilities.cpp11).toBe(false);
    expect(detector.lastWarnings().some((w) => w.startsWith('warning(UNPARSED_VERSION)'))).toBe(true);
  });

  it('skips candidates whose version query fails or times out', () => {
    const host = createMemoryHost({ env: { PATH: '/a/bin:/b/bin:/c/bin' } })
      .addExecutable('/a/bin/gcc', { exitCode: 1, stderr: 'broken install' })
      .addExecutable('/b/bin/gcc', { timedOut: true })
      .addExecutable('/c/bin/gcc', printsVersion(GCC_13));
    const detector = new FamilyDetector('gcc', testContext(host));
    const records = detector.detect();

    expect(records.map((r) => r.executablePath)).toEqual(['/c/bin/gcc']);
    expect(detector.lastWarnings()).toEqual([
      'warning(CANDIDATE_SKIPPED): gcc: /a/bin/gcc version query failed (exit 1)',
      'warning(CANDIDATE_SKIPPED): gcc: /b/bin/gcc timed out answering its version query',
    ]);
  });

  it('passes the version timeout to the query', () => {
    const host = createMemoryHost({ env: { PATH: '/usr/bin' } }).addExecutable('/usr/bin/clang', printsVersion(CLANG_17));
    new FamilyDetector('clang', testContext(host, { timeouts: { versionQueryMs: 1500 } })).detect();
    expect(host.calls[0]).toMatchObject({ command: '/usr/bin/clang', args: ['--version'], opts: { timeoutMs: 1500 } });
  });

  it('reads CC, ignoring trailing flags', () => {
    const host = createMemoryHost({ env: { CC: '/opt/gcc-14/bin/gcc -m64' } }).addExecutable(
      '/opt/gcc-14/bin/gcc',
      printsVersion('gcc (GCC) 14.1.0'),
    );
    const records = new FamilyDetector('gcc', testContext(host)).detect();
    expect(records).toHaveLength(1);
    expect(records[0].provenance).toEqual({ installationRoot: '/opt/gcc-14', discoveryMethod: 'environment' });
  });

  it('searches configured roots first', () => {
    const host = createMemoryHost().addExecutable('/tools/gcc-13/bin/gcc', printsVersion(GCC_13));
    const records = new FamilyDetector('gcc', testContext(host, { searchRoots: { gcc: ['/tools/gcc-*'] } })).detect();
    expect(records.map((r) => r.provenance.installationRoot)).toEqual(['/tools/gcc-13']);
  });

  it('picks up versioned names from a homebrew keg', () => {
    const host = createMemoryHost({ platform: 'darwin', arch: 'arm64' }).addExecutable(
      '/opt/homebrew/opt/gcc/bin/gcc-14',
      printsVersion('gcc-14 (Homebrew GCC 14.1.0) 14.1.0'),
    );
    const records = new FamilyDetector('gcc', testContext(host)).detect();
    expect(records).toHaveLength(1);
    expect(records[0].provenance).toEqual({
      installationRoot: '/opt/homebrew/opt/gcc',
      discoveryMethod: 'packageManagers',
      packageManager: 'homebrew',
    });
    expect(records[0].architecture).toBe('arm64');
  });

  it('rejects the clang shim installed as gcc on macOS', () => {
    const host = createMemoryHost({ platform: 'darwin', env: { PATH: '/usr/bin' } }).addExecutable(
      '/usr/bin/gcc',
      printsVersion('Apple clang version 15.0.0 (clang-1500.3.9.4)'),
    );
    expect(new FamilyDetector('gcc', testContext(host)).detect()).toEqual([]);
  });

  it('is not probed on hosts outside the family', () => {
    const host = createMemoryHost({ platform: 'win32', env: { PATH: 'C:\\bin' } }).addExecutable('C:\\bin\\gcc.exe');
    expect(new FamilyDetector('gcc', testContext(host)).detect()).toEqual([]);
    expect(host.calls).toEqual([]);
  });
});

describe('family detector strategy isolation', () => {
  it('a throwing strategy costs only its own records', () => {
    const host = createMemoryHost().addExecutable('/opt/gcc/bin/gcc', printsVersion(GCC_13));
    const broken: DetectionStrategy = {
      name: 'broken',
      discover() {
        throw new Error('registry unavailable');
      },
    };
    const working: DetectionStrategy = {
      name: 'working',
      discover: () => [
        {
          executablePath: '/opt/gcc/bin/gcc',
          binDir: '/opt/gcc/bin',
          installationRoot: '/opt/gcc',
          discoveryMethod: 'standardLocations',
        },
      ],
    };
    const detector = new FamilyDetector('gcc', testContext(host), { strategies: [broken, working] });

    const records = detector.detect();
    expect(records.map((r) => r.executablePath)).toEqual(['/opt/gcc/bin/gcc']);
    expect(detector.lastWarnings()).toEqual([
      'warning(STRATEGY_FAILED): gcc: strategy "broken" failed: registry unavailable',
    ]);
  });
});

describe('family detector (windows)', () => {
  it('reads MSYS2 environments from the install tree', () => {
    const host = createMemoryHost({ platform: 'win32' })
      .addDir('C:\\msys64\\usr\\bin')
      .addDir('C:\\msys64\\ucrt64\\include')
      .addExecutable('C:\\msys64\\ucrt64\\bin\\gcc.exe', printsVersion('gcc.exe (Rev3, Built by MSYS2 project) 13.2.0'))
      .addExecutable('C:\\msys64\\ucrt64\\bin\\g++.exe');
    const records = new FamilyDetector('mingw_gcc', testContext(host)).detect();

    expect(records).toHaveLength(1);
    const [r] = records;
    expect(r.architecture).toBe('x64');
    expect(r.capabilities.posixCompatible).toBe(true);
    expect(r.provenance.installationRoot).toBe('C:\\msys64');
    expect(r.environmentHints.includePaths).toEqual(['C:\\msys64\\ucrt64\\include']);
    expect(r.environmentHints.extraVariables).toEqual({
      CC: 'C:\\msys64\\ucrt64\\bin\\gcc.exe',
      CXX: 'C:\\msys64\\ucrt64\\bin\\g++.exe',
      MSYSTEM: 'UCRT64',
      MINGW_PREFIX: '/ucrt64',
      MINGW_CHOST: 'x86_64-w64-mingw32',
    });
  });

  it('finds winget MinGW and llvm-mingw installs under Program Files', () => {
    const host = createMemoryHost({ platform: 'win32' })
      .addExecutable(
        'C:\\Program Files\\mingw-w64\\bin\\gcc.exe',
        printsVersion('gcc.exe (x86_64-posix-seh-rev0, Built by MinGW-Builds project) 13.2.0'),
      )
      .addExecutable(
        'C:\\Program Files (x86)\\LLVM\\bin\\clang.exe',
        printsVersion('clang version 18.1.8\nTarget: x86_64-w64-windows-gnu'),
      );

    const [gcc] = new FamilyDetector('mingw_gcc', testContext(host)).detect();
    expect(gcc.executablePath).toBe('C:\\Program Files\\mingw-w64\\bin\\gcc.exe');
    expect(gcc.provenance).toEqual({
      installationRoot: 'C:\\Program Files\\mingw-w64',
      discoveryMethod: 'packageManagers',
      packageManager: 'winget',
    });

    const [clang] = new FamilyDetector('mingw_clang', testContext(host)).detect();
    expect(clang.version.raw).toBe('18.1.8');
    expect(clang.provenance).toEqual({
      installationRoot: 'C:\\Program Files (x86)\\LLVM',
      discoveryMethod: 'packageManagers',
      packageManager: 'winget',
    });
  });

  it('finds clang-cl from Chocolatey and winget LLVM packages', () => {
    const host = createMemoryHost({ platform: 'win32' })
      .addExecutable(
        'C:\\ProgramData\\chocolatey\\lib\\llvm\\tools\\bin\\clang-cl.exe',
        printsVersion('clang version 17.0.6\nTarget: x86_64-pc-windows-msvc'),
      )
      .addExecutable(
        'C:\\Program Files (x86)\\LLVM\\bin\\clang-cl.exe',
        printsVersion('clang version 16.0.0\nTarget: x86_64-pc-windows-msvc'),
      );
    const records = new FamilyDetector('msvc_clang', testContext(host)).detect();

    expect(records.map((r) => [r.executablePath, r.version.raw, r.recommended])).toEqual([
      ['C:\\ProgramData\\chocolatey\\lib\\llvm\\tools\\bin\\clang-cl.exe', '17.0.6', true],
      ['C:\\Program Files (x86)\\LLVM\\bin\\clang-cl.exe', '16.0.0', false],
    ]);
    expect(records.map((r) => r.provenance.packageManager)).toEqual(['chocolatey', 'winget']);
    expect(records[0].provenance.installationRoot).toBe('C:\\ProgramData\\chocolatey\\lib\\llvm');
    expect(records[0].architecture).toBe('x64');
  });

  it('finds MSVC toolsets through vswhere, one record per host/target directory', () => {
    const vs = 'C:\\VS\\2022\\Community';
    const toolset = `${vs}\\VC\\Tools\\MSVC\\14.38.33130`;
    const cl = printsVersion('Microsoft (R) C/C++ Optimizing Compiler Version 19.38.33135 for x64');
    const host = createMemoryHost({ platform: 'win32' })
      .addExecutable('C:\\Program Files (x86)\\Microsoft Visual Studio\\Installer\\vswhere.exe', {
        stdout: JSON.stringify([{ installationPath: vs }]),
      })
      .addExecutable(`${toolset}\\bin\\Hostx64\\x64\\cl.exe`, cl)
      .addExecutable(`${toolset}\\bin\\Hostx64\\arm64\\cl.exe`, cl)
      .addDir(`${toolset}\\include`);
    const records = new FamilyDetector('msvc', testContext(host)).detect();

    expect(records.map((r) => r.architecture)).toEqual(['amd64', 'amd64_arm64']);
    const [r] = records;
    expect(r.provenance).toEqual({ installationRoot: vs, discoveryMethod: 'inventory' });
    expect(r.version).toEqual({ major: 19, minor: 38, patch: 0, build: '33135', raw: '19.38.33135' });
    expect(r.capabilities.nativeCompatible).toBe(true);
    expect(r.environmentHints.includePaths).toEqual([`${toolset}\\include`]);
    expect(r.environmentHints.extraVariables.VCToolsVersion).toBe('14.38.33130');
    expect(host.calls[0].args).toContain('installationPath');
  });

  it('keeps going when vswhere fails', () => {
    const host = createMemoryHost({ platform: 'win32', env: { PATH: 'C:\\BuildTools\\VC\\Tools\\MSVC\\14.29.30133\\bin\\Hostx86\\x86' } })
      .addExecutable('C:\\Program Files (x86)\\Microsoft Visual Studio\\Installer\\vswhere.exe', { exitCode: 87 })
      .addExecutable(
        'C:\\BuildTools\\VC\\Tools\\MSVC\\14.29.30133\\bin\\Hostx86\\x86\\cl.exe',
        printsVersion('Microsoft (R) C/C++ Optimizing Compiler Version 19.29.30133 for x86'),
      );
    const detector = new FamilyDetector('msvc', testContext(host));
    const records = detector.detect();

    expect(records).toHaveLength(1);
    expect(records[0].architecture).toBe('x86');
    expect(records[0].version).toEqual({ major: 19, minor: 29, patch: 0, build: '30133', raw: '19.29.30133' });
    expect(records[0].provenance).toEqual({ installationRoot: 'C:\\BuildTools', discoveryMethod: 'path' });
    expect(detector.lastWarnings()[0]).toMatch(/^warning\(STRATEGY_FAILED\): msvc: strategy "inventory" failed: vswhere failed \(exit 87\)/);
  });

  it('validates a record without touching it', () => {
    const host = createMemoryHost({ env: { PATH: '/usr/bin' } }).addExecutable('/usr/bin/gcc', printsVersion(GCC_13));
    const detector = new FamilyDetector('gcc', testContext(host));
    const [r] = detector.detect();
    expect(detector.validate(r)).toEqual({ valid: true, errors: [], warnings: [] });

    host.remove('/usr/bin/gcc');
    expect(detector.validate(r)).toEqual({ valid: false, errors: ['Executable not found: /usr/bin/gcc'], warnings: [] });
  });
});
