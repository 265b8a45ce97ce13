import { describe, it, expect } from 'vitest';

import { resolveSettings } from '../dx/config.js';
import { LinuxCrossDetector } from '../detect/cross/linuxCross.js';
import { AndroidNdkDetector } from '../detect/cross/androidNdk.js';
import { ActivationError } from '../errors.js';
import { createMemoryHost } from '../host/memoryHost.js';
import type { CommandHandler } from '../host/memoryHost.js';
import {
  AARCH64_GCC_13,
  NDK_CLANG_17,
  addGnuCross,
  addNdk,
  sampleRecord,
  testContext,
} from '../testing/fixtures.js';
import { prependPathEntries } from './activationPlan.js';
import { ActivationSession } from './activationSession.js';
import { captureEnvironment } from './environmentSnapshot.js';
import { ENV_MARKER } from './scriptEnvironment.js';

const settings = resolveSettings();

describe('activation session (direct)', () => {
  function gccHost() {
    return createMemoryHost({ env: { PATH: '/usr/bin:/bin', HOME: '/home/dev' } })
      .addDir('/usr/bin')
      .addExecutable('/opt/gcc-13/bin/gcc')
      .addExecutable('/opt/gcc-13/bin/g++');
  }

  it('sets compiler variables and prepends the bin directory', () => {
    const host = gccHost();
    const record = sampleRecord(host, 'gcc', '/opt/gcc-13/bin/gcc', { extra: { CXX: '/opt/gcc-13/bin/g++' } });
    const session = new ActivationSession(host, settings);

    const active = session.activate(record);

    expect(session.state).toBe('active');
    expect(session.record).toBe(record);
    expect(session.original).toEqual({ PATH: '/usr/bin:/bin', HOME: '/home/dev' });
    expect(active).toEqual({
      PATH: '/opt/gcc-13/bin:/usr/bin:/bin',
      HOME: '/home/dev',
      CC: '/opt/gcc-13/bin/gcc',
      CXX: '/opt/gcc-13/bin/g++',
    });
    expect(captureEnvironment(host.env)).toEqual(active);
  });

  it('activate; activate; restore leaves the environment as it was', () => {
    const host = gccHost();
    const before = captureEnvironment(host.env);
    const record = sampleRecord(host, 'gcc', '/opt/gcc-13/bin/gcc');
    const session = new ActivationSession(host, settings);

    const first = session.activate(record);
    const second = session.activate(record);
    expect(second).toEqual(first);
    expect(host.env.PATH).toBe('/opt/gcc-13/bin:/usr/bin:/bin');
    expect(session.original).toEqual(before);

    session.restore();
    expect(session.state).toBe('idle');
    expect(session.original).toBe(null);
    expect(captureEnvironment(host.env)).toEqual(before);
    expect(Object.keys(host.env)).toEqual(Object.keys(before));
  });

  it('treats restore while idle as a no-op', () => {
    const host = gccHost();
    const before = captureEnvironment(host.env);
    const session = new ActivationSession(host, settings);

    expect(() => session.restore()).not.toThrow();
    expect(session.state).toBe('idle');
    expect(captureEnvironment(host.env)).toEqual(before);
  });

  it('validates without changing anything', () => {
    const host = gccHost();
    const record = sampleRecord(host, 'gcc', '/opt/gcc-13/bin/gcc');
    const session = new ActivationSession(host, settings);

    const idle = session.validate(record);
    expect(idle.valid).toBe(false);
    expect(idle.missingRequired).toEqual(['CC']);
    expect(idle.missingOptional).toEqual(['CXX']);
    expect(idle.invalidPaths).toEqual(['/bin']);
    expect(idle.errors).toEqual(['Required variable CC is not set', 'Expected tool gcc is not on PATH']);
    expect(session.state).toBe('idle');
    expect(host.env.CC).toBeUndefined();

    session.activate(record);
    const active = session.validate(record);
    expect(active.valid).toBe(true);
    expect(active.errors).toEqual([]);
    expect(active.warnings).toEqual(['Optional variable CXX is not set', 'PATH entry does not exist: /bin']);
  });
});

describe('activation session (families)', () => {
  it('sets MSYS2 variables and path lists for a MinGW record on win32', () => {
    const host = createMemoryHost({ platform: 'win32', env: { Path: 'C:\\Windows\\System32' } })
      .addDir('C:\\Windows\\System32')
      .addExecutable('C:\\msys64\\ucrt64\\bin\\gcc.exe')
      .addDir('C:\\msys64\\usr\\bin')
      .addDir('C:\\msys64\\ucrt64\\lib\\pkgconfig');
    const record = sampleRecord(host, 'mingw_gcc', 'C:\\msys64\\ucrt64\\bin\\gcc.exe', {
      root: 'C:\\msys64',
      extra: { MSYSTEM: 'UCRT64', MINGW_PREFIX: '/ucrt64', MINGW_CHOST: 'x86_64-w64-mingw32' },
    });

    new ActivationSession(host, settings).activate(record);

    expect(host.env).toEqual({
      Path: 'C:\\msys64\\ucrt64\\bin;C:\\msys64\\usr\\bin;C:\\Windows\\System32',
      CC: 'C:\\msys64\\ucrt64\\bin\\gcc.exe',
      MSYSTEM: 'UCRT64',
      MINGW_PREFIX: '/ucrt64',
      MINGW_CHOST: 'x86_64-w64-mingw32',
      MSYS2_PATH: 'C:\\msys64',
      PKG_CONFIG_PATH: 'C:\\msys64\\ucrt64\\lib\\pkgconfig',
    });
  });

  it('exports CMake cross variables for a GNU cross record', () => {
    const host = addGnuCross(createMemoryHost({ env: { PATH: '/usr/bin' } }), '/usr/bin', 'aarch64-linux-gnu', AARCH64_GCC_13)
      .addDir('/usr/aarch64-linux-gnu');
    const [record] = new LinuxCrossDetector(testContext(host)).detect();

    new ActivationSession(host, settings).activate(record);

    expect(host.env).toEqual({
      PATH: '/usr/bin',
      CC: '/usr/bin/aarch64-linux-gnu-gcc',
      CXX: '/usr/bin/aarch64-linux-gnu-g++',
      AR: '/usr/bin/aarch64-linux-gnu-gcc-ar',
      STRIP: '/usr/bin/aarch64-linux-gnu-strip',
      CROSS_COMPILE: 'aarch64-linux-gnu-',
      CMAKE_SYSTEM_NAME: 'Linux',
      CMAKE_SYSTEM_PROCESSOR: 'aarch64',
      CMAKE_SYSROOT: '/usr/aarch64-linux-gnu',
      CMAKE_C_COMPILER: '/usr/bin/aarch64-linux-gnu-gcc',
      CMAKE_CXX_COMPILER: '/usr/bin/aarch64-linux-gnu-g++',
      CMAKE_AR: '/usr/bin/aarch64-linux-gnu-gcc-ar',
      CMAKE_STRIP: '/usr/bin/aarch64-linux-gnu-strip',
      CMAKE_C_COMPILER_TARGET: 'aarch64-linux-gnu',
      CMAKE_CXX_COMPILER_TARGET: 'aarch64-linux-gnu',
      CMAKE_GENERATOR: 'Ninja',
    });
  });

  it('adds ARM mode variables only for the armeabi-v7a NDK record', () => {
    const root = '/sdk/ndk/26.1.10909125';
    const host = addNdk(createMemoryHost({ env: { ANDROID_NDK_ROOT: root } }), root, NDK_CLANG_17, '26.1.10909125');
    const records = new AndroidNdkDetector(testContext(host)).detect();
    const arm = records.find((r) => r.architecture === 'arm');
    const arm64 = records.find((r) => r.architecture === 'arm64');
    if (!arm || !arm64) throw new Error('expected arm and arm64 records');

    const session = new ActivationSession(host, settings);
    session.activate(arm);
    expect(host.env.CMAKE_ANDROID_ARM_MODE).toBe('arm');
    expect(host.env.CMAKE_ANDROID_ARCH_ABI).toBe('armeabi-v7a');
    expect(host.env.ANDROID_PLATFORM).toBe('android-21');
    session.restore();

    session.activate(arm64);
    expect(host.env.CMAKE_ANDROID_ARM_MODE).toBeUndefined();
    expect(host.env.CMAKE_C_COMPILER_TARGET).toBe('aarch64-linux-android');
  });
});

describe('activation session (script)', () => {
  const vsRoot = 'C:\\VS\\2022\\Community';
  const cl = `${vsRoot}\\VC\\Tools\\MSVC\\14.38.33130\\bin\\Hostx64\\x64\\cl.exe`;

  function msvcHost(handler: CommandHandler) {
    return createMemoryHost({ platform: 'win32', env: { Path: 'C:\\Windows', SystemRoot: 'C:\\Windows' } })
      .addDir('C:\\Windows')
      .addExecutable(cl)
      .addFile(`${vsRoot}\\VC\\Auxiliary\\Build\\vcvarsall.bat`)
      .setCommand('cmd.exe', handler);
  }

  const vcvars: CommandHandler = (_args, opts) => {
    const env = opts.env ?? {};
    const after = { ...env, INCLUDE: 'C:\\VS\\include', LIB: 'C:\\VS\\lib', Path: `C:\\VS\\bin;${env.Path ?? ''}` };
    const lines = Object.entries(after).map(([k, v]) => `${k}=${v}`);
    return { stdout: ['**********************', ENV_MARKER, '=C:=C:\\', ...lines].join('\r\n') };
  };

  function msvcRecord(host: ReturnType<typeof msvcHost>) {
    return sampleRecord(host, 'msvc', cl, {
      root: vsRoot,
      architecture: 'amd64',
      extra: { VCToolsVersion: '14.38.33130' },
    });
  }

  it('runs vcvarsall with matrix arguments and applies the diff', () => {
    const host = msvcHost(vcvars);
    const session = new ActivationSession(host, settings);
    session.activate(msvcRecord(host));

    expect(host.calls[0].args[3]).toBe(
      `"call "${vsRoot}\\VC\\Auxiliary\\Build\\vcvarsall.bat" amd64 -vcvars_ver=14.38.33130 >nul && echo ${ENV_MARKER} && set"`,
    );
    expect(host.env).toEqual({
      Path: 'C:\\VS\\bin;C:\\Windows',
      SystemRoot: 'C:\\Windows',
      INCLUDE: 'C:\\VS\\include',
      LIB: 'C:\\VS\\lib',
    });
  });

  it('passes platform type, spectre and toolset from settings', () => {
    const host = msvcHost(vcvars);
    const custom = resolveSettings({ msvc: { platformType: 'uwp', spectre: true, toolsetVersion: '14.29' } });
    new ActivationSession(host, custom).activate(msvcRecord(host), { architecture: 'amd64_arm64' });

    expect(host.calls[0].args[3]).toBe(
      `"call "${vsRoot}\\VC\\Auxiliary\\Build\\vcvarsall.bat" amd64_arm64 uwp -vcvars_spectre_libs=spectre -vcvars_ver=14.29 >nul && echo ${ENV_MARKER} && set"`,
    );
  });

  it('does not stack script PATH entries on re-activation', () => {
    const host = msvcHost(vcvars);
    const before = captureEnvironment(host.env);
    const session = new ActivationSession(host, settings);
    const record = msvcRecord(host);

    session.activate(record);
    session.activate(record);
    expect(host.env.Path).toBe('C:\\VS\\bin;C:\\Windows');

    session.restore();
    expect(captureEnvironment(host.env)).toEqual(before);
  });

  it('leaves the environment untouched when the script fails', () => {
    const host = msvcHost(() => ({ exitCode: 1, stderr: 'invalid argument' }));
    const before = captureEnvironment(host.env);
    const session = new ActivationSession(host, settings);

    expect(() => session.activate(msvcRecord(host))).toThrow(ActivationError);
    expect(captureEnvironment(host.env)).toEqual(before);
    expect(session.state).toBe('idle');
    expect(session.original).toBe(null);
  });

  it('refuses an MSVC record without any activation script', () => {
    const host = msvcHost(vcvars).remove(`${vsRoot}\\VC\\Auxiliary\\Build\\vcvarsall.bat`);
    expect(() => new ActivationSession(host, settings).activate(msvcRecord(host))).toThrow(
      `No activation script under ${vsRoot}`,
    );
  });

  it('wraps an unknown architecture as an activation failure', () => {
    const host = msvcHost(vcvars);
    expect(() => new ActivationSession(host, settings).activate(msvcRecord(host), { architecture: 'sparc' })).toThrow(
      ActivationError,
    );
  });
});

describe('path prepends', () => {
  it('moves existing entries to the front instead of repeating them', () => {
    const host = createMemoryHost({ platform: 'win32' });
    expect(prependPathEntries(host, 'C:\\a;C:\\B\\;C:\\c', ['C:\\b', 'C:\\new'])).toBe('C:\\b;C:\\new;C:\\a;C:\\c');
  });
});
