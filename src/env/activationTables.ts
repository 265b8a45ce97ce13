import type { FamilyId } from '../compiler/compilerTypes.js';

/**
 * How a family is activated. Values are templates: `{binDir}`, `{root}`,
 * `{arch}`, `{triple}`, `{sysroot}`, `{cc}`, `{cxx}`, `{ar}`, `{strip}`,
 * `{generator}` and every `extraVariables` key of the record (`{MSYSTEM}`,
 * `{ANDROID_ABI}`, ...). A variable whose template does not resolve is left
 * alone.
 */
export type ActivationProfile = {
  /** Run the family's activation script first, then apply the direct part. */
  script: boolean;
  variables: Readonly<Record<string, string>>;
  /** Extra variables keyed by record architecture. */
  architectureVariables?: Readonly<Record<string, Readonly<Record<string, string>>>>;
  /** Prepended to PATH in this order, when the directory exists. */
  pathPrepend: readonly string[];
  /** Path-list variables; only existing directories are prepended. */
  pathLists?: Readonly<Record<string, readonly string[]>>;
  requiredVariables: readonly string[];
  optionalVariables: readonly string[];
};

const compilerPair = { CC: '{cc}', CXX: '{cxx}' } as const;

const cmakeCross = {
  CMAKE_C_COMPILER: '{cc}',
  CMAKE_CXX_COMPILER: '{cxx}',
  CMAKE_AR: '{ar}',
  CMAKE_STRIP: '{strip}',
  CMAKE_C_COMPILER_TARGET: '{triple}',
  CMAKE_CXX_COMPILER_TARGET: '{triple}',
  CMAKE_GENERATOR: '{generator}',
} as const;

const posixDirect: ActivationProfile = {
  script: false,
  variables: compilerPair,
  pathPrepend: ['{binDir}'],
  requiredVariables: ['CC', 'PATH'],
  optionalVariables: ['CXX'],
};

const mingw: ActivationProfile = {
  script: false,
  variables: {
    ...compilerPair,
    MSYSTEM: '{MSYSTEM}',
    MINGW_PREFIX: '{MINGW_PREFIX}',
    MINGW_CHOST: '{MINGW_CHOST}',
    MSYS2_PATH: '{root}',
  },
  pathPrepend: ['{binDir}', '{root}/usr/bin'],
  pathLists: {
    PKG_CONFIG_PATH: ['{root}{MINGW_PREFIX}/lib/pkgconfig', '{root}{MINGW_PREFIX}/share/pkgconfig'],
    ACLOCAL_PATH: ['{root}{MINGW_PREFIX}/share/aclocal', '{root}/usr/share/aclocal'],
  },
  requiredVariables: ['CC', 'PATH'],
  optionalVariables: ['CXX', 'MSYSTEM', 'MINGW_PREFIX'],
};

export const ACTIVATION_PROFILES: Readonly<Record<FamilyId, ActivationProfile>> = {
  gcc: posixDirect,
  clang: posixDirect,
  msvc: {
    script: true,
    variables: {},
    pathPrepend: [],
    requiredVariables: ['INCLUDE', 'LIB', 'PATH'],
    optionalVariables: ['LIBPATH', 'VCToolsInstallDir', 'WindowsSdkDir'],
  },
  msvc_clang: {
    script: true,
    variables: compilerPair,
    pathPrepend: ['{binDir}'],
    requiredVariables: ['CC', 'PATH'],
    optionalVariables: ['CXX', 'INCLUDE', 'LIB'],
  },
  mingw_gcc: mingw,
  mingw_clang: mingw,
  linux_cross: {
    script: false,
    variables: {
      ...compilerPair,
      ...cmakeCross,
      AR: '{ar}',
      STRIP: '{strip}',
      CROSS_COMPILE: '{CROSS_COMPILE}',
      CMAKE_SYSTEM_NAME: 'Linux',
      CMAKE_SYSTEM_PROCESSOR: '{CMAKE_SYSTEM_PROCESSOR}',
      CMAKE_SYSROOT: '{sysroot}',
    },
    pathPrepend: ['{binDir}'],
    requiredVariables: ['CC', 'CMAKE_C_COMPILER_TARGET', 'PATH'],
    optionalVariables: ['CXX', 'CMAKE_SYSROOT'],
  },
  android_ndk: {
    script: false,
    variables: {
      ...compilerPair,
      ...cmakeCross,
      CMAKE_SYSTEM_NAME: 'Android',
      CMAKE_SYSTEM_PROCESSOR: '{CMAKE_SYSTEM_PROCESSOR}',
      CMAKE_ANDROID_NDK: '{ANDROID_NDK_ROOT}',
      CMAKE_ANDROID_ARCH_ABI: '{ANDROID_ABI}',
      CMAKE_ANDROID_STL: 'c++_shared',
      CMAKE_ANDROID_NDK_TOOLCHAIN_VERSION: 'clang',
      ANDROID_NDK_ROOT: '{ANDROID_NDK_ROOT}',
      ANDROID_ABI: '{ANDROID_ABI}',
      ANDROID_PLATFORM: '{ANDROID_PLATFORM}',
    },
    architectureVariables: {
      arm: { CMAKE_ANDROID_ARM_MODE: 'arm', CMAKE_ANDROID_ARM_NEON: 'ON' },
    },
    pathPrepend: ['{binDir}'],
    requiredVariables: ['ANDROID_NDK_ROOT', 'ANDROID_ABI', 'CMAKE_C_COMPILER_TARGET', 'PATH'],
    optionalVariables: ['ANDROID_PLATFORM'],
  },
  emscripten: {
    script: false,
    variables: {
      ...compilerPair,
      CMAKE_C_COMPILER: '{cc}',
      CMAKE_CXX_COMPILER: '{cxx}',
      CMAKE_AR: '{ar}',
      CMAKE_GENERATOR: '{generator}',
      CMAKE_SYSTEM_NAME: 'Emscripten',
      CMAKE_SYSTEM_PROCESSOR: '{CMAKE_SYSTEM_PROCESSOR}',
      CMAKE_TOOLCHAIN_FILE: '{CMAKE_TOOLCHAIN_FILE}',
      CMAKE_EXECUTABLE_SUFFIX: '.html',
      CMAKE_POSITION_INDEPENDENT_CODE: 'ON',
      EMSCRIPTEN: '{EMSCRIPTEN}',
      EMSCRIPTEN_ROOT_PATH: '{EMSCRIPTEN}',
      EMSDK: '{EMSDK}',
    },
    pathPrepend: ['{binDir}'],
    requiredVariables: ['EMSCRIPTEN', 'CC', 'PATH'],
    optionalVariables: ['EMSDK', 'CMAKE_TOOLCHAIN_FILE'],
  },
};

/**
 * Substitutes `{name}` placeholders from `values`; null when any placeholder
 * has no value.
 */
export function resolveTemplate(template: string, values: Readonly<Record<string, string>>): string | null {
  let missing = false;
  const out = template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_m, name: string) => {
    const v = values[name];
    if (v === undefined || v === '') {
      missing = true;
      return '';
    }
    return v;
  });
  return missing ? null : out;
}
