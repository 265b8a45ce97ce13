import type { CapabilityInfo } from '../version/capabilities.js';
import type { VersionInfo } from '../version/versionInfo.js';

export const NATIVE_FAMILIES = ['gcc', 'clang', 'msvc', 'msvc_clang', 'mingw_gcc', 'mingw_clang'] as const;
export const CROSS_FAMILIES = ['linux_cross', 'android_ndk', 'emscripten'] as const;
export const FAMILIES = [...NATIVE_FAMILIES, ...CROSS_FAMILIES] as const;

export type NativeFamily = (typeof NATIVE_FAMILIES)[number];
export type CrossFamily = (typeof CROSS_FAMILIES)[number];
export type FamilyId = (typeof FAMILIES)[number];

export function isFamilyId(s: string): s is FamilyId {
  return FAMILIES.some((f) => f === s);
}

export function isCrossFamily(f: FamilyId): f is CrossFamily {
  return CROSS_FAMILIES.some((c) => c === f);
}

export const HOST_PLATFORMS = ['linux', 'darwin', 'win32'] as const;
export type HostPlatform = (typeof HOST_PLATFORMS)[number];

export const DISCOVERY_METHODS = [
  'inventory',
  'environment',
  'standardLocations',
  'packageManagers',
  'path',
] as const;
export type DiscoveryMethod = (typeof DISCOVERY_METHODS)[number];

export const PACKAGE_MANAGERS = ['scoop', 'chocolatey', 'winget', 'homebrew'] as const;
export type PackageManager = (typeof PACKAGE_MANAGERS)[number];

export type EnvironmentHints = {
  includePaths: readonly string[];
  libraryPaths: readonly string[];
  extraVariables: Readonly<Record<string, string>>;
};

export type Provenance = {
  installationRoot: string;
  discoveryMethod: DiscoveryMethod;
  packageManager?: PackageManager;
};

export type ToolchainRecord = {
  family: FamilyId;
  version: VersionInfo;
  /** false when no version token was found and `version` is 0.0.0 */
  versionParsed: boolean;
  executablePath: string;
  /**
   * Matrix id (`amd64`, `x86_amd64`, ...) for MSVC toolsets, otherwise the
   * target CPU (`x64`, `x86`, `arm`, `arm64`, `wasm32`, ...).
   */
  architecture: string;
  capabilities: CapabilityInfo;
  environmentHints: EnvironmentHints;
  provenance: Provenance;
  recommended: boolean;
};

export type CrossTools = {
  cc: string;
  cxx: string;
  ar: string;
  strip: string;
};

export type CrossToolchainRecord = ToolchainRecord & {
  family: CrossFamily;
  targetPlatform: string;
  targetArchitecture: string;
  targetTriple: string;
  sysrootPath: string | null;
  generatorHint: string;
  tools: CrossTools;
};

export type AnyToolchainRecord = ToolchainRecord | CrossToolchainRecord;

export function isCrossRecord(r: AnyToolchainRecord): r is CrossToolchainRecord {
  return 'targetTriple' in r;
}

/** Read-only handoff to package-manager integrations. */
export type PackageLocation = {
  name: string;
  version: string;
  location: string;
};

export type RecordValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};
