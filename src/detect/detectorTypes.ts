import type {
  AnyToolchainRecord,
  DiscoveryMethod,
  FamilyId,
  PackageManager,
  RecordValidation,
} from '../compiler/compilerTypes.js';
import type { ToolprobeSettings } from '../dx/config.js';
import type { HostSystem } from '../host/hostTypes.js';
import type { CapabilityInfo } from '../version/capabilities.js';
import type { VersionInfo } from '../version/versionInfo.js';

export type DetectionContext = {
  host: HostSystem;
  settings: ToolprobeSettings;
};

/** An executable a strategy found, before it has been run. */
export type Candidate = {
  executablePath: string;
  binDir: string;
  installationRoot: string;
  discoveryMethod: DiscoveryMethod;
  packageManager?: PackageManager;
  architecture?: string;
  msystem?: string;
  /** MSVC toolset directory (`.../VC/Tools/MSVC/14.38.33130`) */
  toolsetDir?: string;
};

export type DetectionStrategy = {
  readonly name: string;
  discover(): Candidate[];
};

export type VersionProbe = {
  version: VersionInfo;
  /** false when the output held no version token; `version` is then 0.0.0 */
  parsed: boolean;
  output: string;
};

/** One implementation per toolchain family. */
export interface ToolchainDetector<R extends AnyToolchainRecord = AnyToolchainRecord> {
  readonly family: FamilyId;
  /** Records sorted by version, newest first, the head flagged `recommended`. */
  detect(): R[];
  /** Null when the query timed out, failed to start or exited non-zero. */
  detectVersion(executablePath: string): VersionProbe | null;
  detectCapabilities(version: VersionInfo): CapabilityInfo;
  validate(record: R): RecordValidation;
  /** Non-fatal problems met by the last detect() call. */
  lastWarnings(): readonly string[];
}
