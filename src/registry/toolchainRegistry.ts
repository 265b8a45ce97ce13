import { normalizeCpu, tryParseArchitecture } from '../arch/architectureMatrix.js';
import { FAMILIES, isCrossRecord, isFamilyId } from '../compiler/compilerTypes.js';
import type { AnyToolchainRecord, FamilyId, HostPlatform, PackageLocation } from '../compiler/compilerTypes.js';
import { loadOptionalConfig, resolveSettings } from '../dx/config.js';
import type { ToolprobeConfig, ToolprobeSettings } from '../dx/config.js';
import { logDebug, logWarn } from '../dx/logger.js';
import { traceError, traceInfo, traceSpan } from '../dx/trace.js';
import { createDetector } from '../detect/detectors.js';
import type { DetectionContext, ToolchainDetector } from '../detect/detectorTypes.js';
import { ActivationSession } from '../env/activationSession.js';
import type { ActivateOptions } from '../env/activationSession.js';
import type { EnvironmentSnapshot } from '../env/environmentSnapshot.js';
import { InvalidArgumentError, NotFoundError, ValidationError, toDetectionError } from '../errors.js';
import type { DetectionError } from '../errors.js';
import { selectGenerator } from '../generator/generatorSelector.js';
import type { GeneratorSelection, SelectGeneratorOptions } from '../generator/generatorSelector.js';
import { isTargetPlatform } from '../generator/generatorTable.js';
import type { HostSystem } from '../host/hostTypes.js';
import { createNodeHost } from '../host/nodeHost.js';
import { formatVersion } from '../version/versionInfo.js';

export type ToolchainRegistryOptions = {
  host?: HostSystem;
  config?: ToolprobeConfig | null;
  /** Replaces the built-in detector for a family. */
  detectors?: Partial<Record<FamilyId, ToolchainDetector>>;
  /** Families to probe; defaults to the config's list, else all. */
  families?: readonly FamilyId[];
};

export type DetectAllResult = {
  toolchains: Partial<Record<FamilyId, readonly AnyToolchainRecord[]>>;
  errors: DetectionError[];
  warnings: string[];
  success: boolean;
};

export type ValidateAllResult = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

type FamilyEntry = {
  records: readonly AnyToolchainRecord[];
  error: DetectionError | null;
  warnings: readonly string[];
};

const HOST_PREFERENCE: Readonly<Record<HostPlatform, readonly FamilyId[]>> = {
  win32: ['msvc', 'msvc_clang', 'mingw_gcc', 'mingw_clang'],
  darwin: ['clang', 'gcc'],
  linux: ['gcc', 'clang'],
};

const INSTALL_HINTS: Readonly<Record<FamilyId, string>> = {
  gcc: 'Install GCC with the system package manager and make sure gcc is on PATH.',
  clang: 'Install Clang (or the Xcode command line tools on macOS) and make sure clang is on PATH.',
  msvc: 'Install Visual Studio or the Build Tools with the "Desktop development with C++" workload.',
  msvc_clang: 'Add the "C++ Clang tools for Windows" component to your Visual Studio installation.',
  mingw_gcc: 'Install MSYS2 and run `pacman -S mingw-w64-ucrt-x86_64-gcc`.',
  mingw_clang: 'Install MSYS2 and run `pacman -S mingw-w64-clang-x86_64-clang`.',
  linux_cross: 'Install a cross compiler such as gcc-aarch64-linux-gnu.',
  android_ndk: 'Install the Android NDK and set ANDROID_NDK_ROOT.',
  emscripten: 'Install emsdk, run `emsdk activate latest` and set EMSDK.',
};

function matchesArchitecture(record: AnyToolchainRecord, requested: string): boolean {
  const wanted = tryParseArchitecture(requested);
  const have = tryParseArchitecture(record.architecture);
  if (wanted && have) return wanted.host === have.host && wanted.target === have.target;
  return normalizeCpu(record.architecture) === normalizeCpu(requested);
}

/**
 * Front door for detection, activation and generator selection. Detection
 * results are cached per family until refresh(); families are probed one
 * after another, and a failing family is reported without stopping the rest.
 */
export class ToolchainRegistry {
  readonly host: HostSystem;
  readonly settings: ToolprobeSettings;
  readonly families: readonly FamilyId[];
  readonly session: ActivationSession;
  private readonly ctx: DetectionContext;
  private readonly overrides: Partial<Record<FamilyId, ToolchainDetector>>;
  private readonly detectors = new Map<FamilyId, ToolchainDetector>();
  private readonly entries = new Map<FamilyId, FamilyEntry>();
  private readonly lookups = new Map<string, AnyToolchainRecord | null>();

  constructor(opts: ToolchainRegistryOptions = {}) {
    this.host = opts.host ?? createNodeHost();
    this.settings = resolveSettings(opts.config ?? null);
    this.families = opts.families ?? this.settings.families;
    this.ctx = { host: this.host, settings: this.settings };
    this.overrides = opts.detectors ?? {};
    this.session = new ActivationSession(this.host, this.settings);
  }

  /** A registry on the real machine, configured from `toolprobe.config.js` when present. */
  static async fromProject(projectRoot: string = process.cwd()): Promise<ToolchainRegistry> {
    const config = await loadOptionalConfig(projectRoot);
    return new ToolchainRegistry({ config });
  }

  detector(family: FamilyId): ToolchainDetector {
    const existing = this.detectors.get(family);
    if (existing) return existing;
    const created = this.overrides[family] ?? createDetector(family, this.ctx);
    this.detectors.set(family, created);
    return created;
  }

  private entry(family: FamilyId): FamilyEntry {
    const cached = this.entries.get(family);
    if (cached) return cached;

    const detector = this.detector(family);
    let entry: FamilyEntry;
    try {
      const records = traceSpan('registry.family', { family }, () => detector.detect());
      entry = { records, error: null, warnings: detector.lastWarnings() };
      logDebug(`${family}: ${records.length} toolchain(s)`);
    } catch (err) {
      const error = toDetectionError(`${family}_detection`, err);
      logWarn(`${family} detection failed: ${error.message}`);
      traceError('registry.family_failed', error);
      entry = { records: [], error, warnings: [] };
    }
    this.entries.set(family, entry);
    return entry;
  }

  /** Probes every configured family in order. Never throws for a failing family. */
  detectAll(): DetectAllResult {
    const toolchains: Partial<Record<FamilyId, readonly AnyToolchainRecord[]>> = {};
    const errors: DetectionError[] = [];
    const warnings: string[] = [];
    for (const family of this.families) {
      const e = this.entry(family);
      toolchains[family] = e.records;
      if (e.error) errors.push(e.error);
      warnings.push(...e.warnings);
    }
    traceInfo('registry.detectAll', {
      families: this.families.length,
      toolchains: Object.values(toolchains).reduce((n, list) => n + (list?.length ?? 0), 0),
      errors: errors.length,
    });
    return { toolchains, errors, warnings, success: errors.length === 0 };
  }

  private parseFamily(family: string): FamilyId {
    if (!isFamilyId(family)) throw new InvalidArgumentError(`Unknown toolchain family "${family}"`, FAMILIES);
    return family;
  }

  /** Best record for `family` (optionally for one architecture), or null. */
  detect(family: string, architecture?: string): AnyToolchainRecord | null {
    const fam = this.parseFamily(family);
    const key = `${fam}::${architecture ?? '*'}`;
    const cached = this.lookups.get(key);
    if (cached !== undefined) return cached;

    const { records } = this.entry(fam);
    const found = (architecture ? records.find((r) => matchesArchitecture(r, architecture)) : records[0]) ?? null;
    this.lookups.set(key, found);
    return found;
  }

  /** Re-validates every detected record; cross records re-check each tool. */
  validateAll(): ValidateAllResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    for (const family of this.families) {
      const detector = this.detector(family);
      for (const record of this.entry(family).records) {
        const v = detector.validate(record);
        const label = `${family} ${record.executablePath}`;
        errors.push(...v.errors.map((m) => `${label}: ${m}`));
        warnings.push(...v.warnings.map((m) => `${label}: ${m}`));
      }
    }
    return { valid: errors.length === 0, errors, warnings };
  }

  /** Re-validates, then activates the best matching toolchain; see ActivationSession.activate. */
  activate(family: string, architecture?: string): EnvironmentSnapshot {
    const fam = this.parseFamily(family);
    const record = this.detect(fam, architecture);
    if (!record) {
      throw new NotFoundError(`No ${fam} toolchain found${architecture ? ` for ${architecture}` : ''}`, {
        suggestion: INSTALL_HINTS[fam],
        details: { family: fam, architecture },
      });
    }
    const v = this.detector(fam).validate(record);
    if (v.errors.length > 0) {
      const msg = `${fam} toolchain at ${record.executablePath} is no longer usable: ${v.errors.join('; ')}`;
      throw new ValidationError(msg, v.errors, {
        suggestion: INSTALL_HINTS[fam],
        details: { family: fam, executablePath: record.executablePath },
      });
    }
    const opts: ActivateOptions = architecture ? { architecture } : {};
    return this.session.activate(record, opts);
  }

  restore(): void {
    this.session.restore();
  }

  /**
   * Generator for `family`; a detected cross record supplies the target
   * platform and its generator hint.
   */
  selectGenerator(family: string, platform?: string, opts: SelectGeneratorOptions = {}): GeneratorSelection {
    const fam = this.parseFamily(family);
    const record = this.detect(fam);
    const cross = record && isCrossRecord(record) ? record : null;
    const targetPlatform =
      platform ?? (cross && isTargetPlatform(cross.targetPlatform) ? cross.targetPlatform : undefined);
    return selectGenerator(fam, targetPlatform, {
      preferMultiConfig: this.settings.generator.preferMultiConfig,
      allowFallback: this.settings.generator.allowFallback,
      preferred: cross?.generatorHint,
      host: this.host,
      ...opts,
    });
  }

  /** Best record in the host's family preference order. */
  recommended(): AnyToolchainRecord | null {
    for (const family of HOST_PREFERENCE[this.host.platform]) {
      if (!this.families.includes(family)) continue;
      const record = this.detect(family);
      if (record) return record;
    }
    return null;
  }

  /** Install locations of each family's recommended toolchain, for package-manager integrations. */
  packageLocations(): PackageLocation[] {
    const out: PackageLocation[] = [];
    for (const family of this.families) {
      const record = this.detect(family);
      if (record) {
        out.push({ name: family, version: formatVersion(record.version), location: record.provenance.installationRoot });
      }
    }
    return out;
  }

  /** Drops every cached detection result. */
  refresh(): void {
    this.entries.clear();
    this.lookups.clear();
    logDebug('registry cache cleared');
  }
}
