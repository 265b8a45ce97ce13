import { normalizeCpu } from '../arch/architectureMatrix.js';
import type { NativeFamily, RecordValidation, ToolchainRecord } from '../compiler/compilerTypes.js';
import { logDebug } from '../dx/logger.js';
import { traceDebug } from '../dx/trace.js';
import { collectWarnings, formatWarning, warn } from '../dx/warnings.js';
import { errorMessage } from '../errors.js';
import { combinedOutput, hostPath, isRunSuccess } from '../host/hostTypes.js';
import { capabilitiesForFamily } from '../version/capabilities.js';
import type { CapabilityInfo } from '../version/capabilities.js';
import { ZERO_VERSION, extractVersion, formatVersion, makeVersion } from '../version/versionInfo.js';
import type { VersionInfo } from '../version/versionInfo.js';
import { familyConfig, familyTable } from './familyTable.js';
import type { FamilyConfig } from './familyTable.js';
import { deepFreeze, normalizeExecutablePath, rankRecords } from './recordUtils.js';
import { buildStrategy, exeName } from './strategies.js';
import type { Candidate, DetectionContext, DetectionStrategy, ToolchainDetector, VersionProbe } from './detectorTypes.js';

export type FamilyDetectorOptions = {
  /** Overrides the entry from data/families.json. */
  config?: FamilyConfig;
  /** Overrides the strategies built from `config.strategies`. */
  strategies?: DetectionStrategy[];
};

/** `19.38.33135` is compiler 19.38, build 33135. */
function msvcVersion(v: VersionInfo): VersionInfo {
  const build = v.raw.split('.').slice(2).join('.');
  return makeVersion(v.major, v.minor, 0, build || undefined, v.raw);
}

/**
 * One detector for every native family, driven by its FamilyConfig record.
 * Strategies run in the configured order; each is isolated, so a throw
 * costs that strategy's records and nothing else.
 */
export class FamilyDetector implements ToolchainDetector<ToolchainRecord> {
  readonly family: NativeFamily;
  private readonly cfg: FamilyConfig;
  private readonly ctx: DetectionContext;
  private readonly strategies: DetectionStrategy[];
  private warnings: string[] = [];

  constructor(family: NativeFamily, ctx: DetectionContext, opts: FamilyDetectorOptions = {}) {
    this.family = family;
    this.ctx = ctx;
    this.cfg = opts.config ?? familyConfig(family);
    this.strategies = opts.strategies ?? this.cfg.strategies.map((m) => buildStrategy(m, ctx, this.cfg));
  }

  lastWarnings(): readonly string[] {
    return this.warnings;
  }

  /** Records from every strategy; warnings raised meanwhile are kept for lastWarnings(). */
  detect(): ToolchainRecord[] {
    const { result, warnings } = collectWarnings(() => this.runStrategies());
    this.warnings = warnings.map(formatWarning);
    return result;
  }

  private runStrategies(): ToolchainRecord[] {
    const { host } = this.ctx;
    if (!this.cfg.hostPlatforms.includes(host.platform)) {
      logDebug(`${this.family}: not probed on ${host.platform}`);
      return [];
    }

    const probes = new Map<string, VersionProbe | null>();
    const records: ToolchainRecord[] = [];

    for (const strategy of this.strategies) {
      try {
        const candidates = strategy.discover();
        traceDebug('detect.strategy', { family: this.family, strategy: strategy.name, candidates: candidates.length });
        for (const cand of candidates) {
          const key = normalizeExecutablePath(host, cand.executablePath);
          if (!probes.has(key)) probes.set(key, this.probe(cand.executablePath));
          const probe = probes.get(key) ?? null;
          if (probe) records.push(this.toRecord(cand, probe));
        }
      } catch (err) {
        warn({
          code: 'STRATEGY_FAILED',
          message: `${this.family}: strategy "${strategy.name}" failed: ${errorMessage(err)}`,
        });
      }
    }

    return rankRecords(host, records);
  }

  /** Version query plus identification; null skips the candidate. */
  private probe(executablePath: string): VersionProbe | null {
    const probe = this.detectVersion(executablePath);
    if (!probe) {
      logDebug(`${this.family}: skipped ${executablePath} (version query failed)`);
      return null;
    }
    const { identifyPattern, rejectPattern } = this.cfg;
    if (identifyPattern && !new RegExp(identifyPattern, 'i').test(probe.output)) {
      logDebug(`${this.family}: skipped ${executablePath} (not identified)`);
      return null;
    }
    if (rejectPattern && new RegExp(rejectPattern, 'i').test(probe.output)) {
      logDebug(`${this.family}: skipped ${executablePath} (rejected)`);
      return null;
    }
    if (!probe.parsed) {
      warn({
        code: 'UNPARSED_VERSION',
        message: `${this.family}: no version in output of ${executablePath}; recorded as 0.0.0`,
        hint: 'Filter on versionParsed when the exact version matters.',
      });
    }
    return probe;
  }

  detectVersion(executablePath: string): VersionProbe | null {
    const res = this.ctx.host.run(executablePath, this.cfg.versionArgs, {
      timeoutMs: this.ctx.settings.timeouts.versionQueryMs,
    });
    if (!isRunSuccess(res)) {
      warn({
        code: 'CANDIDATE_SKIPPED',
        message: res.timedOut
          ? `${this.family}: ${executablePath} timed out answering its version query`
          : `${this.family}: ${executablePath} version query failed (${res.error ?? `exit ${res.exitCode}`})`,
      });
      return null;
    }
    const output = combinedOutput(res);
    const found = extractVersion(output, this.cfg.versionPatterns);
    const version = found && this.cfg.versionScheme === 'msvc' ? msvcVersion(found) : found;
    return { version: version ?? ZERO_VERSION, parsed: version !== null, output };
  }

  detectCapabilities(version: VersionInfo): CapabilityInfo {
    return capabilitiesForFamily(this.family, version);
  }

  private toRecord(cand: Candidate, probe: VersionProbe): ToolchainRecord {
    const { host } = this.ctx;
    return deepFreeze({
      family: this.family,
      version: probe.version,
      versionParsed: probe.parsed,
      executablePath: cand.executablePath,
      architecture: cand.architecture ?? normalizeCpu(host.arch),
      capabilities: this.detectCapabilities(probe.version),
      environmentHints: this.hints(cand),
      provenance: {
        installationRoot: cand.installationRoot,
        discoveryMethod: cand.discoveryMethod,
        ...(cand.packageManager ? { packageManager: cand.packageManager } : {}),
      },
      recommended: false,
    });
  }

  private firstCompanion(dir: string, names: readonly string[]): string | undefined {
    const { host } = this.ctx;
    const p = hostPath(host);
    return names.map((n) => p.join(dir, exeName(host, n))).find((f) => host.isExecutable(f));
  }

  private hints(cand: Candidate): ToolchainRecord['environmentHints'] {
    const { host } = this.ctx;
    const p = hostPath(host);
    const existing = (dirs: string[]) => dirs.filter((d) => host.isDirectory(d));
    const extra: Record<string, string> = {};

    const cc = this.firstCompanion(cand.binDir, this.cfg.companions.c) ?? cand.executablePath;
    const cxx = this.firstCompanion(cand.binDir, this.cfg.companions.cxx);
    extra.CC = cc;
    if (cxx) extra.CXX = cxx;

    if (cand.toolsetDir) {
      const target = cand.binDir.split(/[\\/]/).pop() ?? '';
      extra.VSINSTALLDIR = cand.installationRoot;
      extra.VCToolsInstallDir = cand.toolsetDir;
      extra.VCToolsVersion = p.basename(cand.toolsetDir);
      return {
        includePaths: existing([p.join(cand.toolsetDir, 'include')]),
        libraryPaths: existing([p.join(cand.toolsetDir, 'lib', target)]),
        extraVariables: extra,
      };
    }

    const prefix = p.dirname(cand.binDir);
    const includePaths = [p.join(prefix, 'include')];
    const libraryPaths = [p.join(prefix, 'lib')];

    const msys = cand.msystem ? familyTable().msys2[cand.msystem] : undefined;
    // MSYS2 variables only make sense inside an MSYS2 tree (it has usr/bin).
    if (cand.msystem && msys && host.isDirectory(p.join(cand.installationRoot, 'usr', 'bin'))) {
      extra.MSYSTEM = cand.msystem;
      extra.MINGW_PREFIX = msys.prefix;
      extra.MINGW_CHOST = msys.chost;
      includePaths.push(p.join(cand.installationRoot, 'usr', 'include'));
      libraryPaths.push(p.join(cand.installationRoot, 'usr', 'lib'));
    }

    return { includePaths: existing(includePaths), libraryPaths: existing(libraryPaths), extraVariables: extra };
  }

  validate(record: ToolchainRecord): RecordValidation {
    const { host } = this.ctx;
    const errors: string[] = [];
    const warnings: string[] = [];
    if (!host.isExecutable(record.executablePath)) {
      errors.push(`Executable not found: ${record.executablePath}`);
    }
    if (!record.versionParsed) {
      warnings.push(`Version of ${record.executablePath} could not be determined (reported as ${formatVersion(record.version)})`);
    }
    if (!host.isDirectory(record.provenance.installationRoot)) {
      warnings.push(`Installation root missing: ${record.provenance.installationRoot}`);
    }
    for (const d of [...record.environmentHints.includePaths, ...record.environmentHints.libraryPaths]) {
      if (!host.isDirectory(d)) warnings.push(`Directory missing: ${d}`);
    }
    return { valid: errors.length === 0, errors, warnings };
  }
}

export function createFamilyDetector(family: NativeFamily, ctx: DetectionContext, opts?: FamilyDetectorOptions) {
  return new FamilyDetector(family, ctx, opts);
}
