import type {
  CrossFamily,
  CrossToolchainRecord,
  CrossTools,
  DiscoveryMethod,
  RecordValidation,
} from '../../compiler/compilerTypes.js';
import { logDebug } from '../../dx/logger.js';
import { traceDebug } from '../../dx/trace.js';
import { collectWarnings, formatWarning, warn } from '../../dx/warnings.js';
import { errorMessage } from '../../errors.js';
import { combinedOutput, hostPath, isRunSuccess } from '../../host/hostTypes.js';
import type { HostSystem } from '../../host/hostTypes.js';
import { capabilitiesForFamily } from '../../version/capabilities.js';
import type { CapabilityInfo } from '../../version/capabilities.js';
import { ZERO_VERSION, extractVersion, formatVersion } from '../../version/versionInfo.js';
import type { VersionInfo } from '../../version/versionInfo.js';
import { deepFreeze, normalizeExecutablePath, rankRecords } from '../recordUtils.js';
import type { DetectionContext, ToolchainDetector, VersionProbe } from '../detectorTypes.js';

/** A complete cross tool set found on disk, before its compiler has been run. */
export type CrossCandidate = {
  targetPlatform: string;
  targetArchitecture: string;
  targetTriple: string;
  installationRoot: string;
  discoveryMethod: DiscoveryMethod;
  binDir: string;
  tools: CrossTools;
  sysrootPath: string | null;
  extraVariables: Record<string, string>;
};

export type CrossStrategy = {
  readonly name: string;
  discover(): CrossCandidate[];
};

/** True only if the compiler and every tool of the record are executable right now. */
export function isCrossToolchainValid(record: CrossToolchainRecord, host: HostSystem): boolean {
  const { cc, cxx, ar, strip } = record.tools;
  return [record.executablePath, cc, cxx, ar, strip].every((t) => host.isExecutable(t));
}

/**
 * Shared probe/record/validate logic for the cross families. Subclasses only
 * say where tool sets live; everything after discovery is the same.
 */
export abstract class CrossDetector implements ToolchainDetector<CrossToolchainRecord> {
  abstract readonly family: CrossFamily;
  protected abstract readonly versionArgs: readonly string[];
  protected abstract readonly versionPatterns: readonly string[];
  protected abstract readonly generatorHint: string;

  protected readonly ctx: DetectionContext;
  private warnings: string[] = [];

  constructor(ctx: DetectionContext) {
    this.ctx = ctx;
  }

  protected abstract strategies(): CrossStrategy[];

  lastWarnings(): readonly string[] {
    return this.warnings;
  }

  /** Records from every strategy; warnings raised meanwhile are kept for lastWarnings(). */
  detect(): CrossToolchainRecord[] {
    const { result, warnings } = collectWarnings(() => this.runStrategies());
    this.warnings = warnings.map(formatWarning);
    return result;
  }

  private runStrategies(): CrossToolchainRecord[] {
    const { host } = this.ctx;
    const probes = new Map<string, VersionProbe | null>();
    const records: CrossToolchainRecord[] = [];

    for (const strategy of this.strategies()) {
      try {
        const candidates = strategy.discover();
        traceDebug('detect.strategy', { family: this.family, strategy: strategy.name, candidates: candidates.length });
        for (const cand of candidates) {
          const key = normalizeExecutablePath(host, cand.tools.cc);
          if (!probes.has(key)) probes.set(key, this.probe(cand.tools.cc));
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

  private probe(executablePath: string): VersionProbe | null {
    const probe = this.detectVersion(executablePath);
    if (!probe) {
      logDebug(`${this.family}: skipped ${executablePath} (version query failed)`);
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
    const res = this.ctx.host.run(executablePath, this.versionArgs, {
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
    const version = extractVersion(output, this.versionPatterns);
    return { version: version ?? ZERO_VERSION, parsed: version !== null, output };
  }

  detectCapabilities(version: VersionInfo): CapabilityInfo {
    return capabilitiesForFamily(this.family, version);
  }

  private toRecord(cand: CrossCandidate, probe: VersionProbe): CrossToolchainRecord {
    const p = hostPath(this.ctx.host);
    const existing = (dirs: string[]) => dirs.filter((d) => this.ctx.host.isDirectory(d));
    const sysroot = cand.sysrootPath;
    return deepFreeze({
      family: this.family,
      version: probe.version,
      versionParsed: probe.parsed,
      executablePath: cand.tools.cc,
      architecture: cand.targetArchitecture,
      capabilities: this.detectCapabilities(probe.version),
      environmentHints: {
        includePaths: sysroot ? existing([p.join(sysroot, 'usr', 'include')]) : [],
        libraryPaths: sysroot ? existing([p.join(sysroot, 'usr', 'lib'), p.join(sysroot, 'lib')]) : [],
        extraVariables: { CC: cand.tools.cc, CXX: cand.tools.cxx, ...cand.extraVariables },
      },
      provenance: { installationRoot: cand.installationRoot, discoveryMethod: cand.discoveryMethod },
      recommended: false,
      targetPlatform: cand.targetPlatform,
      targetArchitecture: cand.targetArchitecture,
      targetTriple: cand.targetTriple,
      sysrootPath: sysroot,
      generatorHint: this.generatorHint,
      tools: cand.tools,
    });
  }

  validate(record: CrossToolchainRecord): RecordValidation {
    const { host } = this.ctx;
    const errors: string[] = [];
    const warnings: string[] = [];
    for (const [role, tool] of Object.entries(record.tools)) {
      if (!host.isExecutable(tool)) errors.push(`Cross tool ${role} not found: ${tool}`);
    }
    if (!record.versionParsed) {
      warnings.push(`Version of ${record.executablePath} could not be determined (reported as ${formatVersion(record.version)})`);
    }
    if (record.sysrootPath && !host.isDirectory(record.sysrootPath)) {
      warnings.push(`Sysroot missing: ${record.sysrootPath}`);
    }
    if (!host.isDirectory(record.provenance.installationRoot)) {
      warnings.push(`Installation root missing: ${record.provenance.installationRoot}`);
    }
    return { valid: errors.length === 0, errors, warnings };
  }
}
