import type { AnyToolchainRecord } from '../compiler/compilerTypes.js';
import { isCrossRecord } from '../compiler/compilerTypes.js';
import type { ToolprobeSettings } from '../dx/config.js';
import { logDebug } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import { ActivationError, ToolprobeError, errorMessage } from '../errors.js';
import { getEnv, splitPathList } from '../host/envAccess.js';
import { hostPath } from '../host/hostTypes.js';
import type { HostSystem } from '../host/hostTypes.js';
import { which } from '../utils/which.js';
import { applyPlan, planActivation } from './activationPlan.js';
import { ACTIVATION_PROFILES } from './activationTables.js';
import { applyDiff, captureEnvironment, diffSnapshots, replaceEnvironment } from './environmentSnapshot.js';
import type { EnvironmentDiff, EnvironmentSnapshot } from './environmentSnapshot.js';
import { runActivationScript } from './scriptEnvironment.js';

export type SessionState = 'idle' | 'activating' | 'active' | 'restoring';

export type ActivateOptions = {
  /** Matrix id or alias for script-activated families (`amd64_arm64`, `x64`, ...). */
  architecture?: string;
};

export type EnvironmentValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
  missingRequired: string[];
  missingOptional: string[];
  /** PATH entries that are not existing directories. */
  invalidPaths: string[];
};

/**
 * Owns every change to the host environment. One session may be active per
 * process; callers restore before activating a different session.
 */
export class ActivationSession {
  private readonly host: HostSystem;
  private readonly settings: ToolprobeSettings;
  private currentState: SessionState = 'idle';
  private originalSnapshot: EnvironmentSnapshot | null = null;
  private activeRecord: AnyToolchainRecord | null = null;

  constructor(host: HostSystem, settings: ToolprobeSettings) {
    this.host = host;
    this.settings = settings;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Environment as it was before the first activation; null while idle. */
  get original(): EnvironmentSnapshot | null {
    return this.originalSnapshot;
  }

  get record(): AnyToolchainRecord | null {
    return this.activeRecord;
  }

  /**
   * Activates `record` and returns the resulting environment. Safe to call
   * again while active: the first snapshot is kept and PATH entries are
   * never duplicated. On failure the environment is left untouched.
   */
  activate(record: AnyToolchainRecord, opts: ActivateOptions = {}): EnvironmentSnapshot {
    if (this.currentState === 'activating' || this.currentState === 'restoring') {
      throw new ActivationError(`Cannot activate while ${this.currentState}`);
    }
    const { host } = this;
    const previous = this.currentState;
    this.currentState = 'activating';
    const current = captureEnvironment(host.env);
    const original = this.originalSnapshot ?? current;

    let diff: EnvironmentDiff;
    try {
      const plan = planActivation(record, host, this.settings, opts.architecture);
      // Script output is always diffed against the original snapshot, never the current one.
      const scriptDiff = plan.script
        ? diffSnapshots(
            original,
            runActivationScript(host, plan.script, original, this.settings.timeouts.activationScriptMs),
            host.platform,
          )
        : null;
      diff = diffSnapshots(current, applyPlan(host, current, plan, scriptDiff), host.platform);
    } catch (err) {
      this.currentState = previous;
      if (err instanceof ActivationError) throw err;
      throw new ActivationError(`Activation of ${record.family} failed: ${errorMessage(err)}`, {
        cause: err,
        suggestion: err instanceof ToolprobeError ? err.suggestion : undefined,
      });
    }

    applyDiff(host.env, diff, host.platform);
    this.originalSnapshot = original;
    this.activeRecord = record;
    this.currentState = 'active';
    traceInfo('env.activate', {
      family: record.family,
      executable: record.executablePath,
      added: Object.keys(diff.added),
      changed: Object.keys(diff.changed),
    });
    return captureEnvironment(host.env);
  }

  /** Puts back the environment captured before the first activation. No-op (with a warning) while idle. */
  restore(): void {
    if (this.currentState === 'idle' || !this.originalSnapshot) {
      warn({ code: 'RESTORE_WHILE_IDLE', message: 'restore() called with no active environment; nothing to do' });
      return;
    }
    this.currentState = 'restoring';
    replaceEnvironment(this.host.env, this.originalSnapshot, this.host.platform);
    logDebug(`restored environment after ${this.activeRecord?.family ?? 'activation'}`);
    this.originalSnapshot = null;
    this.activeRecord = null;
    this.currentState = 'idle';
  }

  /**
   * Checks the current environment against what activating `record` should
   * have produced. Never changes state or the environment.
   */
  validate(record: AnyToolchainRecord): EnvironmentValidation {
    const { host } = this;
    const p = hostPath(host);
    const profile = ACTIVATION_PROFILES[record.family];
    const has = (name: string) => Boolean(getEnv(host.env, name, host.platform));

    const missingRequired = profile.requiredVariables.filter((v) => !has(v));
    const missingOptional = profile.optionalVariables.filter((v) => !has(v));
    const invalidPaths = splitPathList(getEnv(host.env, 'PATH', host.platform), host.platform).filter(
      (d) => !host.isDirectory(d),
    );

    const errors = missingRequired.map((v) => `Required variable ${v} is not set`);
    const warnings = [
      ...missingOptional.map((v) => `Optional variable ${v} is not set`),
      ...invalidPaths.map((d) => `PATH entry does not exist: ${d}`),
    ];

    const tool = p.basename(record.executablePath);
    if (!which(host, tool)) errors.push(`Expected tool ${tool} is not on PATH`);

    const binDir = p.dirname(record.executablePath);
    if (!host.isDirectory(binDir)) errors.push(`Directory missing: ${binDir}`);
    const referenced = [
      ...record.environmentHints.includePaths,
      ...record.environmentHints.libraryPaths,
      ...(isCrossRecord(record) && record.sysrootPath ? [record.sysrootPath] : []),
    ];
    for (const d of referenced) {
      if (!host.isDirectory(d)) warnings.push(`Directory missing: ${d}`);
    }

    return { valid: errors.length === 0, errors, warnings, missingRequired, missingOptional, invalidPaths };
  }
}
