export { ToolchainRegistry } from './registry/toolchainRegistry.js';
export type { DetectAllResult, ToolchainRegistryOptions, ValidateAllResult } from './registry/toolchainRegistry.js';

export * from './compiler/compilerTypes.js';
export * from './errors.js';
export * from './arch/architectureMatrix.js';
export * from './version/versionInfo.js';
export {
  STANDARDS,
  capabilitiesForFamily,
  highestStandard,
  supportsStandard,
} from './version/capabilities.js';
export type { CapabilityFlag, CapabilityInfo, CppStandard } from './version/capabilities.js';

export { createDetector, createCrossDetector } from './detect/detectors.js';
export type { DetectionContext, ToolchainDetector } from './detect/detectorTypes.js';

export { ActivationSession } from './env/activationSession.js';
export type { ActivateOptions, EnvironmentValidation, SessionState } from './env/activationSession.js';
export { captureEnvironment, diffSnapshots, isEmptyDiff } from './env/environmentSnapshot.js';
export type { EnvironmentDiff, EnvironmentSnapshot } from './env/environmentSnapshot.js';

export {
  listGenerators,
  platformForHost,
  selectGenerator,
  selectGeneratorForPlatform,
  validateGenerator,
} from './generator/generatorSelector.js';
export type { GeneratorSelection, GeneratorValidation, SelectGeneratorOptions } from './generator/generatorSelector.js';
export { TARGET_PLATFORMS } from './generator/generatorTable.js';
export type { GeneratorCandidate, TargetPlatform } from './generator/generatorTable.js';

export { createNodeHost } from './host/nodeHost.js';
export { createMemoryHost } from './host/memoryHost.js';
export type { EnvMap, HostSystem, RunOptions, RunResult } from './host/hostTypes.js';

export { resolveSettings, toolprobeConfigSchema } from './dx/config.js';
export type { ToolprobeConfig, ToolprobeSettings } from './dx/config.js';
