import { isCrossFamily } from '../compiler/compilerTypes.js';
import type { CrossFamily, FamilyId } from '../compiler/compilerTypes.js';
import { AndroidNdkDetector } from './cross/androidNdk.js';
import type { CrossDetector } from './cross/crossDetector.js';
import { EmscriptenDetector } from './cross/emscripten.js';
import { LinuxCrossDetector } from './cross/linuxCross.js';
import { FamilyDetector } from './familyDetector.js';
import type { DetectionContext, ToolchainDetector } from './detectorTypes.js';

export function createCrossDetector(family: CrossFamily, ctx: DetectionContext): CrossDetector {
  switch (family) {
    case 'linux_cross':
      return new LinuxCrossDetector(ctx);
    case 'android_ndk':
      return new AndroidNdkDetector(ctx);
    case 'emscripten':
      return new EmscriptenDetector(ctx);
  }
}

/** The detector for any family, native or cross. */
export function createDetector(family: FamilyId, ctx: DetectionContext): ToolchainDetector {
  return isCrossFamily(family) ? createCrossDetector(family, ctx) : new FamilyDetector(family, ctx);
}
