import { logWarn } from './logger.js';

export type ToolprobeWarningCode =
  | 'STRATEGY_FAILED'
  | 'CANDIDATE_SKIPPED'
  | 'UNPARSED_VERSION'
  | 'GENERATOR_FALLBACK'
  | 'RESTORE_WHILE_IDLE';

export type ToolprobeWarning = {
  code: ToolprobeWarningCode;
  message: string;
  hint?: string;
};

// Innermost collector last.
const collectors: ToolprobeWarning[][] = [];

export function formatWarning(w: ToolprobeWarning): string {
  const hint = w.hint ? ` Hint: ${w.hint}` : '';
  return `warning(${w.code}): ${w.message}${hint}`;
}

/**
 * Emit a non-fatal warning. It is handed to the innermost collectWarnings()
 * call, if any, and printed only when debug logging is enabled.
 */
export function warn(w: ToolprobeWarning) {
  collectors.at(-1)?.push(w);
  logWarn(formatWarning(w));
}

/** Runs `fn` and returns its result with every warning emitted meanwhile. */
export function collectWarnings<T>(fn: () => T): { result: T; warnings: ToolprobeWarning[] } {
  const warnings: ToolprobeWarning[] = [];
  collectors.push(warnings);
  try {
    return { result: fn(), warnings };
  } finally {
    collectors.pop();
  }
}
