import { describe, it, expect, afterEach, vi } from 'vitest';

import { setDebugEnabled } from './logger.js';
import { collectWarnings, formatWarning, warn } from './warnings.js';

describe('dx warnings', () => {
  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
  });

  it('formats code, message and hint', () => {
    expect(
      formatWarning({ code: 'GENERATOR_FALLBACK', message: 'Ninja unavailable', hint: 'install ninja' }),
    ).toBe('warning(GENERATOR_FALLBACK): Ninja unavailable Hint: install ninja');
  });

  it('prints only when debug logging is enabled', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    warn({ code: 'RESTORE_WHILE_IDLE', message: 'nothing to restore' });
    expect(spy).not.toHaveBeenCalled();

    setDebugEnabled(true);
    warn({ code: 'RESTORE_WHILE_IDLE', message: 'nothing to restore' });
    expect(spy).toHaveBeenCalledWith('[toolprobe]', 'warning(RESTORE_WHILE_IDLE): nothing to restore');
  });

  it('collects warnings into the innermost collector while logging is off', () => {
    const outer = collectWarnings(() => {
      warn({ code: 'STRATEGY_FAILED', message: 'outer' });
      const inner = collectWarnings(() => {
        warn({ code: 'CANDIDATE_SKIPPED', message: 'inner' });
        return 7;
      });
      expect(inner).toEqual({ result: 7, warnings: [{ code: 'CANDIDATE_SKIPPED', message: 'inner' }] });
      return 'done';
    });
    expect(outer.result).toBe('done');
    expect(outer.warnings).toEqual([{ code: 'STRATEGY_FAILED', message: 'outer' }]);
  });

  it('drops the collector when the callback throws', () => {
    expect(() =>
      collectWarnings(() => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    const after = collectWarnings(() => warn({ code: 'UNPARSED_VERSION', message: 'x' }));
    expect(after.warnings).toHaveLength(1);
  });
});
