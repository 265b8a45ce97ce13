import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConfigError } from '../errors.js';
import { __resetConfigCacheForTests, loadOptionalConfig, parseConfig, resolveSettings } from './config.js';
import { isDebugEnabled, setDebugEnabled } from './logger.js';

// Mark the temp dir as ESM so the config file loads the same way under Node and Vitest.
function configDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'toolprobe-cfg-'));
  writeFileSync(join(dir, 'package.json'), '{ "type": "module" }\n', 'utf8');
  return dir;
}

describe('config loader', () => {
  afterEach(() => {
    __resetConfigCacheForTests();
    setDebugEnabled(false);
  });

  it('returns null when config file is missing', async () => {
    const dir = configDir();
    const cfg = await loadOptionalConfig(dir);
    expect(cfg).toBe(null);
  });

  it('loads toolprobe.config.js (default export)', async () => {
    const dir = configDir();
    writeFileSync(
      join(dir, 'toolprobe.config.js'),
      `export default { debug: true, families: ["gcc", "clang"], timeouts: { versionQueryMs: 2000 } };\n`,
      'utf8',
    );

    const cfg = await loadOptionalConfig(dir);
    expect(cfg?.families).toEqual(['gcc', 'clang']);
    expect(cfg?.timeouts?.versionQueryMs).toBe(2000);
    expect(isDebugEnabled()).toBe(true);
  });

  it('caches the first result for the process', async () => {
    const empty = configDir();
    const withFile = configDir();
    writeFileSync(join(withFile, 'toolprobe.config.js'), 'export default { debug: false };\n', 'utf8');

    expect(await loadOptionalConfig(empty)).toBe(null);
    expect(await loadOptionalConfig(withFile)).toBe(null);
  });

  it('rejects invalid config with the offending keys', async () => {
    const dir = configDir();
    writeFileSync(join(dir, 'toolprobe.config.js'), 'export default { families: ["icc"] };\n', 'utf8');
    await expect(loadOptionalConfig(dir)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('config settings', () => {
  it('fills defaults', () => {
    const s = resolveSettings(null);
    expect(s.timeouts).toEqual({ versionQueryMs: 10_000, inventoryQueryMs: 30_000, activationScriptMs: 300_000 });
    expect(s.generator).toEqual({ preferMultiConfig: false, allowFallback: true });
    expect(s.families).toContain('emscripten');
    expect(s.msvc.platformType).toBe('desktop');
  });

  it('lowers timeouts but never raises them past the limits', () => {
    const s = resolveSettings(parseConfig({ timeouts: { versionQueryMs: 60_000, activationScriptMs: 5_000 } }));
    expect(s.timeouts.versionQueryMs).toBe(10_000);
    expect(s.timeouts.activationScriptMs).toBe(5_000);
  });

  it('reports unknown keys', () => {
    expect(() => parseConfig({ cacheDir: 'x' })).toThrow(/Invalid config: <root>: Unrecognized key\(s\) in object: 'cacheDir'/);
    expect(() => parseConfig({ msvc: { toolsetVersion: 'latest' } })).toThrow(/msvc\.toolsetVersion/);
  });
});
