import { describe, it, expect } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { batchInvocation, createNodeHost } from './nodeHost.js';

describe('node host', () => {
  it('probes the real filesystem', () => {
    const dir = mkdtempSync(join(tmpdir(), 'toolprobe-host-'));
    mkdirSync(join(dir, 'bin'));
    writeFileSync(join(dir, 'bin', 'notes.txt'), 'hello', 'utf8');

    const host = createNodeHost();
    expect(host.isDirectory(join(dir, 'bin'))).toBe(true);
    expect(host.listDir(join(dir, 'bin'))).toEqual(['notes.txt']);
    expect(host.readFile(join(dir, 'bin', 'notes.txt'))).toBe('hello');
    expect(host.readFile(join(dir, 'missing'))).toBe(null);
    expect(host.listDir(join(dir, 'missing'))).toEqual([]);
  });

  it('runs a process and captures output', () => {
    const host = createNodeHost();
    const res = host.run(process.execPath, ['-e', 'process.stdout.write("ok"); process.exit(3)'], {
      timeoutMs: 10_000,
    });
    expect(res.stdout).toBe('ok');
    expect(res.exitCode).toBe(3);
    expect(res.timedOut).toBe(false);
  });

  it('turns a timeout into timedOut instead of throwing', () => {
    const host = createNodeHost();
    const res = host.run(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 });
    expect(res.timedOut).toBe(true);
  });

  it('turns a missing command into an error code', () => {
    const host = createNodeHost();
    const res = host.run(join(tmpdir(), 'toolprobe-does-not-exist'), [], { timeoutMs: 1000 });
    expect(res.exitCode).toBe(null);
    expect(res.error).toBe('ENOENT');
  });

  it('routes batch files through cmd.exe with quoted arguments', () => {
    expect(batchInvocation('C:\\Program Files\\emsdk\\emcc.bat', ['--version'])).toEqual({
      command: 'cmd.exe',
      args: ['/d', '/s', '/c', '""C:\\Program Files\\emsdk\\emcc.bat" --version"'],
    });
  });
});
