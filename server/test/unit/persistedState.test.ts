import { describe, expect, it, vi } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { createStateWriter, loadPersistedState, writePersistedState } from '../../src/persistedState.js';
import type { Logger } from '../../src/logger.js';

async function mkTmpDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'timegate-dns-test-'));
}

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe('persistedState', () => {
  it('returns an empty state when the file does not exist', async () => {
    const dir = await mkTmpDir();
    const logger = fakeLogger();
    const res = loadPersistedState(path.join(dir, 'state.json'), logger);
    expect(res).toEqual({ rules: [], maintenance: false, skipped: 0 });
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it('loads valid rules and skips invalid ones', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'state.json');
    await fs.writeFile(
      file,
      JSON.stringify({
        maintenance: true,
        rules: [
          { pattern: '*.ads.example.', ip: 'REFUSED', start: '00:00', end: '00:00', enabled: true },
          { pattern: 'tracker.example', ip: '0.0.0.0', start: '08:00', end: '20:00', enabled: false },
          { pattern: 'bad.example', ip: 'not-an-ip' },
          { pattern: 'late.example', ip: 'REFUSED', start: '25:00', end: '06:00' },
          { ip: 'REFUSED' },
          'garbage',
          { pattern: 'noclock.example', ip: '::1' }
        ]
      }),
      'utf8'
    );

    const logger = fakeLogger();
    const res = loadPersistedState(file, logger);

    expect(res.maintenance).toBe(true);
    expect(res.skipped).toBe(4);
    expect(logger.warn).toHaveBeenCalledTimes(4);
    expect(res.rules.map((r) => [r.pattern, r.enabled, r.window.start, r.window.end])).toEqual([
      ['*.ads.example.', true, 0, 0],
      ['tracker.example.', false, 480, 1200],
      ['noclock.example.', true, 0, 0]
    ]);
  });

  it('throws on a file that is not JSON', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'state.json');
    await fs.writeFile(file, '{ not json', 'utf8');
    expect(() => loadPersistedState(file, fakeLogger())).toThrow();
  });

  it('throws when the top-level shape is wrong', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'state.json');
    await fs.writeFile(file, JSON.stringify({ rules: 'nope' }), 'utf8');
    expect(() => loadPersistedState(file, fakeLogger())).toThrow();
  });

  it('writePersistedState creates the directory and round-trips through load', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'nested', 'state.json');
    writePersistedState(file, {
      maintenance: false,
      rules: [{ pattern: 'shop.example.', ip: '1.2.3.4', start: '22:00', end: '06:00', enabled: true }]
    });

    const res = loadPersistedState(file, fakeLogger());
    expect(res.rules).toHaveLength(1);
    expect(res.rules[0]?.window).toEqual({ start: 1320, end: 360 });
    await expect(fs.access(`${file}.tmp`)).rejects.toThrow();
  });

  it('createStateWriter applies saves in call order', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'state.json');
    const writer = createStateWriter(file, fakeLogger());

    const first = writer.save({ maintenance: false, rules: [] });
    const second = writer.save({ maintenance: true, rules: [] });
    await expect(first).resolves.toBe(true);
    await expect(second).resolves.toBe(true);
    await writer.flush();

    const stored = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(stored).toEqual({ maintenance: true, rules: [] });
  });

  it('createStateWriter logs and resolves false when the write fails', async () => {
    const dir = await mkTmpDir();
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'x', 'utf8');
    const logger = fakeLogger();
    // A regular file where the parent directory should be makes mkdir fail.
    const writer = createStateWriter(path.join(blocker, 'state.json'), logger);

    await expect(writer.save({ maintenance: false, rules: [] })).resolves.toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
