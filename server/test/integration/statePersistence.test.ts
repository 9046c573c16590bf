import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { authHeaders, startTestApp } from './_harness.js';

describe('integration: state file', () => {
  let dir = '';
  let stateFile = '';

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'timegate-state-'));
    stateFile = path.join(dir, 'nested', 'state.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes every change and restores it on the next start', async () => {
    const first = await startTestApp({ STATE_FILE: stateFile }, { persist: true });
    await first.app.inject({
      method: 'POST',
      url: '/api/rules',
      headers: authHeaders,
      payload: { pattern: '*.ads.example', ip: 'REFUSED', start: '22:00', end: '06:00' }
    });
    await first.app.inject({
      method: 'POST',
      url: '/api/rules',
      headers: authHeaders,
      payload: { pattern: 'v6.example', ip: '2001:db8::1', enabled: false }
    });
    await first.app.inject({ method: 'PUT', url: '/api/maintenance', headers: authHeaders, payload: { active: true } });
    await first.close();

    expect(JSON.parse(fs.readFileSync(stateFile, 'utf8'))).toEqual({
      rules: [
        { pattern: '*.ads.example.', ip: 'REFUSED', start: '22:00', end: '06:00', enabled: true },
        { pattern: 'v6.example.', ip: '2001:db8::1', start: '00:00', end: '00:00', enabled: false }
      ],
      maintenance: true
    });

    const second = await startTestApp({ STATE_FILE: stateFile }, { persist: true });
    try {
      expect(second.ctx.store.maintenance().active).toBe(true);
      const list = await second.app.inject({ method: 'GET', url: '/api/rules', headers: authHeaders });
      expect(list.json().items).toEqual([
        { pattern: '*.ads.example.', ip: 'REFUSED', start: '22:00', end: '06:00', enabled: true },
        { pattern: 'v6.example.', ip: '2001:db8::1', start: '00:00', end: '00:00', enabled: false }
      ]);
    } finally {
      await second.close();
    }
  });

  it('starts with the valid rules of a partly broken file', async () => {
    fs.mkdirSync(path.dirname(stateFile), { recursive: true });
    fs.writeFileSync(
      stateFile,
      JSON.stringify({
        rules: [
          { pattern: 'shop.example', ip: '1.2.3.4' },
          { pattern: 'shop..example', ip: '1.2.3.4' }
        ]
      })
    );

    const built = await startTestApp({ STATE_FILE: stateFile }, { persist: true });
    try {
      expect(built.ctx.store.current().rules.map((r) => r.pattern)).toEqual(['shop.example.']);
      expect(built.ctx.store.maintenance().active).toBe(false);
    } finally {
      await built.close();
    }
  });

  it('refuses to start on a file that is not JSON', async () => {
    fs.mkdirSync(path.dirname(stateFile), { recursive: true });
    fs.writeFileSync(stateFile, '{ not json');
    await expect(startTestApp({ STATE_FILE: stateFile }, { persist: true })).rejects.toThrow(SyntaxError);
  });
});
