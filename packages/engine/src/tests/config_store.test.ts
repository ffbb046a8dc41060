import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { ensureConfigDefaults, patchConfig, readConfig, writeConfig } from '../config_store.js';
import { tmpDir } from './fakes.js';

test('ensureConfigDefaults fills defaults and drops bad fields', () => {
  const cfg = ensureConfigDefaults({
    createdAt: '2024-01-01T00:00:00.000Z',
    projectId: 'p1',
    authToken: '',
    language: 42,
    availableLanguages: ['en', 3, ''],
    stores: 'products',
  });

  assert.deepEqual(cfg, {
    version: 1,
    createdAt: '2024-01-01T00:00:00.000Z',
    projectId: 'p1',
    language: 'en',
    availableLanguages: ['en'],
    stores: [],
  });
});

test('writeConfig then readConfig round-trips and leaves no temp file', () => {
  const dir = tmpDir();
  const configFile = path.join(dir, 'nested', 'config.json');
  const cfg = patchConfig(ensureConfigDefaults({ createdAt: '2024-01-01T00:00:00.000Z' }), {
    projectId: 'p1',
    authToken: 'tok-1',
    projectSecret: 'test-secret',
    language: 'fr',
  });

  writeConfig({ configFile, config: cfg });

  assert.deepEqual(readConfig({ configFile }), cfg);
  assert.deepEqual(fs.readdirSync(path.dirname(configFile)), ['config.json']);
});

test('readConfig returns null for a missing file', () => {
  assert.equal(readConfig({ configFile: path.join(tmpDir(), 'config.json') }), null);
});

test('readConfig treats an unparsable file as absent', () => {
  const configFile = path.join(tmpDir(), 'config.json');
  fs.writeFileSync(configFile, '[1,2]', 'utf8');

  const errors: string[] = [];
  assert.equal(readConfig({ configFile, onCorrupt: (e) => errors.push(e.message) }), null);
  assert.deepEqual(errors, ['config is not an object']);
});
