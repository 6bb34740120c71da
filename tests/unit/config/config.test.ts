import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { applyEnv, deepMerge, loadConfig } from '../../../src/config/index.js';
import { defaults } from '../../../src/config/defaults.js';

describe('deepMerge', () => {
  it('merges nested objects and skips null overrides', () => {
    const merged = deepMerge({ a: { b: 1, c: 2 }, d: 'x' }, { a: { c: 3 }, d: null });
    expect(merged).toEqual({ a: { b: 1, c: 3 }, d: 'x' });
  });

  it('replaces arrays instead of merging them', () => {
    expect(deepMerge({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shellsense-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when there is no config file', () => {
    expect(loadConfig(dir, {})).toEqual(defaults);
  });

  it('merges the config file over defaults', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({
      model: { name: 'org/custom-nli', timeoutMs: 5_000 },
      http: { enabled: true },
    }));
    const config = loadConfig(dir, {});
    expect(config.model.name).toBe('org/custom-nli');
    expect(config.model.timeoutMs).toBe(5_000);
    expect(config.model.baseUrl).toBe(defaults.model.baseUrl);
    expect(config.http).toEqual({ enabled: true, port: 8585 });
  });

  it('does not mutate the shared defaults', () => {
    loadConfig(dir, { HF_API_TOKEN: 'test-token' });
    expect(defaults.model.apiToken).toBe('');
  });

  it('rejects a config file that is not an object', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), '[]');
    expect(() => loadConfig(dir, {})).toThrow('must contain a JSON object');
  });
});

describe('applyEnv', () => {
  it('applies token, model, switch, level and port overrides', () => {
    const config = applyEnv(structuredClone(defaults), {
      HF_API_TOKEN: 'test-token',
      SHELLSENSE_MODEL: 'org/other',
      SHELLSENSE_MODEL_ENABLED: 'false',
      SHELLSENSE_LOG_LEVEL: 'debug',
      SHELLSENSE_HTTP_PORT: '9000',
    });
    expect(config.model).toMatchObject({ apiToken: 'test-token', name: 'org/other', enabled: false });
    expect(config.logging.level).toBe('debug');
    expect(config.http.port).toBe(9000);
  });

  it('ignores unknown values', () => {
    const config = applyEnv(structuredClone(defaults), {
      SHELLSENSE_MODEL_ENABLED: 'maybe',
      SHELLSENSE_LOG_LEVEL: 'loud',
      SHELLSENSE_HTTP_PORT: 'eighty',
    });
    expect(config.model.enabled).toBe(true);
    expect(config.logging.level).toBe('info');
    expect(config.http.port).toBe(8585);
  });
});
