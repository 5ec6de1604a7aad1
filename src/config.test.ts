import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { API_KEY_ENV, CACHE_DIR_ENV, parsePositiveInteger, resolveApiKey, resolveCacheDirectory } from './config.js';
import { ConfigError } from './errors.js';

describe('resolveCacheDirectory', () => {
  const home = path.join(path.sep, 'home', 'steve');

  it('prefers the explicit directory', () => {
    expect(resolveCacheDirectory('/tmp/cache', { platform: 'linux', home, env: { [CACHE_DIR_ENV]: '/env' } })).toBe(
      '/tmp/cache',
    );
  });

  it('falls back to the environment override', () => {
    expect(resolveCacheDirectory(undefined, { platform: 'linux', home, env: { [CACHE_DIR_ENV]: '/env' } })).toBe('/env');
  });

  it('follows XDG on Linux', () => {
    expect(resolveCacheDirectory(undefined, { platform: 'linux', home, env: { XDG_CACHE_HOME: '/xdg' } })).toBe(
      path.join('/xdg', 'modpack-manifests'),
    );
    expect(resolveCacheDirectory(undefined, { platform: 'linux', home, env: {} })).toBe(
      path.join(home, '.cache', 'modpack-manifests'),
    );
  });

  it('uses Library/Caches on macOS', () => {
    expect(resolveCacheDirectory(undefined, { platform: 'darwin', home, env: {} })).toBe(
      path.join(home, 'Library', 'Caches', 'modpack-manifests'),
    );
  });
});

describe('resolveApiKey', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'modpack-manifests-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the key from the environment first', async () => {
    await expect(resolveApiKey(path.join(dir, 'api-key'), { [API_KEY_ENV]: ' test-secret ' })).resolves.toBe(
      'test-secret',
    );
  });

  it('falls back to the key file', async () => {
    const keyFile = path.join(dir, 'api-key');
    fs.writeFileSync(keyFile, 'test-secret\n');

    await expect(resolveApiKey(keyFile, {})).resolves.toBe('test-secret');
  });

  it('fails when neither source has a key', async () => {
    await expect(resolveApiKey(path.join(dir, 'api-key'), {})).rejects.toBeInstanceOf(ConfigError);
  });

  it('fails on an empty key file', async () => {
    const keyFile = path.join(dir, 'api-key');
    fs.writeFileSync(keyFile, '\n');

    await expect(resolveApiKey(keyFile, {})).rejects.toThrow(`API key file ${keyFile} is empty.`);
  });
});

describe('parsePositiveInteger', () => {
  it('returns the fallback when the option is absent', () => {
    expect(parsePositiveInteger(undefined, 8, 'concurrency')).toBe(8);
  });

  it('floors valid numbers', () => {
    expect(parsePositiveInteger('3.7', 8, 'concurrency')).toBe(3);
  });

  it('rejects zero and garbage', () => {
    expect(() => parsePositiveInteger('0', 8, 'concurrency')).toThrow('Option --concurrency must be a positive number.');
    expect(() => parsePositiveInteger('many', 8, 'concurrency')).toThrow(ConfigError);
  });
});
