/**
 * Unit Tests: Settings resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  ConfigError,
  defaultSettingsPath,
  loadSettings,
  parsePollInterval,
  resolveGlobalOptions,
} from '../../src/config/settings.js';
import { createTempDir, cleanupTempDir, writeFiles } from '../helpers/nas.js';

describe('loadSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(dir);
  });

  it('should return empty settings when the file is missing', () => {
    expect(loadSettings(join(dir, 'settings.json'))).toEqual({});
  });

  it('should read known fields and drop the rest', async () => {
    await writeFiles(dir, {
      'settings.json': JSON.stringify({
        host: ' nas.test ',
        apiKey: 'test-secret',
        pollIntervalMs: 250,
        insecure: 'yes',
        theme: 'dark',
      }),
    });

    expect(loadSettings(join(dir, 'settings.json'))).toEqual({
      host: 'nas.test',
      apiKey: 'test-secret',
      pollIntervalMs: 250,
    });
  });

  it('should reject invalid JSON', async () => {
    await writeFiles(dir, { 'settings.json': '{ host: nas }' });

    expect(() => loadSettings(join(dir, 'settings.json'))).toThrow(ConfigError);
  });

  it('should reject a JSON value that is not an object', async () => {
    const file = join(dir, 'settings.json');
    await writeFiles(dir, { 'settings.json': '["nas.test"]' });

    expect(() => loadSettings(file)).toThrow(`Settings file ${file} must contain a JSON object`);
  });
});

describe('defaultSettingsPath', () => {
  it('should honour NAS_SYNC_SETTINGS', () => {
    expect(defaultSettingsPath({ NAS_SYNC_SETTINGS: '/etc/nas-sync.json' })).toBe('/etc/nas-sync.json');
  });
});

describe('parsePollInterval', () => {
  it('should parse milliseconds', () => {
    expect(parsePollInterval(' 500 ', '--poll-interval')).toBe(500);
  });

  it('should reject anything else', () => {
    expect(() => parsePollInterval('1.5s', '--poll-interval')).toThrow(
      '--poll-interval must be a non-negative integer (milliseconds), got "1.5s"'
    );
  });
});

describe('resolveGlobalOptions', () => {
  it('should require a host', () => {
    expect(() => resolveGlobalOptions({}, {}, {})).toThrow(ConfigError);
  });

  it('should apply defaults', () => {
    expect(resolveGlobalOptions({ host: 'nas.test' }, {}, {})).toEqual({
      host: 'nas.test',
      user: 'admin',
      composeDir: undefined,
      catalogDir: undefined,
      dryRun: false,
      json: false,
      insecure: false,
      pollIntervalMs: 1000,
      verbose: false,
    });
  });

  it('should prefer flags over environment over settings', () => {
    const settings = { host: 'from-settings', user: 'settings-user', pollIntervalMs: 300 };

    expect(resolveGlobalOptions({}, {}, settings)).toMatchObject({
      host: 'from-settings',
      user: 'settings-user',
      pollIntervalMs: 300,
    });
    expect(
      resolveGlobalOptions({}, { NAS_HOST: 'from-env', NAS_USER: 'env-user', NAS_POLL_INTERVAL_MS: '200' }, settings)
    ).toMatchObject({ host: 'from-env', user: 'env-user', pollIntervalMs: 200 });
    expect(
      resolveGlobalOptions(
        { host: 'from-flag', user: 'flag-user', pollInterval: '100' },
        { NAS_HOST: 'from-env', NAS_USER: 'env-user', NAS_POLL_INTERVAL_MS: '200' },
        settings
      )
    ).toMatchObject({ host: 'from-flag', user: 'flag-user', pollIntervalMs: 100 });
  });

  it('should read NAS_INSECURE', () => {
    expect(resolveGlobalOptions({ host: 'nas.test' }, { NAS_INSECURE: 'true' }, {}).insecure).toBe(true);
  });

  it('should pass the definition directories through', () => {
    const options = resolveGlobalOptions(
      { host: 'nas.test', composeDir: './compose', catalogDir: './catalog', dryRun: true },
      {},
      {}
    );

    expect(options).toMatchObject({ composeDir: './compose', catalogDir: './catalog', dryRun: true });
  });
});
