import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_BASE_URL } from '../apiClient';
import { ConfigError, ConfigStore, isConfigKey } from '../config';
import type { Env } from '../env';

describe('ConfigStore', () => {
  let home: string;
  let environment: Env;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'termjudge-config-'));
    environment = { TERMJUDGE_HOME: home, TERMJUDGE_LOG_LEVEL: 'silent' };
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  function readFile(): unknown {
    return JSON.parse(fs.readFileSync(path.join(home, 'config.json'), 'utf-8'));
  }

  it('uses defaults when there is no config file', () => {
    const store = new ConfigStore(environment);

    expect(store.configFile).toBe(path.join(home, 'config.json'));
    expect(store.getToken()).toBeUndefined();
    expect(store.apiBaseUrl).toBe(DEFAULT_BASE_URL);
    expect(store.get('pollIntervalMs')).toBe(2000);
    expect(store.get('maxTotalPolls')).toBeUndefined();
    expect(fs.existsSync(store.configFile)).toBe(false);
  });

  it('persists the token', () => {
    new ConfigStore(environment).setToken('test-token');

    expect(new ConfigStore(environment).getToken()).toBe('test-token');
    expect(readFile()).toMatchObject({ token: 'test-token' });
  });

  it('forgets the token on logout', () => {
    const store = new ConfigStore(environment);
    store.setToken('test-token');
    store.setToken(undefined);

    expect(new ConfigStore(environment).getToken()).toBeUndefined();
  });

  it('prefers the token and API URL from the environment', () => {
    new ConfigStore(environment).setToken('stored-token');

    const store = new ConfigStore({
      ...environment,
      TERMJUDGE_TOKEN: 'env-token',
      TERMJUDGE_API_URL: 'https://judge.test/api/v1'
    });

    expect(store.getToken()).toBe('env-token');
    expect(store.apiBaseUrl).toBe('https://judge.test/api/v1');
  });

  it('sets numeric options from their text form', () => {
    const store = new ConfigStore(environment);
    store.set('maxIntervalMs', '8000');
    store.set('backoffMultiplier', '1.5');

    const reloaded = new ConfigStore(environment);
    expect(reloaded.get('maxIntervalMs')).toBe(8000);
    expect(reloaded.get('backoffMultiplier')).toBe(1.5);
  });

  it('rejects invalid values without saving them', () => {
    const store = new ConfigStore(environment);

    expect(() => store.set('pollIntervalMs', 'soon')).toThrow(ConfigError);
    expect(() => store.set('backoffMultiplier', '0.5')).toThrow(ConfigError);
    expect(() => store.set('apiBaseUrl', 'not a url')).toThrow(ConfigError);
    expect(store.get('pollIntervalMs')).toBe(2000);
    expect(fs.existsSync(store.configFile)).toBe(false);
  });

  it('resets settings but keeps the token', () => {
    const store = new ConfigStore(environment);
    store.setToken('test-token');
    store.set('pollIntervalMs', '500');
    store.reset();

    expect(store.get('pollIntervalMs')).toBe(2000);
    expect(store.getToken()).toBe('test-token');
  });

  it('maps settings to watch options', () => {
    const store = new ConfigStore(environment);
    store.set('maxTotalPolls', '30');

    expect(store.watchDefaults()).toEqual({
      initialIntervalMs: 2000,
      maxIntervalMs: 5000,
      backoffMultiplier: 1,
      maxConsecutiveErrors: 5,
      maxTotalPolls: 30
    });
  });

  it('lists every option except the token', () => {
    const store = new ConfigStore(environment);
    store.setToken('test-token');

    expect(store.entries().map(([key]) => key)).toEqual([
      'apiBaseUrl',
      'pollIntervalMs',
      'maxIntervalMs',
      'backoffMultiplier',
      'maxConsecutiveErrors',
      'maxTotalPolls'
    ]);
  });

  it('reports a config file that is not JSON', () => {
    fs.writeFileSync(path.join(home, 'config.json'), '{ token: ');
    expect(() => new ConfigStore(environment)).toThrow(ConfigError);
  });

  it('reports unknown keys in the config file', () => {
    fs.writeFileSync(path.join(home, 'config.json'), JSON.stringify({ colour: 'always' }));
    expect(() => new ConfigStore(environment)).toThrow(/Invalid .*config\.json/);
  });
});

describe('isConfigKey', () => {
  it('accepts settings and rejects the token', () => {
    expect(isConfigKey('pollIntervalMs')).toBe(true);
    expect(isConfigKey('token')).toBe(false);
    expect(isConfigKey('toString')).toBe(false);
  });
});
