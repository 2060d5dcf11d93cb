import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_BASE_URL } from './apiClient';
import env, { type Env } from './env';
import { moduleLogger } from './logger';
import type { PollSchedulerOptions } from './pollScheduler';
import type { TokenProvider } from './types';

const log = moduleLogger('config');

export const ConfigFileSchema = z
  .object({
    token: z.string().min(1).optional(),
    apiBaseUrl: z.string().url().default(DEFAULT_BASE_URL),
    pollIntervalMs: z.number().int().positive().default(2000),
    maxIntervalMs: z.number().int().positive().default(5000),
    backoffMultiplier: z.number().min(1).default(1.0),
    maxConsecutiveErrors: z.number().int().positive().default(5),
    maxTotalPolls: z.number().int().positive().optional()
  })
  .strict();

export type ConfigFile = z.output<typeof ConfigFileSchema>;

export type ConfigKey = Exclude<keyof ConfigFile, 'token'>;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'apiBaseUrl',
  'pollIntervalMs',
  'maxIntervalMs',
  'backoffMultiplier',
  'maxConsecutiveErrors',
  'maxTotalPolls'
];

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

/**
 * Persistent settings and the stored access token, kept in
 * `<home>/config.json`. Environment variables take precedence over the file
 * for the API URL and the token.
 */
export class ConfigStore implements TokenProvider {
  readonly configDir: string;
  readonly configFile: string;
  private data: ConfigFile;
  private readonly env: Env;

  constructor(environment: Env = env) {
    this.env = environment;
    this.configDir = environment.TERMJUDGE_HOME;
    this.configFile = path.join(this.configDir, 'config.json');
    this.data = this.load();
  }

  private load(): ConfigFile {
    let raw: string;
    try {
      raw = fs.readFileSync(this.configFile, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        log.debug(`No config file at ${this.configFile}, using defaults`);
        return ConfigFileSchema.parse({});
      }
      throw new ConfigError(`Cannot read ${this.configFile}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`${this.configFile} is not valid JSON`, { cause: error });
    }

    const result = ConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigError(`Invalid ${this.configFile}: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  private save(): void {
    fs.mkdirSync(this.configDir, { recursive: true });
    fs.writeFileSync(this.configFile, `${JSON.stringify(this.data, null, 2)}\n`, {
      mode: 0o600
    });
    log.debug(`Saved ${this.configFile}`);
  }

  getToken(): string | undefined {
    return this.env.TERMJUDGE_TOKEN ?? this.data.token;
  }

  setToken(token: string | undefined): void {
    this.data = { ...this.data, token };
    this.save();
  }

  get apiBaseUrl(): string {
    return this.env.TERMJUDGE_API_URL ?? this.data.apiBaseUrl;
  }

  get(key: ConfigKey): ConfigFile[ConfigKey] {
    return this.data[key];
  }

  /**
   * Set a setting from its command-line text form
   */
  set(key: ConfigKey, value: string): void {
    const parsedValue: unknown = key === 'apiBaseUrl' ? value : Number(value);
    const result = ConfigFileSchema.safeParse({ ...this.data, [key]: parsedValue });
    if (!result.success) {
      throw new ConfigError(`Invalid value for ${key}: ${formatIssues(result.error)}`);
    }
    this.data = result.data;
    this.save();
  }

  /**
   * Restore defaults, keeping the stored token
   */
  reset(): void {
    this.data = ConfigFileSchema.parse({ token: this.data.token });
    this.save();
  }

  entries(): Array<[ConfigKey, ConfigFile[ConfigKey]]> {
    return CONFIG_KEYS.map((key): [ConfigKey, ConfigFile[ConfigKey]] => [key, this.data[key]]);
  }

  /**
   * Poll settings for a watch, before command-line overrides
   */
  watchDefaults(): PollSchedulerOptions {
    return {
      initialIntervalMs: this.data.pollIntervalMs,
      maxIntervalMs: this.data.maxIntervalMs,
      backoffMultiplier: this.data.backoffMultiplier,
      maxConsecutiveErrors: this.data.maxConsecutiveErrors,
      maxTotalPolls: this.data.maxTotalPolls
    };
  }
}
