/**
 * Configuration Manager
 *
 * Settings kept in a JSON file outside the database, such as the database
 * path itself. A missing file means defaults.
 */

import { promises as fs } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import {
  DEFAULT_AUTHOR,
  DEFAULT_INTERVAL_CONFIG,
  DEFAULT_NEUTRAL_AUTHOR,
  InputError,
  LogLevel,
  parseLogLevel,
} from '@chronicle/shared';
import { errnoCode } from '../storage/atomic-file';

export interface AppConfig {
  databasePath?: string;
  defaultAuthor?: string;
  minIntervalSeconds?: number;
  maxIntervalSeconds?: number;
  neutralAuthor?: string;
  /** Timestamp written by sanitize, in any form parseTimestamp accepts */
  neutralTimestamp?: string;
  logLevel?: LogLevel;
}

export type ResolvedConfig = Required<AppConfig>;

export const CONFIG_ENV_VAR = 'CHRONICLE_CONFIG';

export function defaultConfigDir(): string {
  return join(homedir(), '.chronicle');
}

export const DEFAULT_NEUTRAL_TIMESTAMP = '2000-01-01T00:00:00Z';

const STRING_KEYS = ['databasePath', 'defaultAuthor', 'neutralAuthor', 'neutralTimestamp'] as const;
const INTERVAL_KEYS = ['minIntervalSeconds', 'maxIntervalSeconds'] as const;

function invalid(configPath: string, message: string): InputError {
  return new InputError('InvalidArgument', `Invalid config ${configPath}: ${message}`, {
    operation: 'loadConfig',
    component: 'config',
    data: { configPath },
  });
}

/**
 * Check a parsed config file and keep only known keys
 */
export function validateConfig(value: unknown, configPath: string): AppConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw invalid(configPath, 'expected a JSON object');
  }

  const raw = new Map(Object.entries(value));
  const config: AppConfig = {};

  for (const key of STRING_KEYS) {
    const entry = raw.get(key);
    if (entry === undefined) continue;
    if (typeof entry !== 'string' || entry.length === 0) {
      throw invalid(configPath, `${key} must be a non-empty string`);
    }
    config[key] = entry;
  }

  for (const key of INTERVAL_KEYS) {
    const entry = raw.get(key);
    if (entry === undefined) continue;
    if (typeof entry !== 'number' || !Number.isInteger(entry) || entry < 0) {
      throw invalid(configPath, `${key} must be a non-negative integer`);
    }
    config[key] = entry;
  }

  const level = raw.get('logLevel');
  if (level !== undefined) {
    const parsed = typeof level === 'string' ? parseLogLevel(level) : null;
    if (!parsed) {
      throw invalid(configPath, 'logLevel must be one of debug, info, warn, error');
    }
    config.logLevel = parsed;
  }

  return config;
}

export class ConfigManager {
  private readonly configPath: string;
  private config: AppConfig | null = null;

  constructor(configPath?: string) {
    this.configPath = configPath ?? process.env[CONFIG_ENV_VAR] ?? join(defaultConfigDir(), 'config.json');
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from disk
   */
  async load(): Promise<AppConfig> {
    if (this.config) {
      return this.config;
    }

    let data: string;
    try {
      data = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        this.config = {};
        return this.config;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      throw invalid(this.configPath, 'not valid JSON');
    }

    this.config = validateConfig(parsed, this.configPath);
    return this.config;
  }

  /**
   * Save configuration to disk
   */
  async save(config: AppConfig): Promise<void> {
    this.config = config;
    await fs.mkdir(dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  async get<K extends keyof AppConfig>(key: K): Promise<AppConfig[K] | undefined> {
    const config = await this.load();
    return config[key];
  }

  async set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): Promise<void> {
    const config = await this.load();
    config[key] = value;
    await this.save(config);
  }

  /**
   * Loaded values with defaults applied
   */
  async resolve(): Promise<ResolvedConfig> {
    const config = await this.load();
    return {
      databasePath: config.databasePath ?? join(defaultConfigDir(), 'chronicle.db'),
      defaultAuthor: config.defaultAuthor ?? DEFAULT_AUTHOR,
      minIntervalSeconds: config.minIntervalSeconds ?? DEFAULT_INTERVAL_CONFIG.minIntervalSeconds,
      maxIntervalSeconds: config.maxIntervalSeconds ?? DEFAULT_INTERVAL_CONFIG.maxIntervalSeconds,
      neutralAuthor: config.neutralAuthor ?? DEFAULT_NEUTRAL_AUTHOR,
      neutralTimestamp: config.neutralTimestamp ?? DEFAULT_NEUTRAL_TIMESTAMP,
      logLevel: config.logLevel ?? LogLevel.Warn,
    };
  }
}
