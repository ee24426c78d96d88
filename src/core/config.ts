/**
 * Centralized Configuration Module
 *
 * Process-wide settings (environment, log level) plus the loaders for
 * connection settings. Connection settings come from the environment or from
 * a dotenv-format settings file; `default.env` is the shipped template.
 */

import * as dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import type { Result } from './result.js';
import { ok, err } from './result.js';
import { ConfigValidationError } from './errors.js';
import {
  SettingsSchema,
  type NuclosSettings,
  type NuclosSettingsInput,
} from '../validation/schemas.js';

// Load environment variables from .env file
dotenv.config();

/**
 * Log levels supported by the application
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Node environments
 */
export type NodeEnv = 'development' | 'production' | 'test';

/**
 * Application configuration
 */
export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly logLevel: LogLevel;
}

/**
 * Environment variable behind each connection setting.
 */
export const SETTINGS_ENV_KEYS = {
  host: 'NUCLOS_HOST',
  port: 'NUCLOS_PORT',
  instance: 'NUCLOS_INSTANCE',
  protocol: 'NUCLOS_PROTOCOL',
  username: 'NUCLOS_USERNAME',
  password: 'NUCLOS_PASSWORD',
  locale: 'NUCLOS_LOCALE',
  timeoutMs: 'NUCLOS_TIMEOUT',
} as const satisfies Record<keyof NuclosSettingsInput, string>;

type SettingsKey = keyof typeof SETTINGS_ENV_KEYS;

const SETTINGS_KEYS: readonly SettingsKey[] = [
  'host',
  'port',
  'instance',
  'protocol',
  'username',
  'password',
  'locale',
  'timeoutMs',
];

/**
 * Settings as they come out of an environment file: every value a string.
 */
export type RawSettings = Partial<Record<SettingsKey, string>>;

/**
 * Parse and validate process-level environment variables
 */
class Config {
  private readonly config: AppConfig;

  constructor() {
    const nodeEnv = this.getNodeEnv();
    this.config = {
      nodeEnv,
      logLevel: this.getLogLevel(nodeEnv),
    };
  }

  private getNodeEnv(): NodeEnv {
    const env = process.env.NODE_ENV?.toLowerCase();
    if (env === 'production' || env === 'test') {
      return env;
    }
    return 'development';
  }

  /**
   * Tests stay quiet unless LOG_LEVEL asks otherwise.
   */
  private getLogLevel(nodeEnv: NodeEnv): LogLevel {
    const level = process.env.LOG_LEVEL?.toLowerCase();
    if (
      level === 'debug' ||
      level === 'info' ||
      level === 'warn' ||
      level === 'error' ||
      level === 'silent'
    ) {
      return level;
    }
    return nodeEnv === 'test' ? 'silent' : 'info';
  }

  public getConfig(): Readonly<AppConfig> {
    return this.config;
  }

  public get nodeEnv(): NodeEnv {
    return this.config.nodeEnv;
  }

  public get logLevel(): LogLevel {
    return this.config.logLevel;
  }

  public get isDevelopment(): boolean {
    return this.config.nodeEnv === 'development';
  }

  public get isProduction(): boolean {
    return this.config.nodeEnv === 'production';
  }

  public get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }
}

const configInstance = new Config();

export const config = configInstance;

export const isDevelopment = configInstance.isDevelopment;
export const isProduction = configInstance.isProduction;
export const isTest = configInstance.isTest;
export const nodeEnv = configInstance.nodeEnv;
export const logLevel = configInstance.logLevel;

// ============================================================================
// Connection Settings
// ============================================================================

/**
 * Validates connection settings and fills in defaults.
 */
export function resolveSettings(
  input: NuclosSettingsInput | RawSettings = {}
): Result<NuclosSettings, ConfigValidationError> {
  const parsed = SettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path[0] !== undefined ? String(issue.path[0]) : undefined;
    return err(
      new ConfigValidationError(
        `Invalid settings: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        field
      )
    );
  }
  return ok(parsed.data);
}

/**
 * Picks the NUCLOS_* keys out of an environment-style record. Empty values
 * count as unset so the defaults apply.
 */
function settingsInputFromRecord(
  source: Record<string, string | undefined>
): RawSettings {
  const input: RawSettings = {};
  for (const key of SETTINGS_KEYS) {
    const value = source[SETTINGS_ENV_KEYS[key]];
    if (value !== undefined && value !== '') {
      input[key] = value;
    }
  }
  return input;
}

/**
 * Reads connection settings from the process environment (and `.env`).
 */
export function loadSettingsFromEnv(
  env: Record<string, string | undefined> = process.env
): Result<NuclosSettings, ConfigValidationError> {
  return resolveSettings(settingsInputFromRecord(env));
}

/**
 * Reads connection settings from a dotenv-format file.
 */
export function loadSettingsFile(
  filename: string
): Result<NuclosSettings, ConfigValidationError> {
  let content: string;
  try {
    content = readFileSync(filename, 'utf-8');
  } catch (error) {
    return err(
      new ConfigValidationError(`Cannot read settings file ${filename}`, undefined, {
        filename,
        cause: error instanceof Error ? error.message : String(error),
      })
    );
  }
  return resolveSettings(settingsInputFromRecord(dotenv.parse(content)));
}
