// SPDX-License-Identifier: Apache-2.0

import { ConfigurationError } from './configurationError';

export type StorageProviderKind = 'memory' | 'redis' | 's3';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Value type of every supported configuration key.
 */
export interface ConfigShape {
  LOG_LEVEL: LogLevel;
  PRETTY_LOGS_ENABLED: boolean;
  STORAGE_PROVIDER: StorageProviderKind;
  REDIS_URL: string;
  REDIS_RECONNECT_DELAY_MS: number;
  REDIS_KEY_PREFIX: string;
  S3_ENDPOINT_URL: string | undefined;
  S3_REGION: string;
  S3_ACCESS_KEY_ID: string | undefined;
  S3_SECRET_ACCESS_KEY: string | undefined;
  S3_FORCE_PATH_STYLE: boolean;
  MUTEX_BACKOFF_INITIAL_MS: number;
  MUTEX_BACKOFF_MAX_MS: number;
  MUTEX_BACKOFF_MULTIPLIER: number;
  MUTEX_BACKOFF_JITTER: number;
}

export type ConfigKey = keyof ConfigShape;

export type ConfigEntryType = 'string' | 'number' | 'boolean';

export interface ConfigEntry<T> {
  envName: string;
  type: ConfigEntryType;
  required: boolean;
  defaultValue: T;
  parse: (raw: string) => T;
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
const STORAGE_PROVIDERS: readonly StorageProviderKind[] = ['memory', 'redis', 's3'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isStorageProviderKind(value: string): value is StorageProviderKind {
  return (STORAGE_PROVIDERS as readonly string[]).includes(value);
}

const parseString = (raw: string): string => raw;

const parseOptionalString = (raw: string): string | undefined => (raw === '' ? undefined : raw);

function numberParser(envName: string): (raw: string) => number {
  return (raw) => {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new ConfigurationError(envName, `expected a number but got "${raw}"`);
    }
    return value;
  };
}

function booleanParser(envName: string): (raw: string) => boolean {
  return (raw) => {
    switch (raw.trim().toLowerCase()) {
      case 'true':
        return true;
      case 'false':
        return false;
      default:
        throw new ConfigurationError(envName, `expected "true" or "false" but got "${raw}"`);
    }
  };
}

export class GlobalConfig {
  public static readonly ENTRIES: { readonly [K in ConfigKey]: ConfigEntry<ConfigShape[K]> } = {
    LOG_LEVEL: {
      envName: 'LOG_LEVEL',
      type: 'string',
      required: false,
      defaultValue: 'info',
      parse: (raw) => {
        const level = raw.trim().toLowerCase();
        if (!isLogLevel(level)) {
          throw new ConfigurationError('LOG_LEVEL', `expected one of ${LOG_LEVELS.join(', ')} but got "${raw}"`);
        }
        return level;
      },
    },
    PRETTY_LOGS_ENABLED: {
      envName: 'PRETTY_LOGS_ENABLED',
      type: 'boolean',
      required: false,
      defaultValue: false,
      parse: booleanParser('PRETTY_LOGS_ENABLED'),
    },
    STORAGE_PROVIDER: {
      envName: 'STORAGE_PROVIDER',
      type: 'string',
      required: false,
      defaultValue: 'memory',
      parse: (raw) => {
        const kind = raw.trim().toLowerCase();
        if (!isStorageProviderKind(kind)) {
          throw new ConfigurationError(
            'STORAGE_PROVIDER',
            `expected one of ${STORAGE_PROVIDERS.join(', ')} but got "${raw}"`,
          );
        }
        return kind;
      },
    },
    REDIS_URL: {
      envName: 'REDIS_URL',
      type: 'string',
      required: false,
      defaultValue: 'redis://127.0.0.1:6379',
      parse: parseString,
    },
    REDIS_RECONNECT_DELAY_MS: {
      envName: 'REDIS_RECONNECT_DELAY_MS',
      type: 'number',
      required: false,
      defaultValue: 1000,
      parse: numberParser('REDIS_RECONNECT_DELAY_MS'),
    },
    REDIS_KEY_PREFIX: {
      envName: 'REDIS_KEY_PREFIX',
      type: 'string',
      required: false,
      defaultValue: 'objmutex:',
      parse: parseString,
    },
    S3_ENDPOINT_URL: {
      envName: 'S3_ENDPOINT_URL',
      type: 'string',
      required: false,
      defaultValue: undefined,
      parse: parseOptionalString,
    },
    S3_REGION: {
      envName: 'S3_REGION',
      type: 'string',
      required: false,
      defaultValue: 'us-east-1',
      parse: parseString,
    },
    S3_ACCESS_KEY_ID: {
      envName: 'S3_ACCESS_KEY_ID',
      type: 'string',
      required: false,
      defaultValue: undefined,
      parse: parseOptionalString,
    },
    S3_SECRET_ACCESS_KEY: {
      envName: 'S3_SECRET_ACCESS_KEY',
      type: 'string',
      required: false,
      defaultValue: undefined,
      parse: parseOptionalString,
    },
    S3_FORCE_PATH_STYLE: {
      envName: 'S3_FORCE_PATH_STYLE',
      type: 'boolean',
      required: false,
      defaultValue: true,
      parse: booleanParser('S3_FORCE_PATH_STYLE'),
    },
    MUTEX_BACKOFF_INITIAL_MS: {
      envName: 'MUTEX_BACKOFF_INITIAL_MS',
      type: 'number',
      required: false,
      defaultValue: 200,
      parse: numberParser('MUTEX_BACKOFF_INITIAL_MS'),
    },
    MUTEX_BACKOFF_MAX_MS: {
      envName: 'MUTEX_BACKOFF_MAX_MS',
      type: 'number',
      required: false,
      defaultValue: 5000,
      parse: numberParser('MUTEX_BACKOFF_MAX_MS'),
    },
    MUTEX_BACKOFF_MULTIPLIER: {
      envName: 'MUTEX_BACKOFF_MULTIPLIER',
      type: 'number',
      required: false,
      defaultValue: 2,
      parse: numberParser('MUTEX_BACKOFF_MULTIPLIER'),
    },
    MUTEX_BACKOFF_JITTER: {
      envName: 'MUTEX_BACKOFF_JITTER',
      type: 'number',
      required: false,
      defaultValue: 0.3,
      parse: numberParser('MUTEX_BACKOFF_JITTER'),
    },
  };

  /**
   * Narrows an arbitrary environment variable name to a known configuration key.
   *
   * @param name - The environment variable name.
   */
  static isConfigKey(name: string): name is ConfigKey {
    return Object.prototype.hasOwnProperty.call(this.ENTRIES, name);
  }
}
