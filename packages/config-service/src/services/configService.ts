// SPDX-License-Identifier: Apache-2.0

import * as dotenv from 'dotenv';
import findConfig from 'find-config';
import pino, { type Logger } from 'pino';

import { ConfigurationError } from './configurationError';
import { type ConfigKey, type ConfigShape, GlobalConfig } from './globalConfig';
import { LoggerService } from './loggerService';

/**
 * Typed access to the environment configuration.
 *
 * The nearest `.env` file is loaded once on first use; values are then read from
 * `process.env` on every call so overrides made at runtime (e.g. in tests) take effect.
 */
export class ConfigService {
  /**
   * The singleton instance, created lazily.
   */
  private static instance: ConfigService | undefined;

  /**
   * Logger used to report the loaded configuration.
   */
  private readonly logger: Logger;

  private constructor() {
    const envFilePath = findConfig('.env');
    if (envFilePath) {
      dotenv.config({ path: envFilePath });
    }

    this.logger = pino({ name: 'config-service', level: this.resolve('LOG_LEVEL') });
    if (this.logger.isLevelEnabled('debug')) {
      for (const key of Object.keys(GlobalConfig.ENTRIES)) {
        this.logger.debug(LoggerService.maskUpEnv(key, process.env[key]));
      }
    }
  }

  private static getInstance(): ConfigService {
    if (!this.instance) {
      this.instance = new ConfigService();
    }
    return this.instance;
  }

  /**
   * Returns the typed value of a configuration key, falling back to its default.
   *
   * @param name - The configuration key.
   * @throws {ConfigurationError} if the key is required and unset, or its value is malformed.
   */
  public static get<K extends ConfigKey>(name: K): ConfigShape[K] {
    return this.getInstance().resolve(name);
  }

  private resolve<K extends ConfigKey>(name: K): ConfigShape[K] {
    const entry = GlobalConfig.ENTRIES[name];
    const raw = process.env[entry.envName];

    if (raw === undefined || raw === '') {
      if (entry.required) {
        throw new ConfigurationError(entry.envName, 'value is required');
      }
      return entry.defaultValue;
    }

    return entry.parse(raw);
  }
}
