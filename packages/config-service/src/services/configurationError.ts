// SPDX-License-Identifier: Apache-2.0

/**
 * Raised when an environment variable is missing or cannot be parsed into its declared type.
 */
export class ConfigurationError extends Error {
  public readonly envName: string;

  constructor(envName: string, reason: string) {
    super(`Invalid configuration for ${envName}: ${reason}`);
    this.name = 'ConfigurationError';
    this.envName = envName;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
