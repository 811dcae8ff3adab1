// SPDX-License-Identifier: Apache-2.0

import type { ConfigKey } from '@objmutex/config-service';

export type EnvOverrides = Partial<Record<ConfigKey, string | undefined>>;

const applyEnvs = (envs: EnvOverrides): Record<string, string | undefined> => {
  const previous: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(envs)) {
    previous[name] = process.env[name];
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
  return previous;
};

const restoreEnvs = (previous: Record<string, string | undefined>): void => {
  for (const [name, value] of Object.entries(previous)) {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
};

/**
 * Overrides environment variables for every test of the enclosing `describe` block.
 *
 * @param envs - Variables to set; `undefined` unsets a variable.
 */
export const overrideEnvsInMochaDescribe = (envs: EnvOverrides): void => {
  let previous: Record<string, string | undefined> = {};

  before(() => {
    previous = applyEnvs(envs);
  });

  after(() => {
    restoreEnvs(previous);
  });
};

/**
 * Declares a nested `describe` block whose tests run with the given environment overrides.
 *
 * @param envs - Variables to set; `undefined` unsets a variable.
 * @param tests - Registers the tests of the block.
 */
export const withOverriddenEnvsInMochaTest = (envs: EnvOverrides, tests: () => void): void => {
  const description = Object.entries(envs)
    .map(([name, value]) => `${name}=${value}`)
    .join(', ');

  describe(`given ${description}`, () => {
    overrideEnvsInMochaDescribe(envs);
    tests();
  });
};

