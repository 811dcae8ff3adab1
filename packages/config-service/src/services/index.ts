// SPDX-License-Identifier: Apache-2.0

export * from './configService';
export * from './configurationError';
export * from './globalConfig';
export * from './loggerService';
