// SPDX-License-Identifier: Apache-2.0

export * from './lib/clients/redisClientManager';
export * from './lib/clients/s3ClientFactory';
export * from './lib/errors';
export * from './lib/factories/loggerFactory';
export * from './lib/factories/storageProviderFactory';
export * from './lib/services';
export * from './lib/types';
