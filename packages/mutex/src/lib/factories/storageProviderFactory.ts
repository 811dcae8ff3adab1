// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@objmutex/config-service';
import type { Logger } from 'pino';

import { RedisClientManager } from '../clients/redisClientManager';
import { S3ClientFactory } from '../clients/s3ClientFactory';
import { InMemoryStorageProvider } from '../services/storageProvider/InMemoryStorageProvider';
import { RedisStorageProvider } from '../services/storageProvider/RedisStorageProvider';
import { S3StorageProvider } from '../services/storageProvider/S3StorageProvider';
import type { StorageProvider } from '../types';

/**
 * Factory for creating StorageProvider instances.
 *
 * Selects the backend from `STORAGE_PROVIDER` and builds its client from the
 * matching configuration keys.
 */
export class StorageProviderFactory {
  /**
   * Creates the configured storage provider.
   *
   * @param logger - Logger passed to the provider.
   * @returns The provider; for `redis` the shared client is connected first.
   */
  static async create(logger: Logger): Promise<StorageProvider> {
    const kind = ConfigService.get('STORAGE_PROVIDER');

    switch (kind) {
      case 'redis': {
        const redisClient = await RedisClientManager.getClient(logger);
        return new RedisStorageProvider(redisClient, logger);
      }
      case 's3':
        return new S3StorageProvider(S3ClientFactory.create(), logger);
      case 'memory':
        return new InMemoryStorageProvider(logger);
    }
  }
}
