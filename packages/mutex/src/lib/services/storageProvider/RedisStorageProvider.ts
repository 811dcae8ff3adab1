// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@objmutex/config-service';
import { randomUUID } from 'crypto';
import type { Logger } from 'pino';

import type { RedisClient } from '../../clients/redisClientManager';
import { ConflictError } from '../../errors/ConflictError';
import { StorageProviderError } from '../../errors/StorageProviderError';
import type { ObjectLocation, StorageProvider, UpdateObjectFn } from '../../types';

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return undefined;
}

/**
 * Redis-backed object store using a Lua compare-and-set for conditional writes.
 *
 * @remarks
 * - Object keys: `{prefix}{bucket}/{key}` hold a hash with fields `data` and `version`
 * - `version` is a random UUID replaced on every write and serves as the version tag
 */
export class RedisStorageProvider implements StorageProvider {
  public readonly name = 'redis';

  /**
   * Lua script for an atomic compare-and-set of an object hash.
   *
   * - `KEYS[1]`: The object key.
   * - `ARGV[1]`: The version read by the caller, or an empty string if the object was absent.
   * - `ARGV[2]`: The new content.
   * - `ARGV[3]`: The new version.
   *
   * Returns 1 if the object was written, 0 if its version changed since the read.
   *
   * @private
   */
  private static readonly CAS_SCRIPT = `
    local current = redis.call('HGET', KEYS[1], 'version')
    if (current == false and ARGV[1] == '') or current == ARGV[1] then
      redis.call('HSET', KEYS[1], 'data', ARGV[2], 'version', ARGV[3])
      return 1
    end
    return 0
  `;

  private readonly logger: Logger;
  private readonly keyPrefix: string;

  /**
   * Creates a Redis-backed object store.
   *
   * @param redisClient - A connected Redis client instance.
   * @param logger - Logger instance for logging.
   */
  constructor(
    private readonly redisClient: RedisClient,
    logger: Logger,
  ) {
    this.logger = logger.child({ name: 'redis-storage-provider' });
    this.keyPrefix = ConfigService.get('REDIS_KEY_PREFIX');
  }

  private keyFor(location: ObjectLocation): string {
    return `${this.keyPrefix}${location.bucket}/${location.key}`;
  }

  async atomicUpdate(location: ObjectLocation, transform: UpdateObjectFn): Promise<string> {
    const key = this.keyFor(location);

    let currentVersionTag: string | undefined;
    let currentData: Buffer;
    try {
      const entry = await this.redisClient.hGetAll(key);
      currentVersionTag = toText(entry.version);
      currentData = Buffer.from(toText(entry.data) ?? '', 'utf8');
    } catch (error) {
      this.logger.error(error, `Failed to read object ${key}`);
      throw new StorageProviderError(this.name, 'read', error);
    }

    const newData = transform(currentVersionTag, currentData);
    const newVersionTag = randomUUID();

    let result: unknown;
    try {
      result = await this.redisClient.eval(RedisStorageProvider.CAS_SCRIPT, {
        keys: [key],
        arguments: [currentVersionTag ?? '', newData.toString('utf8'), newVersionTag],
      });
    } catch (error) {
      this.logger.error(error, `Failed to write object ${key}`);
      throw new StorageProviderError(this.name, 'write', error);
    }

    if (result !== 1) {
      if (this.logger.isLevelEnabled('trace')) {
        this.logger.trace(`Conflict on ${key}: version ${currentVersionTag ?? '<absent>'} was replaced`);
      }
      throw new ConflictError();
    }

    return newVersionTag;
  }
}
