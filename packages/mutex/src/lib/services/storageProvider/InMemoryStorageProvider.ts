// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { ConflictError } from '../../errors/ConflictError';
import type { ObjectLocation, StorageProvider, UpdateObjectFn } from '../../types';

/**
 * A stored object and its generation.
 */
export interface StoredObject {
  data: Buffer;
  versionTag: string;
}

/**
 * Process-local object store with generation-based conditional writes.
 *
 * Suitable for coordinating tasks within a single process. The read and the
 * conditional commit of an update are separated by an event-loop turn, so
 * concurrent updates interleave the way they would against a remote store and
 * the losers get a {@link ConflictError}.
 */
export class InMemoryStorageProvider implements StorageProvider {
  public readonly name = 'memory';

  private readonly objects = new Map<string, { data: Buffer; generation: number }>();

  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ name: 'memory-storage-provider' });
  }

  private keyFor(location: ObjectLocation): string {
    return `${location.bucket}/${location.key}`;
  }

  async atomicUpdate(location: ObjectLocation, transform: UpdateObjectFn): Promise<string> {
    const objectKey = this.keyFor(location);
    const current = this.objects.get(objectKey);
    const readGeneration = current?.generation ?? 0;

    const newData = current
      ? transform(String(current.generation), Buffer.from(current.data))
      : transform(undefined, Buffer.alloc(0));

    // Yield so that concurrent updates observe the same revision and race for the commit.
    await new Promise<void>((resolve) => setImmediate(resolve));

    const latestGeneration = this.objects.get(objectKey)?.generation ?? 0;
    if (latestGeneration !== readGeneration) {
      if (this.logger.isLevelEnabled('trace')) {
        this.logger.trace(`Conflict on ${objectKey}: read generation ${readGeneration}, found ${latestGeneration}`);
      }
      throw new ConflictError();
    }

    const generation = readGeneration + 1;
    this.objects.set(objectKey, { data: Buffer.from(newData), generation });

    return String(generation);
  }

  /**
   * Returns a copy of the stored object, or undefined if it does not exist.
   *
   * @param location - The object to inspect.
   */
  snapshot(location: ObjectLocation): StoredObject | undefined {
    const current = this.objects.get(this.keyFor(location));
    if (!current) {
      return undefined;
    }
    return { data: Buffer.from(current.data), versionTag: String(current.generation) };
  }
}
