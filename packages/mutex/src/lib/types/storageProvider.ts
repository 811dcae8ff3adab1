// SPDX-License-Identifier: Apache-2.0

/**
 * Identifies a single object in a storage backend.
 */
export interface ObjectLocation {
  /**
   * Bucket (or container) holding the object.
   */
  bucket: string;

  /**
   * Key of the object within the bucket.
   */
  key: string;
}

/**
 * Computes the new content of an object from its current state.
 *
 * @param currentVersionTag - Version tag of the object as read, or undefined if the object does not exist.
 * @param currentData - Current content of the object; empty if the object does not exist.
 * @returns The content to write back.
 */
export type UpdateObjectFn = (currentVersionTag: string | undefined, currentData: Buffer) => Buffer;

/**
 * Contract every storage backend implements for the lock protocol.
 *
 * @remarks
 * This is the only point of serialization between contenders. Implementations must
 * condition the write on the version tag observed by the read (or on the object's
 * absence) so that two writers can never both succeed against the same revision.
 */
export interface StorageProvider {
  /**
   * Short label of the backend, used for logs and metrics.
   */
  readonly name: string;

  /**
   * Reads an object, transforms it and writes it back if nobody else updated it in between.
   *
   * The transform is invoked exactly once per call. Errors it throws propagate unchanged
   * and nothing is written.
   *
   * @param location - The object to update.
   * @param transform - Produces the new content from the current one.
   * @returns The version tag of the written revision.
   * @throws {ConflictError} if another writer updated the object after it was read.
   * @throws {StorageProviderError} on any other storage failure.
   */
  atomicUpdate(location: ObjectLocation, transform: UpdateObjectFn): Promise<string>;
}
