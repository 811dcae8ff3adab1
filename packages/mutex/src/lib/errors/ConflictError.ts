// SPDX-License-Identifier: Apache-2.0

/**
 * Raised when a conditional write loses the race against another writer.
 *
 * @remarks
 * Expected whenever several contenders race for the same lock object; the mutex
 * never surfaces it to callers.
 */
export class ConflictError extends Error {
  constructor(message: string = 'write conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}
