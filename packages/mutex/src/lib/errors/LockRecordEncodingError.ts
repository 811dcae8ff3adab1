// SPDX-License-Identifier: Apache-2.0

/**
 * Raised when the content of a lock object cannot be understood.
 */
export class LockRecordEncodingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Malformed lock record: ${message}`, options);
    this.name = 'LockRecordEncodingError';
    Object.setPrototypeOf(this, LockRecordEncodingError.prototype);
  }
}
