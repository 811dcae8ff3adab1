// SPDX-License-Identifier: Apache-2.0

/**
 * Signals, from inside an acquisition transform, that the lock is currently held by a live holder.
 */
export class LockHeldError extends Error {
  public readonly expiresAt: Date;

  constructor(expiresAt: Date) {
    super(`lock is held until ${expiresAt.toISOString()}`);
    this.name = 'LockHeldError';
    this.expiresAt = expiresAt;
    Object.setPrototypeOf(this, LockHeldError.prototype);
  }
}
