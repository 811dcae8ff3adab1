// SPDX-License-Identifier: Apache-2.0

/**
 * Persisted state of a lock, stored as the whole content of the lock object.
 */
export interface LockRecord {
  /**
   * Identity of the current holder; absent when the lock is not held.
   */
  holder?: string;

  /**
   * Instant after which the lock is considered abandoned; absent when the lock is not held.
   */
  expiresAt?: Date;

  /**
   * Fencing counter. Incremented once per successful acquisition and never reset.
   */
  fence: number;
}

/**
 * Outcome of a single non-blocking acquisition attempt.
 */
export type LockAttempt = { acquired: true; fencingToken: number } | { acquired: false };
