// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@objmutex/config-service';

export interface BackoffPolicyOptions {
  /**
   * Delay before the second attempt, in milliseconds.
   */
  initialDelayMs?: number;

  /**
   * Upper bound of any delay, in milliseconds.
   */
  maxDelayMs?: number;

  /**
   * Growth factor applied per attempt.
   */
  multiplier?: number;

  /**
   * Fraction of each delay that is randomized away, between 0 (none) and 1 (full jitter).
   */
  jitter?: number;
}

/**
 * Capped exponential backoff with jitter, used between lock acquisition attempts.
 *
 * Object stores commonly limit writes to about one per second per object, so contenders
 * must spread their attempts instead of hammering the lock object in lockstep.
 */
export class BackoffPolicy {
  public readonly initialDelayMs: number;
  public readonly maxDelayMs: number;
  public readonly multiplier: number;
  public readonly jitter: number;

  /**
   * Creates a policy; unset options fall back to the `MUTEX_BACKOFF_*` configuration.
   *
   * @param options - Policy overrides.
   * @throws {RangeError} if the resulting policy is inconsistent.
   */
  constructor(options: BackoffPolicyOptions = {}) {
    this.initialDelayMs = options.initialDelayMs ?? ConfigService.get('MUTEX_BACKOFF_INITIAL_MS');
    this.maxDelayMs = options.maxDelayMs ?? ConfigService.get('MUTEX_BACKOFF_MAX_MS');
    this.multiplier = options.multiplier ?? ConfigService.get('MUTEX_BACKOFF_MULTIPLIER');
    this.jitter = options.jitter ?? ConfigService.get('MUTEX_BACKOFF_JITTER');

    if (!(this.initialDelayMs >= 0)) {
      throw new RangeError(`initialDelayMs must be >= 0, got ${this.initialDelayMs}`);
    }
    if (!(this.maxDelayMs >= this.initialDelayMs)) {
      throw new RangeError(`maxDelayMs must be >= initialDelayMs, got ${this.maxDelayMs}`);
    }
    if (!(this.multiplier >= 1)) {
      throw new RangeError(`multiplier must be >= 1, got ${this.multiplier}`);
    }
    if (!(this.jitter >= 0 && this.jitter <= 1)) {
      throw new RangeError(`jitter must be within [0, 1], got ${this.jitter}`);
    }
  }

  /**
   * Computes the delay to wait after a failed attempt.
   *
   * @param attempt - Zero-based number of the attempt that just failed.
   * @returns Delay in whole milliseconds.
   */
  delayFor(attempt: number): number {
    const base = Math.min(this.maxDelayMs, this.initialDelayMs * Math.pow(this.multiplier, attempt));
    return Math.floor(base * (1 - this.jitter * Math.random()));
  }
}
