// SPDX-License-Identifier: Apache-2.0

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { setTimeout as delay } from 'timers/promises';

import { ConflictError } from '../../errors/ConflictError';
import { LockAcquisitionAbortedError } from '../../errors/LockAcquisitionAbortedError';
import { LockHeldError } from '../../errors/LockHeldError';
import type { LockAttempt, ObjectLocation, StorageProvider } from '../../types';
import { BackoffPolicy, type BackoffPolicyOptions } from './BackoffPolicy';
import type { LockMetricsService } from './LockMetricsService';
import { decodeLockRecord, EMPTY_LOCK_RECORD, encodeLockRecord, isLockHeld } from './LockRecord';

/**
 * Largest epoch millisecond value a Date can represent.
 */
const MAX_TIMESTAMP_MS = 8.64e15;

export interface MutexOptions {
  /**
   * Backoff between blocking acquisition attempts. Unset fields come from configuration.
   */
  backoff?: BackoffPolicyOptions;

  /**
   * Metrics sink; no metrics are recorded when omitted.
   */
  metrics?: LockMetricsService;
}

/**
 * Signals, from inside the seeding transform, that the lock object already exists.
 */
class LockObjectExistsError extends Error {}

/**
 * A distributed mutex stored as a single object in an object store.
 *
 * Contenders serialize through the provider's conditional write: every acquisition and
 * release is one read-modify-write of the lock object, conditioned on the revision read.
 * Leases expire in-band, so a crashed holder's lock is taken over by the next contender
 * once its expiry passes. Every acquisition is issued a fencing token that downstream
 * systems can use to reject writes from a holder that has since lost the lock.
 *
 * @remarks
 * A handle represents one holder identity and must not be used by concurrent callers.
 */
export class Mutex {
  /**
   * Random identity of this handle, written as the holder of the lock object.
   */
  public readonly id: string = randomUUID();

  private readonly logger: Logger;
  private readonly backoff: BackoffPolicy;
  private readonly metrics?: LockMetricsService;

  /**
   * Version tag of the lock object as written by our last acquisition.
   * Undefined when this handle does not hold the lock.
   */
  private versionTag: string | undefined;

  /**
   * Local timestamp of our last acquisition, for hold-time metrics.
   */
  private acquiredAt: number | undefined;

  /**
   * Creates a mutex bound to a lock object.
   *
   * @param provider - Storage backend holding the lock object.
   * @param location - Bucket and key of the lock object.
   * @param logger - Parent logger.
   * @param options - Backoff and metrics settings.
   */
  constructor(
    private readonly provider: StorageProvider,
    private readonly location: ObjectLocation,
    logger: Logger,
    options: MutexOptions = {},
  ) {
    this.logger = logger.child({ name: 'mutex', bucket: location.bucket, key: location.key });
    this.backoff = new BackoffPolicy(options.backoff);
    this.metrics = options.metrics;
  }

  /**
   * Creates the lock object with an empty record if it does not exist yet.
   *
   * Leaves an existing lock object untouched. Applications that provision lock objects
   * ahead of time call this once per key; acquisition itself also works on an absent object.
   *
   * @param provider - Storage backend.
   * @param location - Bucket and key of the lock object.
   */
  static async seed(provider: StorageProvider, location: ObjectLocation): Promise<void> {
    try {
      await provider.atomicUpdate(location, (_versionTag, currentData) => {
        if (currentData.length > 0) {
          throw new LockObjectExistsError();
        }
        return encodeLockRecord(EMPTY_LOCK_RECORD);
      });
    } catch (error) {
      // Either it already existed or a concurrent writer created it first.
      if (error instanceof LockObjectExistsError || error instanceof ConflictError) {
        return;
      }
      throw error;
    }
  }

  /**
   * Whether this handle believes it holds the lock, i.e. it acquired and has not released it.
   * The lease may have expired since.
   */
  get isHolding(): boolean {
    return this.versionTag !== undefined;
  }

  /**
   * Attempts to acquire the lock once, without waiting.
   *
   * @param leaseMs - How long the lock may be held before others may take it over.
   * @returns `{ acquired: true, fencingToken }` on success, `{ acquired: false }` if the lock is held
   *          by someone else or another contender won the race.
   * @throws {RangeError} if leaseMs is not a positive finite number or the expiry would not be a valid date.
   * @throws {StorageProviderError} on storage failure.
   * @throws {LockRecordEncodingError} if the lock object holds unreadable content.
   */
  async tryLock(leaseMs: number): Promise<LockAttempt> {
    if (!Number.isFinite(leaseMs) || leaseMs <= 0) {
      throw new RangeError(`leaseMs must be a positive number, got ${leaseMs}`);
    }
    if (Date.now() + leaseMs > MAX_TIMESTAMP_MS) {
      throw new RangeError(`leaseMs ${leaseMs} puts the expiry beyond the representable date range`);
    }

    let fencingToken = 0;
    let versionTag: string;
    try {
      versionTag = await this.provider.atomicUpdate(this.location, (_currentVersionTag, currentData) => {
        const record = decodeLockRecord(currentData);
        const now = Date.now();

        if (isLockHeld(record, now) && record.expiresAt) {
          throw new LockHeldError(record.expiresAt);
        }

        fencingToken = record.fence + 1;
        return encodeLockRecord({
          holder: this.id,
          expiresAt: new Date(now + leaseMs),
          fence: fencingToken,
        });
      });
    } catch (error) {
      if (error instanceof LockHeldError || error instanceof ConflictError) {
        this.metrics?.recordAcquisition(this.provider.name, 'contended');
        if (this.logger.isLevelEnabled('trace')) {
          this.logger.trace(`Lock not acquired: ${error.message}`);
        }
        return { acquired: false };
      }

      this.metrics?.recordAcquisition(this.provider.name, 'fail');
      throw error;
    }

    if (this.versionTag === undefined) {
      this.metrics?.incrementActiveCount(this.provider.name);
    }
    this.versionTag = versionTag;
    this.acquiredAt = Date.now();
    this.metrics?.recordAcquisition(this.provider.name, 'success');

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`Lock acquired: holder=${this.id}, fencingToken=${fencingToken}, lease=${leaseMs}ms`);
    }

    return { acquired: true, fencingToken };
  }

  /**
   * Acquires the lock, waiting as long as it takes unless the signal aborts.
   *
   * Attempts are spaced by the backoff policy. Only contention is retried; any other
   * failure ends the wait immediately.
   *
   * @param leaseMs - How long the lock may be held before others may take it over.
   * @param signal - Cancels the wait, e.g. `AbortSignal.timeout(30_000)` for a deadline.
   * @returns The fencing token of this acquisition.
   * @throws {LockAcquisitionAbortedError} if the signal aborts before the lock is acquired.
   * @throws {StorageProviderError} on storage failure.
   * @throws {LockRecordEncodingError} if the lock object holds unreadable content.
   */
  async lock(leaseMs: number, signal?: AbortSignal): Promise<number> {
    const startTime = Date.now();

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new LockAcquisitionAbortedError(signal.reason);
      }

      const result = await this.tryLock(leaseMs);
      if (result.acquired) {
        this.metrics?.recordWaitTime(this.provider.name, (Date.now() - startTime) / 1000);
        return result.fencingToken;
      }

      const delayMs = this.backoff.delayFor(attempt);
      if (this.logger.isLevelEnabled('trace')) {
        this.logger.trace(`Lock contended, retrying in ${delayMs}ms (attempt ${attempt + 1})`);
      }

      try {
        await delay(delayMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) {
          throw new LockAcquisitionAbortedError(signal.reason);
        }
        throw error;
      }
    }
  }

  /**
   * Releases the lock if this handle still holds it.
   *
   * Does nothing if the handle holds nothing. If the lock object changed since our
   * acquisition (the lease expired and someone else took over) the release is a no-op
   * and the new holder's record is left as is.
   *
   * @throws {StorageProviderError} on storage failure; the handle keeps its claim and may retry.
   * @throws {LockRecordEncodingError} if the lock object holds unreadable content.
   */
  async unlock(): Promise<void> {
    const heldVersionTag = this.versionTag;
    if (heldVersionTag === undefined) {
      return;
    }

    try {
      await this.provider.atomicUpdate(this.location, (currentVersionTag, currentData) => {
        if (currentVersionTag !== heldVersionTag) {
          throw new ConflictError('lock was reassigned since acquisition');
        }

        const record = decodeLockRecord(currentData);
        return encodeLockRecord({ fence: record.fence });
      });

      if (this.acquiredAt !== undefined) {
        this.metrics?.recordHoldDuration(this.provider.name, (Date.now() - this.acquiredAt) / 1000);
      }
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(`Lock released: holder=${this.id}`);
      }
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }

      this.metrics?.recordReleaseConflict(this.provider.name);
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(`Lock release skipped, already reassigned: holder=${this.id}`);
      }
    }

    this.versionTag = undefined;
    this.acquiredAt = undefined;
    this.metrics?.decrementActiveCount(this.provider.name);
  }
}
