// SPDX-License-Identifier: Apache-2.0

import { Counter, Gauge, Histogram, type Registry } from 'prom-client';

/**
 * Status label values for lock acquisition attempts.
 */
export type LockAcquisitionStatus = 'success' | 'contended' | 'fail';

/**
 * Service responsible for managing all lock-related metrics.
 * Every metric is labelled with the storage provider backing the lock.
 */
export class LockMetricsService {
  public static readonly METRIC_NAMES = [
    'objmutex_lock_acquisitions_total',
    'objmutex_lock_wait_time_seconds',
    'objmutex_lock_hold_duration_seconds',
    'objmutex_lock_release_conflicts_total',
    'objmutex_lock_active_count',
  ] as const;

  /**
   * Counter tracking tryLock outcomes by status.
   * A high share of `contended` indicates many processes competing for the same lock.
   */
  private readonly acquisitionsCounter: Counter;

  /**
   * Histogram tracking time from a blocking lock() call to acquisition.
   */
  private readonly waitTimeHistogram: Histogram;

  /**
   * Histogram tracking time a lock is held from acquisition to release.
   * Values near the lease length mean holders are at risk of losing their lease mid-work.
   */
  private readonly holdDurationHistogram: Histogram;

  /**
   * Counter tracking releases that found the lock already reassigned after lease expiry.
   */
  private readonly releaseConflictsCounter: Counter;

  /**
   * Gauge tracking locks currently held by this process.
   */
  private readonly activeCountGauge: Gauge;

  constructor(register: Registry) {
    // Remove existing metrics if they exist (for hot reloading scenarios)
    LockMetricsService.METRIC_NAMES.forEach((name) => register.removeSingleMetric(name));

    this.acquisitionsCounter = new Counter({
      name: 'objmutex_lock_acquisitions_total',
      help: 'Lock acquisition attempts. Status: success, contended, fail.',
      labelNames: ['provider', 'status'],
      registers: [register],
    });

    this.waitTimeHistogram = new Histogram({
      name: 'objmutex_lock_wait_time_seconds',
      help: 'Time from a blocking lock call to acquisition. High values indicate contention.',
      labelNames: ['provider'],
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 300],
      registers: [register],
    });

    this.holdDurationHistogram = new Histogram({
      name: 'objmutex_lock_hold_duration_seconds',
      help: 'Time a lock is held from acquisition to release.',
      labelNames: ['provider'],
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 300],
      registers: [register],
    });

    this.releaseConflictsCounter = new Counter({
      name: 'objmutex_lock_release_conflicts_total',
      help: 'Releases that found the lock already reassigned to another holder.',
      labelNames: ['provider'],
      registers: [register],
    });

    this.activeCountGauge = new Gauge({
      name: 'objmutex_lock_active_count',
      help: 'Locks currently held by this process.',
      labelNames: ['provider'],
      registers: [register],
    });
  }

  /**
   * Records the outcome of an acquisition attempt.
   *
   * @param provider - The storage provider name.
   * @param status - The attempt outcome.
   */
  recordAcquisition(provider: string, status: LockAcquisitionStatus): void {
    this.acquisitionsCounter.labels(provider, status).inc();
  }

  /**
   * Records the time spent in a blocking lock() call.
   *
   * @param provider - The storage provider name.
   * @param seconds - The wait time in seconds.
   */
  recordWaitTime(provider: string, seconds: number): void {
    this.waitTimeHistogram.labels(provider).observe(seconds);
  }

  /**
   * Records the duration a lock was held.
   *
   * @param provider - The storage provider name.
   * @param seconds - The hold duration in seconds.
   */
  recordHoldDuration(provider: string, seconds: number): void {
    this.holdDurationHistogram.labels(provider).observe(seconds);
  }

  /**
   * Records a release that found the lock reassigned.
   *
   * @param provider - The storage provider name.
   */
  recordReleaseConflict(provider: string): void {
    this.releaseConflictsCounter.labels(provider).inc();
  }

  incrementActiveCount(provider: string): void {
    this.activeCountGauge.labels(provider).inc();
  }

  decrementActiveCount(provider: string): void {
    this.activeCountGauge.labels(provider).dec();
  }
}
