// SPDX-License-Identifier: Apache-2.0

import { expect, use } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { type Logger, pino } from 'pino';
import { Registry } from 'prom-client';
import * as sinon from 'sinon';
import { setTimeout as delay } from 'timers/promises';

import { LockAcquisitionAbortedError } from '../../../../src/lib/errors/LockAcquisitionAbortedError';
import { LockRecordEncodingError } from '../../../../src/lib/errors/LockRecordEncodingError';
import { StorageProviderError } from '../../../../src/lib/errors/StorageProviderError';
import { LockMetricsService } from '../../../../src/lib/services/lockService/LockMetricsService';
import { decodeLockRecord } from '../../../../src/lib/services/lockService/LockRecord';
import { Mutex, type MutexOptions } from '../../../../src/lib/services/lockService/Mutex';
import { InMemoryStorageProvider } from '../../../../src/lib/services/storageProvider/InMemoryStorageProvider';
import type { ObjectLocation, StorageProvider, UpdateObjectFn } from '../../../../src/lib/types';

use(chaiAsPromised);

/**
 * Provider whose every call fails with the given error.
 */
class FailingStorageProvider implements StorageProvider {
  public readonly name = 'failing';
  public calls = 0;

  constructor(private readonly error: Error) {}

  async atomicUpdate(_location: ObjectLocation, _transform: UpdateObjectFn): Promise<string> {
    this.calls++;
    throw this.error;
  }
}

describe('Mutex', function () {
  this.timeout(10000);

  const location: ObjectLocation = { bucket: 'locks', key: 'jobs/nightly-report' };
  const backoff = { initialDelayMs: 1, maxDelayMs: 5, multiplier: 2, jitter: 0 };

  let logger: Logger;
  let provider: InMemoryStorageProvider;

  const newMutex = (options: MutexOptions = {}) => new Mutex(provider, location, logger, { backoff, ...options });
  const storedRecord = () => decodeLockRecord(provider.snapshot(location)?.data ?? Buffer.alloc(0));
  const writeRaw = (content: string) => provider.atomicUpdate(location, () => Buffer.from(content, 'utf8'));

  beforeEach(() => {
    logger = pino({ level: 'silent' });
    provider = new InMemoryStorageProvider(logger);
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('tryLock', () => {
    it('should acquire an absent lock object with fencing token 1', async () => {
      const mutex = newMutex();

      const result = await mutex.tryLock(30_000);

      expect(result).to.deep.equal({ acquired: true, fencingToken: 1 });
      expect(mutex.isHolding).to.be.true;
      expect(storedRecord().holder).to.equal(mutex.id);
      expect(storedRecord().fence).to.equal(1);
    });

    it('should write the lease expiry relative to the current time', async () => {
      sinon.useFakeTimers({ now: new Date('2024-05-01T10:00:00.000Z'), toFake: ['Date'] });
      const mutex = newMutex();

      await mutex.tryLock(5000);

      expect(storedRecord().expiresAt?.toISOString()).to.equal('2024-05-01T10:00:05.000Z');
    });

    it('should not acquire a lock held by another handle', async () => {
      const holder = newMutex();
      const contender = newMutex();
      await holder.tryLock(30_000);

      const result = await contender.tryLock(30_000);

      expect(result).to.deep.equal({ acquired: false });
      expect(contender.isHolding).to.be.false;
      expect(storedRecord().holder).to.equal(holder.id);
      expect(provider.snapshot(location)?.versionTag).to.equal('1');
    });

    it('should not be reentrant', async () => {
      const mutex = newMutex();
      await mutex.tryLock(30_000);

      expect(await mutex.tryLock(30_000)).to.deep.equal({ acquired: false });
      expect(storedRecord().fence).to.equal(1);
    });

    it('should leave a record held by a live foreign holder untouched', async () => {
      const expires = new Date(Date.now() + 10_000).toISOString();
      await writeRaw(`{"id":"another-host","expires":"${expires}","fence":7}`);

      const result = await newMutex().tryLock(30_000);

      expect(result).to.deep.equal({ acquired: false });
      expect(storedRecord()).to.deep.equal({ holder: 'another-host', expiresAt: new Date(expires), fence: 7 });
    });

    it('should continue the fence sequence of an existing record', async () => {
      await writeRaw('{"fence":41}');

      expect(await newMutex().tryLock(30_000)).to.deep.equal({ acquired: true, fencingToken: 42 });
    });

    it('should take over a lock whose lease has expired', async () => {
      const clock = sinon.useFakeTimers({ now: new Date('2024-05-01T10:00:00.000Z'), toFake: ['Date'] });
      const crashed = newMutex();
      const successor = newMutex();
      await crashed.tryLock(1000);

      clock.tick(999);
      expect(await successor.tryLock(1000)).to.deep.equal({ acquired: false });

      clock.tick(1);
      expect(await successor.tryLock(1000)).to.deep.equal({ acquired: true, fencingToken: 2 });
      expect(storedRecord().holder).to.equal(successor.id);
    });

    it('should reject a non-positive lease', async () => {
      const mutex = newMutex();

      await expect(mutex.tryLock(0)).to.be.rejectedWith(RangeError, 'leaseMs must be a positive number, got 0');
      await expect(mutex.tryLock(Number.POSITIVE_INFINITY)).to.be.rejectedWith(RangeError);
      expect(provider.snapshot(location)).to.be.undefined;
    });

    it('should reject a lease whose expiry is not a representable date', async () => {
      const mutex = newMutex();

      await expect(mutex.tryLock(1e16)).to.be.rejectedWith(
        RangeError,
        'leaseMs 10000000000000000 puts the expiry beyond the representable date range',
      );
      expect(provider.snapshot(location)).to.be.undefined;
    });

    it('should report unreadable lock content', async () => {
      await writeRaw('garbage');

      await expect(newMutex().tryLock(30_000)).to.be.rejectedWith(LockRecordEncodingError);
    });

    it('should propagate storage failures', async () => {
      const failure = new StorageProviderError('failing', 'read', new Error('connection reset'));
      const mutex = new Mutex(new FailingStorageProvider(failure), location, logger, { backoff });

      await expect(mutex.tryLock(30_000)).to.be.rejectedWith(failure);
      expect(mutex.isHolding).to.be.false;
    });
  });

  describe('lock', () => {
    it('should acquire immediately when the lock is free', async () => {
      expect(await newMutex().lock(30_000)).to.equal(1);
    });

    it('should wait until the holder releases the lock', async () => {
      const holder = newMutex();
      const waiter = newMutex();
      await holder.tryLock(30_000);

      const acquisition = waiter.lock(30_000);
      await delay(20);
      expect(waiter.isHolding).to.be.false;

      await holder.unlock();

      expect(await acquisition).to.equal(2);
      expect(storedRecord().holder).to.equal(waiter.id);
    });

    it('should give every holder exclusive access with increasing fencing tokens', async () => {
      const workers = 3;
      const cycles = 5;
      const tokens: number[] = [];
      let active = 0;
      let maxActive = 0;

      const work = async (mutex: Mutex) => {
        for (let i = 0; i < cycles; i++) {
          const token = await mutex.lock(5_000);
          active++;
          maxActive = Math.max(maxActive, active);
          tokens.push(token);
          await delay(2);
          active--;
          await mutex.unlock();
        }
      };

      await Promise.all(Array.from({ length: workers }, () => work(newMutex())));

      expect(maxActive).to.equal(1);
      expect(tokens).to.deep.equal(Array.from({ length: workers * cycles }, (_, i) => i + 1));
      expect(storedRecord()).to.deep.equal({ fence: workers * cycles });
    });

    it('should stop waiting when the signal aborts', async () => {
      await newMutex().tryLock(30_000);
      const controller = new AbortController();
      const waiter = newMutex();

      const acquisition = waiter.lock(30_000, controller.signal);
      setTimeout(() => controller.abort(), 20);

      const error = await expect(acquisition).to.be.rejectedWith(LockAcquisitionAbortedError);
      expect(error.message).to.equal('Lock acquisition was aborted');
      expect(waiter.isHolding).to.be.false;
    });

    it('should report a deadline as a timeout', async () => {
      await newMutex().tryLock(30_000);

      const error = await expect(newMutex().lock(30_000, AbortSignal.timeout(30))).to.be.rejectedWith(
        LockAcquisitionAbortedError,
        'Lock acquisition timed out',
      );
      expect(error).to.be.instanceOf(LockAcquisitionAbortedError);
      if (error instanceof LockAcquisitionAbortedError) {
        expect(error.isTimeout()).to.be.true;
      }
    });

    it('should not touch storage when the signal is already aborted', async () => {
      const atomicUpdate = sinon.spy(provider, 'atomicUpdate');

      await expect(newMutex().lock(30_000, AbortSignal.abort())).to.be.rejectedWith(LockAcquisitionAbortedError);
      expect(atomicUpdate.called).to.be.false;
    });

    it('should not retry storage failures', async () => {
      const failing = new FailingStorageProvider(new StorageProviderError('failing', 'write', new Error('denied'), 403));
      const mutex = new Mutex(failing, location, logger, { backoff });

      await expect(mutex.lock(30_000)).to.be.rejectedWith(StorageProviderError, 'failing write failed: denied');
      expect(failing.calls).to.equal(1);
    });

    it('should not retry unreadable lock content', async () => {
      await writeRaw('[]');
      const atomicUpdate = sinon.spy(provider, 'atomicUpdate');

      await expect(newMutex().lock(30_000)).to.be.rejectedWith(LockRecordEncodingError, 'expected a JSON object');
      expect(atomicUpdate.calledOnce).to.be.true;
    });
  });

  describe('unlock', () => {
    it('should clear the holder and keep the fence', async () => {
      const mutex = newMutex();
      await mutex.lock(30_000);

      await mutex.unlock();

      expect(mutex.isHolding).to.be.false;
      expect(provider.snapshot(location)?.data.toString('utf8')).to.equal('{"fence":1}');
    });

    it('should do nothing when the handle holds nothing', async () => {
      const atomicUpdate = sinon.spy(provider, 'atomicUpdate');

      await newMutex().unlock();

      expect(atomicUpdate.called).to.be.false;
    });

    it('should leave the record alone after the lock was taken over', async () => {
      const clock = sinon.useFakeTimers({ now: new Date('2024-05-01T10:00:00.000Z'), toFake: ['Date'] });
      const stale = newMutex();
      const successor = newMutex();
      await stale.tryLock(1000);
      clock.tick(1500);
      await successor.tryLock(1000);
      const successorRecord = storedRecord();

      await stale.unlock();

      expect(stale.isHolding).to.be.false;
      expect(successor.isHolding).to.be.true;
      expect(storedRecord()).to.deep.equal(successorRecord);
      expect(storedRecord().holder).to.equal(successor.id);

      const atomicUpdate = sinon.spy(provider, 'atomicUpdate');
      await stale.unlock();
      expect(atomicUpdate.called).to.be.false;
    });

    it('should keep the claim when the release fails', async () => {
      const mutex = newMutex();
      await mutex.tryLock(30_000);
      const failure = new StorageProviderError('memory', 'write', new Error('timeout'));
      const atomicUpdate = sinon.stub(provider, 'atomicUpdate');
      atomicUpdate.callThrough();
      atomicUpdate.onFirstCall().rejects(failure);

      await expect(mutex.unlock()).to.be.rejectedWith(failure);
      expect(mutex.isHolding).to.be.true;

      await mutex.unlock();
      expect(atomicUpdate.calledTwice).to.be.true;
      expect(mutex.isHolding).to.be.false;
      expect(storedRecord()).to.deep.equal({ fence: 1 });
    });
  });

  describe('seed', () => {
    it('should create an absent lock object with an empty record', async () => {
      await Mutex.seed(provider, location);

      expect(provider.snapshot(location)?.data.toString('utf8')).to.equal('{}');
    });

    it('should leave an existing lock object untouched', async () => {
      const holder = newMutex();
      await holder.tryLock(30_000);

      await Mutex.seed(provider, location);

      expect(provider.snapshot(location)?.versionTag).to.equal('1');
      expect(storedRecord().holder).to.equal(holder.id);
    });

    it('should tolerate concurrent seeding', async () => {
      await Promise.all([Mutex.seed(provider, location), Mutex.seed(provider, location)]);

      expect(provider.snapshot(location)?.data.toString('utf8')).to.equal('{}');
    });

    it('should propagate storage failures', async () => {
      const failure = new StorageProviderError('failing', 'read', new Error('no route to host'));

      await expect(Mutex.seed(new FailingStorageProvider(failure), location)).to.be.rejectedWith(failure);
    });
  });

  describe('metrics', () => {
    let registry: Registry;
    let metrics: LockMetricsService;

    const metricValue = async (name: string, labels: Record<string, string>): Promise<number> => {
      const metric = (await registry.getMetricsAsJSON()).find((m) => m.name === name);
      if (!metric) return 0;
      const value = metric.values.find((v) => Object.entries(labels).every(([key, val]) => v.labels[key] === val));
      return value?.value ?? 0;
    };

    beforeEach(() => {
      registry = new Registry();
      metrics = new LockMetricsService(registry);
    });

    afterEach(() => {
      registry.clear();
    });

    it('should count acquisitions by outcome', async () => {
      const holder = newMutex({ metrics });
      const contender = newMutex({ metrics });

      await holder.tryLock(30_000);
      await contender.tryLock(30_000);

      expect(
        await metricValue('objmutex_lock_acquisitions_total', { provider: 'memory', status: 'success' }),
      ).to.equal(1);
      expect(
        await metricValue('objmutex_lock_acquisitions_total', { provider: 'memory', status: 'contended' }),
      ).to.equal(1);
    });

    it('should track held locks', async () => {
      const mutex = newMutex({ metrics });

      await mutex.lock(30_000);
      expect(await metricValue('objmutex_lock_active_count', { provider: 'memory' })).to.equal(1);

      await mutex.unlock();
      expect(await metricValue('objmutex_lock_active_count', { provider: 'memory' })).to.equal(0);
    });

    it('should count releases that found the lock reassigned', async () => {
      const clock = sinon.useFakeTimers({ now: new Date('2024-05-01T10:00:00.000Z'), toFake: ['Date'] });
      const stale = newMutex({ metrics });
      await stale.tryLock(1000);
      clock.tick(2000);
      await newMutex().tryLock(1000);

      await stale.unlock();

      expect(await metricValue('objmutex_lock_release_conflicts_total', { provider: 'memory' })).to.equal(1);
    });

    it('should count failed attempts', async () => {
      await writeRaw('{"fence":"x"}');

      await expect(newMutex({ metrics }).tryLock(30_000)).to.be.rejectedWith(LockRecordEncodingError);
      expect(await metricValue('objmutex_lock_acquisitions_total', { provider: 'memory', status: 'fail' })).to.equal(
        1,
      );
    });
  });
});
