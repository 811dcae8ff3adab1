// SPDX-License-Identifier: Apache-2.0

import { LockRecordEncodingError } from '../../errors/LockRecordEncodingError';
import type { LockRecord } from '../../types';

/**
 * JSON layout of a lock object. Unset fields are omitted.
 */
interface PersistedLockRecord {
  id?: string;
  expires?: string;
  fence?: number;
}

/**
 * The record of a lock object that has never been acquired.
 */
export const EMPTY_LOCK_RECORD: Readonly<LockRecord> = Object.freeze({ fence: 0 });

function isValidFence(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Decodes the content of a lock object.
 *
 * @param data - Raw object content. Empty content decodes to {@link EMPTY_LOCK_RECORD}.
 * @returns The decoded record.
 * @throws {LockRecordEncodingError} if the content is not a well-formed lock record.
 */
export function decodeLockRecord(data: Buffer): LockRecord {
  if (data.length === 0) {
    return { ...EMPTY_LOCK_RECORD };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data.toString('utf8'));
  } catch (error) {
    throw new LockRecordEncodingError('content is not valid JSON', { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new LockRecordEncodingError('expected a JSON object');
  }

  const record: LockRecord = { fence: 0 };

  const id = 'id' in parsed ? parsed.id : undefined;
  if (typeof id === 'string') {
    if (id !== '') record.holder = id;
  } else if (id !== undefined && id !== null) {
    throw new LockRecordEncodingError(`"id" must be a string, got ${typeof id}`);
  }

  const expires = 'expires' in parsed ? parsed.expires : undefined;
  if (typeof expires === 'string') {
    const expiresAt = new Date(expires);
    if (Number.isNaN(expiresAt.getTime())) {
      throw new LockRecordEncodingError(`"expires" is not a valid timestamp: ${expires}`);
    }
    record.expiresAt = expiresAt;
  } else if (expires !== undefined && expires !== null) {
    throw new LockRecordEncodingError(`"expires" must be a timestamp string, got ${typeof expires}`);
  }

  const fence = 'fence' in parsed ? parsed.fence : undefined;
  if (isValidFence(fence)) {
    record.fence = fence;
  } else if (fence !== undefined && fence !== null) {
    throw new LockRecordEncodingError(`"fence" must be a non-negative integer, got ${JSON.stringify(fence)}`);
  }

  return record;
}

/**
 * Encodes a lock record into the content of a lock object.
 *
 * @param record - The record to encode.
 * @returns UTF-8 JSON, e.g. `{"id":"…","expires":"2024-05-01T10:00:05.000Z","fence":3}`.
 * @throws {LockRecordEncodingError} if the record carries an invalid fence or expiry.
 */
export function encodeLockRecord(record: LockRecord): Buffer {
  if (!isValidFence(record.fence)) {
    throw new LockRecordEncodingError(`cannot encode fence ${record.fence}`);
  }

  const persisted: PersistedLockRecord = {};
  if (record.holder) {
    persisted.id = record.holder;
  }
  if (record.expiresAt) {
    if (Number.isNaN(record.expiresAt.getTime())) {
      throw new LockRecordEncodingError('cannot encode an invalid expiry');
    }
    persisted.expires = record.expiresAt.toISOString();
  }
  if (record.fence > 0) {
    persisted.fence = record.fence;
  }

  return Buffer.from(JSON.stringify(persisted), 'utf8');
}

/**
 * Whether a record is held by a live holder at the given instant.
 *
 * A record whose expiry has passed is not held, even though its holder was never cleared.
 *
 * @param record - The lock record.
 * @param now - Evaluation instant in epoch milliseconds.
 */
export function isLockHeld(record: LockRecord, now: number = Date.now()): boolean {
  return !!record.holder && record.expiresAt !== undefined && record.expiresAt.getTime() > now;
}
