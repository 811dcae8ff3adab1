// SPDX-License-Identifier: Apache-2.0

export * from './ConflictError';
export * from './LockAcquisitionAbortedError';
export * from './LockHeldError';
export * from './LockRecordEncodingError';
export * from './StorageProviderError';
