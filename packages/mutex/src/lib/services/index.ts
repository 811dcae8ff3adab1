// SPDX-License-Identifier: Apache-2.0

export * from './lockService/BackoffPolicy';
export * from './lockService/LockMetricsService';
export * from './lockService/LockRecord';
export * from './lockService/Mutex';
export * from './storageProvider/InMemoryStorageProvider';
export * from './storageProvider/RedisStorageProvider';
export * from './storageProvider/S3StorageProvider';
