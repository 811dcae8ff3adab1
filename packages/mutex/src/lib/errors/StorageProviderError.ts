// SPDX-License-Identifier: Apache-2.0

export type StorageOperation = 'read' | 'write';

/**
 * Raised by storage providers for every failure other than a lost write race:
 * transport errors, authentication failures, malformed responses.
 */
export class StorageProviderError extends Error {
  /**
   * Name of the provider that failed.
   */
  public readonly provider: string;

  /**
   * The storage operation that failed.
   */
  public readonly operation: StorageOperation;

  /**
   * HTTP status reported by the backend, when there is one.
   */
  public readonly statusCode: number | undefined;

  constructor(provider: string, operation: StorageOperation, cause: unknown, statusCode?: number) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${provider} ${operation} failed: ${reason}`, { cause });
    this.name = 'StorageProviderError';
    this.provider = provider;
    this.operation = operation;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, StorageProviderError.prototype);
  }

  /**
   * Checks if the backend rejected the request for lack of permissions
   *
   * @returns True if the backend answered 401 or 403
   */
  public isAccessDenied(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }

  /**
   * Checks if the backend is throttling requests
   *
   * @returns True if the backend answered 429 or 503
   */
  public isThrottled(): boolean {
    return this.statusCode === 429 || this.statusCode === 503;
  }
}
