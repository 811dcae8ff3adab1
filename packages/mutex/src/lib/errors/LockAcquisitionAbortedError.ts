// SPDX-License-Identifier: Apache-2.0

/**
 * Raised when a blocking acquisition is cancelled by its caller before the lock was obtained.
 */
export class LockAcquisitionAbortedError extends Error {
  /**
   * The abort reason carried by the caller's signal.
   */
  public readonly reason: unknown;

  constructor(reason: unknown) {
    super(
      LockAcquisitionAbortedError.isTimeoutReason(reason)
        ? 'Lock acquisition timed out'
        : 'Lock acquisition was aborted',
      { cause: reason },
    );
    this.name = 'LockAcquisitionAbortedError';
    this.reason = reason;
    Object.setPrototypeOf(this, LockAcquisitionAbortedError.prototype);
  }

  /**
   * Checks if the acquisition was cut short by a deadline (e.g. `AbortSignal.timeout`)
   *
   * @returns True if the abort reason is a timeout
   */
  public isTimeout(): boolean {
    return LockAcquisitionAbortedError.isTimeoutReason(this.reason);
  }

  private static isTimeoutReason(reason: unknown): boolean {
    // AbortSignal.timeout() aborts with a DOMException named TimeoutError
    return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
  }
}
